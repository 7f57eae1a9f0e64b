import { createLogger, loadEnvFiles, type Logger } from '@sora-video/client';

export interface CliEnvironment {
  envPath: string | undefined;
  logger: Logger;
}

/**
 * Loads .env before the logger exists so that LOG_LEVEL from the file applies.
 */
export function prepareCli(cwd: string = process.cwd()): CliEnvironment {
  const envPath = loadEnvFiles(cwd);
  const logger = createLogger(process.env.LOG_LEVEL ?? 'info', 'sora-video');
  if (envPath) {
    logger.debug({ envPath }, 'Loaded .env');
  }
  return { envPath, logger };
}

export function commandLogger(base: Logger, debug: boolean): Logger {
  return debug ? base.child({}, { level: 'debug' }) : base;
}
