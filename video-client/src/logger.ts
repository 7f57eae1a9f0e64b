import { pino, type DestinationStream, type Logger } from 'pino';

export type { Logger };

// Debug output carries request headers; credentials never reach the sink
export const REDACTED_PATHS = [
  'headers["api-key"]',
  'headers.authorization',
  'headers.Authorization'
];

export function createLogger(
  level: string = process.env.LOG_LEVEL ?? 'info',
  name = 'video-client',
  destination?: DestinationStream
): Logger {
  const options = {
    name,
    level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger();
