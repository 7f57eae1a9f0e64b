#!/usr/bin/env node
import { cac } from 'cac';
import { PollCancelledError, VideoClientError, withVideoClient, type Logger, type VideoGenerationClient } from '@sora-video/client';
import { deleteJob, generateVideo, listJobs, monitorAndDownload } from './commands.js';
import {
  generateOptionsSchema,
  globalOptionsSchema,
  listOptionsSchema,
  parseOptions,
  statusOptionsSchema
} from './options.js';
import { commandLogger, prepareCli } from './setup.js';

const { logger } = prepareCli();

const shutdown = new AbortController();

const cli = cac('sora-video');

cli.option('--debug', 'Enable debug logging (logs request payloads and response bodies)');

async function withClient<T>(
  rawOptions: unknown,
  fn: (client: VideoGenerationClient, logger: Logger) => Promise<T>
): Promise<T> {
  const { debug } = parseOptions(globalOptionsSchema, rawOptions);
  const commandLog = commandLogger(logger, debug);
  return withVideoClient({}, (client) => fn(client, commandLog), { logger: commandLog });
}

cli
  .command('generate', 'Create a video generation job, wait for it and download the result')
  .option('--prompt <text>', 'Text prompt for the video')
  .option('--width <px>', 'Video width')
  .option('--height <px>', 'Video height')
  .option('--seconds <n>', 'Video duration in seconds (1-20)')
  .option('--variants <n>', 'Number of variants to generate')
  .option('--output-dir <dir>', 'Directory for downloaded files')
  .option('--interval <seconds>', 'Seconds between status requests')
  .option('--timeout <seconds>', 'Give up polling after this many seconds')
  .option('--no-gif', 'Skip GIF downloads')
  .action(async (rawOptions: unknown) => {
    const options = parseOptions(generateOptionsSchema, rawOptions);
    await withClient(rawOptions, (client, logger) =>
      generateVideo(
        client,
        {
          prompt: options.prompt,
          width: options.width,
          height: options.height,
          durationSeconds: options.seconds,
          variantCount: options.variants
        },
        {
          outputDir: options.outputDir,
          intervalMs: options.interval,
          timeoutMs: options.timeout,
          gif: options.gif,
          signal: shutdown.signal
        },
        logger
      )
    );
  });

cli
  .command('status <jobId>', 'Wait for an existing job and download its result')
  .option('--output-dir <dir>', 'Directory for downloaded files')
  .option('--interval <seconds>', 'Seconds between status requests')
  .option('--timeout <seconds>', 'Give up polling after this many seconds')
  .option('--no-gif', 'Skip GIF downloads')
  .action(async (jobId: string, rawOptions: unknown) => {
    const options = parseOptions(statusOptionsSchema, rawOptions);
    await withClient(rawOptions, (client, logger) =>
      monitorAndDownload(
        client,
        jobId,
        {
          outputDir: options.outputDir,
          intervalMs: options.interval,
          timeoutMs: options.timeout,
          gif: options.gif,
          signal: shutdown.signal
        },
        logger
      )
    );
  });

cli
  .command('list', 'List video generation jobs')
  .option('--limit <n>', 'Maximum number of jobs to list')
  .action(async (rawOptions: unknown) => {
    const { limit } = parseOptions(listOptionsSchema, rawOptions);
    await withClient(rawOptions, (client, logger) => listJobs(client, limit, logger));
  });

cli
  .command('delete <jobId>', 'Delete a video generation job')
  .action(async (jobId: string, rawOptions: unknown) => {
    await withClient(rawOptions, (client, logger) => deleteJob(client, jobId, logger));
  });

cli.help();

process.on('SIGINT', () => {
  logger.info('Interrupted, stopping after the current request');
  shutdown.abort();
});

process.on('SIGTERM', () => {
  logger.info('Terminated, stopping after the current request');
  shutdown.abort();
});

async function main(): Promise<void> {
  cli.parse(process.argv, { run: false });
  if (!cli.matchedCommand) {
    if (!cli.options.help) cli.outputHelp();
    return;
  }
  await cli.runMatchedCommand();
}

main().catch((error: unknown) => {
  if (error instanceof PollCancelledError) {
    logger.warn({ jobId: error.jobId }, 'Polling cancelled');
    process.exit(130);
  }
  if (error instanceof VideoClientError) {
    logger.error({ error: error.message, type: error.name }, 'Command failed');
  } else {
    logger.fatal({ error }, 'Fatal error');
  }
  process.exit(1);
});
