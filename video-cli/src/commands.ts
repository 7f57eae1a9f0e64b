import { join } from 'node:path';
import {
  MAX_DURATION_SECONDS,
  MIN_DURATION_SECONDS,
  ValidationError,
  VideoClientError,
  contentFileName,
  findSupportedResolution,
  formatSupportedResolutions,
  type GenerationRequest,
  type JobList,
  type Logger,
  type VideoGenerationClient
} from '@sora-video/client';

export type CliClient = Pick<
  VideoGenerationClient,
  'createJob' | 'pollUntilComplete' | 'saveJobContent' | 'saveContent' | 'listJobs' | 'deleteJob'
>;

export interface DownloadOptions {
  outputDir: string;
  intervalMs: number;
  timeoutMs: number;
  gif: boolean;
  signal?: AbortSignal;
}

/**
 * Pulls duration and variant count back into the range of the requested
 * resolution, warning about every change. An unsupported resolution cannot
 * be fixed up and is rejected.
 */
export function clampToResolution(request: GenerationRequest, logger: Logger): GenerationRequest {
  const resolution = findSupportedResolution(request.width, request.height);
  if (!resolution) {
    throw new ValidationError(
      'UnsupportedResolution',
      'resolution',
      `Resolution ${request.width}x${request.height} is not supported. Supported resolutions: ${formatSupportedResolutions()}`
    );
  }

  let { durationSeconds, variantCount } = request;

  if (durationSeconds > MAX_DURATION_SECONDS) {
    logger.warn({ requested: durationSeconds, max: MAX_DURATION_SECONDS }, 'Duration exceeds the maximum, clamping');
    durationSeconds = MAX_DURATION_SECONDS;
  } else if (durationSeconds < MIN_DURATION_SECONDS) {
    logger.warn({ requested: durationSeconds, min: MIN_DURATION_SECONDS }, 'Duration below the minimum, clamping');
    durationSeconds = MIN_DURATION_SECONDS;
  }

  if (variantCount > resolution.maxVariants) {
    logger.warn(
      { requested: variantCount, max: resolution.maxVariants, tier: resolution.tier },
      'Variant count exceeds the tier maximum, clamping'
    );
    variantCount = resolution.maxVariants;
  } else if (variantCount < 1) {
    variantCount = 1;
  }

  return { ...request, durationSeconds, variantCount };
}

export async function monitorAndDownload(
  client: CliClient,
  jobId: string,
  options: DownloadOptions,
  logger: Logger
): Promise<string[]> {
  logger.info({ jobId, intervalMs: options.intervalMs }, 'Monitoring job');

  const { job } = await client.pollUntilComplete(jobId, {
    intervalMs: options.intervalMs,
    timeoutMs: options.timeoutMs,
    signal: options.signal
  });

  if (job.status !== 'succeeded') {
    logger.error({ jobId, status: job.status, reason: job.statusMessage }, 'Job did not succeed');
    return [];
  }

  const saved = await client.saveJobContent(job, options.outputDir, 'video');
  const files = saved.map((entry) => entry.path);

  if (options.gif) {
    for (const generation of job.generations) {
      const path = join(options.outputDir, contentFileName(generation.id, 'gif'));
      try {
        await client.saveContent(generation.id, 'gif', path);
        files.push(path);
      } catch (error) {
        if (!(error instanceof VideoClientError)) throw error;
        logger.warn({ generationId: generation.id, error: error.message }, 'Failed to download GIF');
      }
    }
  }

  logger.info({ jobId, files }, 'Downloaded job output');
  return files;
}

export async function generateVideo(
  client: CliClient,
  request: GenerationRequest,
  options: DownloadOptions,
  logger: Logger
): Promise<string[]> {
  const clamped = clampToResolution(request, logger);
  logger.info(
    { prompt: clamped.prompt, resolution: `${clamped.width}x${clamped.height}`, durationSeconds: clamped.durationSeconds },
    'Creating video generation job'
  );

  const job = await client.createJob(clamped);
  return monitorAndDownload(client, job.id, options, logger);
}

export async function listJobs(client: CliClient, limit: number, logger: Logger): Promise<JobList> {
  const list = await client.listJobs({ limit });

  if (!list.data.length) {
    logger.info('No jobs found');
    return list;
  }

  logger.info({ count: list.data.length, hasMore: list.hasMore }, 'Found jobs');
  for (const job of list.data) {
    logger.info(
      { jobId: job.id, status: job.status, createdAt: job.createdAt.toISOString() },
      'Job'
    );
    if (job.status === 'succeeded') {
      for (const generation of job.generations) {
        logger.info(
          {
            generationId: generation.id,
            resolution: `${generation.width}x${generation.height}`,
            durationSeconds: generation.durationSeconds
          },
          'Generation'
        );
      }
    }
  }
  return list;
}

export async function deleteJob(client: CliClient, jobId: string, logger: Logger): Promise<void> {
  logger.info({ jobId }, 'Deleting job');
  await client.deleteJob(jobId);
}
