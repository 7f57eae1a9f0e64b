import type { Logger } from 'pino';
import { resolveClientConfig, type ClientConfig, type ClientConfigInput } from './config.js';
import { ContentFetcher, type ContentDestination, type SavedContent } from './content.js';
import { logger as defaultLogger } from './logger.js';
import { toWirePayload } from './payload.js';
import { pollUntilComplete, type PollOptions, type PollResult } from './poller.js';
import { VideoGenerationTransport, type FetchLike } from './transport.js';
import type { ContentKind, Generation, GenerationRequest, Job, JobList } from './types.js';
import { assertValidGenerationRequest } from './validation.js';

export interface VideoClientOptions {
  fetch?: FetchLike;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
}

/**
 * Client for the Azure OpenAI Sora video generation API.
 *
 * Holds no state besides its configuration and the transport; every job or
 * generation it returns is a fresh snapshot from the service.
 */
export class VideoGenerationClient {
  readonly config: ClientConfig;
  private readonly transport: VideoGenerationTransport;
  private readonly content: ContentFetcher;
  private readonly logger: Logger;

  constructor(config: ClientConfigInput = {}, options: VideoClientOptions = {}) {
    this.config = resolveClientConfig(config, options.env);
    this.logger = options.logger ?? defaultLogger;
    this.transport = new VideoGenerationTransport(this.config, { fetch: options.fetch, logger: this.logger });
    this.content = new ContentFetcher(this.transport, this.logger);
  }

  /**
   * Validates the request locally, then submits it. An invalid request
   * throws a ValidationError without touching the network.
   */
  async createJob(request: GenerationRequest): Promise<Job> {
    assertValidGenerationRequest(request);
    const payload = toWirePayload(request, this.config.deploymentName);

    const job = await this.transport.createJob(payload);
    this.logger.info({ jobId: job.id, status: job.status }, 'Video generation job created');
    return job;
  }

  getJob(jobId: string): Promise<Job> {
    return this.transport.getJob(jobId);
  }

  listJobs(options: { limit?: number } = {}): Promise<JobList> {
    return this.transport.listJobs(options);
  }

  async deleteJob(jobId: string): Promise<void> {
    await this.transport.deleteJob(jobId);
    this.logger.info({ jobId }, 'Video generation job deleted');
  }

  getGeneration(generationId: string): Promise<Generation> {
    return this.transport.getGeneration(generationId);
  }

  getContent(generationId: string, kind: ContentKind): Promise<Buffer> {
    return this.transport.fetchContent(generationId, kind);
  }

  saveContent(generationId: string, kind: ContentKind, destination: ContentDestination): Promise<number> {
    return this.content.save(generationId, kind, destination);
  }

  saveJobContent(job: Job, outputDir: string, kind: ContentKind = 'video'): Promise<SavedContent[]> {
    return this.content.saveJobContent(job, outputDir, kind);
  }

  pollUntilComplete(jobId: string, options: PollOptions = {}): Promise<PollResult> {
    return pollUntilComplete(this.transport, jobId, { logger: this.logger, ...options });
  }

  close(): void {
    this.transport.close();
  }
}

/**
 * Runs `fn` with a fresh client and closes it on every exit path.
 */
export async function withVideoClient<T>(
  config: ClientConfigInput,
  fn: (client: VideoGenerationClient) => Promise<T>,
  options: VideoClientOptions = {}
): Promise<T> {
  const client = new VideoGenerationClient(config, options);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}
