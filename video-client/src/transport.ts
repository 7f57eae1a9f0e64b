import type { Logger } from 'pino';
import { ZodError } from 'zod';
import type { ClientConfig } from './config.js';
import {
  ClientClosedError,
  ServiceError,
  TransportError,
  VideoClientError,
  errorFromResponse,
  parseJsonBody
} from './errors.js';
import { parseGeneration, parseJob, parseJobList } from './resources.js';
import type { ContentKind, Generation, Job, JobList, WireGenerationPayload } from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface TransportOptions {
  fetch?: FetchLike;
  logger: Logger;
}

interface RequestOptions {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  params?: Record<string, string>;
  body?: unknown;
}

const GENERATIONS_PATH = 'openai/v1/video/generations/';

export const DEFAULT_LIST_LIMIT = 50;

// Settles with `work`, or rejects as soon as `signal` aborts
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Thin binding over the video generation REST endpoints. One instance owns
 * the in-flight requests it issues; close() aborts them and refuses new ones.
 * No call is retried here.
 */
export class VideoGenerationTransport {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(
    private readonly config: ClientConfig,
    options: TransportOptions
  ) {
    this.baseUrl = new URL(GENERATIONS_PATH, config.endpoint).toString();
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async createJob(payload: WireGenerationPayload): Promise<Job> {
    return this.request({ method: 'POST', path: 'jobs', body: payload }, (response) =>
      this.readResource(response, parseJob)
    );
  }

  async getJob(jobId: string): Promise<Job> {
    return this.request({ method: 'GET', path: `jobs/${encodeURIComponent(jobId)}` }, (response) =>
      this.readResource(response, parseJob)
    );
  }

  async listJobs(options: { limit?: number } = {}): Promise<JobList> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    return this.request({ method: 'GET', path: 'jobs', params: { limit: String(limit) } }, (response) =>
      this.readResource(response, parseJobList)
    );
  }

  async deleteJob(jobId: string): Promise<void> {
    // 204 has no body; a 200 may echo the deleted job
    await this.request({ method: 'DELETE', path: `jobs/${encodeURIComponent(jobId)}` }, (response) =>
      response.arrayBuffer()
    );
  }

  async getGeneration(generationId: string): Promise<Generation> {
    return this.request({ method: 'GET', path: encodeURIComponent(generationId) }, (response) =>
      this.readResource(response, parseGeneration)
    );
  }

  async fetchContent(generationId: string, kind: ContentKind): Promise<Buffer> {
    const content = await this.request(
      { method: 'GET', path: `${encodeURIComponent(generationId)}/content/${kind}` },
      async (response) => Buffer.from(await response.arrayBuffer())
    );
    this.logger.debug({ generationId, kind, bytes: content.length }, 'Downloaded content');
    return content;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  buildUrl(path: string, params: Record<string, string> = {}): string {
    const url = new URL(path, this.baseUrl);
    url.searchParams.set('api-version', this.config.apiVersion);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  /**
   * Sends one request and reads its body with `read`. The timeout and close()
   * cover the whole exchange, body included.
   */
  private async request<T>(options: RequestOptions, read: (response: Response) => Promise<T>): Promise<T> {
    if (this.closed) {
      throw new ClientClosedError();
    }

    const url = this.buildUrl(options.path, options.params);
    const headers: Record<string, string> = { 'api-key': this.config.apiKey };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    this.logger.debug({ method: options.method, url, headers, payload: options.body }, 'Sending request');

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    this.inFlight.add(controller);

    try {
      const response = await untilAborted(
        this.fetchImpl(url, {
          method: options.method,
          headers,
          body: options.body === undefined ? undefined : JSON.stringify(options.body),
          signal: controller.signal
        }),
        controller.signal
      );

      if (!response.ok) {
        const body = await untilAborted(response.text(), controller.signal);
        this.logger.warn({ method: options.method, url, status: response.status }, 'Request rejected');
        this.logger.debug({ status: response.status, body }, 'Error response body');
        throw errorFromResponse(response.status, body, response.headers.get('retry-after'));
      }

      return await untilAborted(read(response), controller.signal);
    } catch (error) {
      if (error instanceof VideoClientError) {
        throw error;
      }
      const reason = this.closed
        ? 'client closed'
        : controller.signal.aborted
          ? `timed out after ${this.config.requestTimeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      this.logger.error({ method: options.method, url, error: reason }, 'Request failed');
      throw new TransportError(`${options.method} ${options.path} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      this.inFlight.delete(controller);
    }
  }

  private async readResource<T>(response: Response, parse: (data: unknown) => T): Promise<T> {
    const text = await response.text();
    this.logger.debug({ status: response.status, body: text }, 'Response body');

    const data = parseJsonBody(text);
    if (data === undefined) {
      throw new ServiceError('Response body is not valid JSON', response.status, text);
    }

    try {
      return parse(data);
    } catch (error) {
      if (error instanceof ZodError) {
        const issues = error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
        throw new ServiceError(`Unexpected response shape: ${issues}`, response.status, text, data);
      }
      throw error;
    }
  }
}
