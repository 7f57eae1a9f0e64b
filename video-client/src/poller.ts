import type { Logger } from 'pino';
import { PollCancelledError, PollTimeoutError } from './errors.js';
import { isTerminal, type Generation, type Job, type TerminalJob } from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_POLL_TIMEOUT_MS = 15 * 60 * 1_000;

export interface JobStatusSource {
  getJob(jobId: string): Promise<Job>;
}

export interface PollClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: PollClock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise((resolve) => {
      if (signal?.aborted) {
        resolve();
        return;
      }
      const onAbort = () => {
        clearTimeout(timeoutId);
        resolve();
      };
      const timeoutId = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    })
};

export interface PollOptions {
  intervalMs?: number;
  timeoutMs?: number;
  // Caps the number of status requests
  maxPolls?: number;
  signal?: AbortSignal;
  clock?: PollClock;
  logger?: Logger;
}

export interface PollResult {
  job: TerminalJob;
  generations: Generation[];
}

/**
 * Re-fetches the job until it reaches a terminal state. Requests are strictly
 * sequential: request, inspect, sleep. The deadline is checked before and
 * after each sleep, the abort signal before each request; neither interrupts
 * a request in flight.
 *
 * A failed or cancelled job is returned, not thrown; the caller inspects
 * `job.status`.
 */
export async function pollUntilComplete(
  source: JobStatusSource,
  jobId: string,
  options: PollOptions = {}
): Promise<PollResult> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  const clock = options.clock ?? systemClock;
  const { signal, logger, maxPolls } = options;

  const startedAt = clock.now();
  let polls = 0;

  const checkDeadline = (): void => {
    const elapsedMs = clock.now() - startedAt;
    if (elapsedMs > timeoutMs) {
      logger?.warn({ jobId, elapsedMs, polls }, 'Polling timed out');
      throw new PollTimeoutError(jobId, elapsedMs, polls);
    }
  };

  for (;;) {
    if (signal?.aborted) {
      throw new PollCancelledError(jobId);
    }

    const job = await source.getJob(jobId);
    polls += 1;

    if (isTerminal(job)) {
      logger?.info({ jobId, status: job.status, polls }, 'Job reached terminal state');
      return {
        job,
        generations: job.status === 'succeeded' ? job.generations : []
      };
    }

    if (maxPolls !== undefined && polls >= maxPolls) {
      throw new PollTimeoutError(jobId, clock.now() - startedAt, polls);
    }

    checkDeadline();

    logger?.debug({ jobId, status: job.status, remoteStatus: job.remoteStatus, intervalMs }, 'Job still in progress');
    await clock.sleep(intervalMs, signal);

    checkDeadline();
  }
}
