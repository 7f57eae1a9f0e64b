import { describe, it, expect, vi } from 'vitest';
import { PollCancelledError, PollTimeoutError } from '../errors.js';
import { parseJob } from '../resources.js';
import { pollUntilComplete, systemClock, type JobStatusSource } from '../poller.js';
import type { Job } from '../types.js';
import { createFakeClock, wireGeneration, wireJob } from './fakeService.js';

function jobWithStatus(status: string, overrides: Record<string, unknown> = {}): Job {
  return parseJob(wireJob({ status, ...overrides }));
}

function scriptedSource(...jobs: Job[]) {
  let index = 0;
  const getJob = vi.fn(async (_jobId: string) => {
    const job = jobs[Math.min(index, jobs.length - 1)];
    index += 1;
    return job;
  });
  const source: JobStatusSource = { getJob };
  return { source, getJob };
}

describe('pollUntilComplete', () => {
  it('returns once the job succeeds, one request per tick', async () => {
    const { source, getJob } = scriptedSource(
      jobWithStatus('queued'),
      jobWithStatus('running'),
      jobWithStatus('succeeded', { generations: [wireGeneration(), wireGeneration({ id: 'gen_2' })] })
    );
    const clock = createFakeClock();

    const result = await pollUntilComplete(source, 'task_1', { intervalMs: 5_000, timeoutMs: 60_000, clock });

    expect(getJob).toHaveBeenCalledTimes(3);
    expect(getJob).toHaveBeenCalledWith('task_1');
    expect(clock.sleeps).toEqual([5_000, 5_000]);
    expect(result.job.status).toBe('succeeded');
    expect(result.generations.map((g) => g.id)).toEqual(['gen_1', 'gen_2']);
  });

  it('returns a failed job without throwing', async () => {
    const { source } = scriptedSource(
      jobWithStatus('running'),
      jobWithStatus('failed', { failure_reason: 'internal_error' })
    );

    const result = await pollUntilComplete(source, 'task_1', { intervalMs: 1_000, clock: createFakeClock() });

    expect(result.job.status).toBe('failed');
    expect(result.generations).toEqual([]);
    if (result.job.status === 'failed') {
      expect(result.job.statusMessage).toBe('internal_error');
    }
  });

  it('returns a cancelled job without generations', async () => {
    const { source } = scriptedSource(jobWithStatus('cancelled'));

    const result = await pollUntilComplete(source, 'task_1', { clock: createFakeClock() });

    expect(result.job.status).toBe('cancelled');
    expect(result.generations).toEqual([]);
  });

  it('times out on a job that never leaves running and stops requesting', async () => {
    const { source, getJob } = scriptedSource(jobWithStatus('running'));
    const clock = createFakeClock();

    const error = await pollUntilComplete(source, 'task_1', { intervalMs: 5_000, timeoutMs: 12_000, clock }).catch(
      (e: unknown) => e
    );

    // Requests at t=0, 5s and 10s; the wake-up at 15s is past the deadline
    expect(error).toBeInstanceOf(PollTimeoutError);
    if (error instanceof PollTimeoutError) {
      expect(error.jobId).toBe('task_1');
      expect(error.elapsedMs).toBe(15_000);
      expect(error.polls).toBe(3);
    }
    expect(getJob).toHaveBeenCalledTimes(3);
  });

  it('times out without sleeping when a status request overruns the deadline', async () => {
    const clock = createFakeClock();
    const running = jobWithStatus('running');
    const slowSource: JobStatusSource = {
      getJob: async () => {
        await clock.sleep(20_000);
        return running;
      }
    };

    const error = await pollUntilComplete(slowSource, 'task_1', { intervalMs: 5_000, timeoutMs: 12_000, clock }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(PollTimeoutError);
    if (error instanceof PollTimeoutError) {
      expect(error.elapsedMs).toBe(20_000);
      expect(error.polls).toBe(1);
    }
    // Only the simulated request time, no poll interval
    expect(clock.sleeps).toEqual([20_000]);
  });

  it('stops after maxPolls status requests', async () => {
    const { source, getJob } = scriptedSource(jobWithStatus('preprocessing'));

    await expect(
      pollUntilComplete(source, 'task_1', { intervalMs: 1_000, maxPolls: 4, clock: createFakeClock() })
    ).rejects.toBeInstanceOf(PollTimeoutError);
    expect(getJob).toHaveBeenCalledTimes(4);
  });

  it('checks the abort signal between requests', async () => {
    const controller = new AbortController();
    const { source, getJob } = scriptedSource(jobWithStatus('running'));
    const clock = createFakeClock();
    getJob.mockImplementationOnce(async () => {
      controller.abort();
      return jobWithStatus('running');
    });

    const error = await pollUntilComplete(source, 'task_1', {
      intervalMs: 1_000,
      signal: controller.signal,
      clock
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PollCancelledError);
    expect(getJob).toHaveBeenCalledTimes(1);
  });

  it('does not request at all with an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const { source, getJob } = scriptedSource(jobWithStatus('running'));

    await expect(
      pollUntilComplete(source, 'task_1', { signal: controller.signal, clock: createFakeClock() })
    ).rejects.toBeInstanceOf(PollCancelledError);
    expect(getJob).not.toHaveBeenCalled();
  });

  it('propagates errors from the status request', async () => {
    const source: JobStatusSource = {
      getJob: async () => {
        throw new Error('boom');
      }
    };

    await expect(pollUntilComplete(source, 'task_1', { clock: createFakeClock() })).rejects.toThrow('boom');
  });
});

describe('systemClock', () => {
  it('wakes early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();

    const sleeping = systemClock.sleep(60_000, controller.signal);
    controller.abort();
    await sleeping;

    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('sleeps for the requested time', async () => {
    vi.useFakeTimers();
    try {
      let woke = false;
      const sleeping = systemClock.sleep(5_000).then(() => {
        woke = true;
      });

      await vi.advanceTimersByTimeAsync(4_999);
      expect(woke).toBe(false);
      await vi.advanceTimersByTimeAsync(1);
      await sleeping;
      expect(woke).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });
});
