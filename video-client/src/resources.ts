import { z } from 'zod';
import type { Generation, Job, JobList, JobStatus } from './types.js';

// Numbers come back as JSON numbers today, but the request side uses strings
const wireNumber = z.coerce.number().int();

const unixSeconds = z
  .number()
  .nullish()
  .transform((value) => (value == null ? undefined : new Date(value * 1000)));

const generationSchema = z.object({
  id: z.string().min(1),
  job_id: z.string().min(1),
  created_at: z.number(),
  width: wireNumber,
  height: wireNumber,
  n_seconds: wireNumber,
  prompt: z.string().default('')
});

const jobSchema = z.object({
  id: z.string().min(1),
  status: z.string().min(1),
  model: z.string().optional(),
  prompt: z.string().default(''),
  width: wireNumber,
  height: wireNumber,
  n_seconds: wireNumber,
  n_variants: wireNumber.default(1),
  created_at: z.number(),
  finished_at: unixSeconds,
  expires_at: unixSeconds,
  generations: z.array(generationSchema).default([]),
  failure_reason: z.string().nullish()
});

const jobListSchema = z.object({
  data: z.array(jobSchema),
  has_more: z.boolean().default(false),
  first_id: z.string().nullish(),
  last_id: z.string().nullish()
});

export type WireGeneration = z.infer<typeof generationSchema>;
export type WireJob = z.infer<typeof jobSchema>;

const STATUS_ALIASES: Record<string, JobStatus> = {
  pending: 'pending',
  queued: 'pending',
  preprocessing: 'pending',
  notstarted: 'pending',
  running: 'running',
  processing: 'running',
  inprogress: 'running',
  succeeded: 'succeeded',
  failed: 'failed',
  cancelled: 'cancelled',
  canceled: 'cancelled'
};

/**
 * Maps the service's status vocabulary onto the five job states. Unknown
 * values are treated as still in progress so that polling carries on.
 */
export function normaliseJobStatus(remoteStatus: string): JobStatus {
  return STATUS_ALIASES[remoteStatus.toLowerCase()] ?? 'running';
}

function toGeneration(wire: WireGeneration): Generation {
  return {
    id: wire.id,
    jobId: wire.job_id,
    createdAt: new Date(wire.created_at * 1000),
    width: wire.width,
    height: wire.height,
    durationSeconds: wire.n_seconds,
    prompt: wire.prompt
  };
}

function toJob(wire: WireJob): Job {
  const snapshot = {
    id: wire.id,
    remoteStatus: wire.status,
    model: wire.model,
    request: {
      prompt: wire.prompt,
      width: wire.width,
      height: wire.height,
      durationSeconds: wire.n_seconds,
      variantCount: wire.n_variants
    },
    createdAt: new Date(wire.created_at * 1000),
    finishedAt: wire.finished_at,
    expiresAt: wire.expires_at
  };

  const status = normaliseJobStatus(wire.status);
  switch (status) {
    case 'pending':
    case 'running':
      return { ...snapshot, status };
    case 'succeeded':
      return { ...snapshot, status, generations: wire.generations.map(toGeneration) };
    case 'failed':
    case 'cancelled':
      return { ...snapshot, status, statusMessage: wire.failure_reason ?? undefined };
  }
}

export function parseJob(data: unknown): Job {
  return toJob(jobSchema.parse(data));
}

export function parseGeneration(data: unknown): Generation {
  return toGeneration(generationSchema.parse(data));
}

export function parseJobList(data: unknown): JobList {
  const wire = jobListSchema.parse(data);
  return {
    data: wire.data.map(toJob),
    hasMore: wire.has_more,
    firstId: wire.first_id ?? undefined,
    lastId: wire.last_id ?? undefined
  };
}
