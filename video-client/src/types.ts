export type ResolutionTier = 'standard' | '720p' | '1080p';

export interface SupportedResolution {
  width: number;
  height: number;
  tier: ResolutionTier;
  maxVariants: number;
}

export interface GenerationRequest {
  prompt: string;
  width: number;
  height: number;
  durationSeconds: number;
  variantCount: number;
}

// Request body of POST jobs, every numeric field sent as a decimal string
export interface WireGenerationPayload {
  model: string;
  prompt: string;
  height: string;
  width: string;
  n_seconds: string;
  n_variants: string;
}

export type ContentKind = 'video' | 'gif';

export const CONTENT_EXTENSIONS: Record<ContentKind, string> = {
  video: 'mp4',
  gif: 'gif'
};

export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled';

export type TerminalJobStatus = 'succeeded' | 'failed' | 'cancelled';

export interface Generation {
  id: string;
  jobId: string;
  createdAt: Date;
  width: number;
  height: number;
  durationSeconds: number;
  prompt: string;
}

interface JobSnapshot {
  id: string;
  // Status string exactly as the service reported it
  remoteStatus: string;
  model?: string;
  request: GenerationRequest;
  createdAt: Date;
  finishedAt?: Date;
  expiresAt?: Date;
}

export interface PendingJob extends JobSnapshot {
  status: 'pending';
}

export interface RunningJob extends JobSnapshot {
  status: 'running';
}

export interface SucceededJob extends JobSnapshot {
  status: 'succeeded';
  generations: Generation[];
}

export interface FailedJob extends JobSnapshot {
  status: 'failed';
  statusMessage?: string;
}

export interface CancelledJob extends JobSnapshot {
  status: 'cancelled';
  statusMessage?: string;
}

export type Job = PendingJob | RunningJob | SucceededJob | FailedJob | CancelledJob;

export type TerminalJob = SucceededJob | FailedJob | CancelledJob;

export interface JobList {
  data: Job[];
  hasMore: boolean;
  firstId?: string;
  lastId?: string;
}

export function isTerminal(job: Job): job is TerminalJob {
  switch (job.status) {
    case 'succeeded':
    case 'failed':
    case 'cancelled':
      return true;
    case 'pending':
    case 'running':
      return false;
  }
}
