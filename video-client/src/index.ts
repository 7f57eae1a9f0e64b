export { VideoGenerationClient, withVideoClient, type VideoClientOptions } from './client.js';
export {
  DEFAULT_API_VERSION,
  DEFAULT_REQUEST_TIMEOUT_MS,
  loadEnvFiles,
  resolveClientConfig,
  type ClientConfig,
  type ClientConfigInput
} from './config.js';
export {
  ContentFetcher,
  contentFileName,
  type ContentDestination,
  type ContentSource,
  type SavedContent
} from './content.js';
export * from './errors.js';
export { createLogger, logger, type Logger } from './logger.js';
export { fromWirePayload, toWirePayload } from './payload.js';
export {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_POLL_TIMEOUT_MS,
  pollUntilComplete,
  systemClock,
  type JobStatusSource,
  type PollClock,
  type PollOptions,
  type PollResult
} from './poller.js';
export { normaliseJobStatus, parseGeneration, parseJob, parseJobList } from './resources.js';
export { DEFAULT_LIST_LIMIT, VideoGenerationTransport, type FetchLike, type TransportOptions } from './transport.js';
export * from './types.js';
export * from './validation.js';
