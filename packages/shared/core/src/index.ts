/**
 * @tonearm/core - Query-resolution pipeline and track models
 */

// Types
export type {
  QueryId,
  ResultId,
  PipelineResult,
  PipelineQuery,
  ResolverInfo,
  Resolver,
  ResultReporter,
  TrackResult
} from './types/index';

export type {
  PipelineLogger,
  PipelineOptions,
  SubmitOptions,
  PipelineEvents,
  IndexReadinessSource
} from './types/pipeline';

// Registry
export { ResolverRegistry } from './registry/resolver-registry';

// Pipeline
export {
  Pipeline,
  clampConcurrency,
  MIN_CONCURRENT_QUERIES,
  MAX_CONCURRENT_QUERIES
} from './pipeline/pipeline';
export { PendingQueue } from './pipeline/pending-queue';
export { QueryLedger } from './pipeline/query-ledger';
export { WorkQueue, type Task } from './pipeline/work-queue';
export {
  TemporaryQueryReaper,
  DEFAULT_TEMPORARY_QUERY_TIMEOUT
} from './pipeline/temporary-reaper';

// Models
export {
  TrackQuery,
  type TrackQueryInit,
  type TrackQueryEvents
} from './models/track-query';

// Services
export {
  TrackMatcher,
  normalizeText,
  MATCH_THRESHOLD,
  type MatchTarget
} from './services/track-matcher';

// Utils
export { EventEmitter } from './utils/event-emitter';
export { createConsoleLogger } from './utils/console-logger';
