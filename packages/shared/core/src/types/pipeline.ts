/**
 * Pipeline Types
 * Options, events and collaborators of the query-resolution pipeline
 */

import type { PipelineQuery, ResolverInfo } from './index';

export interface PipelineLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface PipelineOptions {
  /** Explicit cap on concurrently resolving queries */
  maxConcurrent?: number;
  /** Parallelism of the host, clamped to 4..16 when no explicit cap is set */
  hostParallelism?: number;
  /** Quiet period (ms) before temporary queries are evicted */
  temporaryQueryTimeout?: number;
  logger?: PipelineLogger;
}

export interface SubmitOptions {
  /** Insert ahead of everything already pending */
  prioritized?: boolean;
  /** Fire-and-forget: evicted after the quiet period */
  temporary?: boolean;
}

export interface PipelineEvents<Q extends PipelineQuery> {
  resolverAdded: ResolverInfo;
  resolverRemoved: ResolverInfo;
  resolving: Q;
  finished: Q;
  idle: undefined;
}

/**
 * The library index that gates dispatching until it has loaded
 */
export interface IndexReadinessSource {
  once(event: 'indexReady', listener: () => void): unknown;
  loadIndex(): void;
}
