/**
 * Core domain types for Tonearm
 */

export type QueryId = string;
export type ResultId = string;

/**
 * Anything the pipeline can index by id once a resolver reports it
 */
export interface PipelineResult {
  readonly id: ResultId;
}

/**
 * Identity of a resolver as seen by a query.
 * Queries only ever compare resolvers by reference.
 */
export interface ResolverInfo {
  readonly name: string;
  /** Higher weight is tried first */
  readonly weight: number;
  /** Milliseconds to wait for an answer, 0 = wait forever */
  readonly timeout: number;
}

/**
 * Contract for queries driven through the pipeline.
 * The pipeline mutates queries only through these members.
 */
export interface PipelineQuery<R extends PipelineResult = PipelineResult> {
  readonly id: QueryId;
  readonly results: readonly R[];
  /** Every resolver this query has been handed to, in dispatch order */
  readonly resolvedBy: ReadonlySet<ResolverInfo>;

  addResults(results: readonly R[]): void;
  /** Enough good results to stop trying further resolvers */
  isSatisfied(): boolean;
  /** Must try every resolver even once satisfied */
  isExhaustiveSearch(): boolean;
  setCurrentResolver(resolver: ResolverInfo | null): void;
  onResolvingFinished(): void;
}

/**
 * Entry point resolvers report through
 */
export interface ResultReporter<R extends PipelineResult = PipelineResult> {
  reportResults(queryId: QueryId, results: readonly R[]): void;
}

/**
 * Resolver contract.
 * `resolve` must return promptly; answers arrive later through a ResultReporter.
 */
export interface Resolver<Q extends PipelineQuery = PipelineQuery> extends ResolverInfo {
  resolve(query: Q): void;
}

/**
 * A playable candidate for a track query
 */
export interface TrackResult extends PipelineResult {
  artist: string;
  track: string;
  album?: string;
  /** Duration in seconds */
  duration?: number;
  url?: string;
  /** Name of the resolver that produced it */
  source: string;
  /** Match confidence against the query (0-1), filled in by the query when missing */
  score?: number;
  playable: boolean;
}
