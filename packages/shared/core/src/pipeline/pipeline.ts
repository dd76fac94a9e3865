/**
 * Pipeline - drives queries through the registered resolvers
 *
 * Queries wait in the pending queue until one of `maxConcurrent` slots is
 * free. A dispatched query is handed to its best untried resolver; when that
 * resolver answers without satisfying it (or times out) the next one is
 * tried, until the query is satisfied or its attempt budget runs out.
 *
 * All state is owned by the pipeline and every transition is posted to a
 * single work queue, so resolvers may report at any time and from inside
 * their own `resolve` call.
 */

import { availableParallelism } from 'os';
import type {
  PipelineQuery,
  PipelineResult,
  QueryId,
  Resolver,
  ResolverInfo,
  ResultId,
  ResultReporter
} from '../types/index';
import type {
  IndexReadinessSource,
  PipelineEvents,
  PipelineLogger,
  PipelineOptions,
  SubmitOptions
} from '../types/pipeline';
import { EventEmitter } from '../utils/event-emitter';
import { createConsoleLogger } from '../utils/console-logger';
import { ResolverRegistry } from '../registry/resolver-registry';
import { PendingQueue } from './pending-queue';
import { QueryLedger } from './query-ledger';
import { TemporaryQueryReaper } from './temporary-reaper';
import { WorkQueue } from './work-queue';

export const MIN_CONCURRENT_QUERIES = 4;
export const MAX_CONCURRENT_QUERIES = 16;

export function clampConcurrency(hostParallelism: number): number {
  return Math.min(MAX_CONCURRENT_QUERIES, Math.max(MIN_CONCURRENT_QUERIES, Math.floor(hostParallelism)));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Pipeline<
  R extends PipelineResult = PipelineResult,
  Q extends PipelineQuery<R> = PipelineQuery<R>
> extends EventEmitter<PipelineEvents<Q>> implements ResultReporter<R> {
  readonly maxConcurrent: number;

  private readonly registry = new ResolverRegistry<Q>();
  private readonly pending = new PendingQueue<Q>();
  private readonly ledger = new QueryLedger<R, Q>();
  private readonly attemptTimers = new Map<QueryId, ReturnType<typeof setTimeout>>();
  private readonly work: WorkQueue;
  private readonly reaper: TemporaryQueryReaper;
  private readonly logger: PipelineLogger;
  private running = false;

  constructor(options: PipelineOptions = {}) {
    super();
    this.logger = options.logger ?? createConsoleLogger('Pipeline');
    this.maxConcurrent = options.maxConcurrent !== undefined
      ? Math.max(1, Math.floor(options.maxConcurrent))
      : clampConcurrency(options.hostParallelism ?? availableParallelism());

    this.work = new WorkQueue(error => {
      this.logger.error('Pipeline task failed', { error: describeError(error) });
    });
    this.reaper = new TemporaryQueryReaper(
      () => this.work.post(() => this.reapTemporaryQueries()),
      options.temporaryQueryTimeout
    );

    this.logger.info(`Using ${this.maxConcurrent} concurrent queries`);
  }

  // ========================================
  // Lifecycle
  // ========================================

  /**
   * Load the library index and start dispatching once it reports ready.
   * Resolves after start().
   */
  startWhenReady(index: IndexReadinessSource): Promise<void> {
    const ready = new Promise<void>(resolve => {
      index.once('indexReady', () => {
        this.start();
        resolve();
      });
    });
    index.loadIndex();
    return ready;
  }

  start(): void {
    this.logger.info('Shunting pending queries', { pending: this.pending.size });
    this.running = true;
    this.work.post(() => this.dispatchNext());
  }

  /**
   * Stop dispatching. Resolvers already working are not cancelled;
   * whatever they report while stopped is dropped.
   */
  stop(): void {
    this.running = false;
  }

  /**
   * Stop and release every timer and queued task
   */
  dispose(): void {
    this.stop();
    this.work.clear();
    this.reaper.cancel();
    for (const timer of this.attemptTimers.values()) {
      clearTimeout(timer);
    }
    this.attemptTimers.clear();
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ========================================
  // Resolvers
  // ========================================

  addResolver(resolver: Resolver<Q>): void {
    if (!this.registry.register(resolver)) return;

    this.logger.info(`Adding resolver ${resolver.name}`, {
      weight: resolver.weight,
      timeout: resolver.timeout
    });
    this.emit('resolverAdded', resolver);
  }

  /**
   * Answers already on their way from a removed resolver are still
   * accepted; it is never selected again.
   */
  removeResolver(resolver: ResolverInfo): void {
    if (!this.registry.unregister(resolver)) return;

    this.logger.info(`Removed resolver ${resolver.name}`);
    this.emit('resolverRemoved', resolver);
  }

  resolvers(): Resolver<Q>[] {
    return this.registry.all();
  }

  // ========================================
  // Submission
  // ========================================

  submit(query: Q, options: SubmitOptions = {}): void {
    this.submitAll([query], options);
  }

  /**
   * Queue queries for resolving. Prioritized queries go to the front in
   * the order given; a query already pending keeps its place and its
   * temporary flag.
   */
  submitAll(queries: readonly Q[], options: SubmitOptions = {}): void {
    const { prioritized = false, temporary = false } = options;
    let insertAt = 0;

    for (const query of queries) {
      this.ledger.track(query);

      if (this.pending.has(query)) continue;

      if (prioritized) {
        this.pending.insert(insertAt++, query);
      } else {
        this.pending.push(query);
      }

      if (temporary) {
        this.ledger.markTemporary(query.id);
        this.reaper.arm();
      }
    }

    this.work.post(() => this.dispatchNext());
  }

  /**
   * Resubmit a query the pipeline still knows by id
   */
  resubmit(queryId: QueryId, options: SubmitOptions = {}): boolean {
    const query = this.ledger.lookup(queryId);
    if (!query) {
      this.logger.debug('Cannot resubmit unknown query', { queryId });
      return false;
    }
    this.submit(query, options);
    return true;
  }

  /**
   * Entry point for resolvers. Safe to call at any time, including from
   * inside Resolver.resolve().
   */
  reportResults(queryId: QueryId, results: readonly R[]): void {
    this.work.post(() => this.deliverResults(queryId, results));
  }

  // ========================================
  // Lookups
  // ========================================

  query(queryId: QueryId): Q | undefined {
    return this.ledger.lookup(queryId);
  }

  result(resultId: ResultId): R | undefined {
    return this.ledger.result(resultId);
  }

  /** Queries currently holding a slot */
  get activeQueryCount(): number {
    return this.ledger.occupiedSlots;
  }

  get pendingQueryCount(): number {
    return this.pending.size;
  }

  pendingIds(): QueryId[] {
    return this.pending.snapshot();
  }

  // ========================================
  // Transitions (always run from the work queue)
  // ========================================

  private dispatchNext(): void {
    if (!this.running) return;

    if (this.pending.size === 0) {
      if (this.ledger.occupiedSlots === 0) {
        this.emit('idle', undefined);
      }
      return;
    }

    if (this.ledger.occupiedSlots >= this.maxConcurrent) return;

    const query = this.pending.shift();
    if (!query) return;

    query.setCurrentResolver(null);
    // One attempt per resolver registered right now
    this.setAttemptBudget(query, this.registry.count);
  }

  private attemptNextResolver(query: Q): void {
    if (!this.running) return;
    if (!this.ledger.holdsSlot(query.id)) return;

    const resolver = query.isExhaustiveSearch() || !query.isSatisfied()
      ? this.registry.select(query.resolvedBy)
      : null;

    if (!resolver) {
      // Every resolver tried, or the untried ones were removed meanwhile
      this.setAttemptBudget(query, 0);
      return;
    }

    this.logger.debug(`Dispatching to resolver ${resolver.name}`, { queryId: query.id });

    query.setCurrentResolver(resolver);
    this.ledger.markAwaiting(query.id);
    this.armAttemptTimeout(query, resolver);

    try {
      resolver.resolve(query);
    } catch (error) {
      this.logger.error(`Resolver ${resolver.name} failed`, {
        queryId: query.id,
        error: describeError(error)
      });
      this.reportResults(query.id, []);
    }

    this.emit('resolving', query);
    this.work.post(() => this.dispatchNext());
  }

  private deliverResults(queryId: QueryId, results: readonly R[]): void {
    if (!this.running) {
      this.logger.debug('Dropping results while stopped', { queryId });
      return;
    }

    const query = this.ledger.lookup(queryId);
    if (!query) {
      this.logger.debug('Results arrived too late', { queryId, count: results.length });
      return;
    }

    this.ledger.clearAwaiting(queryId);

    if (results.length > 0) {
      query.addResults(results);
      this.ledger.indexResults(queryId, query.results);
    }

    if (!this.ledger.holdsSlot(queryId)) {
      // A finished temporary query, or one waiting to be dispatched again
      this.logger.debug('Results arrived for a query that is not resolving', { queryId });
      return;
    }

    if (results.length > 0 && query.isSatisfied() && !query.isExhaustiveSearch()) {
      this.setAttemptBudget(query, 0);
      return;
    }

    this.consumeAttempt(query);
  }

  private onAttemptTimeout(query: Q, resolver: ResolverInfo): void {
    if (!this.running) return;
    // Already answered
    if (!this.ledger.isAwaiting(query.id)) return;

    this.logger.debug(`Resolver ${resolver.name} timed out`, {
      queryId: query.id,
      timeout: resolver.timeout
    });
    this.consumeAttempt(query);
  }

  private consumeAttempt(query: Q): void {
    const budget = this.ledger.budget(query.id);
    if (budget === undefined) return;
    this.setAttemptBudget(query, budget - 1);
  }

  /**
   * budget > 0 keeps the slot and tries the next resolver,
   * anything else finalizes the query
   */
  private setAttemptBudget(query: Q, budget: number): void {
    this.ledger.clearAwaiting(query.id);
    this.cancelAttemptTimeout(query.id);

    if (budget > 0) {
      this.ledger.setBudget(query.id, budget);
      this.work.post(() => this.attemptNextResolver(query));
      return;
    }

    this.finalize(query);
  }

  private finalize(query: Q): void {
    this.ledger.releaseSlot(query.id);
    query.onResolvingFinished();

    // Temporary queries stay addressable until the reaper sweeps them
    if (!this.ledger.isTemporary(query.id)) {
      this.ledger.forget(query.id);
    }

    this.emit('finished', query);
    this.work.post(() => this.dispatchNext());
  }

  private armAttemptTimeout(query: Q, resolver: ResolverInfo): void {
    this.cancelAttemptTimeout(query.id);
    if (resolver.timeout <= 0) return;

    const timer = setTimeout(() => {
      this.attemptTimers.delete(query.id);
      this.work.post(() => this.onAttemptTimeout(query, resolver));
    }, resolver.timeout);
    timer.unref();
    this.attemptTimers.set(query.id, timer);
  }

  private cancelAttemptTimeout(queryId: QueryId): void {
    const timer = this.attemptTimers.get(queryId);
    if (timer) {
      clearTimeout(timer);
      this.attemptTimers.delete(queryId);
    }
  }

  private reapTemporaryQueries(): void {
    // Queries still queued or resolving survive until the next sweep
    const reaped = this.ledger.reapTemporary(
      queryId => !this.ledger.holdsSlot(queryId) && !this.pending.hasId(queryId)
    );

    this.logger.info('Evicted temporary queries', {
      reaped,
      remaining: this.ledger.temporaryCount
    });

    if (this.ledger.temporaryCount > 0) {
      this.reaper.arm();
    }
  }
}
