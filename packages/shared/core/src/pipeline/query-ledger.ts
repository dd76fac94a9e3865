/**
 * Query Ledger - every piece of per-query bookkeeping the pipeline keeps
 *
 * The attempt budget doubles as slot occupancy: a query holds one of the
 * pipeline's concurrency slots exactly while it has a budget entry.
 */

import type { PipelineQuery, PipelineResult, QueryId, ResultId } from '../types/index';

export class QueryLedger<R extends PipelineResult = PipelineResult, Q extends PipelineQuery<R> = PipelineQuery<R>> {
  private queries = new Map<QueryId, Q>();
  private results = new Map<ResultId, R>();
  private ownedResults = new Map<QueryId, Set<ResultId>>();
  private resultOwners = new Map<ResultId, Set<QueryId>>();
  private budgets = new Map<QueryId, number>();
  private awaiting = new Set<QueryId>();
  private temporary = new Set<QueryId>();

  // ========================================
  // Queries
  // ========================================

  track(query: Q): void {
    if (!this.queries.has(query.id)) {
      this.queries.set(query.id, query);
    }
  }

  lookup(queryId: QueryId): Q | undefined {
    return this.queries.get(queryId);
  }

  /**
   * Drop a query from the indexes. A result leaves the result index once
   * no remaining query holds it.
   */
  forget(queryId: QueryId): void {
    this.queries.delete(queryId);
    for (const resultId of this.ownedResults.get(queryId) ?? []) {
      const owners = this.resultOwners.get(resultId);
      owners?.delete(queryId);
      if (!owners || owners.size === 0) {
        this.resultOwners.delete(resultId);
        this.results.delete(resultId);
      }
    }
    this.ownedResults.delete(queryId);
  }

  get size(): number {
    return this.queries.size;
  }

  // ========================================
  // Results
  // ========================================

  indexResults(queryId: QueryId, results: readonly R[]): void {
    let owned = this.ownedResults.get(queryId);
    if (!owned) {
      owned = new Set();
      this.ownedResults.set(queryId, owned);
    }
    for (const result of results) {
      this.results.set(result.id, result);
      owned.add(result.id);

      let owners = this.resultOwners.get(result.id);
      if (!owners) {
        owners = new Set();
        this.resultOwners.set(result.id, owners);
      }
      owners.add(queryId);
    }
  }

  result(resultId: ResultId): R | undefined {
    return this.results.get(resultId);
  }

  // ========================================
  // Attempt budgets / slots
  // ========================================

  setBudget(queryId: QueryId, budget: number): void {
    this.budgets.set(queryId, budget);
  }

  budget(queryId: QueryId): number | undefined {
    return this.budgets.get(queryId);
  }

  holdsSlot(queryId: QueryId): boolean {
    return this.budgets.has(queryId);
  }

  releaseSlot(queryId: QueryId): void {
    this.budgets.delete(queryId);
  }

  get occupiedSlots(): number {
    return this.budgets.size;
  }

  // ========================================
  // Unanswered attempts
  // ========================================

  markAwaiting(queryId: QueryId): void {
    this.awaiting.add(queryId);
  }

  clearAwaiting(queryId: QueryId): void {
    this.awaiting.delete(queryId);
  }

  isAwaiting(queryId: QueryId): boolean {
    return this.awaiting.has(queryId);
  }

  // ========================================
  // Temporary queries
  // ========================================

  markTemporary(queryId: QueryId): void {
    this.temporary.add(queryId);
  }

  isTemporary(queryId: QueryId): boolean {
    return this.temporary.has(queryId);
  }

  get temporaryCount(): number {
    return this.temporary.size;
  }

  /**
   * Forget every temporary query for which `canReap` holds.
   * Returns how many were forgotten.
   */
  reapTemporary(canReap: (queryId: QueryId) => boolean): number {
    let reaped = 0;
    for (const queryId of [...this.temporary]) {
      if (!canReap(queryId)) continue;
      this.temporary.delete(queryId);
      this.forget(queryId);
      reaped++;
    }
    return reaped;
  }
}
