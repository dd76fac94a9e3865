/**
 * Ordered worklist of queries waiting for their first dispatch
 */

import type { PipelineQuery, QueryId } from '../types/index';

export class PendingQueue<Q extends PipelineQuery = PipelineQuery> {
  private queue: Q[] = [];
  private ids = new Set<QueryId>();

  has(query: Q): boolean {
    return this.ids.has(query.id);
  }

  hasId(queryId: QueryId): boolean {
    return this.ids.has(queryId);
  }

  push(query: Q): void {
    this.queue.push(query);
    this.ids.add(query.id);
  }

  /**
   * Insert at a position, clamped to the queue bounds
   */
  insert(index: number, query: Q): void {
    const at = Math.max(0, Math.min(index, this.queue.length));
    this.queue.splice(at, 0, query);
    this.ids.add(query.id);
  }

  shift(): Q | undefined {
    const query = this.queue.shift();
    if (query) {
      this.ids.delete(query.id);
    }
    return query;
  }

  get size(): number {
    return this.queue.length;
  }

  /**
   * Query ids front to back
   */
  snapshot(): QueryId[] {
    return this.queue.map(q => q.id);
  }
}
