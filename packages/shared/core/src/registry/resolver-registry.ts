/**
 * Registry of the resolvers currently available to the pipeline
 */

import type { PipelineQuery, Resolver, ResolverInfo } from '../types/index';

export class ResolverRegistry<Q extends PipelineQuery = PipelineQuery> {
  // Registration order is the tie-break for equal weights
  private resolvers: Resolver<Q>[] = [];

  /**
   * Register a resolver. Returns false if it is already registered.
   */
  register(resolver: Resolver<Q>): boolean {
    if (this.resolvers.includes(resolver)) return false;
    this.resolvers.push(resolver);
    return true;
  }

  /**
   * Unregister a resolver. Returns false if it was not registered.
   */
  unregister(resolver: ResolverInfo): boolean {
    const index = this.resolvers.findIndex(r => r === resolver);
    if (index === -1) return false;
    this.resolvers.splice(index, 1);
    return true;
  }

  has(resolver: ResolverInfo): boolean {
    return this.resolvers.some(r => r === resolver);
  }

  findByName(name: string): Resolver<Q> | null {
    return this.resolvers.find(r => r.name === name) ?? null;
  }

  get count(): number {
    return this.resolvers.length;
  }

  /**
   * All resolvers in registration order
   */
  all(): Resolver<Q>[] {
    return [...this.resolvers];
  }

  /**
   * Highest-weighted resolver not in `tried`.
   * On equal weight the first registered wins.
   */
  select(tried: ReadonlySet<ResolverInfo>): Resolver<Q> | null {
    let best: Resolver<Q> | null = null;

    for (const resolver of this.resolvers) {
      if (tried.has(resolver)) continue;
      if (!best || resolver.weight > best.weight) {
        best = resolver;
      }
    }

    return best;
  }
}
