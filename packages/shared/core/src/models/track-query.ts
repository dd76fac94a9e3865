/**
 * Track Query - a request to find playable sources for one track
 */

import { nanoid } from 'nanoid';
import type { PipelineQuery, QueryId, ResolverInfo, TrackResult } from '../types/index';
import { EventEmitter } from '../utils/event-emitter';
import { MATCH_THRESHOLD, TrackMatcher } from '../services/track-matcher';

export interface TrackQueryInit {
  id?: QueryId;
  artist?: string;
  track?: string;
  album?: string;
  /** Duration in seconds */
  duration?: number;
  /** Free-text search; makes the query exhaustive */
  fullText?: string;
}

export interface TrackQueryEvents {
  resultsAdded: { query: TrackQuery; results: readonly TrackResult[] };
  resolvingFinished: { query: TrackQuery; results: readonly TrackResult[] };
}

const matcher = new TrackMatcher();

export class TrackQuery extends EventEmitter<TrackQueryEvents> implements PipelineQuery<TrackResult> {
  readonly id: QueryId;
  readonly artist: string;
  readonly track: string;
  readonly album?: string;
  readonly duration?: number;
  readonly fullText?: string;

  private resultList: TrackResult[] = [];
  private tried = new Set<ResolverInfo>();
  private current: ResolverInfo | null = null;
  private finished = false;

  constructor(init: TrackQueryInit) {
    super();
    this.id = init.id ?? nanoid();
    this.artist = init.artist ?? '';
    this.track = init.track ?? '';
    this.album = init.album;
    this.duration = init.duration;
    this.fullText = init.fullText;
  }

  get results(): readonly TrackResult[] {
    return this.resultList;
  }

  get resolvedBy(): ReadonlySet<ResolverInfo> {
    return this.tried;
  }

  get currentResolver(): ResolverInfo | null {
    return this.current;
  }

  isFullTextQuery(): boolean {
    return this.fullText !== undefined && this.fullText.trim() !== '';
  }

  /**
   * Merge results, scoring any that arrive unscored.
   * Results are kept best-first; a result id already held is ignored.
   */
  addResults(results: readonly TrackResult[]): void {
    const known = new Set(this.resultList.map(r => r.id));
    const added: TrackResult[] = [];

    for (const result of results) {
      if (known.has(result.id)) continue;
      known.add(result.id);
      added.push({ ...result, score: result.score ?? this.scoreResult(result) });
    }

    if (added.length === 0) return;

    this.resultList = [...this.resultList, ...added]
      .sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
    this.emit('resultsAdded', { query: this, results: added });
  }

  /**
   * A playable result satisfies a free-text query; structured queries
   * also need a score at or above the match threshold.
   */
  isSatisfied(): boolean {
    if (this.isFullTextQuery()) {
      return this.resultList.some(r => r.playable);
    }
    return this.resultList.some(r => r.playable && (r.score ?? 0) >= MATCH_THRESHOLD);
  }

  isExhaustiveSearch(): boolean {
    return this.isFullTextQuery();
  }

  setCurrentResolver(resolver: ResolverInfo | null): void {
    this.current = resolver;
    if (resolver) {
      this.tried.add(resolver);
    }
  }

  onResolvingFinished(): void {
    this.finished = true;
    this.current = null;
    this.emit('resolvingFinished', { query: this, results: this.resultList });
  }

  isResolvingFinished(): boolean {
    return this.finished;
  }

  toString(): string {
    if (this.isFullTextQuery()) {
      return `"${this.fullText}"`;
    }
    return `${this.artist} - ${this.track}`;
  }

  private scoreResult(result: TrackResult): number {
    if (this.fullText !== undefined && this.isFullTextQuery()) {
      return matcher.scoreFullText(this.fullText, result);
    }
    return matcher.score(this, result);
  }
}
