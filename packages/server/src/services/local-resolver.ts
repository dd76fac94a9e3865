/**
 * Local Library Resolver - answers track queries from the library index
 */

import type { Resolver, ResultReporter, TrackQuery, TrackResult } from '@tonearm/core';
import type { LibraryIndex, LibraryTrack } from './library-index';
import { log } from './log-service';

export interface LocalLibraryResolverOptions {
  weight?: number;
  timeout?: number;
}

export class LocalLibraryResolver implements Resolver<TrackQuery> {
  readonly name = 'Local Library';
  readonly weight: number;
  readonly timeout: number;

  constructor(
    private readonly index: LibraryIndex,
    private readonly reporter: ResultReporter<TrackResult>,
    options: LocalLibraryResolverOptions = {}
  ) {
    this.weight = options.weight ?? 100;
    this.timeout = options.timeout ?? 5000;
  }

  resolve(query: TrackQuery): void {
    // Answer on a later tick, like any other backend would
    setImmediate(() => this.lookup(query));
  }

  private lookup(query: TrackQuery): void {
    let results: TrackResult[] = [];

    try {
      const tracks = query.isFullTextQuery() && query.fullText !== undefined
        ? this.index.searchFullText(query.fullText)
        : this.index.search(query.artist, query.track);
      results = tracks.map(track => this.toResult(track));
    } catch (error) {
      log.error('LocalLibraryResolver', 'Lookup failed', {
        queryId: query.id,
        error: error instanceof Error ? error.message : String(error)
      });
    }

    log.debug('LocalLibraryResolver', `Found ${results.length} results for ${query}`, { queryId: query.id });
    this.reporter.reportResults(query.id, results);
  }

  private toResult(track: LibraryTrack): TrackResult {
    return {
      id: `local:${track.id}`,
      artist: track.artist,
      track: track.track,
      album: track.album,
      duration: track.duration,
      url: track.url,
      source: this.name,
      playable: track.url !== undefined
    };
  }
}
