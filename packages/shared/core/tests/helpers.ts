import { vi } from 'vitest';
import type { Resolver, TrackResult } from '../src/types/index';
import type { PipelineLogger } from '../src/types/pipeline';
import type { TrackQuery } from '../src/models/track-query';

export class FakeResolver implements Resolver<TrackQuery> {
  readonly calls: TrackQuery[] = [];

  constructor(
    readonly name: string,
    readonly weight: number,
    readonly timeout = 0
  ) {}

  resolve(query: TrackQuery): void {
    this.calls.push(query);
  }
}

export function quietLogger(): PipelineLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

export function trackResult(id: string, overrides: Partial<TrackResult> = {}): TrackResult {
  return {
    id,
    artist: 'Nina Simone',
    track: 'Feeling Good',
    source: 'test',
    playable: true,
    score: 1,
    ...overrides
  };
}

/**
 * Let the pipeline's work queue drain
 */
export async function settle(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await Promise.resolve();
  }
}
