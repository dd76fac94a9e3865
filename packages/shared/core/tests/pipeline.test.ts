import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Pipeline, clampConcurrency } from '../src/pipeline/pipeline';
import { TrackQuery } from '../src/models/track-query';
import type { TrackResult } from '../src/types/index';
import { FakeResolver, quietLogger, settle, trackResult } from './helpers';

function createPipeline(maxConcurrent = 4, temporaryQueryTimeout?: number) {
  return new Pipeline<TrackResult, TrackQuery>({
    maxConcurrent,
    temporaryQueryTimeout,
    logger: quietLogger()
  });
}

function feelingGood(id: string): TrackQuery {
  return new TrackQuery({ id, artist: 'Nina Simone', track: 'Feeling Good' });
}

describe('clampConcurrency', () => {
  it('bounds host parallelism to 4..16', () => {
    expect(clampConcurrency(1)).toBe(4);
    expect(clampConcurrency(8)).toBe(8);
    expect(clampConcurrency(64)).toBe(16);
  });

  it('is used when no explicit cap is given', () => {
    const pipeline = new Pipeline({ hostParallelism: 2, logger: quietLogger() });
    expect(pipeline.maxConcurrent).toBe(4);
  });
});

describe('Pipeline', () => {
  let pipeline: Pipeline<TrackResult, TrackQuery>;

  afterEach(() => {
    pipeline.dispose();
  });

  describe('resolver selection', () => {
    beforeEach(() => {
      pipeline = createPipeline();
    });

    it('tries the heavier resolver first, then the next one, until satisfied', async () => {
      const r1 = new FakeResolver('R1', 10);
      const r2 = new FakeResolver('R2', 20);
      pipeline.addResolver(r1);
      pipeline.addResolver(r2);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      expect(r2.calls).toEqual([query]);
      expect(r1.calls).toEqual([]);

      pipeline.reportResults('q1', []);
      await settle();

      expect(r1.calls).toEqual([query]);

      pipeline.reportResults('q1', [trackResult('r1-hit', { source: 'R1' })]);
      await settle();

      expect(query.isResolvingFinished()).toBe(true);
      expect(query.results.map(r => r.id)).toEqual(['r1-hit']);
      expect([...query.resolvedBy]).toEqual([r2, r1]);
      expect(pipeline.activeQueryCount).toBe(0);
      expect(pipeline.query('q1')).toBeUndefined();
    });

    it('breaks weight ties by registration order', async () => {
      const first = new FakeResolver('first', 50);
      const second = new FakeResolver('second', 50);
      pipeline.addResolver(first);
      pipeline.addResolver(second);
      pipeline.start();

      pipeline.submit(feelingGood('q1'));
      await settle();

      expect(first.calls).toHaveLength(1);
      expect(second.calls).toHaveLength(0);
    });

    it('never hands a query to the same resolver twice', async () => {
      const a = new FakeResolver('a', 30);
      const b = new FakeResolver('b', 20);
      const c = new FakeResolver('c', 10);
      [a, b, c].forEach(r => pipeline.addResolver(r));
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();
      pipeline.reportResults('q1', []);
      await settle();
      pipeline.reportResults('q1', []);
      await settle();
      pipeline.reportResults('q1', []);
      await settle();

      expect([...query.resolvedBy]).toEqual([a, b, c]);
      expect(a.calls).toHaveLength(1);
      expect(b.calls).toHaveLength(1);
      expect(c.calls).toHaveLength(1);
      expect(query.isResolvingFinished()).toBe(true);
    });

    it('keeps trying every resolver for an exhaustive query', async () => {
      const a = new FakeResolver('a', 20);
      const b = new FakeResolver('b', 10);
      pipeline.addResolver(a);
      pipeline.addResolver(b);
      pipeline.start();

      const query = new TrackQuery({ id: 'ft', fullText: 'feeling good' });
      pipeline.submit(query);
      await settle();
      pipeline.reportResults('ft', [trackResult('from-a', { source: 'a' })]);
      await settle();

      expect(b.calls).toEqual([query]);
      expect(query.isResolvingFinished()).toBe(false);

      pipeline.reportResults('ft', [trackResult('from-b', { source: 'b' })]);
      await settle();

      expect(query.isResolvingFinished()).toBe(true);
      expect(query.results).toHaveLength(2);
    });

    it('finalizes at once when no resolver is registered', async () => {
      const finished = vi.fn();
      pipeline.on('finished', finished);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      expect(finished).toHaveBeenCalledWith(query);
      expect(query.results).toEqual([]);
      expect(pipeline.activeQueryCount).toBe(0);
    });

    it('moves on when a resolver throws', async () => {
      const broken = new FakeResolver('broken', 20);
      broken.resolve = () => {
        throw new Error('offline');
      };
      const backup = new FakeResolver('backup', 10);
      pipeline.addResolver(broken);
      pipeline.addResolver(backup);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      expect(backup.calls).toEqual([query]);
      expect([...query.resolvedBy]).toEqual([broken, backup]);
    });

    it('accepts results synchronously reported from inside resolve()', async () => {
      const eager = new FakeResolver('eager', 10);
      eager.resolve = (query) => {
        eager.calls.push(query);
        pipeline.reportResults(query.id, [trackResult('eager-hit')]);
      };
      pipeline.addResolver(eager);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      expect(query.isResolvingFinished()).toBe(true);
      expect(query.results.map(r => r.id)).toEqual(['eager-hit']);
    });
  });

  describe('resolvers added and removed', () => {
    beforeEach(() => {
      pipeline = createPipeline();
    });

    it('emits notifications and ignores duplicates', () => {
      const added = vi.fn();
      const removed = vi.fn();
      pipeline.on('resolverAdded', added);
      pipeline.on('resolverRemoved', removed);

      const resolver = new FakeResolver('local', 100);
      pipeline.addResolver(resolver);
      pipeline.addResolver(resolver);
      pipeline.removeResolver(resolver);
      pipeline.removeResolver(resolver);

      expect(added).toHaveBeenCalledTimes(1);
      expect(removed).toHaveBeenCalledTimes(1);
      expect(pipeline.resolvers()).toEqual([]);
    });

    it('accepts an answer from a removed resolver but never retries it', async () => {
      const first = new FakeResolver('first', 20);
      const second = new FakeResolver('second', 10);
      pipeline.addResolver(first);
      pipeline.addResolver(second);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();
      expect(first.calls).toEqual([query]);

      pipeline.removeResolver(first);
      pipeline.reportResults('q1', []);
      await settle();

      expect(second.calls).toEqual([query]);
      expect(first.calls).toHaveLength(1);
    });

    it('finalizes when the untried resolvers disappear mid-flight', async () => {
      const first = new FakeResolver('first', 20);
      const second = new FakeResolver('second', 10);
      pipeline.addResolver(first);
      pipeline.addResolver(second);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      pipeline.removeResolver(second);
      pipeline.reportResults('q1', []);
      await settle();

      expect(second.calls).toEqual([]);
      expect(query.isResolvingFinished()).toBe(true);
    });
  });

  describe('concurrency', () => {
    it('holds back the second query until the first finishes', async () => {
      pipeline = createPipeline(1);
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);
      pipeline.start();

      const q1 = feelingGood('q1');
      const q2 = feelingGood('q2');
      pipeline.submit(q1);
      pipeline.submit(q2);
      await settle();

      expect(resolver.calls).toEqual([q1]);
      expect(pipeline.pendingIds()).toEqual(['q2']);

      pipeline.reportResults('q1', []);
      await settle();

      expect(q1.isResolvingFinished()).toBe(true);
      expect(resolver.calls).toEqual([q1, q2]);
      expect(pipeline.pendingQueryCount).toBe(0);
    });

    it('never occupies more than maxConcurrent slots', async () => {
      pipeline = createPipeline(2);
      const resolver = new FakeResolver('slow', 10);
      pipeline.addResolver(resolver);

      let highest = 0;
      pipeline.on('resolving', () => {
        highest = Math.max(highest, pipeline.activeQueryCount);
      });
      pipeline.start();

      const queries = ['a', 'b', 'c', 'd', 'e'].map(feelingGood);
      pipeline.submitAll(queries);
      await settle();

      expect(pipeline.activeQueryCount).toBe(2);
      expect(pipeline.pendingIds()).toEqual(['c', 'd', 'e']);

      for (const id of ['a', 'b', 'c', 'd', 'e']) {
        pipeline.reportResults(id, []);
        await settle();
      }

      expect(highest).toBe(2);
      expect(queries.every(q => q.isResolvingFinished())).toBe(true);
    });
  });

  describe('submission', () => {
    beforeEach(() => {
      pipeline = createPipeline();
    });

    it('puts prioritized queries in front, keeping their order', () => {
      pipeline.submitAll([feelingGood('a'), feelingGood('b')]);
      pipeline.submitAll([feelingGood('c'), feelingGood('d')], { prioritized: true });

      expect(pipeline.pendingIds()).toEqual(['c', 'd', 'a', 'b']);
    });

    it('does not queue the same pending query twice', () => {
      const query = feelingGood('a');
      pipeline.submit(query);
      pipeline.submit(query);
      pipeline.submit(query, { prioritized: true });

      expect(pipeline.pendingIds()).toEqual(['a']);
    });

    it('resubmits a query it still knows by id', () => {
      pipeline.submit(feelingGood('a'));

      expect(pipeline.resubmit('a')).toBe(true);
      expect(pipeline.resubmit('missing')).toBe(false);
      expect(pipeline.pendingIds()).toEqual(['a']);
    });
  });

  describe('idle', () => {
    beforeEach(() => {
      pipeline = createPipeline();
    });

    it('fires only once nothing is pending or resolving', async () => {
      const idle = vi.fn();
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);
      pipeline.on('idle', idle);

      pipeline.submit(feelingGood('q1'));
      pipeline.start();
      await settle();

      expect(idle).not.toHaveBeenCalled();

      pipeline.reportResults('q1', [trackResult('hit')]);
      await settle();

      expect(idle).toHaveBeenCalledTimes(1);
    });
  });

  describe('lifecycle', () => {
    beforeEach(() => {
      pipeline = createPipeline();
    });

    it('does not dispatch before start or after stop', async () => {
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);

      pipeline.submit(feelingGood('q1'));
      await settle();
      expect(resolver.calls).toHaveLength(0);

      pipeline.start();
      await settle();
      expect(resolver.calls).toHaveLength(1);

      pipeline.stop();
      pipeline.submit(feelingGood('q2'));
      await settle();
      expect(resolver.calls).toHaveLength(1);
      expect(pipeline.pendingIds()).toEqual(['q2']);
    });

    it('drops results reported while stopped', async () => {
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      pipeline.stop();
      pipeline.reportResults('q1', [trackResult('late')]);
      await settle();

      expect(query.results).toEqual([]);
      expect(query.isResolvingFinished()).toBe(false);
    });

    it('starts once the library index reports ready', async () => {
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);
      pipeline.submit(feelingGood('q1'));

      let onReady: (() => void) | undefined;
      const index = {
        once: (_event: 'indexReady', listener: () => void) => {
          onReady = listener;
        },
        loadIndex: vi.fn(() => {
          setTimeout(() => onReady?.(), 0);
        })
      };

      const started = pipeline.startWhenReady(index);
      expect(index.loadIndex).toHaveBeenCalledTimes(1);
      expect(pipeline.isRunning).toBe(false);

      await started;
      await settle();

      expect(pipeline.isRunning).toBe(true);
      expect(resolver.calls).toHaveLength(1);
    });
  });

  describe('stale results', () => {
    beforeEach(() => {
      pipeline = createPipeline();
    });

    it('ignores repeated reports for a finished, evicted query', async () => {
      const resolver = new FakeResolver('only', 10);
      const finished = vi.fn();
      pipeline.addResolver(resolver);
      pipeline.on('finished', finished);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();
      pipeline.reportResults('q1', [trackResult('hit')]);
      await settle();

      pipeline.reportResults('q1', [trackResult('again')]);
      pipeline.reportResults('q1', []);
      await settle();

      expect(finished).toHaveBeenCalledTimes(1);
      expect(query.results.map(r => r.id)).toEqual(['hit']);
      expect(pipeline.query('q1')).toBeUndefined();
      expect(pipeline.result('hit')).toBeUndefined();
      expect(pipeline.activeQueryCount).toBe(0);
      expect(resolver.calls).toHaveLength(1);
    });

    it('ignores reports for ids it never saw', async () => {
      pipeline.start();
      pipeline.reportResults('nobody', [trackResult('x')]);
      await settle();

      expect(pipeline.result('x')).toBeUndefined();
    });
  });

  describe('timeouts', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      pipeline = createPipeline();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('counts a silent resolver as a failed attempt once its timeout passes', async () => {
      const silent = new FakeResolver('silent', 10, 100);
      pipeline.addResolver(silent);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      vi.advanceTimersByTime(99);
      await settle();
      expect(query.isResolvingFinished()).toBe(false);

      vi.advanceTimersByTime(1);
      await settle();

      expect(query.isResolvingFinished()).toBe(true);
      expect(query.results).toEqual([]);
      expect(pipeline.activeQueryCount).toBe(0);
    });

    it('escalates to the next resolver on timeout', async () => {
      const slow = new FakeResolver('slow', 20, 100);
      const fallback = new FakeResolver('fallback', 10);
      pipeline.addResolver(slow);
      pipeline.addResolver(fallback);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      vi.advanceTimersByTime(100);
      await settle();

      expect(fallback.calls).toEqual([query]);
    });

    it('does nothing when the timeout fires after the answer', async () => {
      const quick = new FakeResolver('quick', 20, 100);
      const other = new FakeResolver('other', 10);
      pipeline.addResolver(quick);
      pipeline.addResolver(other);
      pipeline.start();

      const query = feelingGood('q1');
      pipeline.submit(query);
      await settle();

      pipeline.reportResults('q1', []);
      await settle();
      expect(other.calls).toEqual([query]);

      vi.advanceTimersByTime(100);
      await settle();

      expect(query.isResolvingFinished()).toBe(false);
      expect(pipeline.activeQueryCount).toBe(1);
    });
  });

  describe('temporary queries', () => {
    const quietPeriod = 5 * 60 * 1000;

    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      pipeline = createPipeline();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('stays addressable after finishing until the quiet period ends', async () => {
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);
      pipeline.start();

      const query = feelingGood('tmp');
      pipeline.submit(query, { temporary: true });
      await settle();
      pipeline.reportResults('tmp', [trackResult('tmp-hit')]);
      await settle();

      expect(query.isResolvingFinished()).toBe(true);
      expect(pipeline.query('tmp')).toBe(query);
      expect(pipeline.result('tmp-hit')?.id).toBe('tmp-hit');

      vi.advanceTimersByTime(quietPeriod - 1);
      await settle();
      expect(pipeline.query('tmp')).toBe(query);

      vi.advanceTimersByTime(1);
      await settle();

      expect(pipeline.query('tmp')).toBeUndefined();
      expect(pipeline.result('tmp-hit')).toBeUndefined();
    });

    it('restarts the quiet period on every temporary submission', async () => {
      pipeline.start();

      pipeline.submit(feelingGood('t1'), { temporary: true });
      await settle();

      vi.advanceTimersByTime(4 * 60 * 1000);
      pipeline.submit(feelingGood('t2'), { temporary: true });
      await settle();

      vi.advanceTimersByTime(60 * 1000);
      await settle();
      expect(pipeline.query('t1')).toBeDefined();

      vi.advanceTimersByTime(4 * 60 * 1000);
      await settle();
      expect(pipeline.query('t1')).toBeUndefined();
      expect(pipeline.query('t2')).toBeUndefined();
    });

    it('records late results for a finished temporary query without re-dispatching', async () => {
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);
      pipeline.start();

      const query = feelingGood('tmp');
      pipeline.submit(query, { temporary: true });
      await settle();
      pipeline.reportResults('tmp', [trackResult('first')]);
      await settle();

      pipeline.reportResults('tmp', [trackResult('late')]);
      await settle();

      expect(query.results.map(r => r.id)).toEqual(['first', 'late']);
      expect(pipeline.result('late')?.id).toBe('late');
      expect(resolver.calls).toHaveLength(1);
      expect(pipeline.activeQueryCount).toBe(0);
    });

    it('keeps a temporary query that is still resolving for the next sweep', async () => {
      const resolver = new FakeResolver('never-answers', 10);
      pipeline.addResolver(resolver);
      pipeline.start();

      const query = feelingGood('tmp');
      pipeline.submit(query, { temporary: true });
      await settle();

      vi.advanceTimersByTime(quietPeriod);
      await settle();
      expect(pipeline.query('tmp')).toBe(query);

      pipeline.reportResults('tmp', []);
      await settle();
      expect(query.isResolvingFinished()).toBe(true);

      vi.advanceTimersByTime(quietPeriod);
      await settle();
      expect(pipeline.query('tmp')).toBeUndefined();
    });

    it('keeps a shared result indexed while another query still holds it', async () => {
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);
      pipeline.start();

      pipeline.submit(feelingGood('a'));
      pipeline.submit(feelingGood('b'), { temporary: true });
      await settle();

      pipeline.reportResults('b', [trackResult('local:1')]);
      pipeline.reportResults('a', [trackResult('local:1')]);
      await settle();

      expect(pipeline.query('a')).toBeUndefined();
      expect(pipeline.query('b')?.isResolvingFinished()).toBe(true);
      expect(pipeline.result('local:1')?.id).toBe('local:1');

      vi.advanceTimersByTime(quietPeriod);
      await settle();

      expect(pipeline.query('b')).toBeUndefined();
      expect(pipeline.result('local:1')).toBeUndefined();
    });

    it('leaves an already pending query non-temporary when resubmitted as temporary', async () => {
      const resolver = new FakeResolver('only', 10);
      pipeline.addResolver(resolver);

      const query = feelingGood('q');
      pipeline.submit(query);
      pipeline.submit(query, { temporary: true });
      pipeline.start();
      await settle();

      expect(resolver.calls).toEqual([query]);
      pipeline.reportResults('q', [trackResult('hit')]);
      await settle();

      expect(query.isResolvingFinished()).toBe(true);
      expect(pipeline.query('q')).toBeUndefined();
    });
  });
});
