import { describe, it, expect } from 'vitest';
import {
  DISRUPTED_INTERVAL_KIND,
  aggregateIntervals,
  mergeIntervals,
  observedDisruptionMs,
} from '../../src/domain/interval-aggregator.js';
import type { Interval, Sample } from '../../src/domain/types.js';

const OPTIONS = { kind: DISRUPTED_INTERVAL_KIND, source: 'kube-api', mergeGapMs: 2_000 };

function samples(rows: readonly [seconds: number, ok: boolean, detail?: string][]): Sample[] {
  return rows.map(([seconds, succeeded, detail]) => ({
    timestampMs: seconds * 1_000,
    succeeded,
    detail: detail ?? (succeeded ? 'ok' : 'HTTP 503'),
  }));
}

function interval(source: string, startMs: number, endMs: number, message = 'HTTP 503'): Interval {
  return { kind: DISRUPTED_INTERVAL_KIND, source, startMs, endMs, message };
}

describe('aggregateIntervals', () => {
  it('folds a run of failures followed by a long success streak into one interval', () => {
    const stream: [number, boolean][] = [];
    for (let t = 0; t <= 5; t++) stream.push([t, false]);
    for (let t = 6; t <= 60; t++) stream.push([t, true]);

    expect(aggregateIntervals(samples(stream), OPTIONS)).toEqual([interval('kube-api', 0, 5_000)]);
  });

  it('reports an isolated failure as a zero-length interval', () => {
    const result = aggregateIntervals(samples([[0, true], [1, false], [2, true], [3, true], [4, true]]), OPTIONS);

    expect(result).toEqual([interval('kube-api', 1_000, 1_000)]);
  });

  it('merges failures separated by less than the merge gap', () => {
    const result = aggregateIntervals(
      samples([[0, false], [1, true], [1.5, false], [2, true], [4, true]]),
      OPTIONS
    );

    expect(result).toEqual([interval('kube-api', 0, 1_500)]);
  });

  it('splits failures separated by exactly the merge gap', () => {
    const result = aggregateIntervals(samples([[0, false], [2, false], [10, true]]), {
      ...OPTIONS,
      mergeGapMs: 2_000,
    });

    expect(result).toEqual([interval('kube-api', 0, 0), interval('kube-api', 2_000, 2_000)]);
  });

  it('lists distinct failure details once, in order of first appearance', () => {
    const result = aggregateIntervals(
      samples([
        [0, false, 'HTTP 503'],
        [1, false, 'connection refused'],
        [2, false, 'HTTP 503'],
      ]),
      OPTIONS
    );

    expect(result).toEqual([interval('kube-api', 0, 2_000, 'HTTP 503; connection refused')]);
  });

  it('sorts samples before scanning', () => {
    const result = aggregateIntervals(samples([[3, false], [0, true], [2, false]]), OPTIONS);

    expect(result).toEqual([interval('kube-api', 2_000, 3_000)]);
  });

  it('returns no intervals for an all-success or empty stream', () => {
    expect(aggregateIntervals(samples([[0, true], [1, true]]), OPTIONS)).toEqual([]);
    expect(aggregateIntervals([], OPTIONS)).toEqual([]);
  });

  it('produces intervals that never overlap and keep start <= end', () => {
    const stream: [number, boolean][] = [];
    for (let t = 0; t < 40; t++) stream.push([t, t % 7 === 0 || t % 11 === 0]);
    const result = aggregateIntervals(samples(stream.map(([t, failed]) => [t, !failed])), OPTIONS);

    for (const [i, current] of result.entries()) {
      expect(current.startMs).toBeLessThanOrEqual(current.endMs);
      const next = result[i + 1];
      if (next) expect(next.startMs).toBeGreaterThan(current.endMs);
    }
  });
});

describe('mergeIntervals', () => {
  it('merges overlapping intervals of the same kind and source', () => {
    const result = mergeIntervals([
      interval('kube-api', 5_000, 9_000, 'HTTP 500'),
      interval('kube-api', 0, 6_000),
    ]);

    expect(result).toEqual([interval('kube-api', 0, 9_000, 'HTTP 503; HTTP 500')]);
  });

  it('keeps intervals of different sources apart', () => {
    const result = mergeIntervals([interval('oauth-api', 0, 4_000), interval('kube-api', 1_000, 2_000)]);

    expect(result).toEqual([interval('oauth-api', 0, 4_000), interval('kube-api', 1_000, 2_000)]);
  });

  it('is idempotent', () => {
    const once = mergeIntervals([interval('kube-api', 0, 3_000), interval('kube-api', 2_000, 5_000)]);

    expect(mergeIntervals(once)).toEqual(once);
  });
});

describe('observedDisruptionMs', () => {
  it('counts one cadence period per interval on top of its span', () => {
    expect(observedDisruptionMs([interval('kube-api', 0, 5_000), interval('kube-api', 9_000, 9_000)], 1_000)).toBe(
      7_000
    );
  });

  it('is zero without intervals', () => {
    expect(observedDisruptionMs([], 1_000)).toBe(0);
  });
});
