import type { Interval, Sample } from './types.js';

export const DISRUPTED_INTERVAL_KIND = 'Disrupted';

export interface AggregationOptions {
  readonly kind: string;
  readonly source: string;
  /** Failures closer together than this are folded into one interval. */
  readonly mergeGapMs: number;
}

interface OpenInterval {
  readonly startMs: number;
  lastFailureMs: number;
  readonly details: string[];
}

/**
 * Compress a sample stream into disjoint intervals of failure.
 *
 * An interval opens on the first failure, is extended while failures keep
 * arriving less than `mergeGapMs` after the previous one, and closes on a
 * success observed at least `mergeGapMs` after the last failure. Its end is
 * the timestamp of its last failure, so an isolated failure yields a
 * zero-length interval.
 */
export function aggregateIntervals(samples: readonly Sample[], options: AggregationOptions): readonly Interval[] {
  const ordered = [...samples].sort((a, b) => a.timestampMs - b.timestampMs);
  const intervals: Interval[] = [];
  let open: OpenInterval | null = null;

  const close = (current: OpenInterval): void => {
    intervals.push({
      kind: options.kind,
      source: options.source,
      startMs: current.startMs,
      endMs: current.lastFailureMs,
      message: current.details.join('; '),
    });
  };

  for (const sample of ordered) {
    if (!sample.succeeded) {
      if (open && sample.timestampMs - open.lastFailureMs < options.mergeGapMs) {
        open.lastFailureMs = sample.timestampMs;
        if (!open.details.includes(sample.detail)) open.details.push(sample.detail);
        continue;
      }
      if (open) close(open);
      open = { startMs: sample.timestampMs, lastFailureMs: sample.timestampMs, details: [sample.detail] };
      continue;
    }

    if (open && sample.timestampMs - open.lastFailureMs >= options.mergeGapMs) {
      close(open);
      open = null;
    }
  }

  if (open) close(open);
  return intervals;
}

/**
 * Merge overlapping or touching intervals that share kind and source.
 * Output is ordered by start time, then kind, then source.
 */
export function mergeIntervals(intervals: readonly Interval[]): readonly Interval[] {
  const groups = new Map<string, Interval[]>();
  for (const interval of intervals) {
    const key = `${interval.kind}\u0000${interval.source}`;
    const group = groups.get(key);
    if (group) group.push(interval);
    else groups.set(key, [interval]);
  }

  const merged: Interval[] = [];
  for (const group of groups.values()) {
    group.sort((a, b) => a.startMs - b.startMs);
    let current: Interval | null = null;
    for (const interval of group) {
      if (current && interval.startMs <= current.endMs) {
        const next: Interval = {
          ...current,
          endMs: Math.max(current.endMs, interval.endMs),
          message: current.message === interval.message ? current.message : `${current.message}; ${interval.message}`,
        };
        current = next;
        continue;
      }
      if (current) merged.push(current);
      current = interval;
    }
    if (current) merged.push(current);
  }

  return merged.sort(
    (a, b) => a.startMs - b.startMs || a.kind.localeCompare(b.kind) || a.source.localeCompare(b.source)
  );
}

/**
 * Total unavailability represented by the intervals. Each failed sample stands
 * for one cadence period, so an interval covers `end - start + cadence`.
 */
export function observedDisruptionMs(intervals: readonly Interval[], cadenceMs: number): number {
  return intervals.reduce((total, interval) => total + (interval.endMs - interval.startMs) + cadenceMs, 0);
}
