import type { ResultAsync } from 'neverthrow';
import type { MonitorTestError } from '../errors/app-error.js';
import type { ClusterObjectRecord, Interval, RunWindow, TestVerdict } from '../domain/types.js';
import type { ArtifactStorePort } from '../ports/artifact-store.port.js';

export interface StartCollectionContext {
  readonly beginningMs: number;
  /** End of the window unless the run is cancelled earlier. */
  readonly plannedEndMs: number;
  /** Aborts when the run is cancelled. */
  readonly signal: AbortSignal;
}

export interface CollectedData {
  readonly intervals: readonly Interval[];
  readonly verdicts: readonly TestVerdict[];
  /** Objects observed during collection, shared with every plugin's interval computation. */
  readonly resources: readonly ClusterObjectRecord[];
}

export interface ComputeIntervalsContext {
  readonly window: RunWindow;
  /** Union of every plugin's collected intervals, merged. */
  readonly startingIntervals: readonly Interval[];
  readonly recordedResources: readonly ClusterObjectRecord[];
}

export interface StorageContext {
  /** Absent when the run keeps no artifacts; the phase is still called and writes nothing. */
  readonly store?: ArtifactStorePort;
  /** Appended to artifact file names, e.g. 20240102-030405. */
  readonly timeSuffix: string;
  readonly finalIntervals: readonly Interval[];
  readonly finalResources: readonly ClusterObjectRecord[];
}

/**
 * An analysis plugin. Every phase is called exactly once, in declaration
 * order, by a {@link MonitorTestController} unless an earlier phase failed;
 * `cleanup` is always called.
 */
export interface MonitorTest {
  startCollection(context: StartCollectionContext): ResultAsync<void, MonitorTestError>;
  collectData(window: RunWindow): ResultAsync<CollectedData, MonitorTestError>;
  /** Returns intervals derived from the starting set. They are added to it, not substituted. */
  constructComputedIntervals(context: ComputeIntervalsContext): ResultAsync<readonly Interval[], MonitorTestError>;
  evaluateTestsFromConstructedIntervals(
    finalIntervals: readonly Interval[]
  ): ResultAsync<readonly TestVerdict[], MonitorTestError>;
  writeContentToStorage(context: StorageContext): ResultAsync<void, MonitorTestError>;
  cleanup(): ResultAsync<void, MonitorTestError>;
}

export interface MonitorTestRegistration {
  readonly name: string;
  readonly description: string;
  create(): MonitorTest;
}

export const EMPTY_COLLECTED_DATA: CollectedData = { intervals: [], verdicts: [], resources: [] };
