import { errAsync, okAsync, type ResultAsync } from 'neverthrow';
import type { MonitorTestError } from '../../src/errors/app-error.js';
import type { Interval, RunWindow, TestVerdict } from '../../src/domain/types.js';
import type {
  CollectedData,
  ComputeIntervalsContext,
  MonitorTest,
  MonitorTestRegistration,
  StartCollectionContext,
  StorageContext,
} from '../../src/monitortest/monitor-test.js';
import type { LifecyclePhase } from '../../src/monitortest/lifecycle-controller.js';

export interface FakeMonitorTestScript {
  collected?: Partial<CollectedData>;
  computed?: readonly Interval[];
  evaluated?: readonly TestVerdict[];
  /** Phase that returns this error instead of succeeding. */
  failAt?: { readonly phase: LifecyclePhase; readonly error: MonitorTestError };
  /** Phase that throws instead of returning. */
  throwAt?: LifecyclePhase;
  onStart?: (context: StartCollectionContext) => void;
}

/**
 * Monitor test that returns scripted data and records every call it receives.
 */
export class FakeMonitorTest implements MonitorTest {
  readonly calls: LifecyclePhase[] = [];
  startContext: StartCollectionContext | undefined;
  collectWindow: RunWindow | undefined;
  computeContext: ComputeIntervalsContext | undefined;
  evaluatedWith: readonly Interval[] | undefined;
  storageContext: StorageContext | undefined;

  constructor(private readonly script: FakeMonitorTestScript = {}) {}

  startCollection(context: StartCollectionContext): ResultAsync<void, MonitorTestError> {
    this.startContext = context;
    this.script.onStart?.(context);
    return this.respond('startCollection', undefined);
  }

  collectData(window: RunWindow): ResultAsync<CollectedData, MonitorTestError> {
    this.collectWindow = window;
    return this.respond('collectData', {
      intervals: this.script.collected?.intervals ?? [],
      verdicts: this.script.collected?.verdicts ?? [],
      resources: this.script.collected?.resources ?? [],
    });
  }

  constructComputedIntervals(context: ComputeIntervalsContext): ResultAsync<readonly Interval[], MonitorTestError> {
    this.computeContext = context;
    return this.respond('constructComputedIntervals', this.script.computed ?? []);
  }

  evaluateTestsFromConstructedIntervals(finalIntervals: readonly Interval[]): ResultAsync<readonly TestVerdict[], MonitorTestError> {
    this.evaluatedWith = finalIntervals;
    return this.respond('evaluateTestsFromConstructedIntervals', this.script.evaluated ?? []);
  }

  writeContentToStorage(context: StorageContext): ResultAsync<void, MonitorTestError> {
    this.storageContext = context;
    return this.respond('writeContentToStorage', undefined);
  }

  cleanup(): ResultAsync<void, MonitorTestError> {
    return this.respond('cleanup', undefined);
  }

  private respond<T>(phase: LifecyclePhase, value: T): ResultAsync<T, MonitorTestError> {
    this.calls.push(phase);
    if (this.script.throwAt === phase) {
      throw new Error(`${phase} exploded`);
    }
    if (this.script.failAt?.phase === phase) {
      return errAsync(this.script.failAt.error);
    }
    return okAsync(value);
  }
}

/** Registration that hands out one pre-built fake. */
export function fakeRegistration(name: string, test: FakeMonitorTest = new FakeMonitorTest()): MonitorTestRegistration {
  return { name, description: `fake ${name}`, create: () => test };
}
