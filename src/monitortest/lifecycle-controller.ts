import { ResultAsync, errAsync } from 'neverthrow';
import type { LifecycleViolationError, MonitorTestError } from '../errors/app-error.js';
import { Err } from '../errors/factories.js';
import type { Interval, RunWindow, TestVerdict } from '../domain/types.js';
import type {
  CollectedData,
  ComputeIntervalsContext,
  MonitorTest,
  StartCollectionContext,
  StorageContext,
} from './monitor-test.js';

export type LifecycleState =
  | 'uninitialized'
  | 'collecting'
  | 'collected'
  | 'intervals_computed'
  | 'evaluated'
  | 'persisted'
  | 'cleaned_up'
  | 'aborted';

export type LifecyclePhase =
  | 'startCollection'
  | 'collectData'
  | 'constructComputedIntervals'
  | 'evaluateTestsFromConstructedIntervals'
  | 'writeContentToStorage'
  | 'cleanup';

export type ControllerError = MonitorTestError | LifecycleViolationError;

interface Transition {
  readonly from: LifecycleState;
  readonly to: LifecycleState;
}

const TRANSITIONS: Readonly<Record<Exclude<LifecyclePhase, 'cleanup'>, Transition>> = {
  startCollection: { from: 'uninitialized', to: 'collecting' },
  collectData: { from: 'collecting', to: 'collected' },
  constructComputedIntervals: { from: 'collected', to: 'intervals_computed' },
  evaluateTestsFromConstructedIntervals: { from: 'intervals_computed', to: 'evaluated' },
  writeContentToStorage: { from: 'evaluated', to: 'persisted' },
};

/**
 * Drives one monitor test through its phases.
 *
 * Phases run in a fixed order, at most once each, never concurrently. A phase
 * error (returned or thrown) moves the plugin to `aborted`; from there only
 * `cleanup` is accepted. `cleanup` is accepted from every state but
 * `cleaned_up`.
 */
export class MonitorTestController {
  private _state: LifecycleState = 'uninitialized';
  private running: LifecyclePhase | null = null;

  constructor(
    readonly name: string,
    private readonly test: MonitorTest
  ) {}

  get state(): LifecycleState {
    return this._state;
  }

  startCollection(context: StartCollectionContext): ResultAsync<void, ControllerError> {
    return this.advance('startCollection', () => this.test.startCollection(context));
  }

  collectData(window: RunWindow): ResultAsync<CollectedData, ControllerError> {
    return this.advance('collectData', () => this.test.collectData(window));
  }

  constructComputedIntervals(context: ComputeIntervalsContext): ResultAsync<readonly Interval[], ControllerError> {
    return this.advance('constructComputedIntervals', () => this.test.constructComputedIntervals(context));
  }

  evaluateTestsFromConstructedIntervals(
    finalIntervals: readonly Interval[]
  ): ResultAsync<readonly TestVerdict[], ControllerError> {
    return this.advance('evaluateTestsFromConstructedIntervals', () =>
      this.test.evaluateTestsFromConstructedIntervals(finalIntervals)
    );
  }

  writeContentToStorage(context: StorageContext): ResultAsync<void, ControllerError> {
    return this.advance('writeContentToStorage', () => this.test.writeContentToStorage(context));
  }

  cleanup(): ResultAsync<void, ControllerError> {
    if (this._state === 'cleaned_up') {
      return errAsync(this.violation('cleanup', 'cleanup already ran'));
    }
    if (this.running !== null) {
      return errAsync(this.violation('cleanup', `${this.running} is still running`));
    }

    // Cleanup runs once: the plugin is cleaned up whether or not it succeeds.
    return this.invoke('cleanup', () => this.test.cleanup())
      .map(() => {
        this._state = 'cleaned_up';
      })
      .mapErr((error) => {
        this._state = 'cleaned_up';
        return error;
      });
  }

  private advance<T>(
    phase: Exclude<LifecyclePhase, 'cleanup'>,
    run: () => ResultAsync<T, MonitorTestError>
  ): ResultAsync<T, ControllerError> {
    const { from, to } = TRANSITIONS[phase];

    if (this.running !== null) {
      return errAsync(this.violation(phase, `${this.running} is still running`));
    }
    if (this._state !== from) {
      return errAsync(this.violation(phase, `expected state ${from}`));
    }

    return this.invoke(phase, run)
      .map((value) => {
        this._state = to;
        return value;
      })
      .mapErr((error) => {
        this._state = 'aborted';
        return error;
      });
  }

  private invoke<T>(phase: LifecyclePhase, run: () => ResultAsync<T, MonitorTestError>): ResultAsync<T, MonitorTestError> {
    this.running = phase;

    // Promise.resolve().then turns a synchronous throw into a rejection.
    return ResultAsync.fromPromise(Promise.resolve().then(run), (e) =>
      Err.unexpected(`Monitor test "${this.name}" threw during ${phase}`, e)
    )
      .andThen((result) => result)
      .map((value) => {
        this.running = null;
        return value;
      })
      .mapErr((error) => {
        this.running = null;
        return error;
      });
  }

  private violation(phase: LifecyclePhase, details: string): LifecycleViolationError {
    return Err.lifecycleViolation(this.name, phase, this._state, details);
  }
}
