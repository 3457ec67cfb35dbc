import type { ResultAsync } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { formatAppError } from '../errors/formatter.js';
import { mergeIntervals } from '../domain/interval-aggregator.js';
import { findFlakes, findGatingFailures, toJUnitTestCases } from '../domain/verdict-renderer.js';
import type { Interval, JUnitTestCase, TestVerdict } from '../domain/types.js';
import type { ArtifactStorePort } from '../ports/artifact-store.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { MonitorTestController, type ControllerError, type LifecyclePhase } from './lifecycle-controller.js';
import { EMPTY_COLLECTED_DATA, type CollectedData, type MonitorTestRegistration } from './monitor-test.js';

export interface RunOptions {
  readonly durationMs: number;
  /** Aborting ends the window early; evidence gathered so far is still evaluated. */
  readonly signal?: AbortSignal;
  /** When absent, writeContentToStorage still runs, with no store to write to. */
  readonly store?: ArtifactStorePort;
  /** Run only the monitor tests with these names. */
  readonly only?: readonly string[];
}

export interface PhaseFailure {
  readonly phase: LifecyclePhase;
  readonly error: ControllerError;
}

/**
 * `failed`: a phase up to evaluation failed, so the plugin's evidence is absent.
 * `degraded`: storage or cleanup failed after evaluation; its evidence is kept.
 */
export type PluginStatus =
  | { readonly kind: 'succeeded' }
  | ({ readonly kind: 'failed' } & PhaseFailure)
  | { readonly kind: 'degraded'; readonly failures: readonly PhaseFailure[] };

export interface PluginReport {
  readonly name: string;
  readonly status: PluginStatus;
}

export interface RunReport {
  readonly beginningMs: number;
  readonly endMs: number;
  readonly verdicts: readonly TestVerdict[];
  readonly testCases: readonly JUnitTestCase[];
  readonly intervals: readonly Interval[];
  /** Failed plugins produced no evidence; that is not a test failure. */
  readonly plugins: readonly PluginReport[];
  readonly gatingFailures: readonly string[];
  readonly flakes: readonly string[];
}

interface PluginRun {
  readonly controller: MonitorTestController;
  /** Set by a phase up to evaluation; the run contributes nothing. */
  failure?: PhaseFailure;
  /** Storage and cleanup failures of a run whose evidence stands. */
  readonly lateFailures: PhaseFailure[];
  collected: CollectedData;
  computed: readonly Interval[];
  verdicts: readonly TestVerdict[];
}

/**
 * Formats a timestamp as the artifact suffix `YYYYMMDD-HHmmss` (UTC).
 */
export function formatTimeSuffix(epochMs: number): string {
  const d = new Date(epochMs);
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}` +
    `-${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`
  );
}

function toPluginStatus(run: PluginRun): PluginStatus {
  if (run.failure) return { kind: 'failed', ...run.failure };
  if (run.lateFailures.length > 0) return { kind: 'degraded', failures: [...run.lateFailures] };
  return { kind: 'succeeded' };
}

/**
 * Runs every registered monitor test over one window.
 *
 * Each phase completes for all live plugins before the next one starts. A
 * plugin that fails a phase up to evaluation drops out and contributes
 * nothing to the report; its siblings carry on. Storage and cleanup failures
 * are reported without discarding verdicts already produced. Cleanup always runs.
 */
export class MonitorTestRunner {
  constructor(
    private readonly registrations: readonly MonitorTestRegistration[],
    private readonly clock: TimeClockPort,
    private readonly logger: Logger
  ) {}

  get monitorTests(): readonly MonitorTestRegistration[] {
    return this.registrations;
  }

  async run(options: RunOptions): Promise<RunReport> {
    const signal = options.signal ?? new AbortController().signal;
    const beginningMs = this.clock.nowMs();
    const plannedEndMs = beginningMs + options.durationMs;
    let endMs = plannedEndMs;

    const only = options.only;
    const selected = only ? this.registrations.filter((r) => only.includes(r.name)) : this.registrations;

    const runs: PluginRun[] = selected.map((registration) => ({
      controller: new MonitorTestController(registration.name, registration.create()),
      collected: EMPTY_COLLECTED_DATA,
      computed: [],
      verdicts: [],
      lateFailures: [],
    }));

    this.logger.info(
      { monitorTests: runs.map((r) => r.controller.name), durationMs: options.durationMs },
      'Starting monitor tests'
    );

    try {
      await this.phase(runs, 'startCollection', (c) => c.startCollection({ beginningMs, plannedEndMs, signal }), () => {});

      await this.clock.sleep(Math.max(0, plannedEndMs - this.clock.nowMs()), signal);
      if (signal.aborted) {
        endMs = Math.min(this.clock.nowMs(), plannedEndMs);
        this.logger.warn({ endMs }, 'Run cancelled, evaluating evidence collected so far');
      }
      const window = { beginningMs, endMs };

      await this.phase(runs, 'collectData', (c) => c.collectData(window), (run, data) => {
        run.collected = data;
      });

      const live = (): PluginRun[] => runs.filter((run) => run.failure === undefined);
      const startingIntervals = mergeIntervals(live().flatMap((run) => run.collected.intervals));
      const recordedResources = live().flatMap((run) => run.collected.resources);

      await this.phase(
        runs,
        'constructComputedIntervals',
        (c) => c.constructComputedIntervals({ window, startingIntervals, recordedResources }),
        (run, intervals) => {
          run.computed = intervals;
        }
      );

      const finalIntervals = mergeIntervals([...startingIntervals, ...live().flatMap((run) => run.computed)]);

      await this.phase(
        runs,
        'evaluateTestsFromConstructedIntervals',
        (c) => c.evaluateTestsFromConstructedIntervals(finalIntervals),
        (run, verdicts) => {
          run.verdicts = [...run.collected.verdicts, ...verdicts];
        }
      );

      const store = options.store;
      const timeSuffix = formatTimeSuffix(beginningMs);
      await this.phase(
        runs,
        'writeContentToStorage',
        (c) => c.writeContentToStorage({ store, timeSuffix, finalIntervals, finalResources: recordedResources }),
        () => {}
      );
    } finally {
      await this.cleanupAll(runs);
    }

    return this.buildReport(runs, beginningMs, endMs);
  }

  private async phase<T>(
    runs: readonly PluginRun[],
    phase: LifecyclePhase,
    invoke: (controller: MonitorTestController) => ResultAsync<T, ControllerError>,
    onOk: (run: PluginRun, value: T) => void
  ): Promise<void> {
    await Promise.all(
      runs
        .filter((run) => run.failure === undefined)
        .map(async (run) => {
          const result = await invoke(run.controller);
          if (result.isOk()) {
            onOk(run, result.value);
            return;
          }
          const failure = { phase, error: result.error };
          const logContext = { monitorTest: run.controller.name, phase, error: formatAppError(result.error) };
          if (phase === 'writeContentToStorage') {
            run.lateFailures.push(failure);
            this.logger.warn(logContext, 'Monitor test could not write its artifacts; its verdicts are kept');
            return;
          }
          run.failure = failure;
          this.logger.warn(logContext, 'Monitor test failed; it contributes no evidence to this run');
        })
    );
  }

  private async cleanupAll(runs: readonly PluginRun[]): Promise<void> {
    await Promise.all(
      runs.map(async (run) => {
        const result = await run.controller.cleanup();
        if (result.isErr()) {
          this.logger.warn(
            { monitorTest: run.controller.name, error: formatAppError(result.error) },
            'Monitor test cleanup failed'
          );
          if (run.failure === undefined) run.lateFailures.push({ phase: 'cleanup', error: result.error });
        }
      })
    );
  }

  private buildReport(runs: readonly PluginRun[], beginningMs: number, endMs: number): RunReport {
    const succeeded = runs.filter((run) => run.failure === undefined);
    const verdicts = succeeded.flatMap((run) => run.verdicts);
    const testCases = toJUnitTestCases(verdicts);

    const plugins = runs.map((run): PluginReport => ({
      name: run.controller.name,
      status: toPluginStatus(run),
    }));

    const report: RunReport = {
      beginningMs,
      endMs,
      verdicts,
      testCases,
      intervals: mergeIntervals(succeeded.flatMap((run) => [...run.collected.intervals, ...run.computed])),
      plugins,
      gatingFailures: findGatingFailures(testCases),
      flakes: findFlakes(testCases),
    };

    this.logger.info(
      {
        testCases: testCases.length,
        gatingFailures: report.gatingFailures.length,
        flakes: report.flakes.length,
        failedMonitorTests: plugins.filter((p) => p.status.kind === 'failed').map((p) => p.name),
        degradedMonitorTests: plugins.filter((p) => p.status.kind === 'degraded').map((p) => p.name),
      },
      'Monitor tests finished'
    );

    return report;
  }
}
