import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { MonitorTestError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import { EvidenceSampler } from '../../domain/evidence-sampler.js';
import {
  DISRUPTED_INTERVAL_KIND,
  aggregateIntervals,
  observedDisruptionMs,
} from '../../domain/interval-aggregator.js';
import { computeDisruptionBudget } from '../../domain/tolerance-model.js';
import { renderScopeVerdict } from '../../domain/verdict-renderer.js';
import type { DisruptionBudget, Interval, RunWindow, Sample, TestVerdict } from '../../domain/types.js';
import type { BackendProbePort } from '../../ports/backend-probe.port.js';
import type { ClusterClientFactory, ClusterQueryPort } from '../../ports/cluster-query.port.js';
import type { TimeClockPort } from '../../ports/time-clock.port.js';
import type {
  CollectedData,
  MonitorTest,
  MonitorTestRegistration,
  StartCollectionContext,
  StorageContext,
} from '../../monitortest/monitor-test.js';
import type { BackendDefinition } from './backends.js';
import { readTopologyFacts } from './topology-facts.js';

export interface SamplingSettings {
  readonly intervalMs: number;
  readonly probeTimeoutMs: number;
  readonly mergeGapMs: number;
}

export interface BackendDisruptionDeps {
  readonly clientFactory: ClusterClientFactory;
  readonly probe: BackendProbePort;
  readonly clock: TimeClockPort;
  readonly logger: Logger;
  readonly sampling: SamplingSettings;
}

interface DisruptionSummary {
  readonly source: string;
  readonly observedMs: number;
  readonly totalMs: number;
  readonly budget: DisruptionBudget;
}

/**
 * Pass when observed disruption is within budget, otherwise a gating fail.
 * Caveats from the tolerance model are always part of the output.
 */
export function renderDisruptionVerdict(testName: string, summary: DisruptionSummary): TestVerdict {
  const { source, observedMs, totalMs, budget } = summary;
  const findings =
    observedMs > budget.allowedDurationMs
      ? [`${source}: disruption exceeded the allowed budget by ${observedMs - budget.allowedDurationMs}ms`]
      : [];

  const notes = [
    `${source}: observed ${observedMs}ms of disruption over ${totalMs}ms, allowed ${budget.allowedDurationMs}ms ` +
      `(rule ${budget.ruleId}, fraction ${budget.allowedFraction})`,
    ...budget.caveats.map((caveat) => `caveat: ${caveat}`),
  ];

  return renderScopeVerdict(testName, findings, { flakeOnFindings: false, notes });
}

export function disruptionMonitorTestName(backend: BackendDefinition): string {
  return `${backend.name}-disruption`;
}

/**
 * Samples one API backend for the whole run and judges the observed
 * unavailability against the topology-aware budget.
 */
export class BackendDisruptionMonitorTest implements MonitorTest {
  private client: ClusterQueryPort | undefined;
  private readonly stop = new AbortController();
  private detachFromRun: (() => void) | undefined;
  private sampling: ResultAsync<readonly Sample[], MonitorTestError> | undefined;
  private samples: readonly Sample[] = [];

  constructor(
    private readonly backend: BackendDefinition,
    private readonly deps: BackendDisruptionDeps
  ) {}

  startCollection(context: StartCollectionContext): ResultAsync<void, MonitorTestError> {
    const connected = this.deps.clientFactory.connect();
    if (connected.isErr()) return errAsync(connected.error);
    this.client = connected.value;

    if (context.signal.aborted) {
      this.stop.abort();
    } else {
      const runSignal = context.signal;
      const onRunAborted = (): void => this.stop.abort();
      runSignal.addEventListener('abort', onRunAborted, { once: true });
      this.detachFromRun = () => runSignal.removeEventListener('abort', onRunAborted);
    }
    const signal = this.stop.signal;
    const sampler = new EvidenceSampler(this.deps.probe, this.deps.clock, this.deps.logger);

    // Runs in the background until the window ends; collectData joins it.
    this.sampling = ResultAsync.fromPromise(
      sampler.run({
        target: this.backend,
        cadenceMs: this.deps.sampling.intervalMs,
        probeTimeoutMs: this.deps.sampling.probeTimeoutMs,
        beginningMs: context.beginningMs,
        endMs: context.plannedEndMs,
        signal,
      }),
      (e) => Err.unexpected(`Sampling ${this.backend.name} failed`, e)
    );

    return okAsync(undefined);
  }

  collectData(window: RunWindow): ResultAsync<CollectedData, MonitorTestError> {
    const client = this.client;
    const sampling = this.sampling;
    if (!client || !sampling) {
      return errAsync(Err.unexpected(`${this.backend.name} collection started before sampling`, undefined));
    }

    return sampling.andThen((samples) => {
      this.samples = samples.filter((s) => s.timestampMs >= window.beginningMs && s.timestampMs < window.endMs);

      const intervals = aggregateIntervals(this.samples, {
        kind: DISRUPTED_INTERVAL_KIND,
        source: this.backend.name,
        mergeGapMs: this.deps.sampling.mergeGapMs,
      });

      return readTopologyFacts(client, this.deps.logger).map((facts): CollectedData => {
        const totalMs = window.endMs - window.beginningMs;
        const budget = computeDisruptionBudget(facts, totalMs);
        const observedMs = observedDisruptionMs(intervals, this.deps.sampling.intervalMs);

        this.deps.logger.info(
          { backend: this.backend.name, samples: this.samples.length, observedMs, allowedMs: budget.allowedDurationMs },
          'Disruption measured'
        );

        return {
          intervals,
          verdicts: [
            renderDisruptionVerdict(this.backend.testName, { source: this.backend.name, observedMs, totalMs, budget }),
          ],
          resources: [],
        };
      });
    });
  }

  constructComputedIntervals(): ResultAsync<readonly Interval[], MonitorTestError> {
    return okAsync([]);
  }

  evaluateTestsFromConstructedIntervals(): ResultAsync<readonly TestVerdict[], MonitorTestError> {
    return okAsync([]);
  }

  writeContentToStorage(context: StorageContext): ResultAsync<void, MonitorTestError> {
    if (!context.store) return okAsync(undefined);

    const content = {
      backend: this.backend.name,
      path: this.backend.path,
      samples: this.samples,
      intervals: context.finalIntervals.filter(
        (i) => i.kind === DISRUPTED_INTERVAL_KIND && i.source === this.backend.name
      ),
    };

    return context.store.writeText(
      `backend-disruption_${this.backend.name}_${context.timeSuffix}.json`,
      `${JSON.stringify(content, null, 2)}\n`
    );
  }

  cleanup(): ResultAsync<void, MonitorTestError> {
    this.detachFromRun?.();
    this.detachFromRun = undefined;
    this.stop.abort();
    this.client = undefined;
    return this.sampling ? this.sampling.map(() => undefined) : okAsync(undefined);
  }
}

export function backendDisruptionRegistration(
  backend: BackendDefinition,
  deps: BackendDisruptionDeps
): MonitorTestRegistration {
  return {
    name: disruptionMonitorTestName(backend),
    description: backend.description,
    create: () => new BackendDisruptionMonitorTest(backend, deps),
  };
}
