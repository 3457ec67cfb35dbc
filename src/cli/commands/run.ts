/**
 * `clustermon run`: runs the monitor tests over one window and writes the report.
 */

import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, success } from '../types/cli-result.js';
import type { ArtifactStorePort } from '../../ports/artifact-store.port.js';
import type { MonitorTestRegistration } from '../../monitortest/monitor-test.js';
import {
  formatTimeSuffix,
  type PhaseFailure,
  type PluginReport,
  type RunOptions,
  type RunReport,
} from '../../monitortest/run-orchestrator.js';
import { formatAppError } from '../../errors/formatter.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface RunCommandDeps {
  readonly monitorTests: readonly Pick<MonitorTestRegistration, 'name'>[];
  readonly runMonitorTests: (options: RunOptions) => Promise<RunReport>;
  readonly createStore: (directory: string) => ArtifactStorePort;
  /** Calls `cancel` on SIGINT/SIGTERM. Returns a function that removes the handler. */
  readonly onCancelRequested: (cancel: () => void) => () => void;
  /** Artifact directory from configuration, used when --output is absent. */
  readonly defaultOutputDir?: string;
}

export interface RunCommandOptions {
  /** Raw `--duration` value, in seconds. */
  readonly duration: string;
  readonly only?: readonly string[];
  readonly output?: string;
}

/** RunReport with errors rendered to text, as written to disk. */
export interface SerializedPhaseFailure {
  readonly phase: string;
  readonly error: string;
}

export interface SerializedRunReport extends Omit<RunReport, 'plugins'> {
  readonly plugins: readonly (
    | { readonly name: string; readonly status: 'succeeded' }
    | ({ readonly name: string; readonly status: 'failed' } & SerializedPhaseFailure)
    | { readonly name: string; readonly status: 'degraded'; readonly failures: readonly SerializedPhaseFailure[] }
  )[];
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

function serializePhaseFailure(failure: PhaseFailure): SerializedPhaseFailure {
  return { phase: failure.phase, error: formatAppError(failure.error) };
}

function serializePlugin(plugin: PluginReport): SerializedRunReport['plugins'][number] {
  switch (plugin.status.kind) {
    case 'succeeded':
      return { name: plugin.name, status: 'succeeded' };
    case 'failed':
      return { name: plugin.name, status: 'failed', ...serializePhaseFailure(plugin.status) };
    case 'degraded':
      return { name: plugin.name, status: 'degraded', failures: plugin.status.failures.map(serializePhaseFailure) };
    default:
      return assertNever(plugin.status);
  }
}

function pluginWarnings(plugin: PluginReport): readonly string[] {
  switch (plugin.status.kind) {
    case 'succeeded':
      return [];
    case 'failed':
      return [`${plugin.name} produced no evidence (${plugin.status.phase}): ${plugin.status.error.message}`];
    case 'degraded':
      return plugin.status.failures.map(
        (f) => `${plugin.name} kept its verdicts but ${f.phase} failed: ${f.error.message}`
      );
    default:
      return assertNever(plugin.status);
  }
}

export function serializeRunReport(report: RunReport): SerializedRunReport {
  return { ...report, plugins: report.plugins.map(serializePlugin) };
}

/**
 * Execute the run command.
 *
 * Exit status: failure when any test case name has only failing entries.
 * Flakes and monitor tests that produced no evidence are reported as warnings.
 */
export async function executeRunCommand(deps: RunCommandDeps, options: RunCommandOptions): Promise<CliResult> {
  const seconds = Number(options.duration);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return misuse(`Invalid duration "${options.duration}"`, ['Pass the run length in seconds, e.g. --duration 600']);
  }

  const known = new Set(deps.monitorTests.map((t) => t.name));
  const unknown = (options.only ?? []).filter((name) => !known.has(name));
  if (unknown.length > 0) {
    return misuse(`Unknown monitor test(s): ${unknown.join(', ')}`, ['Run "clustermon list" to see available monitor tests']);
  }

  const outputDir = options.output ?? deps.defaultOutputDir;
  const store = outputDir === undefined ? undefined : deps.createStore(outputDir);

  const controller = new AbortController();
  const removeHandler = deps.onCancelRequested(() => controller.abort());

  const report = await deps
    .runMonitorTests({
      durationMs: Math.round(seconds * 1000),
      signal: controller.signal,
      store,
      only: options.only,
    })
    .finally(removeHandler);

  const details: string[] = [];
  if (store) {
    const fileName = `clustermon-report_${formatTimeSuffix(report.beginningMs)}.json`;
    const written = await store.writeText(fileName, `${JSON.stringify(serializeRunReport(report), null, 2)}\n`);
    if (written.isErr()) {
      return failure(formatAppError(written.error));
    }
    details.push(`Report: ${fileName} in ${outputDir}`);
  }

  const warnings = [
    ...report.plugins.flatMap(pluginWarnings),
    ...report.flakes.map((name) => `flaky: ${name}`),
  ];

  if (controller.signal.aborted) {
    warnings.push('Run was cancelled; results cover the shortened window');
  }

  const passed = report.testCases.filter((t) => t.outcome === 'pass').length;
  details.unshift(`${report.testCases.length} test cases, ${passed} passing entries`);

  if (report.gatingFailures.length > 0) {
    const failedOutput = report.gatingFailures.flatMap((name) => [
      name,
      ...report.testCases
        .filter((t) => t.name === name && t.outcome === 'fail')
        .map((t) => `  ${t.output.split('\n').join('\n  ')}`),
    ]);
    return failure(`${report.gatingFailures.length} monitor test case(s) failed`, {
      details: [...details, ...failedOutput],
      warnings,
    });
  }

  const noEvidence = report.plugins.length > 0 && report.plugins.every((p) => p.status.kind === 'failed');
  return success({
    message: noEvidence ? 'No monitor test produced evidence' : 'Monitor tests passed',
    details,
    warnings,
  });
}
