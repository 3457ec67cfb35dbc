// DI Container exports
export { initializeContainer, container, resetContainer } from './di/container.js';
export { DI } from './di/tokens.js';

// Monitor test framework
export type {
  CollectedData,
  ComputeIntervalsContext,
  MonitorTest,
  MonitorTestRegistration,
  StartCollectionContext,
  StorageContext,
} from './monitortest/monitor-test.js';
export { MonitorTestController, type LifecycleState, type LifecyclePhase } from './monitortest/lifecycle-controller.js';
export {
  MonitorTestRunner,
  formatTimeSuffix,
  type PhaseFailure,
  type PluginReport,
  type PluginStatus,
  type RunOptions,
  type RunReport,
} from './monitortest/run-orchestrator.js';
export { createMonitorTestRegistrations, type MonitorTestDeps } from './monitortests/index.js';

// Evidence, tolerance, classification and verdicts
export type {
  ClusterObjectRecord,
  ComplianceVerdict,
  DisruptionBudget,
  Interval,
  JUnitTestCase,
  RunWindow,
  Sample,
  TestOutcome,
  TestVerdict,
  TopologyFacts,
} from './domain/types.js';
export { EvidenceSampler, type SamplingOptions } from './domain/evidence-sampler.js';
export {
  DISRUPTED_INTERVAL_KIND,
  aggregateIntervals,
  mergeIntervals,
  observedDisruptionMs,
} from './domain/interval-aggregator.js';
export { computeDisruptionBudget, TOLERANCE_RULES } from './domain/tolerance-model.js';
export { classifyObject, collectViolations, describeVerdict, isNamespaceInScope } from './domain/required-scc-classifier.js';
export { renderScopeVerdict, toJUnitTestCases, findGatingFailures, findFlakes } from './domain/verdict-renderer.js';

// Ports
export type { ArtifactStorePort } from './ports/artifact-store.port.js';
export type { BackendProbePort, ProbeFailure, ProbeSuccess, ProbeTarget } from './ports/backend-probe.port.js';
export type { ClusterClientFactory, ClusterQueryPort, InfrastructureStatus, NamespaceRecord } from './ports/cluster-query.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';

// Errors and config
export * from './errors/index.js';
export { loadConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
