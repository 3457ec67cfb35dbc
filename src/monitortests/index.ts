import type { ILoggerFactory } from '../core/logging/index.js';
import type { MonitorTestRegistration } from '../monitortest/monitor-test.js';
import type { BackendProbePort } from '../ports/backend-probe.port.js';
import type { ClusterClientFactory } from '../ports/cluster-query.port.js';
import type { TimeClockPort } from '../ports/time-clock.port.js';
import { API_BACKENDS } from './backend-disruption/backends.js';
import { backendDisruptionRegistration, type SamplingSettings } from './backend-disruption/backend-disruption-monitor-test.js';
import { requiredSccRegistration } from './required-scc/required-scc-monitor-test.js';

export interface MonitorTestDeps {
  readonly clientFactory: ClusterClientFactory;
  readonly probe: BackendProbePort;
  readonly clock: TimeClockPort;
  readonly loggerFactory: ILoggerFactory;
  readonly sampling: SamplingSettings;
}

/**
 * Every monitor test shipped with clustermon, in report order.
 */
export function createMonitorTestRegistrations(deps: MonitorTestDeps): readonly MonitorTestRegistration[] {
  return [
    requiredSccRegistration(deps.clientFactory, deps.loggerFactory.create('RequiredSccMonitorTest')),
    ...API_BACKENDS.map((backend) =>
      backendDisruptionRegistration(backend, {
        clientFactory: deps.clientFactory,
        probe: deps.probe,
        clock: deps.clock,
        logger: deps.loggerFactory.create('BackendDisruptionMonitorTest').child({ backend: backend.name }),
        sampling: deps.sampling,
      })
    ),
  ];
}

export { API_BACKENDS, type BackendDefinition } from './backend-disruption/backends.js';
export {
  BackendDisruptionMonitorTest,
  renderDisruptionVerdict,
  type BackendDisruptionDeps,
  type SamplingSettings,
} from './backend-disruption/backend-disruption-monitor-test.js';
export { readTopologyFacts } from './backend-disruption/topology-facts.js';
export {
  RequiredSccMonitorTest,
  REQUIRED_SCC_MONITOR_TEST,
  requiredSccTestName,
} from './required-scc/required-scc-monitor-test.js';
