import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { MonitorTestError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import {
  REQUIRED_SCC_ANNOTATION,
  collectViolations,
  isNamespaceInScope,
} from '../../domain/required-scc-classifier.js';
import { renderScopeVerdict } from '../../domain/verdict-renderer.js';
import type { ClusterObjectRecord, Interval, TestVerdict } from '../../domain/types.js';
import type { ClusterClientFactory, ClusterQueryPort } from '../../ports/cluster-query.port.js';
import type { CollectedData, MonitorTest, MonitorTestRegistration } from '../../monitortest/monitor-test.js';

export const REQUIRED_SCC_MONITOR_TEST = 'required-scc-annotation-checker';

export function requiredSccTestName(namespace: string): string {
  return `[sig-auth] all workloads in ns/${namespace} must set the '${REQUIRED_SCC_ANNOTATION}' annotation`;
}

interface NamespacePods {
  readonly namespace: string;
  readonly pods: readonly ClusterObjectRecord[];
}

/**
 * Checks that platform pods pin their SCC with the required-scc annotation.
 *
 * One flake-tolerant verdict per in-scope namespace: findings are reported
 * without gating the run while workloads are migrated.
 */
export class RequiredSccMonitorTest implements MonitorTest {
  private client: ClusterQueryPort | undefined;

  constructor(
    private readonly clientFactory: ClusterClientFactory,
    private readonly logger: Logger
  ) {}

  startCollection(): ResultAsync<void, MonitorTestError> {
    const connected = this.clientFactory.connect();
    if (connected.isErr()) return errAsync(connected.error);

    this.client = connected.value;
    return okAsync(undefined);
  }

  collectData(): ResultAsync<CollectedData, MonitorTestError> {
    const client = this.client;
    if (!client) {
      return errAsync(Err.unexpected('required-scc collection started without a cluster client', undefined));
    }

    return client
      .listNamespaces()
      .andThen((namespaces) => {
        const inScope = namespaces
          .map((ns) => ns.name)
          .filter(isNamespaceInScope)
          .sort();
        this.logger.debug({ namespaces: inScope.length }, 'Listing pods of in-scope namespaces');

        return ResultAsync.combine(
          inScope.map((namespace) => client.listPods(namespace).map((pods): NamespacePods => ({ namespace, pods })))
        );
      })
      .map((perNamespace) => {
        const verdicts = perNamespace.map(({ namespace, pods }) =>
          renderScopeVerdict(requiredSccTestName(namespace), collectViolations(pods))
        );
        return {
          intervals: [],
          verdicts,
          resources: perNamespace.flatMap(({ pods }) => pods),
        };
      });
  }

  constructComputedIntervals(): ResultAsync<readonly Interval[], MonitorTestError> {
    return okAsync([]);
  }

  evaluateTestsFromConstructedIntervals(): ResultAsync<readonly TestVerdict[], MonitorTestError> {
    return okAsync([]);
  }

  writeContentToStorage(): ResultAsync<void, MonitorTestError> {
    return okAsync(undefined);
  }

  cleanup(): ResultAsync<void, MonitorTestError> {
    this.client = undefined;
    return okAsync(undefined);
  }
}

export function requiredSccRegistration(clientFactory: ClusterClientFactory, logger: Logger): MonitorTestRegistration {
  return {
    name: REQUIRED_SCC_MONITOR_TEST,
    description: `Reports pods in platform namespaces that do not set '${REQUIRED_SCC_ANNOTATION}'`,
    create: () => new RequiredSccMonitorTest(clientFactory, logger),
  };
}
