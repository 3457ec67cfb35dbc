import { err, errAsync, ok, okAsync, type Result, type ResultAsync } from 'neverthrow';
import type {
  ClusterClientFactory,
  ClusterQueryPort,
  InfrastructureStatus,
  NamespaceRecord,
} from '../../src/ports/cluster-query.port.js';
import type { ClientInitError, ListError } from '../../src/errors/app-error.js';
import { Err } from '../../src/errors/factories.js';
import type { ClusterObjectRecord } from '../../src/domain/types.js';

/**
 * In-memory cluster. Pods are keyed by namespace; the namespace list is
 * derived from the pods unless set explicitly.
 */
export class FakeClusterQuery implements ClusterQueryPort {
  readonly pods = new Map<string, ClusterObjectRecord[]>();
  namespaces: string[] | undefined;
  infrastructure: InfrastructureStatus | ListError = { controlPlaneTopology: 'HighlyAvailable', platformType: 'AWS' };
  versionHistory: readonly string[] | ListError = ['4.14.3', '4.13.10'];
  failNamespaceList: ListError | undefined;
  readonly failPodsIn = new Set<string>();
  readonly podListings: string[] = [];

  addPod(record: ClusterObjectRecord): this {
    const existing = this.pods.get(record.namespace) ?? [];
    this.pods.set(record.namespace, [...existing, record]);
    return this;
  }

  listNamespaces(): ResultAsync<readonly NamespaceRecord[], ListError> {
    if (this.failNamespaceList) return errAsync(this.failNamespaceList);
    const names = this.namespaces ?? [...this.pods.keys()];
    return okAsync(names.map((name) => ({ name })));
  }

  listPods(namespace: string): ResultAsync<readonly ClusterObjectRecord[], ListError> {
    this.podListings.push(namespace);
    if (this.failPodsIn.has(namespace)) {
      return errAsync(Err.listFailed('pods', 'connection reset', { namespace }));
    }
    return okAsync(this.pods.get(namespace) ?? []);
  }

  getInfrastructure(): ResultAsync<InfrastructureStatus, ListError> {
    const infra = this.infrastructure;
    return 'controlPlaneTopology' in infra ? okAsync(infra) : errAsync(infra);
  }

  getClusterVersionHistory(): ResultAsync<readonly string[], ListError> {
    const history = this.versionHistory;
    return isListError(history) ? errAsync(history) : okAsync(history);
  }
}

function isListError(value: readonly string[] | ListError): value is ListError {
  return !Array.isArray(value);
}

export class FakeClusterClientFactory implements ClusterClientFactory {
  connects = 0;

  constructor(
    readonly client: FakeClusterQuery = new FakeClusterQuery(),
    public initError: ClientInitError | undefined = undefined
  ) {}

  connect(): Result<ClusterQueryPort, ClientInitError> {
    this.connects += 1;
    return this.initError ? err(this.initError) : ok(this.client);
  }
}

export function pod(
  namespace: string,
  name: string,
  annotations: Record<string, string> = {},
  ownerReferences: { kind: string; name: string }[] = []
): ClusterObjectRecord {
  return { namespace, name, annotations, ownerReferences };
}
