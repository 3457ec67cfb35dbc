import { Result, ResultAsync, err, errAsync, ok, okAsync } from 'neverthrow';
import type { z } from 'zod';
import type {
  ClusterClientFactory,
  ClusterQueryPort,
  InfrastructureStatus,
  NamespaceRecord,
} from '../../ports/cluster-query.port.js';
import type { ClientInitError, ListError } from '../../errors/app-error.js';
import { Err } from '../../errors/factories.js';
import type { ClusterObjectRecord } from '../../domain/types.js';
import type { ClusterTarget } from '../../config/app-config.js';
import { ClusterVersionSchema, InfrastructureSchema, NamespaceListSchema, PodListSchema } from './schemas.js';

export type FetchFn = typeof fetch;

const PAGE_SIZE = 500;

export interface KubeRestClientConfig {
  readonly apiServerUrl: string;
  readonly bearerToken?: string;
  readonly requestTimeoutMs: number;
}

interface PagedList<I> {
  readonly metadata?: { readonly continue?: string } | undefined;
  readonly items: I[];
}

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (e) => (e instanceof Error ? e.message : String(e))
);

function describeIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
}

/**
 * Cluster queries over the Kubernetes REST API.
 *
 * One request per call (plus continuation pages for lists), each bounded by
 * the request timeout. Responses are validated before they reach the core.
 */
export class KubeRestClusterClient implements ClusterQueryPort {
  private readonly baseUrl: string;

  constructor(
    private readonly config: KubeRestClientConfig,
    private readonly fetchFn: FetchFn = fetch
  ) {
    this.baseUrl = config.apiServerUrl.replace(/\/$/, '');
  }

  listNamespaces(): ResultAsync<readonly NamespaceRecord[], ListError> {
    return this.listAll('namespaces', '/api/v1/namespaces', NamespaceListSchema).map((items) =>
      items.map((item) => ({ name: item.metadata.name }))
    );
  }

  listPods(namespace: string): ResultAsync<readonly ClusterObjectRecord[], ListError> {
    return this.listAll(
      'pods',
      `/api/v1/namespaces/${encodeURIComponent(namespace)}/pods`,
      PodListSchema,
      namespace
    ).map((items) =>
      items.map((item) => ({
        namespace: item.metadata.namespace ?? namespace,
        name: item.metadata.name,
        ownerReferences: (item.metadata.ownerReferences ?? []).map((owner) => ({ kind: owner.kind, name: owner.name })),
        annotations: item.metadata.annotations ?? {},
      }))
    );
  }

  getInfrastructure(): ResultAsync<InfrastructureStatus, ListError> {
    return this.getJson(
      'infrastructures',
      '/apis/config.openshift.io/v1/infrastructures/cluster',
      InfrastructureSchema
    ).map((infra) => ({
      controlPlaneTopology: infra.status.controlPlaneTopology ?? '',
      platformType: infra.status.platformStatus?.type ?? infra.status.platform ?? '',
    }));
  }

  getClusterVersionHistory(): ResultAsync<readonly string[], ListError> {
    return this.getJson(
      'clusterversions',
      '/apis/config.openshift.io/v1/clusterversions/version',
      ClusterVersionSchema
    ).map((cv) => {
      const history = (cv.status.history ?? []).map((entry) => entry.version);
      if (history.length === 0 && cv.status.desired) return [cv.status.desired.version];
      return history;
    });
  }

  private listAll<I>(
    resource: string,
    basePath: string,
    schema: z.ZodType<PagedList<I>, z.ZodTypeDef, unknown>,
    namespace?: string
  ): ResultAsync<I[], ListError> {
    const fetchPage = (continueToken: string | undefined, collected: I[]): ResultAsync<I[], ListError> => {
      const query = new URLSearchParams({ limit: String(PAGE_SIZE) });
      if (continueToken) query.set('continue', continueToken);

      return this.getJson(resource, `${basePath}?${query.toString()}`, schema, namespace).andThen((page) => {
        const items = [...collected, ...page.items];
        const next = page.metadata?.continue;
        return next ? fetchPage(next, items) : okAsync(items);
      });
    };

    return fetchPage(undefined, []);
  }

  private getJson<T>(
    resource: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    namespace?: string
  ): ResultAsync<T, ListError> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.config.bearerToken) headers['Authorization'] = `Bearer ${this.config.bearerToken}`;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    const request = this.fetchFn(`${this.baseUrl}${path}`, { method: 'GET', headers, signal: controller.signal })
      .then(async (response) => ({ status: response.status, ok: response.ok, body: await response.text() }))
      .finally(() => clearTimeout(timeoutId));

    return ResultAsync.fromPromise(request, (e) =>
      Err.listFailed(
        resource,
        controller.signal.aborted
          ? `request timed out after ${this.config.requestTimeoutMs}ms`
          : e instanceof Error ? e.message : String(e),
        { namespace }
      )
    ).andThen((response) => {
      if (!response.ok) {
        return errAsync(
          Err.listFailed(resource, response.body.slice(0, 200) || 'empty response', { namespace, status: response.status })
        );
      }

      const decoded = parseJson(response.body).andThen((json) => {
        const parsed = schema.safeParse(json);
        return parsed.success ? ok(parsed.data) : err(`unexpected response shape: ${describeIssues(parsed.error)}`);
      });

      return decoded.isOk()
        ? okAsync(decoded.value)
        : errAsync(Err.listFailed(resource, decoded.error, { namespace, status: response.status }));
    });
  }
}

/**
 * Creates REST clients from the configured cluster target.
 */
export class KubeRestClusterClientFactory implements ClusterClientFactory {
  constructor(
    private readonly target: ClusterTarget,
    private readonly requestTimeoutMs: number,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  connect(): Result<ClusterQueryPort, ClientInitError> {
    if (this.target.kind === 'unconfigured') {
      return err(Err.clientInit('no API server configured (set CLUSTERMON_API_SERVER)'));
    }

    if (!URL.canParse(this.target.apiServerUrl)) {
      return err(Err.clientInit(`invalid API server URL "${this.target.apiServerUrl}"`));
    }

    return ok(
      new KubeRestClusterClient(
        {
          apiServerUrl: this.target.apiServerUrl,
          bearerToken: this.target.bearerToken,
          requestTimeoutMs: this.requestTimeoutMs,
        },
        this.fetchFn
      )
    );
  }
}
