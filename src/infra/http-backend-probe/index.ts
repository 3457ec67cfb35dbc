import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { BackendProbePort, ProbeFailure, ProbeSuccess, ProbeTarget } from '../../ports/backend-probe.port.js';
import type { TimeClockPort } from '../../ports/time-clock.port.js';
import type { ClusterTarget } from '../../config/app-config.js';
import type { FetchFn } from '../kube-rest-client/index.js';

/**
 * Probes a backend with a single GET against the API server.
 * Any 2xx response is a success; everything else is a failed check.
 */
export class HttpBackendProbe implements BackendProbePort {
  constructor(
    private readonly cluster: ClusterTarget,
    private readonly clock: TimeClockPort,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  check(target: ProbeTarget, signal: AbortSignal): ResultAsync<ProbeSuccess, ProbeFailure> {
    if (this.cluster.kind === 'unconfigured') {
      return errAsync<ProbeSuccess, ProbeFailure>({ code: 'PROBE_FAILED', message: 'no API server configured' });
    }

    const baseUrl = this.cluster.apiServerUrl.replace(/\/$/, '');
    const startedMs = this.clock.nowMs();
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.cluster.bearerToken) headers['Authorization'] = `Bearer ${this.cluster.bearerToken}`;

    const toFailure = (e: unknown): ProbeFailure =>
      signal.aborted
        ? { code: 'PROBE_ABORTED', message: `probe of ${target.name} aborted` }
        : { code: 'PROBE_FAILED', message: e instanceof Error ? e.message : String(e) };

    return ResultAsync.fromPromise(
      // The body is read so the connection goes back to the pool.
      this.fetchFn(`${baseUrl}${target.path}`, { method: 'GET', headers, signal }).then(async (response) => {
        await response.arrayBuffer();
        return response;
      }),
      toFailure
    ).andThen((response) => {
      const latencyMs = this.clock.nowMs() - startedMs;
      return response.ok
        ? okAsync<ProbeSuccess, ProbeFailure>({ latencyMs })
        : errAsync<ProbeSuccess, ProbeFailure>({ code: 'PROBE_FAILED', message: `HTTP ${response.status}`, latencyMs });
    });
  }
}
