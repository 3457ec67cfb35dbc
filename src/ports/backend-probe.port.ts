import type { ResultAsync } from 'neverthrow';

export interface ProbeTarget {
  /** Stable name used as the interval source, e.g. kube-api. */
  readonly name: string;
  /** Path requested on the API server, e.g. /api/v1/namespaces/default. */
  readonly path: string;
}

export interface ProbeSuccess {
  readonly latencyMs: number;
}

export type ProbeFailure =
  | { readonly code: 'PROBE_FAILED'; readonly message: string; readonly latencyMs?: number }
  | { readonly code: 'PROBE_ABORTED'; readonly message: string };

/**
 * Port: one health check against a backend.
 *
 * Implementations must stop work when `signal` aborts. No retries: a failed
 * check is evidence.
 */
export interface BackendProbePort {
  check(target: ProbeTarget, signal: AbortSignal): ResultAsync<ProbeSuccess, ProbeFailure>;
}
