import type { Result, ResultAsync } from 'neverthrow';
import type { ClientInitError, ListError } from '../errors/app-error.js';
import type { ClusterObjectRecord } from '../domain/types.js';

export interface NamespaceRecord {
  readonly name: string;
}

/** Fields of the cluster-scoped infrastructure resource the core reads. */
export interface InfrastructureStatus {
  /** Raw `status.controlPlaneTopology`, e.g. SingleReplica or HighlyAvailable. */
  readonly controlPlaneTopology: string;
  /** Raw `status.platformStatus.type`, e.g. AWS, Azure, GCP. */
  readonly platformType: string;
}

/**
 * Port: point-in-time queries against the cluster API.
 *
 * Every call is a single bounded request returning a snapshot; nothing is
 * watched or cached.
 */
export interface ClusterQueryPort {
  listNamespaces(): ResultAsync<readonly NamespaceRecord[], ListError>;
  listPods(namespace: string): ResultAsync<readonly ClusterObjectRecord[], ListError>;
  getInfrastructure(): ResultAsync<InfrastructureStatus, ListError>;
  /** Every version the cluster has run, newest first. */
  getClusterVersionHistory(): ResultAsync<readonly string[], ListError>;
}

/**
 * Port: creates a cluster client. Fails when the cluster cannot be reached
 * or the connection settings are unusable.
 */
export interface ClusterClientFactory {
  connect(): Result<ClusterQueryPort, ClientInitError>;
}
