import { ResultAsync, ok } from 'neverthrow';
import { coerce, lt, type SemVer } from 'semver';
import type { Logger } from '../../core/logging/index.js';
import type { ClusterQueryPort } from '../../ports/cluster-query.port.js';
import type { ControlPlaneTopology, TopologyFacts, VersionBaseline } from '../../domain/types.js';

const PROVIDER_NAMES: ReadonlyMap<string, string> = new Map([
  ['AWS', 'aws'],
  ['Azure', 'azure'],
  ['GCP', 'gce'],
]);

interface InfrastructureFacts {
  readonly controlPlaneTopology: ControlPlaneTopology;
  readonly infrastructureProvider: string;
}

export function toProviderName(platformType: string): string {
  return PROVIDER_NAMES.get(platformType) ?? platformType.toLowerCase();
}

export function toControlPlaneTopology(raw: string): ControlPlaneTopology {
  switch (raw) {
    case 'SingleReplica':
    case 'HighlyAvailable':
    case 'External':
      return raw;
    default:
      return 'Unknown';
  }
}

/**
 * Oldest version the cluster has run. Versions are coerced first, so
 * pre-release and build suffixes are ignored.
 */
export function toVersionBaseline(history: readonly string[]): VersionBaseline {
  const versions = history.map((v) => coerce(v)).filter((v): v is SemVer => v !== null);
  const [first, ...rest] = versions;
  if (!first) {
    return {
      kind: 'unverified',
      reason: history.length === 0 ? 'cluster version history is empty' : 'no parseable version in cluster version history',
    };
  }

  const oldest = rest.reduce((min, v) => (lt(v, min) ? v : min), first);
  return { kind: 'known', oldestVersion: oldest.version };
}

/**
 * Read the facts the tolerance model needs. Never fails: an unreadable
 * infrastructure resource yields Unknown topology, an unreadable version
 * history yields an unverified baseline.
 */
export function readTopologyFacts(client: ClusterQueryPort, logger: Logger): ResultAsync<TopologyFacts, never> {
  const infrastructure = client
    .getInfrastructure()
    .map(
      (infra): InfrastructureFacts => ({
        controlPlaneTopology: toControlPlaneTopology(infra.controlPlaneTopology),
        infrastructureProvider: toProviderName(infra.platformType),
      })
    )
    .orElse((error) => {
      logger.warn({ error: error.message }, 'Could not read infrastructure; topology is unknown');
      return ok<InfrastructureFacts, never>({ controlPlaneTopology: 'Unknown', infrastructureProvider: '' });
    });

  const baseline = client
    .getClusterVersionHistory()
    .map(toVersionBaseline)
    .orElse((error) => {
      logger.warn({ error: error.message }, 'Could not read cluster version history');
      return ok<VersionBaseline, never>({ kind: 'unverified', reason: error.message });
    });

  return infrastructure.andThen((infra) =>
    baseline.map((versionBaseline): TopologyFacts => ({ ...infra, versionBaseline }))
  );
}
