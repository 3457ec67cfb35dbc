import { coerce, gte } from 'semver';
import type { DisruptionBudget, ToleranceRuleId, TopologyFacts } from './types.js';

/** Providers on which control-plane disruption was fixed starting with the baseline below. */
export const FIXED_PROVIDERS: ReadonlySet<string> = new Set(['azure', 'aws', 'gce']);
export const FIX_BASELINE_VERSION = '4.8.0';

export const SINGLE_REPLICA_FRACTION = 0.15;
export const SINGLE_REPLICA_AZURE_FRACTION = 0.23;
export const FIXED_PROVIDER_FRACTION = 0;
export const DEFAULT_FRACTION = 0.08;

/**
 * A guarded tolerance rule. Rules are evaluated top-to-bottom and the first
 * one whose guard holds decides the fraction.
 */
export interface ToleranceRule {
  readonly id: ToleranceRuleId;
  readonly description: string;
  readonly applies: (facts: TopologyFacts) => boolean;
  readonly fraction: (facts: TopologyFacts) => number;
}

function providerIs(facts: TopologyFacts, provider: string): boolean {
  return facts.infrastructureProvider.toLowerCase() === provider;
}

/**
 * True only when the baseline is known and every version in it is at or past the fix.
 * Pre-release suffixes are dropped before comparison (4.8.0-0.nightly counts as 4.8.0).
 */
export function baselineHasFix(facts: TopologyFacts): boolean {
  if (facts.versionBaseline.kind !== 'known') return false;
  const version = coerce(facts.versionBaseline.oldestVersion);
  return version !== null && gte(version, FIX_BASELINE_VERSION);
}

export const TOLERANCE_RULES: readonly ToleranceRule[] = [
  {
    id: 'single-replica-control-plane',
    description: 'single control-plane replica cannot avoid downtime while it restarts',
    applies: (facts) => facts.controlPlaneTopology === 'SingleReplica',
    fraction: (facts) => (providerIs(facts, 'azure') ? SINGLE_REPLICA_AZURE_FRACTION : SINGLE_REPLICA_FRACTION),
  },
  {
    id: 'fixed-cloud-provider',
    description: `no disruption tolerated on ${[...FIXED_PROVIDERS].join(', ')} from ${FIX_BASELINE_VERSION}`,
    applies: (facts) =>
      FIXED_PROVIDERS.has(facts.infrastructureProvider.toLowerCase()) && baselineHasFix(facts),
    fraction: () => FIXED_PROVIDER_FRACTION,
  },
  {
    id: 'default-baseline',
    description: 'default tolerance',
    applies: () => true,
    fraction: () => DEFAULT_FRACTION,
  },
];

function collectCaveats(facts: TopologyFacts): string[] {
  const caveats: string[] = [];
  if (facts.controlPlaneTopology === 'Unknown') {
    caveats.push('control-plane topology could not be determined; single-replica tolerance not applied');
  }
  if (facts.versionBaseline.kind === 'unverified') {
    caveats.push(
      `could not verify that all cluster versions are at least ${FIX_BASELINE_VERSION}: ${facts.versionBaseline.reason}`
    );
  }
  return caveats;
}

/**
 * Compute the disruption budget for a run of `totalRunDurationMs`.
 *
 * Missing facts never abort the computation: they fall through to the rules
 * that do not depend on them, and are reported as caveats.
 */
export function computeDisruptionBudget(facts: TopologyFacts, totalRunDurationMs: number): DisruptionBudget {
  const rule = TOLERANCE_RULES.find((candidate) => candidate.applies(facts));
  if (!rule) {
    // default-baseline always applies
    throw new Error('no tolerance rule matched');
  }
  const allowedFraction = rule.fraction(facts);

  // Work in basis points so 0.15 of 100 minutes is exactly 15 minutes.
  const basisPoints = Math.round(allowedFraction * 10_000);
  const allowedDurationMs = Math.floor((Math.max(0, totalRunDurationMs) * basisPoints) / 10_000);

  return {
    allowedFraction,
    allowedDurationMs,
    ruleId: rule.id,
    caveats: collectCaveats(facts),
  };
}
