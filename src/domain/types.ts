/**
 * Evidence and verdict model shared by the sampler, aggregator, tolerance model,
 * compliance classifier and verdict renderer.
 *
 * Timestamps are epoch milliseconds, durations are milliseconds.
 */

// =============================================================================
// Evidence
// =============================================================================

export interface Sample {
  readonly timestampMs: number;
  readonly succeeded: boolean;
  readonly detail: string;
  readonly latencyMs?: number;
}

/**
 * A span of observed behavior. Intervals of the same kind for the same source
 * never overlap (see mergeIntervals).
 */
export interface Interval {
  readonly kind: string;
  readonly source: string;
  readonly startMs: number;
  readonly endMs: number;
  readonly message: string;
}

export interface RunWindow {
  readonly beginningMs: number;
  readonly endMs: number;
}

// =============================================================================
// Topology and tolerance
// =============================================================================

export type ControlPlaneTopology = 'SingleReplica' | 'HighlyAvailable' | 'External' | 'Unknown';

export type VersionBaseline =
  | { readonly kind: 'known'; readonly oldestVersion: string }
  | { readonly kind: 'unverified'; readonly reason: string };

export interface TopologyFacts {
  readonly controlPlaneTopology: ControlPlaneTopology;
  /** Lower-cased provider name: aws, azure, gce, ... Empty when unknown. */
  readonly infrastructureProvider: string;
  readonly versionBaseline: VersionBaseline;
}

export type ToleranceRuleId = 'single-replica-control-plane' | 'fixed-cloud-provider' | 'default-baseline';

export interface DisruptionBudget {
  readonly allowedFraction: number;
  readonly allowedDurationMs: number;
  readonly ruleId: ToleranceRuleId;
  readonly caveats: readonly string[];
}

// =============================================================================
// Cluster objects and compliance
// =============================================================================

export interface OwnerReference {
  readonly kind: string;
  readonly name: string;
}

export interface ClusterObjectRecord {
  readonly namespace: string;
  readonly name: string;
  readonly ownerReferences: readonly OwnerReference[];
  readonly annotations: Readonly<Record<string, string>>;
}

export type NoSuggestionReason = 'no_validated_value' | 'custom_validated_value';

/**
 * Outcome of classifying one object. `missing_annotation_no_suggestion` is the
 * "cannot determine" verdict: it is reported like any other finding.
 */
export type ComplianceVerdict =
  | { readonly kind: 'ok' }
  | {
      readonly kind: 'missing_annotation_suggest';
      readonly suggestedValue: string;
      readonly nonStandard: boolean;
    }
  | {
      readonly kind: 'missing_annotation_no_suggestion';
      readonly reason: NoSuggestionReason;
      readonly validatedValue: string;
    }
  | {
      readonly kind: 'non_standard_scope_violation';
      readonly validatedValue: string;
      readonly namespace: string;
      readonly allowedNamespaces: readonly string[];
      readonly annotationPresent: boolean;
    };

// =============================================================================
// Verdicts and report
// =============================================================================

/**
 * Internal test outcome. `flake` is a tracked, non-gating failure; it only
 * becomes the duplicate-name Fail + Pass pair at the report boundary.
 */
export type TestOutcome =
  | { readonly kind: 'pass'; readonly output?: string }
  | { readonly kind: 'fail'; readonly output: string }
  | { readonly kind: 'flake'; readonly output: string };

export interface TestVerdict {
  readonly name: string;
  readonly outcome: TestOutcome;
}

/** JUnit-style test case as consumed by report writers. */
export interface JUnitTestCase {
  readonly name: string;
  readonly outcome: 'pass' | 'fail';
  readonly output: string;
}
