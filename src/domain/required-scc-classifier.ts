import type { ClusterObjectRecord, ComplianceVerdict, OwnerReference } from './types.js';
import { assertNever } from '../runtime/assert-never.js';

/** Workload-supplied declaration of the SCC it needs. */
export const REQUIRED_SCC_ANNOTATION = 'openshift.io/required-scc';
/** SCC the platform admitted the workload under. */
export const VALIDATED_SCC_ANNOTATION = 'openshift.io/scc';

export const DEFAULT_SCCS: ReadonlySet<string> = new Set([
  'anyuid',
  'hostaccess',
  'hostmount-anyuid',
  'hostnetwork',
  'hostnetwork-v2',
  'nonroot',
  'nonroot-v2',
  'privileged',
  'restricted',
  'restricted-v2',
]);

/** Non-standard SCCs and the only namespaces allowed to use them. */
export const NON_STANDARD_SCC_NAMESPACES: ReadonlyMap<string, readonly string[]> = new Map([
  ['node-exporter', ['openshift-monitoring']],
  ['machine-api-termination-handler', ['openshift-machine-api']],
]);

const PLATFORM_ROOT_NAMESPACE = 'openshift';
const PLATFORM_NAMESPACE_PREFIX = 'openshift-';
// Generated per diagnostic run, never permanent.
const DIAGNOSTIC_NAMESPACE_PREFIX = 'openshift-must-gather-';

/**
 * Only `default`, `kube-*` and permanent platform namespaces are checked.
 */
export function isNamespaceInScope(namespace: string): boolean {
  if (namespace === 'default' || namespace.startsWith('kube-')) return true;
  const isPlatform = namespace === PLATFORM_ROOT_NAMESPACE || namespace.startsWith(PLATFORM_NAMESPACE_PREFIX);
  return isPlatform && !namespace.startsWith(DIAGNOSTIC_NAMESPACE_PREFIX);
}

// =============================================================================
// Rules
// =============================================================================

export interface ClassificationInput {
  readonly namespace: string;
  readonly requiredPresent: boolean;
  readonly validated: string;
  /** Allowed namespaces when `validated` is a non-standard SCC, otherwise undefined. */
  readonly allowedNamespaces: readonly string[] | undefined;
}

export interface ClassificationRule {
  readonly id: string;
  readonly matches: (input: ClassificationInput) => boolean;
  readonly verdict: (input: ClassificationInput) => ComplianceVerdict;
}

function scopeViolation(input: ClassificationInput, allowed: readonly string[]): ComplianceVerdict {
  return {
    kind: 'non_standard_scope_violation',
    validatedValue: input.validated,
    namespace: input.namespace,
    allowedNamespaces: allowed,
    annotationPresent: input.requiredPresent,
  };
}

function isAllowedHere(input: ClassificationInput): boolean {
  return input.allowedNamespaces !== undefined && input.allowedNamespaces.includes(input.namespace);
}

export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    id: 'required-annotation-present',
    matches: (input) => input.requiredPresent,
    verdict: (input) =>
      input.allowedNamespaces !== undefined && !isAllowedHere(input)
        ? scopeViolation(input, input.allowedNamespaces)
        : { kind: 'ok' },
  },
  {
    id: 'no-validated-value',
    matches: (input) => input.validated.length === 0,
    verdict: (input) => ({
      kind: 'missing_annotation_no_suggestion',
      reason: 'no_validated_value',
      validatedValue: input.validated,
    }),
  },
  {
    id: 'default-scc',
    matches: (input) => DEFAULT_SCCS.has(input.validated),
    verdict: (input) => ({ kind: 'missing_annotation_suggest', suggestedValue: input.validated, nonStandard: false }),
  },
  {
    id: 'non-standard-scc',
    matches: (input) => input.allowedNamespaces !== undefined,
    verdict: (input) =>
      isAllowedHere(input)
        ? { kind: 'missing_annotation_suggest', suggestedValue: input.validated, nonStandard: true }
        : scopeViolation(input, input.allowedNamespaces ?? []),
  },
  {
    id: 'custom-scc',
    matches: () => true,
    verdict: (input) => ({
      kind: 'missing_annotation_no_suggestion',
      reason: 'custom_validated_value',
      validatedValue: input.validated,
    }),
  },
];

export function toClassificationInput(record: ClusterObjectRecord): ClassificationInput {
  const validated = record.annotations[VALIDATED_SCC_ANNOTATION] ?? '';
  return {
    namespace: record.namespace,
    requiredPresent: Object.prototype.hasOwnProperty.call(record.annotations, REQUIRED_SCC_ANNOTATION),
    validated,
    allowedNamespaces: NON_STANDARD_SCC_NAMESPACES.get(validated),
  };
}

/**
 * Classify one object. Pure: the same record always yields the same verdict.
 */
export function classifyObject(record: ClusterObjectRecord): ComplianceVerdict {
  const input = toClassificationInput(record);
  for (const rule of CLASSIFICATION_RULES) {
    if (rule.matches(input)) return rule.verdict(input);
  }
  // custom-scc matches everything
  throw new Error('no classification rule matched');
}

// =============================================================================
// Messages
// =============================================================================

/**
 * ` (owners: replicaset/foo, daemonset/bar)`, or '' when there are no owners.
 */
export function formatOwnerReferences(owners: readonly OwnerReference[]): string {
  if (owners.length === 0) return '';
  return ` (owners: ${owners.map((owner) => `${owner.kind.toLowerCase()}/${owner.name}`).join(', ')})`;
}

/**
 * Human-readable finding for a verdict, or null when the object is compliant.
 */
export function describeVerdict(record: ClusterObjectRecord, verdict: ComplianceVerdict): string | null {
  const missing = `annotation missing from pod '${record.name}'${formatOwnerReferences(record.ownerReferences)}`;

  switch (verdict.kind) {
    case 'ok':
      return null;

    case 'missing_annotation_suggest':
      return verdict.nonStandard
        ? `${missing}; suggested required-scc: '${verdict.suggestedValue}', this is a non-standard SCC`
        : `${missing}; suggested required-scc: '${verdict.suggestedValue}'`;

    case 'missing_annotation_no_suggestion':
      return verdict.reason === 'no_validated_value'
        ? `${missing}; cannot suggest required-scc, no validated SCC on pod`
        : `${missing}; cannot suggest required-scc, validated SCC '${verdict.validatedValue}' is a custom SCC`;

    case 'non_standard_scope_violation': {
      const allowed = verdict.allowedNamespaces.join(', ');
      return verdict.annotationPresent
        ? `pod '${record.name}' has a non-standard SCC '${verdict.validatedValue}' not allowed in namespace '${verdict.namespace}'; allowed namespaces are: ${allowed}`
        : `${missing}; pod is using non-standard SCC '${verdict.validatedValue}' not allowed in namespace '${verdict.namespace}'; allowed namespaces are: ${allowed}`;
    }

    default:
      return assertNever(verdict);
  }
}

/**
 * Classify every record of one namespace and return the findings in listing order.
 */
export function collectViolations(records: readonly ClusterObjectRecord[]): readonly string[] {
  const findings: string[] = [];
  for (const record of records) {
    const message = describeVerdict(record, classifyObject(record));
    if (message !== null) findings.push(message);
  }
  return findings;
}
