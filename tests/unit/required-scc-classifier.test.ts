import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SCCS,
  REQUIRED_SCC_ANNOTATION,
  VALIDATED_SCC_ANNOTATION,
  classifyObject,
  collectViolations,
  describeVerdict,
  formatOwnerReferences,
  isNamespaceInScope,
} from '../../src/domain/required-scc-classifier.js';
import { renderScopeVerdict, toJUnitTestCases } from '../../src/domain/verdict-renderer.js';
import type { ClusterObjectRecord, OwnerReference } from '../../src/domain/types.js';

function pod(
  namespace: string,
  name: string,
  annotations: Record<string, string> = {},
  ownerReferences: OwnerReference[] = []
): ClusterObjectRecord {
  return { namespace, name, annotations, ownerReferences };
}

describe('classifyObject', () => {
  it('cannot suggest a value for a pod without any SCC annotation', () => {
    const record = pod('kube-foo', 'etcd-guard');
    const verdict = classifyObject(record);

    expect(verdict).toEqual({
      kind: 'missing_annotation_no_suggestion',
      reason: 'no_validated_value',
      validatedValue: '',
    });
    expect(describeVerdict(record, verdict)).toBe(
      "annotation missing from pod 'etcd-guard'; cannot suggest required-scc, no validated SCC on pod"
    );
  });

  it('reports the missing annotation as a flaky test case pair for its namespace', () => {
    const findings = collectViolations([pod('kube-foo', 'etcd-guard')]);
    const cases = toJUnitTestCases([renderScopeVerdict('ns/kube-foo', findings)]);

    expect(cases).toEqual([
      {
        name: 'ns/kube-foo',
        outcome: 'fail',
        output: "annotation missing from pod 'etcd-guard'; cannot suggest required-scc, no validated SCC on pod",
      },
      { name: 'ns/kube-foo', outcome: 'pass', output: '' },
    ]);
  });

  it('suggests a non-standard SCC inside its allowed namespace', () => {
    const record = pod('openshift-monitoring', 'node-exporter-7x2kq', { [VALIDATED_SCC_ANNOTATION]: 'node-exporter' });
    const verdict = classifyObject(record);

    expect(verdict).toEqual({ kind: 'missing_annotation_suggest', suggestedValue: 'node-exporter', nonStandard: true });
    expect(describeVerdict(record, verdict)).toBe(
      "annotation missing from pod 'node-exporter-7x2kq'; suggested required-scc: 'node-exporter', this is a non-standard SCC"
    );
  });

  it('flags a non-standard SCC used outside its allowed namespace', () => {
    const record = pod('openshift-machine-api', 'handler-0', { [VALIDATED_SCC_ANNOTATION]: 'node-exporter' });
    const verdict = classifyObject(record);

    expect(verdict).toEqual({
      kind: 'non_standard_scope_violation',
      validatedValue: 'node-exporter',
      namespace: 'openshift-machine-api',
      allowedNamespaces: ['openshift-monitoring'],
      annotationPresent: false,
    });
    expect(describeVerdict(record, verdict)).toBe(
      "annotation missing from pod 'handler-0'; pod is using non-standard SCC 'node-exporter' not allowed in namespace 'openshift-machine-api'; allowed namespaces are: openshift-monitoring"
    );
  });

  it('flags an out-of-scope non-standard SCC even when the required annotation is set', () => {
    const record = pod('openshift-machine-api', 'handler-0', {
      [REQUIRED_SCC_ANNOTATION]: 'node-exporter',
      [VALIDATED_SCC_ANNOTATION]: 'node-exporter',
    });

    expect(describeVerdict(record, classifyObject(record))).toBe(
      "pod 'handler-0' has a non-standard SCC 'node-exporter' not allowed in namespace 'openshift-machine-api'; allowed namespaces are: openshift-monitoring"
    );
  });

  it('suggests a default SCC as-is', () => {
    const record = pod('openshift-dns', 'dns-default-abc', { [VALIDATED_SCC_ANNOTATION]: 'restricted-v2' });

    expect(describeVerdict(record, classifyObject(record))).toBe(
      "annotation missing from pod 'dns-default-abc'; suggested required-scc: 'restricted-v2'"
    );
  });

  it('cannot suggest a custom SCC', () => {
    const record = pod('openshift-ingress', 'router-1', { [VALIDATED_SCC_ANNOTATION]: 'router-scc' });

    expect(describeVerdict(record, classifyObject(record))).toBe(
      "annotation missing from pod 'router-1'; cannot suggest required-scc, validated SCC 'router-scc' is a custom SCC"
    );
  });

  it('accepts the required annotation whatever its value when the SCC is not restricted to namespaces', () => {
    for (const validated of [...DEFAULT_SCCS, 'router-scc', '']) {
      const record = pod('openshift-etcd', 'etcd-0', { [REQUIRED_SCC_ANNOTATION]: '', [VALIDATED_SCC_ANNOTATION]: validated });
      expect(classifyObject(record)).toEqual({ kind: 'ok' });
    }
  });

  it('returns the same verdict for the same record', () => {
    const record = pod('openshift-machine-api', 'handler-0', { [VALIDATED_SCC_ANNOTATION]: 'node-exporter' });

    expect(classifyObject(record)).toEqual(classifyObject(record));
  });
});

describe('collectViolations', () => {
  it('includes owner references in listing order and skips compliant pods', () => {
    const findings = collectViolations([
      pod('openshift-dns', 'dns-a', { [VALIDATED_SCC_ANNOTATION]: 'restricted-v2' }, [
        { kind: 'DaemonSet', name: 'dns-default' },
      ]),
      pod('openshift-dns', 'dns-b', { [REQUIRED_SCC_ANNOTATION]: 'restricted-v2', [VALIDATED_SCC_ANNOTATION]: 'restricted-v2' }),
      pod('openshift-dns', 'dns-c', {}, [
        { kind: 'ReplicaSet', name: 'resolver-5d9' },
        { kind: 'Node', name: 'master-0' },
      ]),
    ]);

    expect(findings).toEqual([
      "annotation missing from pod 'dns-a' (owners: daemonset/dns-default); suggested required-scc: 'restricted-v2'",
      "annotation missing from pod 'dns-c' (owners: replicaset/resolver-5d9, node/master-0); cannot suggest required-scc, no validated SCC on pod",
    ]);
  });

  it('passes a namespace where every pod declares its SCC', () => {
    const findings = collectViolations([
      pod('openshift-monitoring', 'node-exporter-1', {
        [REQUIRED_SCC_ANNOTATION]: 'node-exporter',
        [VALIDATED_SCC_ANNOTATION]: 'node-exporter',
      }),
      pod('openshift-monitoring', 'prometheus-0', {
        [REQUIRED_SCC_ANNOTATION]: 'nonroot-v2',
        [VALIDATED_SCC_ANNOTATION]: 'nonroot-v2',
      }),
    ]);

    expect(renderScopeVerdict('ns/openshift-monitoring', findings)).toEqual({
      name: 'ns/openshift-monitoring',
      outcome: { kind: 'pass' },
    });
  });
});

describe('formatOwnerReferences', () => {
  it('is empty without owners', () => {
    expect(formatOwnerReferences([])).toBe('');
  });
});

describe('isNamespaceInScope', () => {
  it.each([
    ['default', true],
    ['kube-system', true],
    ['openshift', true],
    ['openshift-etcd', true],
    ['openshift-must-gather-x7d2p', false],
    ['my-app', false],
    ['openshiftish', false],
  ])('%s -> %s', (namespace, expected) => {
    expect(isNamespaceInScope(namespace)).toBe(expected);
  });
});
