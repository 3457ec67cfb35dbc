import type { JUnitTestCase, TestVerdict } from './types.js';
import { assertNever } from '../runtime/assert-never.js';

export interface ScopeVerdictOptions {
  /**
   * Report findings as a tracked, non-gating flake instead of a failure.
   * Used for checks still being rolled out.
   */
  readonly flakeOnFindings: boolean;
  /** Context lines appended to the output whatever the outcome. */
  readonly notes?: readonly string[];
}

/**
 * One verdict per scope unit: pass when there are no findings, otherwise
 * flake (or fail) with the findings joined by newlines.
 */
export function renderScopeVerdict(
  name: string,
  findings: readonly string[],
  options: ScopeVerdictOptions = { flakeOnFindings: true }
): TestVerdict {
  const notes = options.notes ?? [];

  if (findings.length === 0) {
    return notes.length === 0
      ? { name, outcome: { kind: 'pass' } }
      : { name, outcome: { kind: 'pass', output: notes.join('\n') } };
  }

  const output = [...findings, ...notes].join('\n');
  return options.flakeOnFindings
    ? { name, outcome: { kind: 'flake', output } }
    : { name, outcome: { kind: 'fail', output } };
}

/**
 * Serialize verdicts for JUnit-style writers.
 *
 * A flake becomes two cases sharing one name, failing first and passing second;
 * downstream tooling reads that pair as "flaky, do not gate".
 */
export function toJUnitTestCases(verdicts: readonly TestVerdict[]): readonly JUnitTestCase[] {
  return verdicts.flatMap((verdict): JUnitTestCase[] => {
    const { name, outcome } = verdict;
    switch (outcome.kind) {
      case 'pass':
        return [{ name, outcome: 'pass', output: outcome.output ?? '' }];
      case 'fail':
        return [{ name, outcome: 'fail', output: outcome.output }];
      case 'flake':
        return [
          { name, outcome: 'fail', output: outcome.output },
          { name, outcome: 'pass', output: '' },
        ];
      default:
        return assertNever(outcome);
    }
  });
}

/**
 * Names with at least one failing case and no passing case. These gate the run.
 */
export function findGatingFailures(testCases: readonly JUnitTestCase[]): readonly string[] {
  const failed = new Set<string>();
  const passed = new Set<string>();
  for (const testCase of testCases) {
    (testCase.outcome === 'fail' ? failed : passed).add(testCase.name);
  }
  return [...failed].filter((name) => !passed.has(name));
}

/**
 * Names reported as flakes (a failing and a passing case with the same name).
 */
export function findFlakes(testCases: readonly JUnitTestCase[]): readonly string[] {
  const failed = new Set(testCases.filter((t) => t.outcome === 'fail').map((t) => t.name));
  return [...new Set(testCases.filter((t) => t.outcome === 'pass' && failed.has(t.name)).map((t) => t.name))];
}
