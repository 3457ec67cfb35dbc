/**
 * Unwrap neverthrow Results in tests. A wrong branch throws with the
 * other branch's value printed as JSON.
 */

import type { Result } from 'neverthrow';

/**
 * Unwrap Ok value from Result, throw if Err.
 * Use in tests when you expect success and want to assert on the value.
 * 
 * @example
 * const result = await client.listNamespaces();
 * const namespaces = expectOk(result, 'listing namespaces');
 * expect(namespaces).toHaveLength(2);
 */
export function expectOk<T, E>(result: Result<T, E>, context = 'test'): T {
  if (result.isErr()) {
    const errorJson = JSON.stringify(result.error, null, 2);
    throw new Error(
      `Expected Ok in ${context}, but got Err:\n${errorJson}`
    );
  }
  return result.value;
}

/**
 * Unwrap Err value from Result, throw if Ok.
 * Use in tests when you expect failure and want to assert on the error.
 * 
 * @example
 * const result = await client.listPods('kube-system');
 * const error = expectErr(result, 'listing pods');
 * expect(error._tag).toBe('ListFailed');
 */
export function expectErr<T, E>(result: Result<T, E>, context = 'test'): E {
  if (result.isOk()) {
    const valueJson = JSON.stringify(result.value, null, 2);
    throw new Error(
      `Expected Err in ${context}, but got Ok:\n${valueJson}`
    );
  }
  return result.error;
}
