/**
 * Compile-time exhaustiveness check for `switch` over a tagged union.
 * Reaching it at run time means a value arrived that the types ruled out.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
