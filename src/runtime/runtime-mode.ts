/**
 * Where the process is running. Chosen once by the composition root and
 * injected; services never read it from the environment.
 */
export type RuntimeMode = { readonly kind: 'test' } | { readonly kind: 'cli' };
