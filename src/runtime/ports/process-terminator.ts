import { assertNever } from '../assert-never.js';

/**
 * How the process ends.
 *
 * - success: every gating test case passed
 * - general_error: a test case gated the run, or the run could not complete
 * - misuse: bad flags or configuration; nothing was run
 */
export type ExitCode =
  | { readonly kind: 'success' }
  | { readonly kind: 'general_error' }
  | { readonly kind: 'misuse' };

export function toExitStatus(code: ExitCode): number {
  switch (code.kind) {
    case 'success':
      return 0;
    case 'general_error':
      return 1;
    case 'misuse':
      return 2;
    default:
      return assertNever(code);
  }
}

/**
 * Port for ending the process. Only the CLI entry point uses it.
 */
export interface ProcessTerminator {
  terminate(code: ExitCode): never;
}
