/**
 * What a CLI command produced. Commands return a CliResult; only the entry
 * point turns it into output and an exit status.
 */

import type { ExitCode } from '../../runtime/ports/process-terminator.js';

export type { ExitCode } from '../../runtime/ports/process-terminator.js';

export interface CliOutput {
  readonly message: string;
  /** Printed in order. Lines that start with whitespace are continuation lines. */
  readonly details?: readonly string[];
  readonly warnings?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

export function failure(
  message: string,
  options: Omit<CliOutput, 'message'> & { readonly exitCode?: ExitCode } = {}
): CliResult {
  const { exitCode, ...rest } = options;
  return {
    kind: 'failure',
    exitCode: exitCode ?? { kind: 'general_error' },
    output: { message, ...rest },
  };
}

/** Bad flags or configuration. */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return failure(message, { exitCode: { kind: 'misuse' }, suggestions });
}
