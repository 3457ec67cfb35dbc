/**
 * The one place a CliResult becomes printed output and an exit status.
 */

import type { CliResult } from './types/cli-result.js';
import { toExitStatus, type ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { printResult } from './output-formatter.js';

/**
 * Print the result and exit on failure. On success the process ends by
 * itself once pending work drains.
 */
export function interpretCliResult(result: CliResult, terminator: ProcessTerminator): void {
  printResult(result);
  if (result.kind === 'failure') {
    terminator.terminate(result.exitCode);
  }
}

/**
 * Same as {@link interpretCliResult}, for failures before the container
 * (and so the terminator) exists.
 */
export function interpretCliResultWithoutDI(result: CliResult): void {
  printResult(result);
  if (result.kind === 'failure') {
    process.exit(toExitStatus(result.exitCode));
  }
}
