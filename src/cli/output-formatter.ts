/**
 * Terminal rendering of CliResult. Colors come from chalk, which turns
 * itself off when stdout is not a TTY.
 */

import chalk from 'chalk';
import type { CliResult, CliOutput } from './types/cli-result.js';

function section(title: string, lines: readonly string[] | undefined, paint: (text: string) => string): string[] {
  if (!lines || lines.length === 0) return [];
  return ['', paint(title), ...lines.map((line) => paint(`  ${line}`))];
}

/**
 * Detail lines that start with whitespace continue the line above them
 * (e.g. the output of a failing test case) and are printed without a bullet.
 */
function renderDetail(detail: string): string {
  if (detail === '') return '';
  return /^\s/.test(detail) ? chalk.dim(`  ${detail}`) : `  - ${detail}`;
}

export function formatOutput(output: CliOutput, isError: boolean): string {
  const headline = isError ? chalk.red.bold(`FAIL ${output.message}`) : chalk.green.bold(`OK ${output.message}`);
  const details = output.details && output.details.length > 0 ? ['', ...output.details.map(renderDetail)] : [];

  return [
    headline,
    ...details,
    ...section('Warnings:', output.warnings, chalk.yellow),
    ...section('Try:', output.suggestions, chalk.gray),
  ].join('\n');
}

export function formatResult(result: CliResult): string {
  if (result.kind === 'failure') return formatOutput(result.output, true);
  return result.output ? formatOutput(result.output, false) : '';
}

/** Failures go to stderr, everything else to stdout. */
export function printResult(result: CliResult): void {
  const formatted = formatResult(result);
  if (!formatted) return;
  if (result.kind === 'failure') console.error(formatted);
  else console.log(formatted);
}
