#!/usr/bin/env node
/**
 * clustermon entry point. Resolves what each command needs from the
 * container and hands the CliResult to interpretCliResult; the commands
 * themselves live in src/cli/commands.
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';

import { initializeContainer, container } from './di/container.js';
import { DI } from './di/tokens.js';
import type { ProcessTerminator } from './runtime/ports/process-terminator.js';
import type { ProcessSignals } from './runtime/ports/process-signals.js';
import type { ValidatedConfig } from './config/app-config.js';
import type { MonitorTestRunner } from './monitortest/run-orchestrator.js';
import { LocalArtifactStore } from './infra/artifact-store/index.js';
import { formatAppError } from './errors/formatter.js';
import { createBootstrapLogger } from './core/logging/index.js';

import { interpretCliResult, interpretCliResultWithoutDI } from './cli/interpret-result.js';
import type { CliResult } from './cli/types/cli-result.js';
import { failure } from './cli/types/cli-result.js';
import { executeListCommand, executeRunCommand } from './cli/commands/index.js';

// Load .env before anything reads the environment.
loadDotenv();

const logger = createBootstrapLogger('cli');

/**
 * Initialize the container, or report the configuration error and exit.
 * Returns the terminator once the container is ready.
 */
function initializeOrExit(): ProcessTerminator | null {
  const initialized = initializeContainer({ runtimeMode: { kind: 'cli' } });
  if (initialized.isErr()) {
    const result: CliResult = failure(formatAppError(initialized.error), {
      exitCode: { kind: 'misuse' },
      suggestions: ['Check the CLUSTERMON_* environment variables (or your .env file)'],
    });
    interpretCliResultWithoutDI(result);
    return null;
  }
  return container.resolve<ProcessTerminator>(DI.Runtime.ProcessTerminator);
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM DEFINITION
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('clustermon')
  .description('Observe a running cluster over a time window and report monitor test verdicts')
  .version('0.1.0');

program
  .command('list')
  .description('List the available monitor tests')
  .action(() => {
    const terminator = initializeOrExit();
    if (!terminator) return;

    const runner = container.resolve<MonitorTestRunner>(DI.MonitorTests.Runner);
    interpretCliResult(executeListCommand({ monitorTests: runner.monitorTests }), terminator);
  });

program
  .command('run')
  .description('Run the monitor tests for a fixed window and report the verdicts')
  .requiredOption('-d, --duration <seconds>', 'Length of the observation window in seconds')
  .option('--only <names...>', 'Run only the named monitor tests')
  .option('-o, --output <dir>', 'Directory for the report and artifacts (defaults to CLUSTERMON_ARTIFACT_DIR)')
  .action(async (options: { duration: string; only?: string[]; output?: string }) => {
    const terminator = initializeOrExit();
    if (!terminator) return;

    const runner = container.resolve<MonitorTestRunner>(DI.MonitorTests.Runner);
    const signals = container.resolve<ProcessSignals>(DI.Runtime.ProcessSignals);
    const config = container.resolve<ValidatedConfig>(DI.Config.App);

    const result = await executeRunCommand(
      {
        monitorTests: runner.monitorTests,
        runMonitorTests: (runOptions) => runner.run(runOptions),
        createStore: (directory) => new LocalArtifactStore(directory),
        onCancelRequested: (cancel) =>
          signals.onShutdownRequest((signal) => {
            logger.warn({ signal }, 'Cancellation requested; finishing with the evidence collected so far');
            cancel();
          }),
        defaultOutputDir: config.artifacts.kind === 'directory' ? config.artifacts.path : undefined,
      },
      options
    );

    interpretCliResult(result, terminator);
  });

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════

program.parseAsync().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Unexpected CLI failure');
  process.exit(1);
});
