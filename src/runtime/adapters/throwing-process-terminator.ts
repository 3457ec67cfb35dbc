import { toExitStatus, type ExitCode, type ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: throws where the CLI would exit, so a stray exit fails the test
 * instead of killing the runner.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new Error(`process would exit with status ${toExitStatus(code)} (${code.kind})`);
  }
}
