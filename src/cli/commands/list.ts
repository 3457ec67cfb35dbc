/** `clustermon list`: names and descriptions of the registered monitor tests. */

import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import type { MonitorTestRegistration } from '../../monitortest/monitor-test.js';

export interface ListCommandDeps {
  readonly monitorTests: readonly Pick<MonitorTestRegistration, 'name' | 'description'>[];
}

export function executeListCommand(deps: ListCommandDeps): CliResult {
  if (deps.monitorTests.length === 0) {
    return success({ message: 'No monitor tests registered' });
  }

  const details = deps.monitorTests.flatMap((test, index) => [`${index + 1}. ${test.name}`, `   ${test.description}`]);
  details.push('', `Total: ${deps.monitorTests.length} monitor tests`);

  return success({ message: 'Available monitor tests', details });
}
