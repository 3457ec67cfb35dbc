export { executeListCommand, type ListCommandDeps } from './list.js';
export {
  executeRunCommand,
  serializeRunReport,
  type RunCommandDeps,
  type RunCommandOptions,
  type SerializedPhaseFailure,
  type SerializedRunReport,
} from './run.js';
