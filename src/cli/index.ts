/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export {
  registerExecCommand,
  registerRunCommand,
  registerScriptsCommand,
  selectTasks,
  applyOverrides,
  resolveLLMConfig,
  collectConstraint,
  parseConstraintValue,
  EXIT_SUCCESS,
  EXIT_TASK_FAILED,
  EXIT_USAGE,
} from './run.js';
