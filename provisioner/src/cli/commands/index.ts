/**
 * CLI Commands Module Exports
 */

export {
  type CommandDependencies,
  type PreparedCommand,
  createDefaultDependencies,
  createCommandLogger,
  prepareCommand,
  useColor,
} from './context.js';

export { type RunCommandResult, runProvision } from './run.js';

export { type CheckResult, runCheck, formatCheckOutput, formatCheckOutputJson } from './check.js';

export { runShowConfig } from './show-config.js';
