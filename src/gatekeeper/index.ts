/**
 * Gatekeeper exports: validation, execution and process handling
 */

export {
  CommandValidator,
  leadingToken,
  type ValidatorOptions,
  type DirectoryCheck,
} from './validator.js';

export {
  CommandExecutor,
  TRUNCATION_MARKER,
  TERMINATION_NOTICE,
  type CommandRunner,
  type ExecutorOptions,
} from './executor.js';

export {
  killProcessTree,
  type KillableProcess,
  type KillProcessTreeOptions,
} from './process-tree.js';

export {
  restrictedPowerShell,
  defaultShellExecutable,
  RESTRICTED_POWERSHELL_FLAGS,
  type ShellInvocation,
} from './shell.js';
