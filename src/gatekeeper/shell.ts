/**
 * Restricted shell invocation.
 *
 * Commands run through PowerShell with profiles disabled, no interactive
 * prompts and the Restricted execution policy, so a validated command cannot
 * itself load and run script files. The command string is handed to the
 * interpreter as a single argument; no system shell sits in between.
 */

export interface ShellInvocation {
  /** Interpreter executable, resolved through PATH */
  executable: string;
  /** Full argument vector for running `command` */
  buildArgs(command: string): string[];
}

export const RESTRICTED_POWERSHELL_FLAGS: readonly string[] = [
  '-NoProfile',
  '-NonInteractive',
  '-NoLogo',
  '-ExecutionPolicy',
  'Restricted',
];

export function defaultShellExecutable(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'powershell.exe' : 'pwsh';
}

export function restrictedPowerShell(executable: string = defaultShellExecutable()): ShellInvocation {
  return {
    executable,
    buildArgs: (command) => [...RESTRICTED_POWERSHELL_FLAGS, '-Command', command],
  };
}
