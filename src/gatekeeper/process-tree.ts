/**
 * Process tree termination.
 *
 * POSIX: the executor starts each child as the leader of its own process
 * group, so signalling the negative pid reaches every descendant that did not
 * leave the group. SIGTERM first, SIGKILL after a grace period, or SIGKILL
 * at once when forced.
 *
 * Windows: `taskkill /T /F` walks the tree by parent pid.
 */

import { spawn } from 'child_process';
import { componentLogger, type Logger } from '../logging/logger.js';
import { getErrorCode, getErrorMessage } from '../types/index.js';

export interface KillableProcess {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals): boolean;
}

export interface KillProcessTreeOptions {
  platform?: NodeJS.Platform;
  /** Delay between SIGTERM and SIGKILL on POSIX (default: 1000ms) */
  graceMs?: number;
  /** Send SIGKILL straight away on POSIX, with no grace period */
  force?: boolean;
  logger?: Logger;
  /** Sends a signal to a pid or process group (default: process.kill) */
  signal?: (pid: number, signal: NodeJS.Signals) => void;
  /** Runs `taskkill` for a pid on Windows */
  taskkill?: (pid: number) => Promise<void>;
}

const DEFAULT_GRACE_MS = 1000;

function runTaskkill(pid: number): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    const killer = spawn('taskkill', ['/pid', String(pid), '/T', '/F'], {
      stdio: 'ignore',
      windowsHide: true,
    });
    killer.on('error', reject);
    killer.on('close', (code) => {
      // 128: process not found (already exited)
      if (code === 0 || code === 128) {
        resolvePromise();
      } else {
        reject(new Error(`taskkill exited with code ${code}`));
      }
    });
  });
}

/**
 * Terminate a child and its descendants. Returns once termination has been
 * issued; it does not wait for the processes to be reaped.
 */
export function killProcessTree(child: KillableProcess, options: KillProcessTreeOptions = {}): void {
  const {
    platform = process.platform,
    graceMs = DEFAULT_GRACE_MS,
    force = false,
    logger = componentLogger('process-tree'),
    signal = (pid: number, sig: NodeJS.Signals) => {
      process.kill(pid, sig);
    },
    taskkill = runTaskkill,
  } = options;

  const pid = child.pid;
  if (pid === undefined) {
    return;
  }

  if (platform === 'win32') {
    taskkill(pid).catch((error: unknown) => {
      logger.warn('taskkill failed, killing root process only', { pid, error: getErrorMessage(error) });
      child.kill('SIGKILL');
    });
    return;
  }

  const signalGroup = (sig: NodeJS.Signals): void => {
    try {
      signal(-pid, sig);
    } catch (error) {
      if (getErrorCode(error) === 'ESRCH') {
        return;
      }
      logger.warn('Process group signal failed, signalling root process only', {
        pid,
        signal: sig,
        error: getErrorMessage(error),
      });
      child.kill(sig);
    }
  };

  if (force) {
    signalGroup('SIGKILL');
    return;
  }

  signalGroup('SIGTERM');
  const escalation = setTimeout(() => signalGroup('SIGKILL'), graceMs);
  escalation.unref();
}
