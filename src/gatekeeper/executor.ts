/**
 * Command Execution
 *
 * Runs an already-validated command through the restricted shell with:
 * - Separate, size-limited stdout/stderr capture
 * - A wall-clock timeout that terminates the whole process tree
 * - The working directory normalized exactly as the validator normalized it
 *
 * Spawn failures and timeouts come back as results; `execute` never rejects.
 * The executor does not re-validate commands.
 */

import { spawn, type ChildProcess } from 'child_process';
import { restrictedPowerShell, type ShellInvocation } from './shell.js';
import { killProcessTree } from './process-tree.js';
import {
  isDirectory,
  normalizeDirectory,
  resolvePathPlatform,
  type PathPlatform,
} from '../utils/path-normalizer.js';
import { componentLogger, type Logger } from '../logging/logger.js';
import { getErrorMessage, type ExecutionResult } from '../types/index.js';

export interface CommandRunner {
  execute(command: string, workingDirectory: string | undefined, timeoutSeconds: number): Promise<ExecutionResult>;
}

export interface ExecutorOptions {
  /** Interpreter invocation (default: restricted PowerShell) */
  shell?: ShellInvocation;
  /** Path semantics for the working directory; must match the validator's */
  platform?: PathPlatform;
  /** Per-stream capture limit in bytes (default: 1MB) */
  maxOutputBytes?: number;
  /** Delay before SIGKILL follows SIGTERM on timeout (default: 1000ms) */
  killGraceMs?: number;
  /** Environment for the child (default: inherited) */
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

const DEFAULT_MAX_OUTPUT = 1024 * 1024; // 1MB
const DEFAULT_KILL_GRACE_MS = 1000;
// setTimeout clamps anything larger to 1ms
const MAX_TIMER_MS = 2_147_483_647;

export const TRUNCATION_MARKER = '... [output truncated]';
export const TERMINATION_NOTICE = 'Command terminated because the executor is shutting down';

/**
 * Length of the longest prefix that does not end inside a UTF-8 sequence.
 */
function completeUtf8Length(buffer: Buffer): number {
  const lookback = Math.min(4, buffer.length);
  for (let back = 1; back <= lookback; back++) {
    const byte = buffer[buffer.length - back];
    if ((byte & 0xc0) === 0x80) {
      continue;
    }
    const sequenceLength = byte >= 0xf0 ? 4 : byte >= 0xe0 ? 3 : byte >= 0xc0 ? 2 : 1;
    return sequenceLength > back ? buffer.length - back : buffer.length;
  }
  return buffer.length;
}

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly limit: number) {}

  append(chunk: Buffer): void {
    if (this.truncated) {
      return;
    }
    const remaining = this.limit - this.size;
    if (chunk.length <= remaining) {
      this.chunks.push(chunk);
      this.size += chunk.length;
      return;
    }
    this.chunks.push(chunk.subarray(0, remaining));
    this.size = this.limit;
    this.truncated = true;
  }

  toString(): string {
    const captured = Buffer.concat(this.chunks);
    if (!this.truncated) {
      return captured.toString('utf8').trim();
    }
    const text = captured.subarray(0, completeUtf8Length(captured)).toString('utf8').trim();
    return `${text}\n${TRUNCATION_MARKER}`;
  }
}

type Outcome = Pick<ExecutionResult, 'success' | 'returnCode' | 'stdout' | 'stderr' | 'timedOut'>;

interface RunningCommand {
  /** Kill the tree now and release the caller */
  terminate(): void;
  /** Resolves once the root process has exited */
  exited: Promise<void>;
}

export class CommandExecutor implements CommandRunner {
  private readonly shell: ShellInvocation;
  private readonly platform: PathPlatform;
  private readonly maxOutputBytes: number;
  private readonly killGraceMs: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;
  private readonly running = new Set<RunningCommand>();

  constructor(options: ExecutorOptions = {}) {
    this.shell = options.shell ?? restrictedPowerShell();
    this.platform = options.platform ?? resolvePathPlatform();
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.env = options.env ?? process.env;
    this.logger = options.logger ?? componentLogger('executor');
  }

  async execute(
    command: string,
    workingDirectory: string | undefined,
    timeoutSeconds: number
  ): Promise<ExecutionResult> {
    const startTime = Date.now();
    const cwd = workingDirectory ? normalizeDirectory(workingDirectory, this.platform) : undefined;
    const reportedDirectory = cwd ?? process.cwd();

    const finish = (outcome: Outcome): ExecutionResult => ({
      ...outcome,
      command,
      workingDirectory: reportedDirectory,
      durationMs: Date.now() - startTime,
    });

    if (cwd !== undefined && !isDirectory(cwd)) {
      this.logger.warn('Working directory does not exist', { command, workingDirectory: cwd });
      return finish({
        success: false,
        returnCode: null,
        stdout: '',
        stderr: `Working directory does not exist: ${cwd}`,
        timedOut: false,
      });
    }

    this.logger.info('Executing command', { command, workingDirectory: reportedDirectory, timeoutSeconds });

    return new Promise<ExecutionResult>((resolvePromise) => {
      const stdout = new OutputBuffer(this.maxOutputBytes);
      const stderr = new OutputBuffer(this.maxOutputBytes);
      let settled = false;
      let timeoutId: NodeJS.Timeout | undefined;

      const settle = (outcome: Outcome): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timeoutId !== undefined) {
          clearTimeout(timeoutId);
        }
        resolvePromise(finish(outcome));
      };

      const spawnFailure = (error: unknown): void => {
        if (settled) {
          return;
        }
        const message = `Command execution failed: ${getErrorMessage(error)}`;
        this.logger.error(message, { command });
        settle({ success: false, returnCode: null, stdout: stdout.toString(), stderr: message, timedOut: false });
      };

      let child: ChildProcess;
      try {
        child = spawn(this.shell.executable, this.shell.buildArgs(command), {
          cwd,
          env: this.env,
          shell: false,
          stdio: ['ignore', 'pipe', 'pipe'],
          // Own process group on POSIX so the whole tree can be signalled
          detached: process.platform !== 'win32',
          windowsHide: true,
        });
      } catch (error) {
        spawnFailure(error);
        return;
      }

      let markExited: () => void = () => undefined;
      const running: RunningCommand = {
        exited: new Promise<void>((resolveExit) => {
          markExited = resolveExit;
        }),
        terminate: () => {
          killProcessTree(child, { graceMs: this.killGraceMs, force: true, logger: this.logger });
          const captured = stderr.toString();
          settle({
            success: false,
            returnCode: null,
            stdout: stdout.toString(),
            stderr: captured ? `${captured}\n${TERMINATION_NOTICE}` : TERMINATION_NOTICE,
            timedOut: false,
          });
        },
      };
      const onExit = (): void => {
        this.running.delete(running);
        markExited();
      };
      this.running.add(running);
      child.once('close', onExit);
      child.once('error', onExit);

      timeoutId = setTimeout(() => {
        const notice = `Command timed out after ${timeoutSeconds} seconds`;
        this.logger.error(notice, { command, pid: child.pid });
        killProcessTree(child, { graceMs: this.killGraceMs, logger: this.logger });
        const captured = stderr.toString();
        settle({
          success: false,
          returnCode: null,
          stdout: stdout.toString(),
          stderr: captured ? `${captured}\n${notice}` : notice,
          timedOut: true,
        });
      }, Math.min(timeoutSeconds * 1000, MAX_TIMER_MS));

      child.stdout?.on('data', (chunk: Buffer) => stdout.append(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.append(chunk));

      child.on('error', spawnFailure);

      child.on('close', (code, signal) => {
        if (settled) {
          return;
        }
        if (code === 0) {
          this.logger.info('Command executed successfully', { command });
        } else {
          this.logger.warn('Command failed', { command, returnCode: code, signal });
        }
        settle({
          success: code === 0,
          returnCode: code,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          timedOut: false,
        });
      });
    });
  }

  /**
   * Kill every command still running, including timed-out ones whose tree
   * may not be gone yet. Pending callers are released with a termination
   * notice. Resolves once the root processes have exited, or after the kill
   * grace period at the latest.
   */
  async terminateAll(): Promise<void> {
    const pending = [...this.running];
    if (pending.length === 0) {
      return;
    }
    this.logger.warn('Terminating running commands', { count: pending.length });
    for (const command of pending) {
      command.terminate();
    }

    let capTimer: NodeJS.Timeout | undefined;
    const cap = new Promise<void>((resolveCap) => {
      capTimer = setTimeout(resolveCap, this.killGraceMs);
    });
    try {
      await Promise.race([Promise.all(pending.map((command) => command.exited)), cap]);
    } finally {
      clearTimeout(capTimer);
    }
  }
}
