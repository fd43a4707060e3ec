/**
 * Shared result types and type guards.
 *
 * Results are plain data: created per request, owned by the caller and
 * never cached or shared between requests.
 */

/**
 * Outcome of checking a command (and optional working directory) against the
 * active security policy.
 */
export interface ValidationResult {
  isAllowed: boolean;
  /** Human-readable justification, populated for both outcomes */
  reason: string;
  /** The command exactly as it was received */
  command: string;
}

/**
 * Outcome of running (or refusing to run) a command.
 */
export interface ExecutionResult {
  success: boolean;
  /** Raw exit code; null on timeout, spawn failure, denial or signal exit */
  returnCode: number | null;
  stdout: string;
  stderr: string;
  command: string;
  workingDirectory: string;
  /** When true, success is false and stderr carries a timeout notice */
  timedOut: boolean;
  durationMs: number;
}

/**
 * Summary of the loaded policy. Patterns themselves are never exposed.
 */
export interface SecurityConfigSummary {
  allowedCommandsCount: number;
  allowedDirectoriesCount: number;
  blockedPatternsCount: number;
  maxCommandLength: number;
  timeoutSeconds: number;
}

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Node system errors carry a string `code` (ENOENT, ESRCH, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
  if (isError(error) && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
