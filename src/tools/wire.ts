/**
 * Wire format for tool responses: flat JSON objects with snake_case keys,
 * wrapped in a single MCP text content item.
 */

import type { ExecutionResult, SecurityConfigSummary, ValidationResult } from '../types/index.js';

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
}

export function jsonToolResult(payload: unknown): ToolResult {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

export function toWireValidation(result: ValidationResult) {
  return {
    is_allowed: result.isAllowed,
    reason: result.reason,
    command: result.command,
  };
}

export function toWireExecution(result: ExecutionResult) {
  return {
    success: result.success,
    return_code: result.returnCode,
    stdout: result.stdout,
    stderr: result.stderr,
    command: result.command,
    working_directory: result.workingDirectory,
    timed_out: result.timedOut,
    duration_ms: result.durationMs,
  };
}

export function toWireSecurityConfig(summary: SecurityConfigSummary) {
  return {
    allowed_commands_count: summary.allowedCommandsCount,
    allowed_directories_count: summary.allowedDirectoriesCount,
    blocked_patterns_count: summary.blockedPatternsCount,
    max_command_length: summary.maxCommandLength,
    timeout_seconds: summary.timeoutSeconds,
  };
}
