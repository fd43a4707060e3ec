/**
 * Command Validation
 *
 * Decides whether a command may run under the active policy. Checks run in a
 * fixed order and the first failure is reported:
 *
 * 1. emptiness and length
 * 2. blocked patterns over the whole raw command (overrides the allowlist)
 * 3. leading token against the allowed commands
 * 4. working directory against the allowed directories
 *
 * `validate` never throws; every outcome is a {@link ValidationResult}.
 */

import type { SecurityPolicy } from '../policy/security-policy.js';
import {
  compileDirectoryRule,
  matchesDirectoryRule,
  normalizeDirectory,
  resolvePathPlatform,
  type DirectoryRule,
  type PathPlatform,
} from '../utils/path-normalizer.js';
import { componentLogger, type Logger } from '../logging/logger.js';
import { getErrorMessage, type ValidationResult } from '../types/index.js';

export interface ValidatorOptions {
  /** Path semantics used for working directories (default: host platform) */
  platform?: PathPlatform;
  logger?: Logger;
}

export type DirectoryCheck =
  | { allowed: true; normalizedPath: string }
  | { allowed: false; normalizedPath: string; error: string };

/**
 * First whitespace-delimited word of the command.
 */
export function leadingToken(command: string): string {
  const trimmed = command.trim();
  if (trimmed.length === 0) {
    return '';
  }
  return trimmed.split(/\s+/)[0] ?? '';
}

/** Length in code points, not UTF-16 units */
function characterLength(value: string): number {
  return Array.from(value).length;
}

export class CommandValidator {
  readonly policy: SecurityPolicy;
  readonly platform: PathPlatform;

  private readonly directoryRules: readonly DirectoryRule[];
  private readonly logger: Logger;

  constructor(policy: SecurityPolicy, options: ValidatorOptions = {}) {
    this.policy = policy;
    this.platform = options.platform ?? resolvePathPlatform();
    this.logger = options.logger ?? componentLogger('validator');
    this.directoryRules = policy.allowedDirectories.map((pattern) =>
      compileDirectoryRule(pattern, this.platform)
    );
  }

  validate(command: string, workingDirectory?: string): ValidationResult {
    const result = this.evaluate(command, workingDirectory);
    if (result.isAllowed) {
      this.logger.debug('Command allowed', { command });
    } else {
      this.logger.warn('Command blocked', { command, workingDirectory, reason: result.reason });
    }
    return result;
  }

  /**
   * Check a working directory on its own.
   */
  checkDirectory(workingDirectory: string): DirectoryCheck {
    if (workingDirectory.includes('\0')) {
      return { allowed: false, normalizedPath: '', error: 'Working directory contains null bytes' };
    }

    let normalizedPath: string;
    try {
      normalizedPath = normalizeDirectory(workingDirectory, this.platform);
    } catch (error) {
      return {
        allowed: false,
        normalizedPath: '',
        error: `Invalid working directory: ${getErrorMessage(error)}`,
      };
    }

    const matched = this.directoryRules.some((rule) =>
      matchesDirectoryRule(normalizedPath, rule, this.platform)
    );
    if (!matched) {
      return {
        allowed: false,
        normalizedPath,
        error: `Working directory '${normalizedPath}' is not in the allowed directories list`,
      };
    }
    return { allowed: true, normalizedPath };
  }

  private evaluate(command: string, workingDirectory: string | undefined): ValidationResult {
    const deny = (reason: string): ValidationResult => ({ isAllowed: false, reason, command });

    if (command.trim().length === 0) {
      return deny('Command is empty');
    }

    if (characterLength(command) > this.policy.maxCommandLength) {
      return deny(`Command exceeds maximum length of ${this.policy.maxCommandLength} characters`);
    }

    for (const pattern of this.policy.blockedPatterns) {
      if (pattern.matcher.test(command)) {
        return deny(`Command contains blocked pattern (${pattern.label}): ${pattern.source}`);
      }
    }

    const token = leadingToken(command);
    if (!this.policy.isCommandAllowed(token)) {
      return deny(`Command '${token}' is not in the allowed commands list`);
    }

    if (workingDirectory) {
      const directory = this.checkDirectory(workingDirectory);
      if (!directory.allowed) {
        return deny(directory.error);
      }
    }

    return { isAllowed: true, reason: 'Command is allowed', command };
  }
}
