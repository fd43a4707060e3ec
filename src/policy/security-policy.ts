/**
 * Security Policy
 *
 * The validated, immutable rule set the gatekeeper enforces. Built once from
 * a policy definition (usually the JSON policy file); every field is frozen
 * and every blocked pattern is compiled up front, so concurrent validations
 * only ever read shared state.
 */

import { z } from 'zod';
import { PolicyLoadError } from './policy-error.js';
import { checkDirectoryPattern } from '../utils/path-normalizer.js';
import type { SecurityConfigSummary } from '../types/index.js';

export const DEFAULT_PATTERN_LABEL = 'blocked pattern';

const blockedPatternEntrySchema = z.union([
  z.string().min(1),
  z
    .object({
      pattern: z.string().min(1),
      label: z.string().trim().min(1).optional(),
    })
    .strict(),
]);

export const policyDefinitionSchema = z
  .object({
    allowed_commands: z.array(z.string().trim().min(1)),
    allowed_directories: z
      .array(z.string().min(1))
      .superRefine((patterns, ctx) => {
        patterns.forEach((pattern, index) => {
          const problem = checkDirectoryPattern(pattern);
          if (problem) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: problem });
          }
        });
      }),
    blocked_patterns: z.array(blockedPatternEntrySchema),
    max_command_length: z.number().int().positive(),
    timeout_seconds: z.number().int().positive(),
  })
  .strict();

export type PolicyDefinition = z.infer<typeof policyDefinitionSchema>;

export interface BlockedPattern {
  /** Regex source as written in the policy */
  source: string;
  /** Class of threat the pattern guards against, used in denial reasons */
  label: string;
  matcher: RegExp;
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function compileBlockedPattern(
  entry: PolicyDefinition['blocked_patterns'][number],
  index: number,
  source: string
): BlockedPattern {
  const patternSource = typeof entry === 'string' ? entry : entry.pattern;
  const label = typeof entry === 'string' ? DEFAULT_PATTERN_LABEL : entry.label ?? DEFAULT_PATTERN_LABEL;

  let matcher: RegExp;
  try {
    // Only the 'i' flag: without 'g'/'y' the matcher keeps no lastIndex state
    matcher = new RegExp(patternSource, 'i');
  } catch (error) {
    throw new PolicyLoadError(`blocked_patterns.${index}: invalid regular expression ${patternSource}`, source, {
      cause: error,
    });
  }

  return Object.freeze({ source: patternSource, label, matcher });
}

export class SecurityPolicy {
  readonly allowedCommands: readonly string[];
  readonly allowedDirectories: readonly string[];
  readonly blockedPatterns: readonly BlockedPattern[];
  readonly maxCommandLength: number;
  readonly timeoutSeconds: number;
  /** Where the policy came from (file path or a descriptive label) */
  readonly source: string;

  private readonly commandIndex: ReadonlySet<string>;

  private constructor(definition: PolicyDefinition, source: string) {
    const seen = new Set<string>();
    const commands: string[] = [];
    for (const command of definition.allowed_commands) {
      const key = command.toLowerCase();
      if (!seen.has(key)) {
        seen.add(key);
        commands.push(command);
      }
    }

    this.allowedCommands = Object.freeze(commands);
    this.commandIndex = seen;
    this.allowedDirectories = Object.freeze([...definition.allowed_directories]);
    this.blockedPatterns = Object.freeze(
      definition.blocked_patterns.map((entry, index) => compileBlockedPattern(entry, index, source))
    );
    this.maxCommandLength = definition.max_command_length;
    this.timeoutSeconds = definition.timeout_seconds;
    this.source = source;
    Object.freeze(this);
  }

  /**
   * Validate an untrusted definition and build a policy from it.
   *
   * @throws PolicyLoadError when any field is missing, unknown or malformed
   */
  static fromDefinition(definition: unknown, source = '<inline>'): SecurityPolicy {
    const parsed = policyDefinitionSchema.safeParse(definition);
    if (!parsed.success) {
      throw new PolicyLoadError(formatZodIssues(parsed.error), source, { cause: parsed.error });
    }
    return new SecurityPolicy(parsed.data, source);
  }

  /** Case-insensitive membership test for a leading token */
  isCommandAllowed(token: string): boolean {
    return this.commandIndex.has(token.toLowerCase());
  }

  summary(): SecurityConfigSummary {
    return {
      allowedCommandsCount: this.allowedCommands.length,
      allowedDirectoriesCount: this.allowedDirectories.length,
      blockedPatternsCount: this.blockedPatterns.length,
      maxCommandLength: this.maxCommandLength,
      timeoutSeconds: this.timeoutSeconds,
    };
  }
}
