/**
 * Server configuration.
 *
 * Resolved from environment variables, then overridden by CLI flags, then
 * validated as a whole. The security policy itself lives in its own file
 * (see policy-loader); this only says where to find it and how to run.
 */

import { z } from 'zod';
import { formatZodIssues } from '../policy/security-policy.js';
import { LOG_LEVELS } from '../types/index.js';

export const ENV_POLICY_PATH = 'GATEKEEPER_POLICY';
export const ENV_LOG_LEVEL = 'LOG_LEVEL';
export const ENV_LOG_FILE = 'GATEKEEPER_LOG_FILE';
export const ENV_SHELL = 'GATEKEEPER_SHELL';

export const DEFAULT_POLICY_PATH = 'config.json';

const logLevelSchema = z.enum(LOG_LEVELS);

export const serverConfigSchema = z.object({
  policyPath: z.string().trim().min(1).default(DEFAULT_POLICY_PATH),
  logLevel: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(logLevelSchema)
    .default('info'),
  logFile: z.string().trim().min(1).optional(),
  shellExecutable: z.string().trim().min(1).optional(),
});

export type ServerConfig = z.infer<typeof serverConfigSchema>;

export interface ServerConfigOverrides {
  policyPath?: string;
  logLevel?: string;
  logFile?: string;
  shellExecutable?: string;
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value : undefined;
}

/**
 * @throws ConfigError listing every invalid setting
 */
export function resolveServerConfig(
  overrides: ServerConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const parsed = serverConfigSchema.safeParse({
    policyPath: overrides.policyPath ?? nonEmpty(env[ENV_POLICY_PATH]),
    logLevel: overrides.logLevel ?? nonEmpty(env[ENV_LOG_LEVEL]),
    logFile: overrides.logFile ?? nonEmpty(env[ENV_LOG_FILE]),
    shellExecutable: overrides.shellExecutable ?? nonEmpty(env[ENV_SHELL]),
  });

  if (!parsed.success) {
    throw new ConfigError(`Invalid server configuration: ${formatZodIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
