/**
 * PowerShell Gatekeeper - policy-checked command execution for MCP servers.
 *
 * @module powershell-gatekeeper-mcp
 *
 * @description
 * Validates PowerShell commands against an immutable security policy
 * (length limit, blocked patterns, command allowlist, directory allowlist)
 * and runs allowed ones through a restricted PowerShell under a hard
 * timeout that takes down the whole process tree.
 *
 * @example Embedding
 * ```typescript
 * import { loadPolicyFile, PolicyStore, ToolSurface, createGatekeeperServer } from 'powershell-gatekeeper-mcp';
 * import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
 *
 * const store = new PolicyStore(await loadPolicyFile('config.json'));
 * const server = createGatekeeperServer(new ToolSurface(store));
 * await server.connect(new StdioServerTransport());
 * ```
 *
 * @example Validation only
 * ```typescript
 * import { SecurityPolicy, CommandValidator } from 'powershell-gatekeeper-mcp';
 *
 * const validator = new CommandValidator(SecurityPolicy.fromDefinition(definition), { platform: 'win32' });
 * validator.validate('Get-ChildItem; Remove-Item C:\\x');
 * // { isAllowed: false, reason: 'Command contains blocked pattern (command separator): [;&|`]', ... }
 * ```
 */

export {
  SecurityPolicy,
  policyDefinitionSchema,
  DEFAULT_PATTERN_LABEL,
  PolicyLoadError,
  PolicyStore,
  loadPolicyFile,
  writeDefaultPolicy,
  DEFAULT_POLICY_FILE,
} from './policy/index.js';

export type {
  PolicyDefinition,
  BlockedPattern,
  PolicyChangeListener,
  WriteDefaultPolicyOptions,
} from './policy/index.js';

export {
  CommandValidator,
  CommandExecutor,
  leadingToken,
  killProcessTree,
  restrictedPowerShell,
  defaultShellExecutable,
  RESTRICTED_POWERSHELL_FLAGS,
  TERMINATION_NOTICE,
  TRUNCATION_MARKER,
} from './gatekeeper/index.js';

export type {
  ValidatorOptions,
  DirectoryCheck,
  CommandRunner,
  ExecutorOptions,
  ShellInvocation,
  KillableProcess,
  KillProcessTreeOptions,
} from './gatekeeper/index.js';

export { ToolSurface } from './tools/index.js';
export type { ToolSurfaceOptions, ToolResult } from './tools/index.js';

export { createGatekeeperServer, DEFAULT_SERVER_INFO, TOOL_NAMES } from './server/create-server.js';
export type { ServerInfo } from './server/create-server.js';

export { resolveServerConfig, ConfigError } from './config/server-config.js';
export type { ServerConfig, ServerConfigOverrides } from './config/server-config.js';

export { createLogger, configureLogger } from './logging/logger.js';
export type { Logger, LoggerOptions } from './logging/logger.js';

export type { PathPlatform } from './utils/path-normalizer.js';

// Re-export common types for consumers
export type {
  ValidationResult,
  ExecutionResult,
  SecurityConfigSummary,
  LogLevel,
} from './types/index.js';

export { isError, getErrorMessage } from './types/index.js';
