/**
 * MCP server wiring: registers the gatekeeper tools on an McpServer.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  ToolSurface,
  executePowershellSchema,
  executePowershell,
  validateCommandSchema,
  validateCommand,
  listAllowedCommands,
  listAllowedDirectories,
  getSecurityConfig,
} from '../tools/index.js';

export interface ServerInfo {
  name: string;
  version: string;
}

export const DEFAULT_SERVER_INFO: ServerInfo = {
  name: 'powershell-gatekeeper',
  version: '0.1.0',
};

export const TOOL_NAMES = [
  'execute_powershell',
  'validate_command',
  'list_allowed_commands',
  'list_allowed_directories',
  'get_security_config',
] as const;

export function createGatekeeperServer(surface: ToolSurface, info: ServerInfo = DEFAULT_SERVER_INFO): McpServer {
  const server = new McpServer({ name: info.name, version: info.version });

  server.tool(
    'execute_powershell',
    'Execute a PowerShell command with security restrictions. The command must pass validation; ' +
      'it runs with profiles disabled, non-interactively and under the policy timeout.',
    executePowershellSchema.shape,
    async (args) => executePowershell(surface, args)
  );

  server.tool(
    'validate_command',
    'Check whether a PowerShell command would be allowed, without executing it.',
    validateCommandSchema.shape,
    async (args) => validateCommand(surface, args)
  );

  server.tool('list_allowed_commands', 'List the commands allowed as the leading token.', async () =>
    listAllowedCommands(surface)
  );

  server.tool(
    'list_allowed_directories',
    'List the allowed working directories. A trailing * covers the directory and everything beneath it.',
    async () => listAllowedDirectories(surface)
  );

  server.tool(
    'get_security_config',
    'Summarize the active security policy: rule counts, maximum command length and timeout.',
    async () => getSecurityConfig(surface)
  );

  return server;
}
