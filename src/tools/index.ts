/**
 * Tool exports for the gatekeeper server
 */

export { ToolSurface, type ToolSurfaceOptions } from './tool-surface.js';

export {
  executePowershellSchema,
  executePowershell,
  type ExecutePowershellArgs,
} from './execute-powershell.js';

export {
  validateCommandSchema,
  validateCommand,
  type ValidateCommandArgs,
} from './validate-command.js';

export { listAllowedCommands, listAllowedDirectories } from './list-allowed.js';

export { getSecurityConfig } from './get-security-config.js';

export {
  jsonToolResult,
  toWireExecution,
  toWireSecurityConfig,
  toWireValidation,
  type ToolResult,
} from './wire.js';
