/**
 * list_allowed_commands / list_allowed_directories
 */

import { jsonToolResult, type ToolResult } from './wire.js';
import type { ToolSurface } from './tool-surface.js';

export async function listAllowedCommands(surface: ToolSurface): Promise<ToolResult> {
  return jsonToolResult(surface.listAllowedCommands());
}

export async function listAllowedDirectories(surface: ToolSurface): Promise<ToolResult> {
  return jsonToolResult(surface.listAllowedDirectories());
}
