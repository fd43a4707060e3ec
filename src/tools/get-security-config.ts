/**
 * get_security_config
 *
 * Counts and limits of the active policy; never the patterns themselves.
 */

import { jsonToolResult, toWireSecurityConfig, type ToolResult } from './wire.js';
import type { ToolSurface } from './tool-surface.js';

export async function getSecurityConfig(surface: ToolSurface): Promise<ToolResult> {
  return jsonToolResult(toWireSecurityConfig(surface.getSecurityConfig()));
}
