/**
 * execute_powershell
 *
 * Validates the command and, only when allowed, runs it through the
 * restricted shell. Denials come back as a failed execution whose stderr
 * holds the reason.
 */

import { z } from 'zod';
import { jsonToolResult, toWireExecution, type ToolResult } from './wire.js';
import type { ToolSurface } from './tool-surface.js';

export const executePowershellSchema = z.object({
  command: z.string().describe('The PowerShell command to execute'),
  working_directory: z
    .string()
    .optional()
    .describe('Optional working directory; must fall under an allowed directory'),
});

export type ExecutePowershellArgs = z.infer<typeof executePowershellSchema>;

export async function executePowershell(surface: ToolSurface, args: ExecutePowershellArgs): Promise<ToolResult> {
  const result = await surface.executePowershell(args.command, args.working_directory);
  return jsonToolResult(toWireExecution(result));
}
