/**
 * validate_command
 *
 * Dry run: reports whether a command would be allowed. Never executes.
 */

import { z } from 'zod';
import { jsonToolResult, toWireValidation, type ToolResult } from './wire.js';
import type { ToolSurface } from './tool-surface.js';

export const validateCommandSchema = z.object({
  command: z.string().describe('The PowerShell command to validate'),
  working_directory: z
    .string()
    .optional()
    .describe('Optional working directory to check alongside the command'),
});

export type ValidateCommandArgs = z.infer<typeof validateCommandSchema>;

export async function validateCommand(surface: ToolSurface, args: ValidateCommandArgs): Promise<ToolResult> {
  return jsonToolResult(toWireValidation(surface.validateCommand(args.command, args.working_directory)));
}
