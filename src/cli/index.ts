#!/usr/bin/env node

import { Command } from 'commander';
import { createServeCommand } from './commands/serve.js';
import { createInitCommand } from './commands/init.js';
import { createCheckCommand } from './commands/check.js';
import { DEFAULT_SERVER_INFO } from '../server/create-server.js';
import { logger } from '../logging/logger.js';
import { getErrorMessage } from '../types/index.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('powershell-gatekeeper')
    .description('MCP server for policy-checked PowerShell command execution')
    .version(DEFAULT_SERVER_INFO.version)
    // Options after a subcommand name belong to the subcommand, so -Verbose is not -V
    .enablePositionalOptions();

  program.addCommand(createServeCommand(), { isDefault: true });
  program.addCommand(createInitCommand());
  program.addCommand(createCheckCommand());

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(getErrorMessage(error));
    process.exitCode = 1;
  });
