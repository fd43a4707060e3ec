import { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { resolveServerConfig } from '../../config/server-config.js';
import { configureLogger } from '../../logging/logger.js';
import { loadPolicyFile } from '../../policy/policy-loader.js';
import { PolicyStore } from '../../policy/policy-store.js';
import { CommandExecutor } from '../../gatekeeper/executor.js';
import { defaultShellExecutable, restrictedPowerShell } from '../../gatekeeper/shell.js';
import { ToolSurface } from '../../tools/index.js';
import { createGatekeeperServer, DEFAULT_SERVER_INFO } from '../../server/create-server.js';
import { resolvePathPlatform } from '../../utils/path-normalizer.js';
import { getErrorMessage } from '../../types/index.js';

export interface ServeOptions {
  config?: string;
  logLevel?: string;
  logFile?: string;
  shell?: string;
}

export async function runServe(options: ServeOptions): Promise<void> {
  const config = resolveServerConfig({
    policyPath: options.config,
    logLevel: options.logLevel,
    logFile: options.logFile,
    shellExecutable: options.shell,
  });
  const log = configureLogger({ level: config.logLevel, file: config.logFile });

  log.info('Loading security policy', { policyPath: config.policyPath });
  const policy = await loadPolicyFile(config.policyPath);
  const store = new PolicyStore(policy);
  store.onChange((next) => {
    log.info('Security policy replaced', { source: next.source, ...next.summary() });
  });

  const platform = resolvePathPlatform();
  const shellExecutable = config.shellExecutable ?? defaultShellExecutable();
  const executor = new CommandExecutor({ platform, shell: restrictedPowerShell(shellExecutable) });
  const surface = new ToolSurface(store, { platform, runner: executor });
  const server = createGatekeeperServer(surface, DEFAULT_SERVER_INFO);

  process.on('SIGHUP', () => {
    log.info('SIGHUP received, reloading security policy');
    store.reload().catch((error: unknown) => {
      log.error('Policy reload failed, keeping previous policy', { error: getErrorMessage(error) });
    });
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info('Shutting down', { signal });
    // Children run in their own process groups and would outlive the exit
    executor
      .terminateAll()
      .then(() => server.close())
      .catch((error: unknown) => {
        log.error('Error while closing server', { error: getErrorMessage(error) });
      })
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.connect(new StdioServerTransport());
  log.info('Server listening on stdio', {
    shell: shellExecutable,
    platform,
    ...policy.summary(),
  });
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Start the MCP server on stdio')
    .option('-c, --config <path>', 'Path to the security policy JSON file (default: config.json)')
    .option('--log-level <level>', 'Logging level: error, warn, info or debug (default: info)')
    .option('--log-file <path>', 'Also write JSON logs to a rotating file')
    .option('--shell <executable>', 'PowerShell executable (default: powershell.exe on Windows, pwsh elsewhere)')
    .action(async (options: ServeOptions) => {
      await runServe(options);
    });
}
