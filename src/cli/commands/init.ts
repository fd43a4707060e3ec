import { Command } from 'commander';
import { writeDefaultPolicy } from '../../policy/policy-loader.js';
import { resolveServerConfig } from '../../config/server-config.js';

interface InitOptions {
  config?: string;
  force?: boolean;
}

export function createInitCommand(): Command {
  return new Command('init')
    .description('Write the default security policy file')
    .option('-c, --config <path>', 'Where to write the policy (default: config.json)')
    .option('-f, --force', 'Overwrite an existing file', false)
    .action(async (options: InitOptions) => {
      const { policyPath } = resolveServerConfig({ policyPath: options.config });
      const written = await writeDefaultPolicy(policyPath, { force: options.force });
      console.log(`Default security policy written to ${written}`);
    });
}
