import { Command } from 'commander';
import { resolveServerConfig } from '../../config/server-config.js';
import { loadPolicyFile } from '../../policy/policy-loader.js';
import { CommandValidator } from '../../gatekeeper/validator.js';
import { toWireValidation } from '../../tools/wire.js';
import { createLogger } from '../../logging/logger.js';
import { resolvePathPlatform, type PathPlatform } from '../../utils/path-normalizer.js';

interface CheckOptions {
  config?: string;
  cwd?: string;
  windows?: boolean;
}

/** Exit code for a denied command */
export const EXIT_DENIED = 2;

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Validate a command against the policy without running it')
    .argument('<command...>', 'Command to validate; put it after -- if its parameters clash with ours')
    // PowerShell parameters such as -Recurse belong to the command, not to us
    .allowUnknownOption()
    .option('-c, --config <path>', 'Path to the security policy JSON file (default: config.json)')
    .option('--cwd <directory>', 'Working directory to validate alongside the command')
    .option('--windows', 'Use Windows path rules regardless of the host platform', false)
    .action(async (words: string[], options: CheckOptions) => {
      const { policyPath } = resolveServerConfig({ policyPath: options.config });
      const policy = await loadPolicyFile(policyPath);
      const platform: PathPlatform = options.windows ? 'win32' : resolvePathPlatform();
      const validator = new CommandValidator(policy, {
        platform,
        logger: createLogger({ silent: true }),
      });

      const result = validator.validate(words.join(' '), options.cwd);
      console.log(JSON.stringify(toWireValidation(result), null, 2));
      if (!result.isAllowed) {
        process.exitCode = EXIT_DENIED;
      }
    });
}
