/**
 * Tool Surface
 *
 * The five operations exposed to the protocol layer. Pure delegation: policy
 * decisions belong to the validator, process handling to the executor. The
 * current policy is read from the store once per call, so a reload between
 * calls is picked up and never observed halfway through one.
 */

import { CommandValidator } from '../gatekeeper/validator.js';
import { CommandExecutor, type CommandRunner } from '../gatekeeper/executor.js';
import { resolvePathPlatform, type PathPlatform } from '../utils/path-normalizer.js';
import { componentLogger, type Logger } from '../logging/logger.js';
import type { PolicyStore } from '../policy/policy-store.js';
import type { SecurityPolicy } from '../policy/security-policy.js';
import type { ExecutionResult, SecurityConfigSummary, ValidationResult } from '../types/index.js';

export interface ToolSurfaceOptions {
  /** Runs allowed commands (default: a {@link CommandExecutor} on the same platform) */
  runner?: CommandRunner;
  /** Path semantics shared by validation and execution */
  platform?: PathPlatform;
  logger?: Logger;
}

export class ToolSurface {
  private readonly store: PolicyStore;
  private readonly runner: CommandRunner;
  private readonly platform: PathPlatform;
  private readonly logger: Logger;
  private validator: CommandValidator;

  constructor(store: PolicyStore, options: ToolSurfaceOptions = {}) {
    this.store = store;
    this.platform = options.platform ?? resolvePathPlatform();
    this.logger = options.logger ?? componentLogger('tools');
    this.runner = options.runner ?? new CommandExecutor({ platform: this.platform, logger: this.logger });
    this.validator = this.createValidator(store.current());
  }

  async executePowershell(command: string, workingDirectory?: string): Promise<ExecutionResult> {
    this.logger.info('execute_powershell called', { command, workingDirectory });
    const policy = this.store.current();
    const validation = this.validatorFor(policy).validate(command, workingDirectory);

    if (!validation.isAllowed) {
      return {
        success: false,
        returnCode: null,
        stdout: '',
        stderr: validation.reason,
        command,
        workingDirectory: workingDirectory ?? '',
        timedOut: false,
        durationMs: 0,
      };
    }

    return this.runner.execute(command, workingDirectory || undefined, policy.timeoutSeconds);
  }

  validateCommand(command: string, workingDirectory?: string): ValidationResult {
    this.logger.debug('validate_command called', { command, workingDirectory });
    return this.validatorFor(this.store.current()).validate(command, workingDirectory);
  }

  listAllowedCommands(): string[] {
    this.logger.debug('list_allowed_commands called');
    return [...this.store.current().allowedCommands];
  }

  listAllowedDirectories(): string[] {
    this.logger.debug('list_allowed_directories called');
    return [...this.store.current().allowedDirectories];
  }

  getSecurityConfig(): SecurityConfigSummary {
    this.logger.debug('get_security_config called');
    return this.store.current().summary();
  }

  private validatorFor(policy: SecurityPolicy): CommandValidator {
    if (this.validator.policy !== policy) {
      this.validator = this.createValidator(policy);
    }
    return this.validator;
  }

  private createValidator(policy: SecurityPolicy): CommandValidator {
    return new CommandValidator(policy, {
      platform: this.platform,
      logger: componentLogger('validator', this.logger),
    });
  }
}
