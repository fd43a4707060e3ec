import { describe, it, expect } from 'vitest';
import {
  resolveServerConfig,
  ConfigError,
  DEFAULT_POLICY_PATH,
  ENV_LOG_LEVEL,
  ENV_POLICY_PATH,
  ENV_LOG_FILE,
  ENV_SHELL,
} from '@/config/server-config.js';

describe('resolveServerConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(resolveServerConfig({}, {})).toEqual({
      policyPath: DEFAULT_POLICY_PATH,
      logLevel: 'info',
    });
  });

  it('reads environment variables', () => {
    const config = resolveServerConfig(
      {},
      {
        [ENV_POLICY_PATH]: '/etc/gatekeeper/policy.json',
        [ENV_LOG_LEVEL]: ' DEBUG ',
        [ENV_LOG_FILE]: '/var/log/gatekeeper.log',
        [ENV_SHELL]: 'pwsh-preview',
      }
    );

    expect(config).toEqual({
      policyPath: '/etc/gatekeeper/policy.json',
      logLevel: 'debug',
      logFile: '/var/log/gatekeeper.log',
      shellExecutable: 'pwsh-preview',
    });
  });

  it('lets overrides win over the environment', () => {
    const config = resolveServerConfig(
      { policyPath: 'local.json', logLevel: 'warn' },
      { [ENV_POLICY_PATH]: 'env.json', [ENV_LOG_LEVEL]: 'debug' }
    );

    expect(config.policyPath).toBe('local.json');
    expect(config.logLevel).toBe('warn');
  });

  it('ignores blank environment values', () => {
    const config = resolveServerConfig({}, { [ENV_POLICY_PATH]: '   ', [ENV_LOG_LEVEL]: '' });

    expect(config.policyPath).toBe(DEFAULT_POLICY_PATH);
    expect(config.logLevel).toBe('info');
  });

  it('rejects an unknown log level', () => {
    expect(() => resolveServerConfig({ logLevel: 'verbose' }, {})).toThrow(ConfigError);
    expect(() => resolveServerConfig({ logLevel: 'verbose' }, {})).toThrow(
      /^Invalid server configuration: logLevel: /
    );
  });
});
