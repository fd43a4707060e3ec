import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadPolicyFile, writeDefaultPolicy, DEFAULT_POLICY_FILE } from '@/policy/policy-loader.js';
import { PolicyLoadError } from '@/policy/policy-error.js';
import { PolicyStore } from '@/policy/policy-store.js';
import { createPolicyDefinition } from '../../fixtures/policies.js';

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'gatekeeper-policy-'));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

function writePolicy(name: string, contents: unknown): string {
  const file = join(workDir, name);
  writeFileSync(file, typeof contents === 'string' ? contents : JSON.stringify(contents), 'utf8');
  return file;
}

describe('loadPolicyFile', () => {
  it('loads a valid policy file and records its absolute path', async () => {
    const file = writePolicy('policy.json', createPolicyDefinition({ timeout_seconds: 15 }));

    const policy = await loadPolicyFile(file);

    expect(policy.timeoutSeconds).toBe(15);
    expect(policy.source).toBe(file);
  });

  it('fails on a missing file with a hint to run init', async () => {
    await expect(loadPolicyFile(join(workDir, 'absent.json'))).rejects.toThrow(/file not found.*init/);
  });

  it('fails on invalid JSON instead of falling back to defaults', async () => {
    const file = writePolicy('policy.json', 'invalid json content');

    await expect(loadPolicyFile(file)).rejects.toBeInstanceOf(PolicyLoadError);
    await expect(loadPolicyFile(file)).rejects.toThrow(/invalid JSON/);
  });

  it('fails on a partial policy', async () => {
    const file = writePolicy('policy.json', { allowed_commands: ['Get-Date'] });

    await expect(loadPolicyFile(file)).rejects.toThrow(/allowed_directories: Required/);
  });

  it('loads the bundled default policy', async () => {
    const policy = await loadPolicyFile(DEFAULT_POLICY_FILE);

    expect(policy.summary()).toEqual({
      allowedCommandsCount: 16,
      allowedDirectoriesCount: 3,
      blockedPatternsCount: 20,
      maxCommandLength: 200,
      timeoutSeconds: 30,
    });
    expect(policy.isCommandAllowed('Get-ChildItem')).toBe(true);
  });
});

describe('writeDefaultPolicy', () => {
  it('writes the bundled policy to a new file', async () => {
    const target = join(workDir, 'nested', 'config.json');

    const written = await writeDefaultPolicy(target);

    expect(written).toBe(target);
    expect(readFileSync(target, 'utf8').trimEnd()).toBe(readFileSync(DEFAULT_POLICY_FILE, 'utf8').trimEnd());
    await expect(loadPolicyFile(target)).resolves.toMatchObject({ timeoutSeconds: 30 });
  });

  it('refuses to overwrite an existing file', async () => {
    const target = writePolicy('config.json', createPolicyDefinition({ timeout_seconds: 5 }));

    await expect(writeDefaultPolicy(target)).rejects.toThrow(/already exists/);
    expect((await loadPolicyFile(target)).timeoutSeconds).toBe(5);
  });

  it('overwrites when forced', async () => {
    const target = writePolicy('config.json', createPolicyDefinition({ timeout_seconds: 5 }));

    await writeDefaultPolicy(target, { force: true });

    expect((await loadPolicyFile(target)).timeoutSeconds).toBe(30);
  });

  it('writes nothing when the template is invalid', async () => {
    const template = writePolicy('template.json', { allowed_commands: [] });
    const target = join(workDir, 'config.json');

    await expect(writeDefaultPolicy(target, { templatePath: template })).rejects.toBeInstanceOf(PolicyLoadError);
    expect(existsSync(target)).toBe(false);
  });
});

describe('PolicyStore', () => {
  it('swaps the whole policy on reload', async () => {
    const file = writePolicy('policy.json', createPolicyDefinition({ timeout_seconds: 10 }));
    const initial = await loadPolicyFile(file);
    const store = new PolicyStore(initial);

    writePolicy('policy.json', createPolicyDefinition({ timeout_seconds: 20 }));
    const next = await store.reload();

    expect(next).not.toBe(initial);
    expect(store.current()).toBe(next);
    expect(store.current().timeoutSeconds).toBe(20);
    expect(initial.timeoutSeconds).toBe(10);
  });

  it('keeps the current policy when a reload fails', async () => {
    const file = writePolicy('policy.json', createPolicyDefinition());
    const initial = await loadPolicyFile(file);
    const store = new PolicyStore(initial);

    writePolicy('policy.json', '{ "allowed_commands": ');

    await expect(store.reload()).rejects.toBeInstanceOf(PolicyLoadError);
    expect(store.current()).toBe(initial);
  });

  it('notifies listeners until they unsubscribe', async () => {
    const file = writePolicy('policy.json', createPolicyDefinition());
    const initial = await loadPolicyFile(file);
    const store = new PolicyStore(initial);
    const listener = vi.fn();

    const unsubscribe = store.onChange(listener);
    const next = await store.reload();
    unsubscribe();
    await store.reload();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(next, initial);
  });
});
