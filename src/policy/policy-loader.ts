/**
 * Policy file loading and bootstrap.
 */

import { readFile, writeFile, access, mkdir } from 'fs/promises';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { PolicyLoadError } from './policy-error.js';
import { SecurityPolicy } from './security-policy.js';
import { getErrorCode, getErrorMessage } from '../types/index.js';

/** Bundled starting policy written by `init` */
export const DEFAULT_POLICY_FILE = fileURLToPath(new URL('../../config/default-policy.json', import.meta.url));

/**
 * Read, parse and validate a policy file.
 *
 * @throws PolicyLoadError on a missing file, invalid JSON or an invalid policy
 */
export async function loadPolicyFile(policyPath: string): Promise<SecurityPolicy> {
  const absolutePath = resolve(policyPath);

  let raw: string;
  try {
    raw = await readFile(absolutePath, 'utf8');
  } catch (error) {
    const message =
      getErrorCode(error) === 'ENOENT'
        ? 'file not found (run `powershell-gatekeeper init` to create one)'
        : `cannot read file: ${getErrorMessage(error)}`;
    throw new PolicyLoadError(message, absolutePath, { cause: error });
  }

  let definition: unknown;
  try {
    definition = JSON.parse(raw);
  } catch (error) {
    throw new PolicyLoadError(`invalid JSON: ${getErrorMessage(error)}`, absolutePath, { cause: error });
  }

  return SecurityPolicy.fromDefinition(definition, absolutePath);
}

export interface WriteDefaultPolicyOptions {
  /** Overwrite an existing file */
  force?: boolean;
  /** Template to copy (defaults to the bundled policy) */
  templatePath?: string;
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write the bundled default policy to `policyPath`. The template is validated
 * before anything is written.
 *
 * @returns the absolute path written
 */
export async function writeDefaultPolicy(
  policyPath: string,
  options: WriteDefaultPolicyOptions = {}
): Promise<string> {
  const { force = false, templatePath = DEFAULT_POLICY_FILE } = options;
  const target = resolve(policyPath);

  if (!force && (await exists(target))) {
    throw new Error(`Policy file already exists: ${target} (use --force to overwrite)`);
  }

  const template = await loadPolicyFile(templatePath);
  const contents = await readFile(template.source, 'utf8');

  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, contents.endsWith('\n') ? contents : `${contents}\n`, 'utf8');
  return target;
}
