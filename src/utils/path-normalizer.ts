/**
 * Path Normalization
 *
 * Shared by the validator and the executor so that the directory a command
 * runs in is exactly the directory that was checked.
 *
 * Rules are matched segment-wise over normalized absolute paths:
 * - `C:\temp` matches only `C:\temp`
 * - `C:\temp*` (or `C:\temp\*`) matches `C:\temp` and anything beneath it,
 *   but never `C:\temp2`
 */

import path from 'path';
import { existsSync, statSync } from 'fs';

export type PathPlatform = 'win32' | 'posix';

export const WILDCARD_MARKER = '*';

export interface DirectoryRule {
  /** Pattern as written in the policy */
  pattern: string;
  /** Normalized root, lower-cased on win32 */
  root: string;
  /** Whether the rule covers everything beneath root */
  subtree: boolean;
}

export function resolvePathPlatform(platform: NodeJS.Platform = process.platform): PathPlatform {
  return platform === 'win32' ? 'win32' : 'posix';
}

function pathApi(platform: PathPlatform): path.PlatformPath {
  return platform === 'win32' ? path.win32 : path.posix;
}

/**
 * Resolve to an absolute path with `.` and `..` segments collapsed.
 */
export function normalizeDirectory(input: string, platform: PathPlatform): string {
  const api = pathApi(platform);
  return api.normalize(api.resolve(input));
}

function comparable(value: string, platform: PathPlatform): string {
  return platform === 'win32' ? value.toLowerCase() : value;
}

/**
 * Check a policy directory pattern without resolving it. Returns an error
 * message, or undefined when the pattern is well formed.
 */
export function checkDirectoryPattern(pattern: string): string | undefined {
  const markerIndex = pattern.indexOf(WILDCARD_MARKER);
  if (markerIndex !== -1 && markerIndex !== pattern.length - 1) {
    return `wildcard marker '${WILDCARD_MARKER}' is only allowed at the end of a directory pattern: ${pattern}`;
  }
  const root = markerIndex === -1 ? pattern : pattern.slice(0, -1);
  if (root.trim().length === 0) {
    return `directory pattern has no root path: ${pattern}`;
  }
  if (pattern.includes('\0')) {
    return `directory pattern contains null bytes: ${pattern}`;
  }
  return undefined;
}

export function compileDirectoryRule(pattern: string, platform: PathPlatform): DirectoryRule {
  const subtree = pattern.endsWith(WILDCARD_MARKER);
  const rawRoot = subtree ? pattern.slice(0, -WILDCARD_MARKER.length) : pattern;
  return {
    pattern,
    root: comparable(normalizeDirectory(rawRoot, platform), platform),
    subtree,
  };
}

/**
 * @param normalizedPath - output of {@link normalizeDirectory}
 */
export function matchesDirectoryRule(
  normalizedPath: string,
  rule: DirectoryRule,
  platform: PathPlatform
): boolean {
  const candidate = comparable(normalizedPath, platform);
  if (candidate === rule.root) {
    return true;
  }
  if (!rule.subtree) {
    return false;
  }
  const separator = pathApi(platform).sep;
  const prefix = rule.root.endsWith(separator) ? rule.root : rule.root + separator;
  return candidate.startsWith(prefix);
}

/**
 * Check if a path is an existing directory
 */
export function isDirectory(target: string): boolean {
  try {
    return existsSync(target) && statSync(target).isDirectory();
  } catch {
    return false;
  }
}
