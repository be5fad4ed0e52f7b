/**
 * Path Utilities
 *
 * Provides path expansion and the location of the local backend state.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

/**
 * Environment variable overriding the default state directory.
 */
export const STATE_DIR_ENV = 'HPCSTACK_HOME';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~ or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  if (expanded.startsWith('~')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(/\$([A-Za-z_][A-Za-z0-9_]*)/g, (_, varName: string) => {
    return process.env[varName] ?? '';
  });

  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Resolve the local backend state directory.
 *
 * Order: explicit option, then $HPCSTACK_HOME, then ~/.hpcstack.
 *
 * @param option - Value of --state-dir, if given
 * @param env - Environment to read
 * @param cwd - Base directory for relative paths
 */
export function resolveStateDir(
  option: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): string {
  const configured = option ?? env[STATE_DIR_ENV];
  if (configured) {
    return expandPath(configured, cwd);
  }
  return join(homedir(), '.hpcstack');
}
