/**
 * PATH lookup through the platform's lookup tool (`which` or `where`).
 * @module process/locator
 */

import { realpath } from 'fs/promises';
import { dirname } from 'path';

import type { Platform } from '../catalog/types.js';
import type { CommandRunner } from './command-runner.js';
import { succeeded } from './command-runner.js';

export type CommandLocator = (
  command: string,
  env: Record<string, string | undefined>
) => Promise<string | null>;

/**
 * Follows symlinks such as `/usr/bin/javac -> /etc/alternatives/javac`, so
 * that the home derived from the result is the real installation root.
 * A path that cannot be resolved is returned as reported.
 */
async function resolveLink(commandPath: string): Promise<string> {
  try {
    return await realpath(commandPath);
  } catch {
    return commandPath;
  }
}

/**
 * Creates a locator that resolves a command against the PATH of `env`.
 * Returns the first match with symlinks resolved, or null when the tool
 * reports nothing.
 */
export function createCommandLocator(runner: CommandRunner, platform: Platform): CommandLocator {
  const tool = platform === 'win32' ? 'where' : 'which';

  return async (command, env) => {
    const result = await runner(tool, [command], { env });
    if (!succeeded(result)) {
      return null;
    }
    const first = result.stdout
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0);
    return first ? resolveLink(first) : null;
  };
}

/**
 * Derives a dependency home from the location of one of its commands,
 * assuming the `<home>/bin/<command>` layout.
 *
 * @example
 * ```ts
 * deriveHome('/usr/lib/jvm/java-8/bin/javac'); // '/usr/lib/jvm/java-8'
 * ```
 */
export function deriveHome(commandPath: string): string {
  return dirname(dirname(commandPath));
}
