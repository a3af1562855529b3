/**
 * Elevation check for machine-scope provisioning.
 * @module process/privileges
 */

import type { Platform } from '../catalog/types.js';
import type { CommandRunner } from './command-runner.js';
import { succeeded } from './command-runner.js';

/**
 * True when the current process may write machine-scope environment state.
 * POSIX requires uid 0; on Windows `net session` only succeeds elevated.
 */
export async function hasElevatedPrivileges(
  platform: Platform,
  runner: CommandRunner,
  uid: number | undefined = process.getuid?.()
): Promise<boolean> {
  if (platform === 'win32') {
    const result = await runner('net', ['session']);
    return succeeded(result);
  }
  return uid === 0;
}
