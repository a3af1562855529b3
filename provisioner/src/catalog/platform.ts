/**
 * Platform detection for artifact selection and default install roots.
 * @module catalog/platform
 */

import os from 'os';

import type { Platform } from './types.js';

/**
 * Detects the current operating system platform.
 *
 * @returns The detected platform ('darwin', 'win32', or 'linux')
 *
 * @example
 * ```ts
 * const platform = detectPlatform();
 * console.log(platform); // 'linux' on most CI hosts
 * ```
 */
export function detectPlatform(): Platform {
  const nodePlatform = os.platform();

  switch (nodePlatform) {
    case 'darwin':
      return 'darwin';
    case 'win32':
      return 'win32';
    case 'linux':
      return 'linux';
    default:
      // Other Unix-likes take the linux artifacts and profile store
      return 'linux';
  }
}

/**
 * True for platforms whose environment lives in the registry rather than in
 * shell profiles.
 */
export function usesRegistry(platform: Platform): boolean {
  return platform === 'win32';
}
