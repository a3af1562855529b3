/**
 * Environment store selection.
 * @module environment
 */

import type { Platform } from '../catalog/types.js';
import { usesRegistry } from '../catalog/platform.js';
import type { ProvisionLogger } from '../logging/logger.js';
import type { CommandRunner } from '../process/command-runner.js';
import { ProfileEnvironmentStore } from './profile-store.js';
import { RegistryEnvironmentStore } from './registry-store.js';
import type { EnvironmentStore, EnvironmentVariables } from './types.js';

export type { EnvironmentStore, EnvironmentVariables } from './types.js';
export { ScopedEnvironmentStore, joinPathLists } from './types.js';
export { ProfileEnvironmentStore, MACHINE_PROFILE_PATH, defaultUserProfilePath } from './profile-store.js';
export { RegistryEnvironmentStore, REGISTRY_KEYS } from './registry-store.js';

export interface CreateEnvironmentStoreOptions {
  readonly platform: Platform;
  readonly runner: CommandRunner;
  readonly logger?: ProvisionLogger;
  readonly env?: EnvironmentVariables;
}

/**
 * Registry-backed store on Windows, profile scripts elsewhere.
 */
export function createEnvironmentStore(options: CreateEnvironmentStoreOptions): EnvironmentStore {
  if (usesRegistry(options.platform)) {
    return new RegistryEnvironmentStore({
      runner: options.runner,
      logger: options.logger,
      env: options.env,
    });
  }
  return new ProfileEnvironmentStore({ logger: options.logger, env: options.env });
}
