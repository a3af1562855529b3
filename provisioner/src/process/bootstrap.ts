/**
 * Package-manager bootstrap: installs a dependency through a third-party
 * package manager (e.g. `choco install temurin8 -y`).
 * @module process/bootstrap
 */

import { Err, Ok, type Result } from '../types/result.js';
import { BootstrapError, BootstrapErrorCode } from '../types/errors.js';
import type { CommandRunner } from './command-runner.js';
import { describeFailure, succeeded } from './command-runner.js';

/** Placeholder in package-manager args replaced by the package name */
export const PACKAGE_PLACEHOLDER = '{package}';

export interface PackageManagerConfig {
  readonly command: string;
  readonly args: readonly string[];
}

/**
 * Expands `{package}` in the configured args.
 */
export function bootstrapArgs(manager: PackageManagerConfig, packageName: string): string[] {
  return manager.args.map((arg) => arg.split(PACKAGE_PLACEHOLDER).join(packageName));
}

/**
 * Runs the package manager for `packageName` without a timeout.
 */
export async function runBootstrap(
  manager: PackageManagerConfig,
  packageName: string,
  runner: CommandRunner,
  env?: Record<string, string | undefined>
): Promise<Result<void, BootstrapError>> {
  const args = bootstrapArgs(manager, packageName);
  const command = [manager.command, ...args].join(' ');
  const result = await runner(manager.command, args, { env, timeoutMs: 0 });

  if (!succeeded(result)) {
    return Err(
      new BootstrapError(
        `Package manager failed to install ${packageName}: ${describeFailure(manager.command, result)}`,
        BootstrapErrorCode.FAILED,
        { packageName, command, exitCode: result.exitCode }
      )
    );
  }

  return Ok(undefined);
}
