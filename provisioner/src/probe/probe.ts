/**
 * Runs a dependency's version-query command and validates the result against
 * its minimum version.
 * @module probe/probe
 */

import { isAbsolute, join } from 'path';

import type { DependencySpec } from '../catalog/types.js';
import type { CommandRunner } from '../process/command-runner.js';
import { Err, Ok, type Result } from '../types/result.js';
import { VersionError, VersionErrorCode } from '../types/errors.js';
import { extractVersion, isAtLeast, parseVersionRequirement, type VersionToken } from './version.js';

/** Characters of probe output kept in diagnostics */
const OUTPUT_EXCERPT_LENGTH = 200;

/**
 * Resolves the binary of a version command. Paths with a separator are taken
 * relative to the dependency home; bare names are left to PATH lookup.
 */
export function resolveProbeBinary(binary: string, home: string): string {
  if (isAbsolute(binary)) return binary;
  return /[\\/]/.test(binary) ? join(home, binary) : binary;
}

/**
 * Runs the version command and extracts a token from its combined output.
 * Exit status is ignored: several tools print their version and exit non-zero.
 */
export async function probeVersion(
  spec: DependencySpec,
  home: string,
  runner: CommandRunner,
  env?: Record<string, string | undefined>
): Promise<Result<VersionToken, VersionError>> {
  if (!spec.versionCommand) {
    return Err(
      new VersionError(
        `${spec.displayName} has no version command`,
        VersionErrorCode.UNRESOLVED,
        { dependency: spec.name }
      )
    );
  }

  const [binary, args] = spec.versionCommand;
  const resolved = resolveProbeBinary(binary, home);
  const result = await runner(resolved, args, { env });
  const token = extractVersion(result.output);

  if (!token) {
    const reason = result.spawnError
      ? `${resolved} could not be run (${result.spawnError.code ?? result.spawnError.message})`
      : `no version found in output of ${resolved}`;
    return Err(
      new VersionError(
        `Could not determine ${spec.displayName} version: ${reason}`,
        VersionErrorCode.UNRESOLVED,
        { dependency: spec.name, output: result.output.slice(0, OUTPUT_EXCERPT_LENGTH) }
      )
    );
  }

  return Ok(token);
}

/**
 * Probes the version and checks it against `spec.minVersion`.
 * Returns Ok(undefined) when the dependency declares no minimum.
 *
 * @throws Error if `spec.minVersion` is not a parseable version; the config
 * layer validates this before any spec is built.
 */
export async function verifyVersion(
  spec: DependencySpec,
  home: string,
  runner: CommandRunner,
  env?: Record<string, string | undefined>
): Promise<Result<VersionToken | undefined, VersionError>> {
  if (spec.minVersion === null || !spec.versionCommand) {
    return Ok(undefined);
  }

  const minimum = parseVersionRequirement(spec.minVersion);
  if (!minimum) {
    throw new Error(`Invalid minimum version for ${spec.name}: ${spec.minVersion}`);
  }

  const probed = await probeVersion(spec, home, runner, env);
  if (!probed.ok) {
    return probed;
  }

  if (!isAtLeast(probed.value, minimum)) {
    return Err(
      new VersionError(
        `${spec.displayName} ${probed.value.raw} is installed but ${minimum.raw} or later is required`,
        VersionErrorCode.INCOMPATIBLE,
        { dependency: spec.name, detected: probed.value.raw, minimum: minimum.raw }
      )
    );
  }

  return Ok(probed.value);
}
