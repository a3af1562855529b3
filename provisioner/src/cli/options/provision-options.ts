/**
 * Provision Options Module
 *
 * Parses and validates the options shared by `run`, `check` and
 * `show-config`. Values commander hands over untyped are narrowed here.
 *
 * @module cli/options/provision-options
 */

import { getAllDependencyNames } from '../../catalog/catalog.js';
import type { EnvironmentScope } from '../../catalog/types.js';
import { Err, Ok, type Result } from '../../types/result.js';
import { InvalidOptionsError } from '../output/errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Options as commander delivers them.
 */
export interface RawProvisionOptions {
  config?: string;
  runtimeRoot?: string;
  frameworkRoot?: string;
  extensionsRoot?: string;
  downloadHost?: string;
  scope?: string;
  only?: string[];
  json?: boolean;
  verbose?: boolean;
  logFile?: string;
  /** false when --no-color is given */
  color?: boolean;
}

/**
 * Validated options.
 */
export interface ProvisionOptions {
  readonly configPath?: string;
  readonly runtimeRoot?: string;
  readonly frameworkRoot?: string;
  readonly extensionsRoot?: string;
  readonly downloadHost?: string;
  readonly scope?: EnvironmentScope;
  /** Restricts the chain to these dependencies; empty means all */
  readonly only: readonly string[];
  readonly json: boolean;
  readonly verbose: boolean;
  readonly logFile?: string;
  /** false forces plain output; true defers to terminal detection */
  readonly color: boolean;
}

// =============================================================================
// Parsing
// =============================================================================

function isScope(value: string): value is EnvironmentScope {
  return value === 'machine' || value === 'user';
}

/**
 * Splits `--only jdk,spark hadoop` into individual names.
 */
export function splitNames(values: readonly string[] | undefined): string[] {
  if (!values) return [];
  return values
    .flatMap((value) => value.split(','))
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseProvisionOptions(
  raw: RawProvisionOptions
): Result<ProvisionOptions, InvalidOptionsError> {
  let scope: EnvironmentScope | undefined;
  if (raw.scope !== undefined) {
    if (!isScope(raw.scope)) {
      return Err(
        new InvalidOptionsError(
          '--scope',
          `expected machine or user, got '${raw.scope}'`,
          'Use --scope machine (the default, needs elevation) or --scope user.'
        )
      );
    }
    scope = raw.scope;
  }

  const known = getAllDependencyNames();
  const only = splitNames(raw.only);
  const unknown = only.filter((name) => !known.includes(name));
  if (unknown.length > 0) {
    return Err(
      new InvalidOptionsError(
        '--only',
        `unknown dependency ${unknown.map((name) => `'${name}'`).join(', ')}`,
        `Known dependencies: ${known.join(', ')}.`
      )
    );
  }

  if (raw.logFile !== undefined && nonEmpty(raw.logFile) === undefined) {
    return Err(new InvalidOptionsError('--log-file', 'path is empty', 'Pass a file path, e.g. --log-file provision.log.'));
  }

  const options: ProvisionOptions = {
    configPath: nonEmpty(raw.config),
    runtimeRoot: nonEmpty(raw.runtimeRoot),
    frameworkRoot: nonEmpty(raw.frameworkRoot),
    extensionsRoot: nonEmpty(raw.extensionsRoot),
    downloadHost: nonEmpty(raw.downloadHost),
    scope,
    only: Array.from(new Set(only)),
    json: raw.json ?? false,
    verbose: raw.verbose ?? false,
    logFile: nonEmpty(raw.logFile),
    color: raw.color ?? true,
  };
  return Ok(options);
}
