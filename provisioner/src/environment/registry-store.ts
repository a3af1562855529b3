/**
 * Windows environment store backed by the registry. Reads go through
 * `reg query`, writes through `setx`, which also broadcasts the change to
 * running applications.
 * @module environment/registry-store
 */

import type { EnvironmentScope } from '../catalog/types.js';
import type { ProvisionLogger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import type { CommandRunner } from '../process/command-runner.js';
import { describeFailure, runCommand, succeeded } from '../process/command-runner.js';
import { Err, Ok, type Result } from '../types/result.js';
import { EnvironmentError, EnvironmentErrorCode } from '../types/errors.js';
import { ScopedEnvironmentStore, type EnvironmentVariables } from './types.js';

export const REGISTRY_KEYS: Readonly<Record<EnvironmentScope, string>> = {
  machine: 'HKLM\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment',
  user: 'HKCU\\Environment',
};

/** `    NAME    REG_TYPE    DATA` */
const VALUE_LINE = /^ {4}(.+?) {4}(REG_[A-Z_]+)(?: {4}(.*))?$/;

/**
 * Expands `%NAME%` references. Unknown names are kept verbatim, as Windows does.
 */
export function expandWindowsVariables(value: string, lookup: (name: string) => string | undefined): string {
  return value.replace(/%([^%]+)%/g, (whole, name: string) => lookup(name) ?? whole);
}

/**
 * Parses `reg query` output into a variable map. `Path` is normalised to
 * `PATH` and `REG_EXPAND_SZ` values are expanded against the other values
 * and `fallback`.
 */
export function parseRegQuery(output: string, fallback: EnvironmentVariables = {}): Map<string, string> {
  const raw: { name: string; type: string; data: string }[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = VALUE_LINE.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      const name = match[1].toUpperCase() === 'PATH' ? 'PATH' : match[1];
      raw.push({ name, type: match[2], data: (match[3] ?? '').trimEnd() });
    }
  }

  const literal = new Map(raw.map((value) => [value.name.toUpperCase(), value.data]));
  const lookup = (name: string): string | undefined =>
    literal.get(name.toUpperCase()) ?? fallback[name] ?? fallback[name.toUpperCase()];

  const variables = new Map<string, string>();
  for (const value of raw) {
    variables.set(
      value.name,
      value.type === 'REG_EXPAND_SZ' ? expandWindowsVariables(value.data, lookup) : value.data
    );
  }
  return variables;
}

export interface RegistryEnvironmentStoreOptions {
  readonly runner?: CommandRunner;
  /** Process view; defaults to process.env */
  readonly env?: EnvironmentVariables;
  readonly logger?: ProvisionLogger;
}

export class RegistryEnvironmentStore extends ScopedEnvironmentStore {
  private readonly runner: CommandRunner;
  private readonly logger: ProvisionLogger;

  constructor(options: RegistryEnvironmentStoreOptions = {}) {
    super(options.env ?? process.env, ';');
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? createSilentLogger();
  }

  protected async readScope(
    scope: EnvironmentScope
  ): Promise<Result<Map<string, string>, EnvironmentError>> {
    const key = REGISTRY_KEYS[scope];
    const result = await this.runner('reg', ['query', key]);

    if (!succeeded(result)) {
      return Err(
        new EnvironmentError(
          `Could not read ${scope} environment: ${describeFailure('reg', result)}`,
          EnvironmentErrorCode.READ_FAILED,
          { scope, location: key }
        )
      );
    }
    return Ok(parseRegQuery(result.stdout, this.processEnv));
  }

  protected async persist(
    key: string,
    value: string,
    scope: EnvironmentScope
  ): Promise<Result<void, EnvironmentError>> {
    const args = scope === 'machine' ? [key, value, '/M'] : [key, value];
    const result = await this.runner('setx', args);

    if (!succeeded(result)) {
      return Err(
        new EnvironmentError(
          `Could not write ${key}: ${describeFailure('setx', result)}`,
          EnvironmentErrorCode.WRITE_FAILED,
          { key, scope, location: REGISTRY_KEYS[scope] }
        )
      );
    }

    this.logger.logEnvironmentWrite(key, value, scope);
    return Ok(undefined);
  }
}
