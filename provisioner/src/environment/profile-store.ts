/**
 * POSIX environment store: each scope is a shell profile script of
 * `export KEY='value'` lines that login shells source.
 * @module environment/profile-store
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { dirname, join } from 'path';

import type { EnvironmentScope } from '../catalog/types.js';
import type { ProvisionLogger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { Err, Ok, type Result } from '../types/result.js';
import { EnvironmentError, EnvironmentErrorCode } from '../types/errors.js';
import { ScopedEnvironmentStore, type EnvironmentVariables } from './types.js';

export const MACHINE_PROFILE_PATH = '/etc/profile.d/toolchain-provisioner.sh';

export function defaultUserProfilePath(home = homedir()): string {
  return join(home, '.config', 'toolchain-provisioner', 'env.sh');
}

const PROFILE_HEADER = '# Managed by toolchain-provisioner. Changes to listed keys are overwritten.';

const EXPORT_LINE = /^\s*export\s+([A-Za-z_][A-Za-z0-9_]*)=(.*)$/;

/**
 * Quotes a value for a POSIX shell: `it's` becomes `'it'\''s'`.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Reverses {@link shellQuote}; also accepts bare words, double quotes and
 * backslash escapes. Variable expansion is not performed.
 */
export function shellUnquote(text: string): string {
  let result = '';
  let i = 0;
  const input = text.trim();

  while (i < input.length) {
    const char = input.charAt(i);
    if (char === "'") {
      const end = input.indexOf("'", i + 1);
      const stop = end === -1 ? input.length : end;
      result += input.slice(i + 1, stop);
      i = stop + 1;
    } else if (char === '"') {
      i++;
      while (i < input.length && input.charAt(i) !== '"') {
        if (input.charAt(i) === '\\' && i + 1 < input.length) i++;
        result += input.charAt(i);
        i++;
      }
      i++;
    } else if (char === '\\' && i + 1 < input.length) {
      result += input.charAt(i + 1);
      i += 2;
    } else if (char === '#' || /\s/.test(char)) {
      break;
    } else {
      result += char;
      i++;
    }
  }
  return result;
}

export function parseProfile(content: string): Map<string, string> {
  const variables = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    const match = EXPORT_LINE.exec(line);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      variables.set(match[1], shellUnquote(match[2]));
    }
  }
  return variables;
}

export function renderProfile(variables: ReadonlyMap<string, string>): string {
  const lines = [PROFILE_HEADER];
  for (const [key, value] of variables) {
    lines.push(`export ${key}=${shellQuote(value)}`);
  }
  return lines.join('\n') + '\n';
}

export interface ProfileEnvironmentStoreOptions {
  readonly machineFile?: string;
  readonly userFile?: string;
  /** Process view; defaults to process.env */
  readonly env?: EnvironmentVariables;
  readonly logger?: ProvisionLogger;
}

export class ProfileEnvironmentStore extends ScopedEnvironmentStore {
  private readonly files: Readonly<Record<EnvironmentScope, string>>;
  private readonly logger: ProvisionLogger;

  constructor(options: ProfileEnvironmentStoreOptions = {}) {
    super(options.env ?? process.env, ':');
    this.files = {
      machine: options.machineFile ?? MACHINE_PROFILE_PATH,
      user: options.userFile ?? defaultUserProfilePath(),
    };
    this.logger = options.logger ?? createSilentLogger();
  }

  /** Profile script backing a scope */
  fileFor(scope: EnvironmentScope): string {
    return this.files[scope];
  }

  protected async readScope(
    scope: EnvironmentScope
  ): Promise<Result<Map<string, string>, EnvironmentError>> {
    const file = this.files[scope];
    try {
      return Ok(parseProfile(await readFile(file, 'utf8')));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return Ok(new Map<string, string>());
      }
      return Err(
        new EnvironmentError(
          `Could not read ${scope} environment from ${file}`,
          EnvironmentErrorCode.READ_FAILED,
          { scope, location: file },
          error instanceof Error ? { cause: error } : undefined
        )
      );
    }
  }

  protected async persist(
    key: string,
    value: string,
    scope: EnvironmentScope
  ): Promise<Result<void, EnvironmentError>> {
    const file = this.files[scope];
    const current = await this.readScope(scope);
    if (!current.ok) {
      return current;
    }

    const variables = current.value;
    variables.set(key, value);
    const tempFile = `${file}.${process.pid}.tmp`;

    try {
      await mkdir(dirname(file), { recursive: true });
      await writeFile(tempFile, renderProfile(variables), { encoding: 'utf8', mode: 0o644 });
      await rename(tempFile, file);
    } catch (error) {
      return Err(
        new EnvironmentError(
          `Could not write ${key} to ${file}`,
          EnvironmentErrorCode.WRITE_FAILED,
          { key, scope, location: file },
          error instanceof Error ? { cause: error } : undefined
        )
      );
    }

    this.logger.logEnvironmentWrite(key, value, scope);
    return Ok(undefined);
  }
}
