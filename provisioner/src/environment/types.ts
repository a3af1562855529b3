/**
 * Environment store contract and the scope-overlay logic shared by the
 * platform implementations.
 * @module environment/types
 */

import { delimiter as defaultDelimiter } from 'path';

import type { EnvironmentScope } from '../catalog/types.js';
import { Ok, type Result } from '../types/result.js';
import { ValidationError, ValidationErrorCode, type EnvironmentError } from '../types/errors.js';

export type EnvironmentVariables = Record<string, string | undefined>;

/**
 * Persistent key/value environment with a process-visible view.
 */
export interface EnvironmentStore {
  /**
   * Process-visible value, falling back to the machine scope and then the
   * user scope. Empty values read as null.
   */
  read(key: string): Promise<Result<string | null, EnvironmentError>>;

  /**
   * Persists `key=value` at `scope`. Does not change the process view until
   * {@link refreshProcessView} runs.
   *
   * @throws ValidationError if `value` is empty
   */
  write(key: string, value: string, scope: EnvironmentScope): Promise<Result<void, EnvironmentError>>;

  /**
   * Overlays the persisted machine and user variables onto the process view
   * and rebuilds PATH as machine PATH followed by user PATH.
   */
  refreshProcessView(): Promise<Result<void, EnvironmentError>>;

  /** Live process view, suitable as a child-process environment */
  view(): EnvironmentVariables;
}

/**
 * Joins PATH lists, dropping empty segments.
 */
export function joinPathLists(lists: readonly (string | undefined)[], delimiter: string = defaultDelimiter): string {
  return lists
    .flatMap((list) => (list ?? '').split(delimiter))
    .filter((segment) => segment.length > 0)
    .join(delimiter);
}

export function assertNonEmptyValue(key: string, value: string): void {
  if (value.length === 0) {
    throw new ValidationError(`Refusing to write an empty value for ${key}`, ValidationErrorCode.EMPTY_VALUE, {
      field: key,
      value,
      constraint: 'non-empty',
    });
  }
}

/**
 * Base for stores that persist each scope as a flat variable map.
 * Subclasses supply {@link readScope} and {@link persist}.
 */
export abstract class ScopedEnvironmentStore implements EnvironmentStore {
  protected constructor(
    protected readonly processEnv: EnvironmentVariables,
    protected readonly pathDelimiter: string = defaultDelimiter
  ) {}

  protected abstract readScope(
    scope: EnvironmentScope
  ): Promise<Result<Map<string, string>, EnvironmentError>>;

  protected abstract persist(
    key: string,
    value: string,
    scope: EnvironmentScope
  ): Promise<Result<void, EnvironmentError>>;

  view(): EnvironmentVariables {
    return this.processEnv;
  }

  async read(key: string): Promise<Result<string | null, EnvironmentError>> {
    const visible = this.processEnv[key];
    if (visible) {
      return Ok(visible);
    }

    for (const scope of ['machine', 'user'] as const) {
      const variables = await this.readScope(scope);
      if (!variables.ok) {
        return variables;
      }
      const value = variables.value.get(key);
      if (value) {
        return Ok(value);
      }
    }
    return Ok(null);
  }

  async write(
    key: string,
    value: string,
    scope: EnvironmentScope
  ): Promise<Result<void, EnvironmentError>> {
    assertNonEmptyValue(key, value);
    return this.persist(key, value, scope);
  }

  async refreshProcessView(): Promise<Result<void, EnvironmentError>> {
    const machine = await this.readScope('machine');
    if (!machine.ok) return machine;
    const user = await this.readScope('user');
    if (!user.ok) return user;

    for (const variables of [machine.value, user.value]) {
      for (const [key, value] of variables) {
        if (key !== 'PATH' && value) {
          this.processEnv[key] = value;
        }
      }
    }

    const machinePath = machine.value.get('PATH');
    const userPath = user.value.get('PATH');
    // Scopes that manage no PATH leave the inherited one in place
    if (machinePath !== undefined || userPath !== undefined) {
      this.processEnv['PATH'] = joinPathLists([machinePath, userPath], this.pathDelimiter);
    }

    return Ok(undefined);
  }
}
