/**
 * Result Type for Type-Safe Error Handling
 *
 * This module provides:
 * - Result<T, E>: Discriminated union for success/failure
 * - Ok/Err constructors
 * - Type guards (isOk, isErr)
 * - Utility functions (unwrap, mapErr, match, fromPromise)
 *
 * Every provisioning stage returns a Result so that each failure path is
 * handled at compile time; exceptions are reserved for programming errors.
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 * Uses discriminated union with 'ok' boolean for type narrowing
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Success result variant interface
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failure result variant interface
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Create a success result
 *
 * @example
 * ```typescript
 * return Ok({ present: true, path: home, outcome: 'already-present' });
 * ```
 */
export function Ok<const T>(value: T): Result<T, never> {
  return { ok: true, value } as const;
}

/**
 * Create a failure result
 *
 * @example
 * ```typescript
 * return Err(new FetchError('HTTP 404', FetchErrorCode.TRANSPORT_FAILURE, context));
 * ```
 */
export function Err<const E>(error: E): Result<never, E> {
  return { ok: false, error } as const;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Type guard for success results
 */
export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

/**
 * Type guard for failure results
 */
export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result.ok === false;
}

// =============================================================================
// Result Utilities
// =============================================================================

/**
 * Unwrap a result, throwing if it's an error
 *
 * @throws The error value if result is Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

/**
 * Map the error value
 *
 * @example
 * ```typescript
 * const wrapped = mapErr(await fetcher.fetch(url, dest), (e) => InstallError.fromStage(spec, e));
 * ```
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return isErr(result) ? Err(fn(result.error)) : result;
}

/**
 * Pattern match on result variants
 *
 * @example
 * ```typescript
 * const exitCode = match(result, {
 *   ok: () => 0,
 *   err: () => 1,
 * });
 * ```
 */
export function match<T, E, U>(
  result: Result<T, E>,
  handlers: {
    ok: (value: T) => U;
    err: (error: E) => U;
  }
): U {
  return isOk(result) ? handlers.ok(result.value) : handlers.err(result.error);
}

/**
 * Wrap a promise that may throw into a Result
 *
 * @param mapError - Function to map caught errors into the domain error type
 */
export async function fromPromise<T, E>(
  promise: Promise<T>,
  mapError: (error: unknown) => E
): Promise<Result<T, E>> {
  try {
    return Ok(await promise);
  } catch (error) {
    return Err(mapError(error));
  }
}
