/**
 * Type Utilities - Barrel Export
 *
 * @example
 * ```typescript
 * import {
 *   FetchError, FetchErrorCode, InstallError,
 *   Result, Ok, Err, isOk, isErr,
 *   assertNever,
 * } from './types/index.js';
 * ```
 */

// =============================================================================
// Errors
// =============================================================================

export {
  type ErrorWireFormat,
  BaseError,
  ConfigError,
  ConfigErrorCode,
  type ConfigErrorContext,
  ValidationError,
  ValidationErrorCode,
  type ValidationErrorContext,
  VersionError,
  VersionErrorCode,
  type VersionErrorContext,
  FetchError,
  FetchErrorCode,
  type FetchErrorContext,
  ExtractError,
  ExtractErrorCode,
  type ExtractErrorContext,
  EnvironmentError,
  EnvironmentErrorCode,
  type EnvironmentErrorContext,
  BootstrapError,
  BootstrapErrorCode,
  type BootstrapErrorContext,
  InstallError,
  InstallErrorCode,
  type InstallErrorContext,
  ProvisioningError,
  ProvisioningErrorCode,
  type ProvisioningErrorContext,
  type StageError,
  isBaseError,
  isConfigError,
  isValidationError,
  isInstallError,
  isProvisioningError,
} from './errors.js';

// =============================================================================
// Result
// =============================================================================

export {
  type Result,
  type Ok as OkType,
  type Err as ErrType,
  Ok,
  Err,
  isOk,
  isErr,
  unwrap,
  mapErr,
  match,
  fromPromise,
} from './result.js';

// =============================================================================
// assertNever
// =============================================================================

export { assertNever } from './assert-never.js';
