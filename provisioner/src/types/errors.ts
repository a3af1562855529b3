/**
 * Custom Error Types with Canonical Wire Format
 *
 * This module provides:
 * - ErrorWireFormat: Canonical JSON serialization format for all errors
 * - BaseError: Abstract base class for all custom errors
 * - Domain-specific error classes for every provisioning stage
 * - Type guards for runtime error type checking
 *
 * Every error carries a machine-readable code and a JSON-serializable context,
 * so the CLI can render a diagnosis or emit the same data as JSON.
 */

// =============================================================================
// Error Wire Format
// =============================================================================

/**
 * Wire format type for error serialization
 */
export interface ErrorWireFormat {
  name: string;
  code: string;
  message: string;
  cause?: ErrorWireFormat;
  context: Record<string, unknown>;
  stack?: string;
}

/** Maximum depth for cause chain serialization (prevents infinite recursion) */
const MAX_CAUSE_DEPTH = 10;

// =============================================================================
// Error Code Enums
// =============================================================================

/** Configuration error codes */
export const ConfigErrorCode = {
  INVALID_SCHEMA: 'CONFIG_INVALID_SCHEMA',
  INVALID_VALUE: 'CONFIG_INVALID_VALUE',
  FILE_NOT_FOUND: 'CONFIG_FILE_NOT_FOUND',
  PARSE_ERROR: 'CONFIG_PARSE_ERROR',
} as const;

export type ConfigErrorCode = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

/** Validation error codes */
export const ValidationErrorCode = {
  INVALID_INPUT: 'VALIDATION_INVALID_INPUT',
  EMPTY_VALUE: 'VALIDATION_EMPTY_VALUE',
  INVALID_PATH: 'VALIDATION_INVALID_PATH',
} as const;

export type ValidationErrorCode = (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

/** Version probe error codes */
export const VersionErrorCode = {
  UNRESOLVED: 'VERSION_UNRESOLVED',
  INCOMPATIBLE: 'VERSION_INCOMPATIBLE',
} as const;

export type VersionErrorCode = (typeof VersionErrorCode)[keyof typeof VersionErrorCode];

/** Artifact fetch error codes */
export const FetchErrorCode = {
  TRANSPORT_FAILURE: 'FETCH_TRANSPORT_FAILURE',
  INCOMPLETE_TRANSFER: 'FETCH_INCOMPLETE_TRANSFER',
} as const;

export type FetchErrorCode = (typeof FetchErrorCode)[keyof typeof FetchErrorCode];

/** Archive extraction error codes */
export const ExtractErrorCode = {
  SOURCE_MISSING: 'EXTRACT_SOURCE_MISSING',
  TOOL_FAILURE: 'EXTRACT_TOOL_FAILURE',
} as const;

export type ExtractErrorCode = (typeof ExtractErrorCode)[keyof typeof ExtractErrorCode];

/** Environment store error codes */
export const EnvironmentErrorCode = {
  READ_FAILED: 'ENVIRONMENT_READ_FAILED',
  WRITE_FAILED: 'ENVIRONMENT_WRITE_FAILED',
} as const;

export type EnvironmentErrorCode = (typeof EnvironmentErrorCode)[keyof typeof EnvironmentErrorCode];

/** Package-manager bootstrap error codes */
export const BootstrapErrorCode = {
  FAILED: 'BOOTSTRAP_FAILED',
  NOT_DISCOVERABLE: 'BOOTSTRAP_NOT_DISCOVERABLE',
} as const;

export type BootstrapErrorCode = (typeof BootstrapErrorCode)[keyof typeof BootstrapErrorCode];

/** Dependency installation error codes */
export const InstallErrorCode = {
  FAILED: 'INSTALL_FAILED',
  LAYOUT_MISMATCH: 'INSTALL_LAYOUT_MISMATCH',
} as const;

export type InstallErrorCode = (typeof InstallErrorCode)[keyof typeof InstallErrorCode];

/** Orchestration error codes */
export const ProvisioningErrorCode = {
  ABORTED: 'PROVISIONING_ABORTED',
} as const;

export type ProvisioningErrorCode =
  (typeof ProvisioningErrorCode)[keyof typeof ProvisioningErrorCode];

// =============================================================================
// Error Context Types
// =============================================================================

/** Context for configuration errors */
export interface ConfigErrorContext extends Record<string, unknown> {
  path?: string;
  field?: string;
  expected?: string;
  actual?: unknown;
}

/** Context for validation errors */
export interface ValidationErrorContext extends Record<string, unknown> {
  field: string;
  value?: unknown;
  constraint?: string;
}

/** Context for version errors */
export interface VersionErrorContext extends Record<string, unknown> {
  dependency: string;
  detected?: string;
  minimum?: string;
  /** Head of the version output, for unresolved versions */
  output?: string;
}

/** Context for fetch errors */
export interface FetchErrorContext extends Record<string, unknown> {
  url: string;
  destinationPath: string;
  status?: number;
  bytesReceived?: number;
  bytesTotal?: number | null;
}

/** Context for extraction errors */
export interface ExtractErrorContext extends Record<string, unknown> {
  archivePath: string;
  targetDir: string;
  kind: string;
  exitCode?: number | null;
}

/** Context for environment errors */
export interface EnvironmentErrorContext extends Record<string, unknown> {
  key?: string;
  scope?: string;
  location?: string;
}

/** Context for bootstrap errors */
export interface BootstrapErrorContext extends Record<string, unknown> {
  packageName: string;
  command?: string;
  exitCode?: number | null;
}

/** Context for install errors */
export interface InstallErrorContext extends Record<string, unknown> {
  dependency: string;
  environmentKey: string;
  /** Code of the underlying failure */
  subkind: string;
}

/** Context for provisioning errors */
export interface ProvisioningErrorContext extends Record<string, unknown> {
  dependency: string;
  /** 1-based position of the failing dependency in the chain */
  position: number;
  chainLength: number;
  subkind: string;
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Abstract base class for all custom errors
 *
 * Provides:
 * - Consistent error structure with code and context
 * - Serialization to the canonical wire format
 * - Proper cause chain handling
 */
export abstract class BaseError extends Error {
  abstract readonly code: string;
  abstract readonly context: Record<string, unknown>;

  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = this.constructor.name;

    // Capture stack trace, excluding constructor
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to canonical wire format
   *
   * @param depth - Current recursion depth (internal use)
   */
  toWireFormat(depth = 0): ErrorWireFormat {
    const wire: ErrorWireFormat = {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };

    if (this.stack) {
      wire.stack = this.stack;
    }

    if (this.cause && depth < MAX_CAUSE_DEPTH) {
      if (this.cause instanceof BaseError) {
        wire.cause = this.cause.toWireFormat(depth + 1);
      } else if (this.cause instanceof Error) {
        wire.cause = {
          name: this.cause.name,
          code: 'UNKNOWN_ERROR',
          message: this.cause.message,
          context: {},
          stack: this.cause.stack,
        };
      }
    }

    return wire;
  }
}

// =============================================================================
// Config / Validation Errors
// =============================================================================

/**
 * Error for configuration-related failures
 *
 * Use for:
 * - Schema validation errors
 * - Missing configuration files
 * - Invalid configuration values (e.g. an unparseable minimum version)
 */
export class ConfigError extends BaseError {
  readonly code: ConfigErrorCode;
  readonly context: ConfigErrorContext;

  constructor(
    message: string,
    code: ConfigErrorCode,
    context: ConfigErrorContext = {},
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

/**
 * Error for input validation failures, including contract violations such as
 * writing an empty environment value.
 */
export class ValidationError extends BaseError {
  readonly code: ValidationErrorCode;
  readonly context: ValidationErrorContext;

  constructor(
    message: string,
    code: ValidationErrorCode,
    context: ValidationErrorContext,
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

// =============================================================================
// Stage Errors
// =============================================================================

export class VersionError extends BaseError {
  readonly code: VersionErrorCode;
  readonly context: VersionErrorContext;

  constructor(
    message: string,
    code: VersionErrorCode,
    context: VersionErrorContext,
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

/**
 * Error for artifact transfers. INCOMPLETE_TRANSFER is reported the same way
 * as TRANSPORT_FAILURE; both are cured by re-running.
 */
export class FetchError extends BaseError {
  readonly code: FetchErrorCode;
  readonly context: FetchErrorContext;

  constructor(
    message: string,
    code: FetchErrorCode,
    context: FetchErrorContext,
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

export class ExtractError extends BaseError {
  readonly code: ExtractErrorCode;
  readonly context: ExtractErrorContext;

  constructor(
    message: string,
    code: ExtractErrorCode,
    context: ExtractErrorContext,
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }

  /** SOURCE_MISSING is tolerated so that re-runs survive manual cleanup */
  get fatal(): boolean {
    return this.code !== ExtractErrorCode.SOURCE_MISSING;
  }
}

export class EnvironmentError extends BaseError {
  readonly code: EnvironmentErrorCode;
  readonly context: EnvironmentErrorContext;

  constructor(
    message: string,
    code: EnvironmentErrorCode,
    context: EnvironmentErrorContext = {},
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

export class BootstrapError extends BaseError {
  readonly code: BootstrapErrorCode;
  readonly context: BootstrapErrorContext;

  constructor(
    message: string,
    code: BootstrapErrorCode,
    context: BootstrapErrorContext,
    options?: { cause?: Error }
  ) {
    super(message, options);
    this.code = code;
    this.context = context;
  }
}

/**
 * Failures that can abort a single dependency's installation.
 */
export type StageError = VersionError | FetchError | ExtractError | EnvironmentError | BootstrapError;

// =============================================================================
// Install / Provisioning Errors
// =============================================================================

/**
 * Wraps a stage failure together with the dependency it belongs to.
 */
export class InstallError extends BaseError {
  readonly code: InstallErrorCode;
  readonly context: InstallErrorContext;
  readonly stageError?: StageError;

  constructor(
    message: string,
    code: InstallErrorCode,
    context: InstallErrorContext,
    stageError?: StageError
  ) {
    super(message, stageError ? { cause: stageError } : undefined);
    this.code = code;
    this.context = context;
    this.stageError = stageError;
  }

  /**
   * Wrap a stage error, reusing its message after the dependency name
   */
  static fromStage(
    dependency: { name: string; environmentKey: string },
    stageError: StageError
  ): InstallError {
    return new InstallError(
      `${dependency.name}: ${stageError.message}`,
      InstallErrorCode.FAILED,
      {
        dependency: dependency.name,
        environmentKey: dependency.environmentKey,
        subkind: stageError.code,
      },
      stageError
    );
  }

  /** Code of the underlying failure (e.g. VERSION_INCOMPATIBLE) */
  get subkind(): string {
    return this.context.subkind;
  }
}

/**
 * First install failure of a chain, with its position.
 */
export class ProvisioningError extends BaseError {
  readonly code: ProvisioningErrorCode;
  readonly context: ProvisioningErrorContext;
  readonly installError: InstallError;

  constructor(installError: InstallError, position: number, chainLength: number) {
    super(
      `Provisioning stopped at ${installError.context.dependency} (${position}/${chainLength}): ${installError.message}`,
      { cause: installError }
    );
    this.code = ProvisioningErrorCode.ABORTED;
    this.installError = installError;
    this.context = {
      dependency: installError.context.dependency,
      position,
      chainLength,
      subkind: installError.subkind,
    };
  }
}

// =============================================================================
// Type Guards
// =============================================================================

function hasCodePrefix(error: unknown, prefix: string): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith(prefix)
  );
}

/**
 * Type guard for ConfigError
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError || hasCodePrefix(error, 'CONFIG_');
}

/**
 * Type guard for ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError || hasCodePrefix(error, 'VALIDATION_');
}

export function isInstallError(error: unknown): error is InstallError {
  return error instanceof InstallError;
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

/**
 * Type guard for any BaseError subclass
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}
