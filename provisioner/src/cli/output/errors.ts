/**
 * CLI Error Types and Formatters
 *
 * Provides user-facing error types and formatting for terminal output.
 * Every error carries a hint and the process exit code it maps to.
 */

import type { EnvironmentScope } from '../../catalog/types.js';
import {
  BootstrapErrorCode,
  ConfigErrorCode,
  EnvironmentErrorCode,
  ExtractErrorCode,
  FetchErrorCode,
  InstallErrorCode,
  VersionErrorCode,
  type ConfigError,
  type ProvisioningError,
} from '../../types/errors.js';
import { colorize } from './colors.js';

// =============================================================================
// Exit Codes
// =============================================================================

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// =============================================================================
// CLI Error Codes
// =============================================================================

export const CLIErrorCode = {
  INVALID_CONFIG: 'CLI_INVALID_CONFIG',
  CONFIG_NOT_FOUND: 'CLI_CONFIG_NOT_FOUND',
  INVALID_OPTIONS: 'CLI_INVALID_OPTIONS',
  INSUFFICIENT_PRIVILEGES: 'CLI_INSUFFICIENT_PRIVILEGES',
  PROVISIONING_FAILED: 'CLI_PROVISIONING_FAILED',
} as const;

export type CLIErrorCode = (typeof CLIErrorCode)[keyof typeof CLIErrorCode];

// =============================================================================
// CLI Error Classes
// =============================================================================

/**
 * Base class for CLI errors
 */
export abstract class CLIError extends Error {
  abstract readonly code: CLIErrorCode;
  abstract readonly hint?: string;
  abstract readonly exitCode: ExitCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidConfigError extends CLIError {
  readonly code = CLIErrorCode.INVALID_CONFIG;
  readonly exitCode = ExitCode.USAGE;
  readonly hint: string;
  readonly configPath?: string;

  constructor(message: string, configPath?: string) {
    super(message);
    this.configPath = configPath;
    this.hint =
      "Fix the configuration and re-run. 'toolchain-provisioner show-config' prints the effective settings.";
  }
}

export class ConfigNotFoundError extends CLIError {
  readonly code = CLIErrorCode.CONFIG_NOT_FOUND;
  readonly exitCode = ExitCode.USAGE;
  readonly hint: string;
  readonly configPath: string;

  constructor(configPath: string) {
    super(`Config file not found: ${configPath}`);
    this.configPath = configPath;
    this.hint = 'Remove -c to use the built-in defaults, or check the file path.';
  }
}

export class InvalidOptionsError extends CLIError {
  readonly code = CLIErrorCode.INVALID_OPTIONS;
  readonly exitCode = ExitCode.USAGE;
  readonly hint: string;
  readonly option: string;

  constructor(option: string, reason: string, hint: string) {
    super(`Invalid option ${option}: ${reason}`);
    this.option = option;
    this.hint = hint;
  }
}

export class InsufficientPrivilegesError extends CLIError {
  readonly code = CLIErrorCode.INSUFFICIENT_PRIVILEGES;
  readonly exitCode = ExitCode.USAGE;
  readonly hint: string;

  constructor(scope: EnvironmentScope, elevateHint: string) {
    super(`Provisioning at ${scope} scope requires elevated privileges`);
    this.hint = `${elevateHint}, or re-run with --scope user.`;
  }
}

/**
 * A provisioning run stopped at a dependency.
 */
export class ProvisioningFailedError extends CLIError {
  readonly code = CLIErrorCode.PROVISIONING_FAILED;
  readonly exitCode = ExitCode.FAILURE;
  readonly hint: string;
  readonly provisioningError: ProvisioningError;

  constructor(provisioningError: ProvisioningError) {
    super(provisioningError.message);
    this.provisioningError = provisioningError;
    this.hint = provisioningHint(provisioningError);
  }
}

// =============================================================================
// Hints
// =============================================================================

/**
 * Actionable next step for the failure that stopped a run.
 */
export function provisioningHint(error: ProvisioningError): string {
  const install = error.installError;
  const stage = install.stageError;
  const key = install.context.environmentKey;

  if (!stage) {
    if (install.code === InstallErrorCode.LAYOUT_MISMATCH) {
      return (
        'The archive did not contain the expected top-level directory. Set extracted_dir for ' +
        `${install.context.dependency} in provision.yml, then re-run.`
      );
    }
    return 'Re-run with --verbose for details.';
  }

  switch (stage.code) {
    case VersionErrorCode.INCOMPATIBLE:
      return (
        `Found version ${stage.context.detected ?? 'unknown'}, but ${stage.context.minimum ?? 'a newer version'} ` +
        `or later is required. Upgrade manually, or unset ${key} to let the provisioner install it, then re-run.`
      );
    case VersionErrorCode.UNRESOLVED:
      return `Check that ${key} points to a working installation, then re-run.`;
    case FetchErrorCode.TRANSPORT_FAILURE:
    case FetchErrorCode.INCOMPLETE_TRANSFER:
      return (
        `Check network access to ${stage.context.url} (or use --download-host to pick a mirror), then re-run. ` +
        'Incomplete downloads are discarded.'
      );
    case ExtractErrorCode.TOOL_FAILURE:
    case ExtractErrorCode.SOURCE_MISSING:
      return `Make sure tar is available and delete ${stage.context.archivePath} to force a fresh download, then re-run.`;
    case EnvironmentErrorCode.READ_FAILED:
    case EnvironmentErrorCode.WRITE_FAILED:
      return 'Check permissions on the environment store, or re-run with --scope user.';
    case BootstrapErrorCode.FAILED:
    case BootstrapErrorCode.NOT_DISCOVERABLE:
      return `Install ${stage.context.packageName} manually and set ${key}, then re-run.`;
  }
}

/**
 * Maps a configuration failure to its CLI error.
 */
export function fromConfigError(error: ConfigError): CLIError {
  if (error.code === ConfigErrorCode.FILE_NOT_FOUND && error.context.path) {
    return new ConfigNotFoundError(error.context.path);
  }
  return new InvalidConfigError(error.message, error.context.path);
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format a CLI error for terminal display
 */
export function formatCLIError(error: CLIError | Error, colored = false): string {
  const header = `${colorize('Error:', 'bold', colored)} ${error.message}`;
  const lines: string[] = [colorize(header, 'red', colored)];

  if (error instanceof CLIError && error.hint) {
    lines.push('');
    lines.push(colorize('Hint:', 'yellow', colored));
    lines.push(error.hint);
  }

  return lines.join('\n');
}

// =============================================================================
// Type Guards
// =============================================================================

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
