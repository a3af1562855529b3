/**
 * Command Context Module
 *
 * Injectable process surface shared by every command, plus the config and
 * chain resolution each command starts with.
 *
 * @module cli/commands/context
 */

import { homedir } from 'os';
import { resolve } from 'path';

import { detectPlatform } from '../../catalog/platform.js';
import type { DependencySpec, Platform } from '../../catalog/types.js';
import { loadConfig, resolveChain, resolveConfig, type ResolvedConfig } from '../../config/index.js';
import type { EnvironmentStore } from '../../environment/types.js';
import type { Transport } from '../../fetch/types.js';
import { createJsonlSink } from '../../logging/jsonl.js';
import { createLogger, type ProvisionLogger } from '../../logging/logger.js';
import { runCommand, type CommandRunner } from '../../process/command-runner.js';
import type { CommandLocator } from '../../process/locator.js';
import { ConfigError } from '../../types/errors.js';
import { Err, Ok, type Result } from '../../types/result.js';
import type { ProvisionOptions } from '../options/provision-options.js';
import { supportsColor } from '../output/colors.js';
import { fromConfigError, type CLIError } from '../output/errors.js';
import type { OutputStream } from '../output/progress.js';

// =============================================================================
// Dependencies
// =============================================================================

/**
 * Everything a command touches outside its own logic. Tests replace any of it.
 */
export interface CommandDependencies {
  /** Environment variables */
  env: Record<string, string | undefined>;
  /** Directory relative paths and the default config file resolve against */
  cwd: string;
  platform: Platform;
  /** Home directory for user-scope defaults */
  home: string;
  /** Exit handler (allows testing without process.exit) */
  exitHandler: (code: number) => void;
  /** Reports and machine-readable output */
  stdout: OutputStream;
  /** Progress, diagnostics and errors */
  stderr: OutputStream;
  runner: CommandRunner;
  /** Override for the HTTP transport (for testing) */
  transport?: Transport;
  /** Override for the platform environment store (for testing) */
  environmentStore?: EnvironmentStore;
  /** Override for PATH lookup (for testing) */
  locator?: CommandLocator;
  /** Override for the elevation check (for testing) */
  isElevated?: () => Promise<boolean>;
  now?: () => number;
}

export function createDefaultDependencies(): CommandDependencies {
  return {
    env: process.env,
    cwd: process.cwd(),
    platform: detectPlatform(),
    home: homedir(),
    exitHandler: (code: number) => {
      process.exitCode = code;
    },
    stdout: process.stdout,
    stderr: process.stderr,
    runner: runCommand,
  };
}

// =============================================================================
// Shared Setup
// =============================================================================

export interface PreparedCommand {
  readonly resolved: ResolvedConfig;
  readonly chain: readonly DependencySpec[];
}

/**
 * Loads the config file, applies command-line overrides and builds the chain.
 */
export async function prepareCommand(
  options: ProvisionOptions,
  deps: CommandDependencies
): Promise<Result<PreparedCommand, CLIError>> {
  try {
    const loaded = await loadConfig({ path: options.configPath, cwd: deps.cwd });
    const resolved = resolveConfig(
      loaded,
      deps.platform,
      {
        scope: options.scope,
        downloadHost: options.downloadHost,
        runtimeRoot: absolute(deps.cwd, options.runtimeRoot),
        frameworkRoot: absolute(deps.cwd, options.frameworkRoot),
        extensionsRoot: absolute(deps.cwd, options.extensionsRoot),
      },
      deps.home
    );
    const prepared: PreparedCommand = { resolved, chain: resolveChain(resolved, options.only) };
    return Ok(prepared);
  } catch (error) {
    if (error instanceof ConfigError) {
      return Err(fromConfigError(error));
    }
    throw error;
  }
}

function absolute(cwd: string, path: string | undefined): string | undefined {
  return path === undefined ? undefined : resolve(cwd, path);
}

/**
 * Color is used when not disabled by --no-color and the terminal supports it.
 */
export function useColor(options: ProvisionOptions, deps: CommandDependencies): boolean {
  return options.color && supportsColor(deps.env, deps.stderr.isTTY === true);
}

/**
 * Logger for one command: console mirror with --verbose, JSONL file with
 * --log-file.
 */
export function createCommandLogger(options: ProvisionOptions, deps: CommandDependencies): ProvisionLogger {
  const sink = options.logFile
    ? createJsonlSink({
        filePath: resolve(deps.cwd, options.logFile),
        onError: (error: unknown) => deps.stderr.write(`Warning: could not write log file: ${String(error)}\n`),
      })
    : undefined;

  return createLogger({
    minLevel: options.verbose ? 'debug' : 'info',
    consoleOutput: options.verbose,
    sink,
  });
}
