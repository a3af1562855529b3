/**
 * Config Module
 *
 * Loads `provision.yml`, validates it and merges it with command-line
 * overrides. Precedence: command line, then the file, then built-in defaults.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { posix, resolve, win32 } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ZodError } from 'zod';

import { buildChain, type DependencyOverride } from '../catalog/catalog.js';
import type {
  DependencyFamily,
  DependencySpec,
  EnvironmentScope,
  Platform,
} from '../catalog/types.js';
import type { PackageManagerConfig } from '../process/bootstrap.js';
import { ConfigError, ConfigErrorCode } from '../types/errors.js';
import { ConfigSchema, ScopeSchema, type Config } from './schemas.js';

export {
  ConfigSchema,
  DependencyOverrideSchema,
  InstallRootsSchema,
  PackageManagerSchema,
  ScopeSchema,
  type Config,
  type DependencyOverrideConfig,
  type PackageManager,
} from './schemas.js';

export const CONFIG_FILENAME = 'provision.yml';

export interface LoadedConfig {
  readonly config: Config;
  /** Absolute path of the file read, null when defaults were used */
  readonly source: string | null;
}

/**
 * Command-line values that take precedence over the file.
 */
export interface ConfigOverrides {
  readonly scope?: string;
  readonly downloadHost?: string;
  readonly runtimeRoot?: string;
  readonly frameworkRoot?: string;
  readonly extensionsRoot?: string;
}

export interface ResolvedConfig {
  readonly platform: Platform;
  readonly scope: EnvironmentScope;
  readonly downloadHost: string;
  readonly installRoots: Readonly<Record<DependencyFamily, string>>;
  readonly packageManager: PackageManagerConfig | null;
  readonly overrides: readonly DependencyOverride[];
  readonly source: string | null;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validates parsed YAML against the schema.
 *
 * @throws ConfigError with INVALID_SCHEMA when validation fails
 */
export function parseConfig(raw: unknown, source: string | null = null): Config {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid configuration${source ? ` in ${source}` : ''}: ${formatIssues(result.error)}`,
      ConfigErrorCode.INVALID_SCHEMA,
      { path: source ?? undefined }
    );
  }
  return result.data;
}

/**
 * Reads the configuration file. Without an explicit path, `provision.yml` in
 * `cwd` is used when present and the defaults otherwise.
 *
 * @throws ConfigError when an explicit file is missing, unparseable or invalid
 */
export async function loadConfig(options: { path?: string; cwd: string }): Promise<LoadedConfig> {
  const configPath = resolve(options.cwd, options.path ?? CONFIG_FILENAME);

  if (!existsSync(configPath)) {
    if (options.path) {
      throw new ConfigError(`Configuration file not found: ${configPath}`, ConfigErrorCode.FILE_NOT_FOUND, {
        path: configPath,
      });
    }
    return { config: parseConfig({}), source: null };
  }

  const content = await readFile(configPath, 'utf-8');
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Could not parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      ConfigErrorCode.PARSE_ERROR,
      { path: configPath },
      error instanceof Error ? { cause: error } : undefined
    );
  }

  return { config: parseConfig(raw, configPath), source: configPath };
}

/**
 * Default install roots: a system location for machine scope, a directory
 * under the user's home for user scope.
 */
export function defaultInstallRoots(
  platform: Platform,
  scope: EnvironmentScope,
  home: string = homedir()
): Record<DependencyFamily, string> {
  const path = platform === 'win32' ? win32 : posix;
  let base: string;
  if (scope === 'user') {
    base =
      platform === 'win32'
        ? path.join(home, 'AppData', 'Local', 'toolchain-provisioner')
        : path.join(home, '.local', 'share', 'toolchain-provisioner');
  } else {
    base = platform === 'win32' ? 'C:\\toolchain' : '/opt/toolchain';
  }

  return {
    runtime: path.join(base, 'runtime'),
    framework: path.join(base, 'framework'),
    extensions: path.join(base, 'extensions'),
  };
}

/**
 * Merges command-line overrides over the file configuration.
 *
 * @throws ConfigError with INVALID_VALUE for an unknown scope or a malformed
 * download host
 */
export function resolveConfig(
  loaded: LoadedConfig,
  platform: Platform,
  overrides: ConfigOverrides = {},
  home?: string
): ResolvedConfig {
  const { config } = loaded;

  let scope: EnvironmentScope = config.scope;
  if (overrides.scope !== undefined) {
    const parsed = ScopeSchema.safeParse(overrides.scope);
    if (!parsed.success) {
      throw new ConfigError(`Invalid scope: ${overrides.scope}`, ConfigErrorCode.INVALID_VALUE, {
        field: 'scope',
        expected: 'machine | user',
        actual: overrides.scope,
      });
    }
    scope = parsed.data;
  }

  if (overrides.downloadHost !== undefined && !ConfigSchema.shape.download_host.safeParse(overrides.downloadHost).success) {
    throw new ConfigError(`Invalid download host: ${overrides.downloadHost}`, ConfigErrorCode.INVALID_VALUE, {
      field: 'download_host',
      expected: 'absolute URL',
      actual: overrides.downloadHost,
    });
  }

  const defaults = defaultInstallRoots(platform, scope, home);
  const fromCli: Partial<Record<DependencyFamily, string>> = {
    runtime: overrides.runtimeRoot,
    framework: overrides.frameworkRoot,
    extensions: overrides.extensionsRoot,
  };
  const pick = (family: DependencyFamily): string =>
    fromCli[family] ?? config.install_roots[family] ?? defaults[family];
  const installRoots = {
    runtime: pick('runtime'),
    framework: pick('framework'),
    extensions: pick('extensions'),
  };

  return {
    platform,
    scope,
    downloadHost: overrides.downloadHost ?? config.download_host,
    installRoots,
    packageManager: config.package_manager ?? null,
    overrides: config.dependencies.map((dependency) => ({
      name: dependency.name,
      minVersion: dependency.min_version,
      downloadURL: dependency.download_url,
      extractedDirName: dependency.extracted_dir,
    })),
    source: loaded.source,
  };
}

/**
 * Builds the dependency chain for a resolved configuration.
 */
export function resolveChain(resolved: ResolvedConfig, only?: readonly string[]): DependencySpec[] {
  return buildChain({
    platform: resolved.platform,
    downloadHost: resolved.downloadHost,
    installRoots: resolved.installRoots,
    overrides: resolved.overrides,
    only: only && only.length > 0 ? only : undefined,
  });
}

/**
 * YAML rendering of the effective configuration and chain.
 */
export function renderResolvedConfig(resolved: ResolvedConfig, chain: readonly DependencySpec[]): string {
  const path = resolved.platform === 'win32' ? win32 : posix;
  return stringifyYaml({
    source: resolved.source ?? '(defaults)',
    platform: resolved.platform,
    scope: resolved.scope,
    download_host: resolved.downloadHost,
    install_roots: resolved.installRoots,
    package_manager: resolved.packageManager,
    dependencies: chain.map((spec) => ({
      name: spec.name,
      environment_key: spec.environmentKey,
      min_version: spec.minVersion,
      download_url: spec.downloadURL,
      archive_kind: spec.archiveKind,
      install_path: path.join(spec.installRoot, spec.extractedDirName),
      bootstrap_package: spec.bootstrapPackage,
    })),
  });
}
