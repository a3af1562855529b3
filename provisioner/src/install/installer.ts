/**
 * Per-dependency installation state machine.
 *
 * unchecked
 *   -> already-present-compatible | already-present-incompatible
 *   -> absent -> [locating] -> [bootstrapping] -> fetching -> extracting
 *      -> registering -> installed-compatible
 *
 * Any fatal stage error moves to `failed`.
 *
 * @module install/installer
 */

import { access } from 'fs/promises';
import { join } from 'path';

import { artifactFileName } from '../catalog/catalog.js';
import type {
  DependencySpec,
  EnvironmentScope,
  InstallationState,
  InstallerState,
  InstallerTransition,
} from '../catalog/types.js';
import type { EnvironmentStore } from '../environment/types.js';
import type { ArchiveExtractor } from '../extract/extractor.js';
import type { ArtifactFetcher } from '../fetch/fetcher.js';
import type { ProgressSample } from '../fetch/types.js';
import type { ProvisionLogger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { verifyVersion } from '../probe/probe.js';
import type { VersionToken } from '../probe/version.js';
import { runBootstrap, type PackageManagerConfig } from '../process/bootstrap.js';
import type { CommandRunner } from '../process/command-runner.js';
import { deriveHome, type CommandLocator } from '../process/locator.js';
import { Err, Ok, type Result } from '../types/result.js';
import {
  BootstrapError,
  BootstrapErrorCode,
  InstallError,
  InstallErrorCode,
  VersionErrorCode,
  type StageError,
} from '../types/errors.js';

export interface InstallerOptions {
  readonly environment: EnvironmentStore;
  readonly fetcher: Pick<ArtifactFetcher, 'fetch'>;
  readonly extractor: Pick<ArchiveExtractor, 'extract'>;
  readonly runner: CommandRunner;
  readonly scope: EnvironmentScope;
  /** PATH lookup; discovery is skipped without one */
  readonly locator?: CommandLocator;
  /** Bootstrap is skipped without one */
  readonly packageManager?: PackageManagerConfig | null;
  readonly logger?: ProvisionLogger;
  readonly onTransition?: (transition: InstallerTransition) => void;
  readonly onProgress?: (dependency: string, sample: ProgressSample) => void;
  readonly pathExists?: (path: string) => Promise<boolean>;
}

/**
 * Read-only view of a dependency, produced without changing anything.
 */
export interface InspectionResult {
  readonly dependency: string;
  readonly status: 'present' | 'absent' | 'incompatible' | 'unresolved';
  readonly path?: string;
  readonly version?: string;
  readonly detail?: string;
}

async function defaultPathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * What {@link inspectDependency} needs: it never fetches, extracts or writes.
 */
export type InspectionOptions = Pick<InstallerOptions, 'environment' | 'runner' | 'locator' | 'pathExists'>;

/**
 * Reports the current state of `spec` without installing or registering.
 */
export async function inspectDependency(spec: DependencySpec, options: InspectionOptions): Promise<InspectionResult> {
  const pathExists = options.pathExists ?? defaultPathExists;
  const existing = await options.environment.read(spec.environmentKey);
  if (!existing.ok) {
    return { dependency: spec.name, status: 'unresolved', detail: existing.error.message };
  }

  let home = existing.value;
  let detail: string | undefined;
  if (home === null && spec.locateCommand && options.locator) {
    const commandPath = await options.locator(spec.locateCommand, options.environment.view());
    if (commandPath) {
      home = deriveHome(commandPath);
      detail = `found ${commandPath} on PATH; not registered`;
    }
  }

  if (home === null) {
    return { dependency: spec.name, status: 'absent', detail: `${spec.environmentKey} is not set` };
  }
  if (!(await pathExists(home))) {
    return { dependency: spec.name, status: 'absent', path: home, detail: `${home} does not exist` };
  }

  const version = await verifyVersion(spec, home, options.runner, options.environment.view());
  if (!version.ok) {
    return {
      dependency: spec.name,
      status: version.error.code === VersionErrorCode.INCOMPATIBLE ? 'incompatible' : 'unresolved',
      path: home,
      version: version.error.context.detected,
      detail: version.error.message,
    };
  }

  return { dependency: spec.name, status: 'present', path: home, version: version.value?.raw, detail };
}

/**
 * Tracks the current state of one `ensureInstalled` call.
 */
class TransitionTracker {
  private current: InstallerState = 'unchecked';

  constructor(
    private readonly dependency: string,
    private readonly emit: (transition: InstallerTransition) => void
  ) {}

  get state(): InstallerState {
    return this.current;
  }

  move(to: InstallerState, detail?: string): void {
    const transition: InstallerTransition = { dependency: this.dependency, from: this.current, to, detail };
    this.current = to;
    this.emit(transition);
  }
}

export class DependencyInstaller {
  private readonly logger: ProvisionLogger;
  private readonly pathExists: (path: string) => Promise<boolean>;

  constructor(private readonly options: InstallerOptions) {
    this.logger = options.logger ?? createSilentLogger();
    this.pathExists = options.pathExists ?? defaultPathExists;
  }

  /**
   * Ensures `spec` is installed at a compatible version and registered in
   * the environment. Safe to call repeatedly.
   */
  async ensureInstalled(spec: DependencySpec): Promise<Result<InstallationState, InstallError>> {
    const tracker = new TransitionTracker(spec.name, (transition) => {
      this.logger.logTransition(transition);
      this.options.onTransition?.(transition);
    });

    const fail = (error: StageError | InstallError): Result<never, InstallError> => {
      const installError = error instanceof InstallError ? error : InstallError.fromStage(spec, error);
      tracker.move('failed', installError.subkind);
      return Err(installError);
    };

    // 1. Already registered
    const existing = await this.options.environment.read(spec.environmentKey);
    if (!existing.ok) {
      return fail(existing.error);
    }

    if (existing.value !== null && (await this.pathExists(existing.value))) {
      const home = existing.value;
      const version = await verifyVersion(spec, home, this.options.runner, this.options.environment.view());
      if (!version.ok) {
        if (version.error.code === VersionErrorCode.INCOMPATIBLE) {
          tracker.move('already-present-incompatible', version.error.message);
        }
        return fail(version.error);
      }

      tracker.move('already-present-compatible', home);
      return Ok(this.presentState(home, version.value, 'already-present'));
    }

    // A stale registration is replaced by a fresh install
    if (existing.value !== null) {
      this.logger.warn('install', `${spec.environmentKey} points to a missing path: ${existing.value}`, {
        dependency: spec.name,
        path: existing.value,
      });
    }

    tracker.move('absent', existing.value ?? undefined);

    // 2. On PATH but not registered
    if (spec.locateCommand && this.options.locator) {
      tracker.move('locating', spec.locateCommand);
      const commandPath = await this.options.locator(spec.locateCommand, this.options.environment.view());
      if (commandPath) {
        return this.registerDiscovered(spec, deriveHome(commandPath), 'discovered', tracker, fail);
      }
    }

    // 3. Package-manager bootstrap
    if (spec.bootstrapPackage && this.options.packageManager) {
      tracker.move('bootstrapping', spec.bootstrapPackage);
      const bootstrapped = await runBootstrap(
        this.options.packageManager,
        spec.bootstrapPackage,
        this.options.runner,
        this.options.environment.view()
      );
      if (!bootstrapped.ok) {
        return fail(bootstrapped.error);
      }

      const refreshed = await this.options.environment.refreshProcessView();
      if (!refreshed.ok) {
        return fail(refreshed.error);
      }

      const commandPath =
        spec.locateCommand && this.options.locator
          ? await this.options.locator(spec.locateCommand, this.options.environment.view())
          : null;
      if (!commandPath) {
        return fail(
          new BootstrapError(
            `${spec.bootstrapPackage} was installed but ${spec.locateCommand ?? spec.name} is not on PATH`,
            BootstrapErrorCode.NOT_DISCOVERABLE,
            { packageName: spec.bootstrapPackage }
          )
        );
      }
      return this.registerDiscovered(spec, deriveHome(commandPath), 'bootstrapped', tracker, fail);
    }

    // 4. Fetch and extract
    tracker.move('fetching', spec.downloadURL);
    const archivePath = join(spec.installRoot, artifactFileName(spec.downloadURL));
    const fetched = await this.options.fetcher.fetch(spec.downloadURL, archivePath, {
      onProgress: (sample) => this.options.onProgress?.(spec.name, sample),
    });
    if (!fetched.ok) {
      return fail(fetched.error);
    }

    tracker.move('extracting', archivePath);
    const resolvedPath = join(spec.installRoot, spec.extractedDirName);
    if (await this.pathExists(resolvedPath)) {
      this.logger.info('extract', `${resolvedPath} already exists; skipping extraction`, {
        dependency: spec.name,
      });
    } else {
      const extracted = await this.options.extractor.extract({
        archivePath,
        targetDir: spec.installRoot,
        kind: spec.archiveKind,
      });
      if (!extracted.ok && extracted.error.fatal) {
        return fail(extracted.error);
      }
    }

    if (!(await this.pathExists(resolvedPath))) {
      return fail(
        new InstallError(
          `${spec.name}: ${archivePath} did not unpack to ${resolvedPath}`,
          InstallErrorCode.LAYOUT_MISMATCH,
          {
            dependency: spec.name,
            environmentKey: spec.environmentKey,
            subkind: InstallErrorCode.LAYOUT_MISMATCH,
          }
        )
      );
    }

    // 5. Register
    const registered = await this.register(spec, resolvedPath, tracker);
    if (!registered.ok) {
      return fail(registered.error);
    }
    return Ok(this.presentState(resolvedPath, undefined, 'installed'));
  }

  /** {@link inspectDependency} with this installer's collaborators */
  inspect(spec: DependencySpec): Promise<InspectionResult> {
    return inspectDependency(spec, { ...this.options, pathExists: this.pathExists });
  }

  private presentState(
    path: string,
    version: VersionToken | undefined,
    outcome: InstallationState['outcome']
  ): InstallationState {
    return version ? { present: true, path, version, outcome } : { present: true, path, outcome };
  }

  private async registerDiscovered(
    spec: DependencySpec,
    home: string,
    outcome: 'discovered' | 'bootstrapped',
    tracker: TransitionTracker,
    fail: (error: StageError) => Result<never, InstallError>
  ): Promise<Result<InstallationState, InstallError>> {
    const version = await verifyVersion(spec, home, this.options.runner, this.options.environment.view());
    if (!version.ok) {
      return fail(version.error);
    }

    const registered = await this.register(spec, home, tracker);
    if (!registered.ok) {
      return fail(registered.error);
    }
    return Ok(this.presentState(home, version.value, outcome));
  }

  private async register(
    spec: DependencySpec,
    path: string,
    tracker: TransitionTracker
  ): Promise<Result<void, StageError>> {
    tracker.move('registering', `${spec.environmentKey}=${path}`);

    const written = await this.options.environment.write(spec.environmentKey, path, this.options.scope);
    if (!written.ok) {
      return written;
    }
    const refreshed = await this.options.environment.refreshProcessView();
    if (!refreshed.ok) {
      return refreshed;
    }

    tracker.move('installed-compatible', path);
    return Ok(undefined);
  }
}
