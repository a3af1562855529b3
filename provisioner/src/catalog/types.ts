/**
 * Types describing the dependency chain and per-dependency installation state.
 * @module catalog/types
 */

import type { VersionToken } from '../probe/version.js';

// ============= Core Types =============

/**
 * Supported platforms for provisioning.
 */
export type Platform = 'darwin' | 'win32' | 'linux';

/**
 * Archive formats the extractor understands.
 */
export type ArchiveKind = 'tar' | 'zip';

/**
 * Dependency families; each family has its own install root.
 */
export type DependencyFamily = 'runtime' | 'framework' | 'extensions';

/**
 * Persistence scope for environment entries.
 */
export type EnvironmentScope = 'machine' | 'user';

/**
 * Binary and args for a version query, e.g. ['bin/javac', ['-version']].
 * A binary containing a path separator is resolved against the dependency home.
 */
export type VersionCommand = readonly [binary: string, args: readonly string[]];

/**
 * Immutable descriptor of one dependency in the chain.
 */
export interface DependencySpec {
  /** Identifier (e.g., 'spark') */
  readonly name: string;
  /** Human-readable name for diagnostics */
  readonly displayName: string;
  readonly family: DependencyFamily;
  /** Home variable registered after install (e.g., 'SPARK_HOME') */
  readonly environmentKey: string;
  /** Minimum required version ('1.8'), null when any version is accepted */
  readonly minVersion: string | null;
  readonly downloadURL: string;
  readonly installRoot: string;
  readonly archiveKind: ArchiveKind;
  /** Top-level directory the archive unpacks to */
  readonly extractedDirName: string;
  readonly versionCommand: VersionCommand | null;
  /** Command looked up on PATH when the home variable is unset */
  readonly locateCommand: string | null;
  /** Package installed through the package-manager bootstrap, if any */
  readonly bootstrapPackage: string | null;
}

// ============= Installation State =============

/**
 * How a successful installation came about.
 * - already-present: home variable was already set
 * - discovered: found on PATH and registered
 * - bootstrapped: installed by the package manager and registered
 * - installed: fetched, extracted and registered
 */
export type InstallOutcome = 'already-present' | 'discovered' | 'bootstrapped' | 'installed';

/**
 * Derived per run; never persisted by the provisioner itself.
 */
export interface InstallationState {
  readonly present: boolean;
  readonly path?: string;
  readonly version?: VersionToken;
  readonly outcome: InstallOutcome;
}

/**
 * Installer state machine positions.
 */
export type InstallerState =
  | 'unchecked'
  | 'already-present-compatible'
  | 'already-present-incompatible'
  | 'absent'
  | 'locating'
  | 'bootstrapping'
  | 'fetching'
  | 'extracting'
  | 'registering'
  | 'installed-compatible'
  | 'failed';

/**
 * Emitted on every state change of an installer.
 */
export interface InstallerTransition {
  readonly dependency: string;
  readonly from: InstallerState;
  readonly to: InstallerState;
  readonly detail?: string;
}
