/**
 * Built-in dependency catalog.
 * Single source of truth for the provisioning chain and its artifacts.
 * @module catalog/catalog
 */

import { posix } from 'path';

import { ConfigError, ConfigErrorCode } from '../types/errors.js';
import { parseVersionRequirement } from '../probe/version.js';
import type {
  ArchiveKind,
  DependencyFamily,
  DependencySpec,
  Platform,
  VersionCommand,
} from './types.js';

/** Mirror used for the framework artifacts unless configured otherwise */
export const DEFAULT_DOWNLOAD_HOST = 'https://archive.apache.org';

/** Placeholder in artifact URLs replaced by the configured download host */
const HOST_PLACEHOLDER = '{host}';

/**
 * Where one platform's archive comes from and what it unpacks to.
 */
export interface ArtifactSource {
  /** May contain `{host}` */
  readonly url: string;
  readonly archiveKind: ArchiveKind;
  readonly extractedDirName: string;
}

/**
 * Static catalog entry; turned into a DependencySpec by {@link buildChain}.
 */
export interface CatalogEntry {
  readonly name: string;
  readonly displayName: string;
  readonly family: DependencyFamily;
  readonly environmentKey: string;
  readonly minVersion: string | null;
  readonly versionCommand: VersionCommand | null;
  readonly locateCommand: string | null;
  /** Package names for the package-manager bootstrap, by platform */
  readonly bootstrapPackages: Readonly<Partial<Record<Platform, string>>>;
  /** Every platform names its archive; platform-neutral ones share a source */
  readonly artifacts: Readonly<Record<Platform, ArtifactSource>>;
}

/**
 * Per-dependency override from the configuration file.
 */
export interface DependencyOverride {
  readonly name: string;
  readonly minVersion?: string | null;
  readonly downloadURL?: string;
  readonly extractedDirName?: string;
}

export interface ChainOptions {
  readonly platform: Platform;
  readonly downloadHost: string;
  readonly installRoots: Readonly<Record<DependencyFamily, string>>;
  readonly overrides?: readonly DependencyOverride[];
  /** Restrict the chain to these names, keeping catalog order */
  readonly only?: readonly string[];
}

const TEMURIN_RELEASE = 'https://github.com/adoptium/temurin8-binaries/releases/download/jdk8u412-b08';
const WORKER_RELEASE = 'https://github.com/dotnet/spark/releases/download/v2.1.1';

function everywhere(source: ArtifactSource): Record<Platform, ArtifactSource> {
  return { linux: source, darwin: source, win32: source };
}

/**
 * Provisioning chain in dependency order: the runtime first, then the
 * framework, then the layers built on it.
 */
export const DEPENDENCY_CATALOG: readonly CatalogEntry[] = [
  {
    name: 'jdk',
    displayName: 'Java Development Kit',
    family: 'runtime',
    environmentKey: 'JAVA_HOME',
    minVersion: '1.8',
    versionCommand: ['bin/javac', ['-version']],
    locateCommand: 'javac',
    bootstrapPackages: {
      win32: 'temurin8',
      linux: 'openjdk-8-jdk',
      darwin: 'temurin@8',
    },
    artifacts: {
      linux: {
        url: `${TEMURIN_RELEASE}/OpenJDK8U-jdk_x64_linux_hotspot_8u412b08.tar.gz`,
        archiveKind: 'tar',
        extractedDirName: 'jdk8u412-b08',
      },
      // macOS JDKs are bundles; the home is inside Contents/Home
      darwin: {
        url: `${TEMURIN_RELEASE}/OpenJDK8U-jdk_x64_mac_hotspot_8u412b08.tar.gz`,
        archiveKind: 'tar',
        extractedDirName: 'jdk8u412-b08/Contents/Home',
      },
      win32: {
        url: `${TEMURIN_RELEASE}/OpenJDK8U-jdk_x64_windows_hotspot_8u412b08.zip`,
        archiveKind: 'zip',
        extractedDirName: 'jdk8u412-b08',
      },
    },
  },
  {
    name: 'spark',
    displayName: 'Apache Spark',
    family: 'framework',
    environmentKey: 'SPARK_HOME',
    minVersion: '2.4',
    versionCommand: ['bin/spark-submit', ['--version']],
    locateCommand: null,
    bootstrapPackages: {},
    artifacts: everywhere({
      url: '{host}/dist/spark/spark-2.4.8/spark-2.4.8-bin-hadoop2.7.tgz',
      archiveKind: 'tar',
      extractedDirName: 'spark-2.4.8-bin-hadoop2.7',
    }),
  },
  {
    name: 'hadoop',
    displayName: 'Apache Hadoop',
    family: 'extensions',
    environmentKey: 'HADOOP_HOME',
    minVersion: '2.7',
    versionCommand: ['bin/hadoop', ['version']],
    locateCommand: null,
    bootstrapPackages: {},
    artifacts: everywhere({
      url: '{host}/dist/hadoop/common/hadoop-2.7.7/hadoop-2.7.7.tar.gz',
      archiveKind: 'tar',
      extractedDirName: 'hadoop-2.7.7',
    }),
  },
  {
    name: 'spark-worker',
    displayName: '.NET for Apache Spark worker',
    family: 'extensions',
    environmentKey: 'DOTNET_WORKER_DIR',
    minVersion: null,
    versionCommand: null,
    locateCommand: null,
    bootstrapPackages: {},
    artifacts: {
      linux: {
        url: `${WORKER_RELEASE}/Microsoft.Spark.Worker.netcoreapp3.1.linux-x64-2.1.1.tar.gz`,
        archiveKind: 'tar',
        extractedDirName: 'Microsoft.Spark.Worker-2.1.1',
      },
      darwin: {
        url: `${WORKER_RELEASE}/Microsoft.Spark.Worker.netcoreapp3.1.osx-x64-2.1.1.tar.gz`,
        archiveKind: 'tar',
        extractedDirName: 'Microsoft.Spark.Worker-2.1.1',
      },
      win32: {
        url: `${WORKER_RELEASE}/Microsoft.Spark.Worker.netcoreapp3.1.win-x64-2.1.1.zip`,
        archiveKind: 'zip',
        extractedDirName: 'Microsoft.Spark.Worker-2.1.1',
      },
    },
  },
];

/**
 * Gets all dependency names in chain order.
 */
export function getAllDependencyNames(): string[] {
  return DEPENDENCY_CATALOG.map((entry) => entry.name);
}

/**
 * Infers the archive kind from a URL's file name.
 */
export function archiveKindForURL(url: string): ArchiveKind {
  return /\.zip$/i.test(new URL(url).pathname) ? 'zip' : 'tar';
}

/**
 * Last path segment of a URL, used as the download file name.
 */
export function artifactFileName(url: string): string {
  const name = posix.basename(new URL(url).pathname);
  if (!name) {
    throw new ConfigError(`Download URL has no file name: ${url}`, ConfigErrorCode.INVALID_VALUE, {
      field: 'download_url',
      actual: url,
    });
  }
  return name;
}

function assertKnownNames(names: readonly string[], field: string): void {
  const known = new Set(getAllDependencyNames());
  for (const name of names) {
    if (!known.has(name)) {
      throw new ConfigError(`Unknown dependency: ${name}`, ConfigErrorCode.INVALID_VALUE, {
        field,
        expected: [...known].join(', '),
        actual: name,
      });
    }
  }
}

function resolveSpec(entry: CatalogEntry, options: ChainOptions): DependencySpec {
  const override = options.overrides?.find((candidate) => candidate.name === entry.name);
  const artifact = entry.artifacts[options.platform];

  const downloadURL =
    override?.downloadURL ?? artifact.url.replace(HOST_PLACEHOLDER, options.downloadHost.replace(/\/+$/, ''));
  const archiveKind = override?.downloadURL ? archiveKindForURL(downloadURL) : artifact.archiveKind;
  const minVersion = override?.minVersion !== undefined ? override.minVersion : entry.minVersion;

  if (minVersion !== null && !parseVersionRequirement(minVersion)) {
    throw new ConfigError(
      `Invalid minimum version for ${entry.name}: ${minVersion}`,
      ConfigErrorCode.INVALID_VALUE,
      { field: 'min_version', actual: minVersion }
    );
  }
  // Validates the URL shape before anything is fetched
  artifactFileName(downloadURL);

  return Object.freeze({
    name: entry.name,
    displayName: entry.displayName,
    family: entry.family,
    environmentKey: entry.environmentKey,
    minVersion,
    downloadURL,
    installRoot: options.installRoots[entry.family],
    archiveKind,
    extractedDirName: override?.extractedDirName ?? artifact.extractedDirName,
    versionCommand: entry.versionCommand,
    locateCommand: entry.locateCommand,
    bootstrapPackage: entry.bootstrapPackages[options.platform] ?? null,
  });
}

/**
 * Builds the frozen dependency chain for a platform and configuration.
 *
 * @throws ConfigError for unknown dependency names, invalid minimum versions
 * or download URLs without a file name
 */
export function buildChain(options: ChainOptions): DependencySpec[] {
  assertKnownNames((options.overrides ?? []).map((override) => override.name), 'dependencies');
  if (options.only) {
    assertKnownNames(options.only, 'only');
  }

  return DEPENDENCY_CATALOG.filter((entry) => !options.only || options.only.includes(entry.name)).map(
    (entry) => resolveSpec(entry, options)
  );
}
