/**
 * Public API of the provisioning engine.
 */

export * from './types/index.js';
export * from './catalog/types.js';
export {
  DEFAULT_DOWNLOAD_HOST,
  DEPENDENCY_CATALOG,
  archiveKindForURL,
  artifactFileName,
  buildChain,
  getAllDependencyNames,
  type ArtifactSource,
  type CatalogEntry,
  type ChainOptions,
  type DependencyOverride,
} from './catalog/catalog.js';
export { detectPlatform, usesRegistry } from './catalog/platform.js';

export {
  CONFIG_FILENAME,
  defaultInstallRoots,
  loadConfig,
  parseConfig,
  renderResolvedConfig,
  resolveChain,
  resolveConfig,
  type ConfigOverrides,
  type LoadedConfig,
  type ResolvedConfig,
} from './config/index.js';

export { extractVersion, isAtLeast, parseVersionRequirement, type VersionToken } from './probe/version.js';
export { probeVersion, verifyVersion } from './probe/probe.js';

export { ArtifactFetcher, DEFAULT_POLL_INTERVAL_MS, type ArtifactFetcherOptions } from './fetch/fetcher.js';
export { httpTransport } from './fetch/transport.js';
export type { FetchOptions, FetchOutcome, ProgressSample, Transport, TransportResponse } from './fetch/types.js';

export { ArchiveExtractor, type ExtractionJob } from './extract/extractor.js';

export {
  createEnvironmentStore,
  ProfileEnvironmentStore,
  RegistryEnvironmentStore,
  ScopedEnvironmentStore,
  type EnvironmentStore,
  type EnvironmentVariables,
} from './environment/index.js';

export {
  DependencyInstaller,
  inspectDependency,
  type InspectionOptions,
  type InspectionResult,
  type InstallerOptions,
} from './install/installer.js';
export {
  ProvisioningOrchestrator,
  type DependencyReport,
  type OrchestratorOptions,
  type ProvisioningReport,
} from './install/orchestrator.js';

export { runCommand, type CommandResult, type CommandRunner } from './process/command-runner.js';
export { createCommandLocator, type CommandLocator } from './process/locator.js';

export { createLogger, createSilentLogger, ProvisionLogger, type LoggerConfig } from './logging/logger.js';
export { createJsonlSink, type LogSink } from './logging/jsonl.js';
