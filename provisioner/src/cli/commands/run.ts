/**
 * Run Command Module
 *
 * Implements `toolchain-provisioner run`: provisions every dependency of the
 * chain in order and reports what happened to each.
 *
 * @module cli/commands/run
 */

import type { DependencySpec } from '../../catalog/types.js';
import { createEnvironmentStore } from '../../environment/index.js';
import { ArchiveExtractor } from '../../extract/extractor.js';
import { ArtifactFetcher } from '../../fetch/fetcher.js';
import { DependencyInstaller } from '../../install/installer.js';
import { ProvisioningOrchestrator, type ProvisioningReport } from '../../install/orchestrator.js';
import { createCommandLocator } from '../../process/locator.js';
import { hasElevatedPrivileges } from '../../process/privileges.js';
import type { ProvisioningError } from '../../types/errors.js';
import type { Result } from '../../types/result.js';
import { parseProvisionOptions, type RawProvisionOptions } from '../options/provision-options.js';
import {
  ExitCode,
  InsufficientPrivilegesError,
  ProvisioningFailedError,
  formatCLIError,
  type CLIError,
} from '../output/errors.js';
import { DependencyProgressTracker, Spinner, formatTransferProgress } from '../output/progress.js';
import {
  createCommandLogger,
  createDefaultDependencies,
  prepareCommand,
  useColor,
  type CommandDependencies,
} from './context.js';

// =============================================================================
// Types
// =============================================================================

export interface RunCommandResult {
  exitCode: number;
  /** Present when every dependency was provisioned */
  report?: ProvisioningReport;
  /** Present when the command failed */
  error?: CLIError;
}

// =============================================================================
// Helpers
// =============================================================================

function elevationHint(deps: CommandDependencies): string {
  return deps.platform === 'win32' ? 'Run from an elevated (Administrator) prompt' : 'Re-run with sudo';
}

function fail(error: CLIError, deps: CommandDependencies, json: boolean, colored: boolean): RunCommandResult {
  if (json) {
    deps.stdout.write(
      JSON.stringify(
        {
          status: 'failed',
          error: { code: error.code, message: error.message, hint: error.hint },
        },
        null,
        2
      ) + '\n'
    );
  } else {
    deps.stderr.write(formatCLIError(error, colored) + '\n');
  }
  return { exitCode: error.exitCode, error };
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

// =============================================================================
// Command
// =============================================================================

/**
 * Provisions the configured chain.
 *
 * Exit codes: 0 when every dependency is installed, 1 when provisioning
 * stopped at a dependency, 2 for option, configuration and privilege errors.
 */
export async function runProvision(
  raw: RawProvisionOptions,
  deps: CommandDependencies = createDefaultDependencies()
): Promise<RunCommandResult> {
  const parsed = parseProvisionOptions(raw);
  if (!parsed.ok) {
    return fail(parsed.error, deps, raw.json === true, false);
  }
  const options = parsed.value;
  const colored = useColor(options, deps);

  const prepared = await prepareCommand(options, deps);
  if (!prepared.ok) {
    return fail(prepared.error, deps, options.json, colored);
  }
  const { resolved, chain } = prepared.value;

  if (resolved.scope === 'machine') {
    const isElevated = deps.isElevated ?? (() => hasElevatedPrivileges(deps.platform, deps.runner));
    if (!(await isElevated())) {
      return fail(new InsufficientPrivilegesError(resolved.scope, elevationHint(deps)), deps, options.json, colored);
    }
  }

  const logger = createCommandLogger(options, deps);
  const environment =
    deps.environmentStore ?? createEnvironmentStore({ platform: deps.platform, runner: deps.runner, logger, env: deps.env });

  const displayNames = new Map<string, string>(chain.map((spec: DependencySpec) => [spec.name, spec.displayName]));
  const label = (name: string): string => displayNames.get(name) ?? name;

  // Human-readable progress goes to stderr and is silenced for --json
  const tracker = new DependencyProgressTracker({ colored, stream: deps.stderr, now: deps.now });
  const spinner = new Spinner({ colored, stream: deps.stderr, interactive: options.json ? false : undefined });
  for (const spec of chain) {
    tracker.register(spec.name, spec.displayName);
  }

  const installer = new DependencyInstaller({
    environment,
    fetcher: new ArtifactFetcher({ transport: deps.transport, logger }),
    extractor: new ArchiveExtractor({ runner: deps.runner, logger }),
    runner: deps.runner,
    scope: resolved.scope,
    locator: deps.locator ?? createCommandLocator(deps.runner, deps.platform),
    packageManager: resolved.packageManager,
    logger,
    onTransition: (transition) => spinner.update(`${label(transition.dependency)}: ${transition.to}`),
    onProgress: (dependency, sample) =>
      spinner.update(`${label(dependency)}: downloading ${formatTransferProgress(sample)}`),
  });

  const orchestrator = new ProvisioningOrchestrator(installer, {
    logger,
    now: deps.now,
    onStart: (spec, position, chainLength) => {
      tracker.start(spec.name);
      spinner.start(`[${position}/${chainLength}] ${spec.displayName}`);
    },
    onComplete: (report) => {
      spinner.stop();
      tracker.complete(report.name, report.state.outcome, report.state.path);
    },
  });

  let result: Result<ProvisioningReport, ProvisioningError>;
  try {
    result = await orchestrator.run(chain);
  } finally {
    spinner.stop();
    await logger.close();
  }

  if (!result.ok) {
    const failure = result.error;
    tracker.fail(failure.context.dependency, failure.context.subkind);
    tracker.skipRemaining('not attempted');

    const error = new ProvisioningFailedError(failure);
    if (options.json) {
      deps.stdout.write(
        JSON.stringify({ status: 'failed', error: failure.toWireFormat(), hint: error.hint }, null, 2) + '\n'
      );
    } else {
      tracker.printSummary();
      deps.stderr.write('\n' + formatCLIError(error, colored) + '\n');
    }
    return { exitCode: error.exitCode, error };
  }

  const report = result.value;
  if (options.json) {
    deps.stdout.write(
      JSON.stringify(
        {
          status: 'ok',
          scope: resolved.scope,
          dependencies: report.dependencies.map((dependency) => ({
            name: dependency.name,
            environment_key: dependency.environmentKey,
            outcome: dependency.state.outcome,
            path: dependency.state.path ?? null,
            version: dependency.state.version?.raw ?? null,
          })),
          elapsed_ms: report.elapsedMs,
        },
        null,
        2
      ) + '\n'
    );
  } else {
    tracker.printSummary();
    deps.stdout.write(`Provisioned ${report.dependencies.length} dependencies in ${formatSeconds(report.elapsedMs)}.\n`);
    if (report.dependencies.some((dependency) => dependency.state.outcome !== 'already-present')) {
      deps.stdout.write('Open a new shell to pick up the updated environment.\n');
    }
  }

  return { exitCode: ExitCode.SUCCESS, report };
}
