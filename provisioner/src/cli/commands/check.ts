/**
 * Check Command Module
 *
 * Provides the `toolchain-provisioner check` command: reports the state of
 * every dependency in the chain without installing or registering anything.
 *
 * @module cli/commands/check
 */

import type { DependencySpec } from '../../catalog/types.js';
import { createEnvironmentStore } from '../../environment/index.js';
import { inspectDependency, type InspectionOptions, type InspectionResult } from '../../install/installer.js';
import { createCommandLocator } from '../../process/locator.js';
import { parseProvisionOptions, type RawProvisionOptions } from '../options/provision-options.js';
import { colorize } from '../output/colors.js';
import { ExitCode, formatCLIError } from '../output/errors.js';
import { createDefaultDependencies, prepareCommand, useColor, type CommandDependencies } from './context.js';

/**
 * Result from running the check command
 */
export interface CheckResult {
  /** Exit code (0=all present, 1=issues found, 2=usage error) */
  exitCode: number;
  /** Individual dependency results */
  results: InspectionResult[];
  summary: {
    present: number;
    absent: number;
    incompatible: number;
    unresolved: number;
    allPresent: boolean;
  };
}

function summarize(results: readonly InspectionResult[]): CheckResult['summary'] {
  const summary = { present: 0, absent: 0, incompatible: 0, unresolved: 0, allPresent: true };
  for (const result of results) {
    summary[result.status]++;
    if (result.status !== 'present') {
      summary.allPresent = false;
    }
  }
  return summary;
}

/**
 * Inspect each dependency of the chain.
 */
export async function runCheck(
  raw: RawProvisionOptions,
  deps: CommandDependencies = createDefaultDependencies()
): Promise<CheckResult> {
  const empty = summarize([]);

  const parsed = parseProvisionOptions(raw);
  if (!parsed.ok) {
    deps.stderr.write(formatCLIError(parsed.error) + '\n');
    return { exitCode: parsed.error.exitCode, results: [], summary: empty };
  }
  const options = parsed.value;
  const colored = useColor(options, deps);

  const prepared = await prepareCommand(options, deps);
  if (!prepared.ok) {
    deps.stderr.write(formatCLIError(prepared.error, colored) + '\n');
    return { exitCode: prepared.error.exitCode, results: [], summary: empty };
  }
  const { chain } = prepared.value;

  const inspection: InspectionOptions = {
    environment:
      deps.environmentStore ?? createEnvironmentStore({ platform: deps.platform, runner: deps.runner, env: deps.env }),
    runner: deps.runner,
    locator: deps.locator ?? createCommandLocator(deps.runner, deps.platform),
  };

  const results: InspectionResult[] = [];
  for (const spec of chain) {
    results.push(await inspectDependency(spec, inspection));
  }

  const summary = summarize(results);
  if (options.json) {
    deps.stdout.write(formatCheckOutputJson(results, summary) + '\n');
  } else {
    deps.stdout.write(formatCheckOutput(results, chain, { verbose: options.verbose, colored }));
  }

  return {
    exitCode: summary.allPresent ? ExitCode.SUCCESS : ExitCode.FAILURE,
    results,
    summary,
  };
}

/**
 * Format check output for terminal display.
 */
export function formatCheckOutput(
  results: readonly InspectionResult[],
  chain: readonly DependencySpec[],
  options: { verbose: boolean; colored: boolean }
): string {
  const { colored } = options;
  const lines: string[] = [];

  lines.push('');
  lines.push('Dependency Status Check');
  lines.push('─'.repeat(40));
  lines.push('');

  for (const result of results) {
    const spec = chain.find((candidate) => candidate.name === result.dependency);
    const displayName = spec?.displayName ?? result.dependency;

    const version = result.version ? ` ${result.version}` : '';

    switch (result.status) {
      case 'present': {
        lines.push(`${colorize('✓', 'green', colored)} ${displayName}${version}`);
        if (result.path) {
          lines.push(`    ${spec?.environmentKey ?? 'Path'}: ${result.path}`);
        }
        break;
      }
      case 'absent':
        lines.push(`${colorize('✗', 'red', colored)} ${displayName} - absent`);
        break;
      case 'incompatible':
        lines.push(`${colorize('⚠', 'yellow', colored)} ${displayName}${version} - version mismatch`);
        if (spec?.minVersion) {
          lines.push(`    Required: ${spec.minVersion} or later`);
        }
        break;
      case 'unresolved':
        lines.push(`${colorize('⚠', 'yellow', colored)} ${displayName} - version unknown`);
        break;
    }

    if (result.detail && (result.status !== 'present' || options.verbose)) {
      lines.push(colorize(`    ${result.detail}`, 'gray', colored));
    }

    if (options.verbose && spec) {
      lines.push(`    Download: ${spec.downloadURL}`);
    }

    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Format check output as JSON.
 */
export function formatCheckOutputJson(
  results: readonly InspectionResult[],
  summary: CheckResult['summary']
): string {
  return JSON.stringify(
    {
      dependencies: results.map((result) => ({
        name: result.dependency,
        status: result.status,
        path: result.path ?? null,
        version: result.version ?? null,
        detail: result.detail ?? null,
      })),
      summary,
    },
    null,
    2
  );
}
