/**
 * `toolchain-provisioner show-config`: prints the effective configuration
 * and the chain it produces.
 *
 * @module cli/commands/show-config
 */

import { renderResolvedConfig } from '../../config/index.js';
import { parseProvisionOptions, type RawProvisionOptions } from '../options/provision-options.js';
import { ExitCode, formatCLIError } from '../output/errors.js';
import { createDefaultDependencies, prepareCommand, type CommandDependencies } from './context.js';

export async function runShowConfig(
  raw: RawProvisionOptions,
  deps: CommandDependencies = createDefaultDependencies()
): Promise<{ exitCode: number }> {
  const parsed = parseProvisionOptions(raw);
  if (!parsed.ok) {
    deps.stderr.write(formatCLIError(parsed.error) + '\n');
    return { exitCode: parsed.error.exitCode };
  }

  const prepared = await prepareCommand(parsed.value, deps);
  if (!prepared.ok) {
    deps.stderr.write(formatCLIError(prepared.error) + '\n');
    return { exitCode: prepared.error.exitCode };
  }

  deps.stdout.write(renderResolvedConfig(prepared.value.resolved, prepared.value.chain));
  return { exitCode: ExitCode.SUCCESS };
}
