#!/usr/bin/env node
/**
 * Toolchain Provisioner - Main Entry Point
 * Installs and registers the runtime, framework and extension chain
 */

import { Command } from 'commander';

import { getAllDependencyNames } from './catalog/catalog.js';
import { createDefaultDependencies, runCheck, runProvision, runShowConfig } from './cli/commands/index.js';
import type { RawProvisionOptions } from './cli/options/index.js';

export const VERSION = '0.3.0';

const program = new Command();

program
  .name('toolchain-provisioner')
  .description('Idempotent provisioning of a runtime, a distributed-computing framework and its extensions')
  .version(VERSION);

/**
 * Options every command accepts: where the config lives and what it resolves to.
 */
function withSelectionOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Configuration file (default: ./provision.yml when present)')
    .option('--runtime-root <dir>', 'Install root for the runtime')
    .option('--framework-root <dir>', 'Install root for the framework')
    .option('--extensions-root <dir>', 'Install root for the extensions')
    .option('--download-host <url>', 'Mirror substituted into download URLs')
    .option('--scope <scope>', 'Environment scope: machine or user')
    .option('--only <names...>', `Restrict to these dependencies (${getAllDependencyNames().join(', ')})`);
}

withSelectionOptions(program.command('run'))
  .description('Provision every dependency in the chain')
  .option('--json', 'Print the report as JSON')
  .option('--verbose', 'Mirror the provisioning log to stderr')
  .option('--log-file <file>', 'Append the provisioning log to a JSON lines file')
  .option('--no-color', 'Disable colored output')
  .action(async (options: RawProvisionOptions) => {
    const deps = createDefaultDependencies();
    try {
      const result = await runProvision(options, deps);
      deps.exitHandler(result.exitCode);
    } catch (error) {
      console.error('[provision] Fatal error:', error);
      deps.exitHandler(1);
    }
  });

withSelectionOptions(program.command('check'))
  .description('Report the state of each dependency without installing anything')
  .option('--json', 'Print the results as JSON')
  .option('--verbose', 'Show details for every dependency')
  .option('--no-color', 'Disable colored output')
  .action(async (options: RawProvisionOptions) => {
    const deps = createDefaultDependencies();
    try {
      const result = await runCheck(options, deps);
      deps.exitHandler(result.exitCode);
    } catch (error) {
      console.error('[provision] Fatal error:', error);
      deps.exitHandler(1);
    }
  });

withSelectionOptions(program.command('show-config'))
  .description('Print the effective configuration and chain as YAML')
  .action(async (options: RawProvisionOptions) => {
    const deps = createDefaultDependencies();
    try {
      const result = await runShowConfig(options, deps);
      deps.exitHandler(result.exitCode);
    } catch (error) {
      console.error('[provision] Fatal error:', error);
      deps.exitHandler(1);
    }
  });

await program.parseAsync();
