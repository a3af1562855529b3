/**
 * CLI Options Module Exports
 *
 * Barrel export for CLI option parsing and validation.
 */

export {
  type RawProvisionOptions,
  type ProvisionOptions,
  parseProvisionOptions,
  splitNames,
} from './provision-options.js';
