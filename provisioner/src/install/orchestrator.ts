/**
 * Runs installers over the chain in dependency order.
 * @module install/orchestrator
 */

import type { DependencySpec, InstallationState } from '../catalog/types.js';
import type { ProvisionLogger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { Err, Ok, type Result } from '../types/result.js';
import { ProvisioningError } from '../types/errors.js';
import type { DependencyInstaller } from './installer.js';

export interface DependencyReport {
  readonly name: string;
  readonly environmentKey: string;
  readonly state: InstallationState;
}

export interface ProvisioningReport {
  readonly dependencies: readonly DependencyReport[];
  readonly elapsedMs: number;
}

export interface OrchestratorOptions {
  readonly logger?: ProvisionLogger;
  /** Called before each installer starts */
  readonly onStart?: (spec: DependencySpec, position: number, chainLength: number) => void;
  readonly onComplete?: (report: DependencyReport) => void;
  readonly now?: () => number;
}

export class ProvisioningOrchestrator {
  private readonly logger: ProvisionLogger;
  private readonly now: () => number;

  constructor(
    private readonly installer: Pick<DependencyInstaller, 'ensureInstalled'>,
    private readonly options: OrchestratorOptions = {}
  ) {
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? Date.now;
  }

  /**
   * Installs each dependency in order. Stops at the first failure; later
   * dependencies are not attempted.
   */
  async run(chain: readonly DependencySpec[]): Promise<Result<ProvisioningReport, ProvisioningError>> {
    const startedAt = this.now();
    const dependencies: DependencyReport[] = [];

    this.logger.info('orchestrator', `Provisioning ${chain.length} dependencies`, {
      chain: chain.map((spec) => spec.name),
    });

    for (const [index, spec] of chain.entries()) {
      const position = index + 1;
      this.options.onStart?.(spec, position, chain.length);

      const result = await this.installer.ensureInstalled(spec);
      if (!result.ok) {
        const error = new ProvisioningError(result.error, position, chain.length);
        this.logger.error('orchestrator', error.message, { ...error.context });
        return Err(error);
      }

      const report: DependencyReport = {
        name: spec.name,
        environmentKey: spec.environmentKey,
        state: result.value,
      };
      dependencies.push(report);
      this.options.onComplete?.(report);
    }

    const elapsedMs = this.now() - startedAt;
    this.logger.logChainComplete(dependencies.length, elapsedMs);
    return Ok({ dependencies, elapsedMs });
  }
}
