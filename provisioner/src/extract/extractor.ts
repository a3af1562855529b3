/**
 * Archive extraction. Always unpacks the whole archive, overwriting existing
 * files; whether to extract at all is the caller's decision.
 * @module extract/extractor
 */

import AdmZip from 'adm-zip';
import { access, mkdir, writeFile } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve } from 'path';

import type { ArchiveKind } from '../catalog/types.js';
import type { ProvisionLogger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import type { CommandRunner } from '../process/command-runner.js';
import { describeFailure, runCommand, succeeded } from '../process/command-runner.js';
import { assertNever } from '../types/assert-never.js';
import { Err, Ok, type Result } from '../types/result.js';
import { ExtractError, ExtractErrorCode } from '../types/errors.js';

export interface ExtractionJob {
  readonly archivePath: string;
  readonly targetDir: string;
  readonly kind: ArchiveKind;
}

export interface ArchiveExtractorOptions {
  readonly runner?: CommandRunner;
  readonly logger?: ProvisionLogger;
}

/**
 * True when `entryPath` resolves inside `root`.
 */
export function isWithin(root: string, entryPath: string): boolean {
  const rel = relative(root, entryPath);
  return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
}

export class ArchiveExtractor {
  private readonly runner: CommandRunner;
  private readonly logger: ProvisionLogger;

  constructor(options: ArchiveExtractorOptions = {}) {
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? createSilentLogger();
  }

  async extract(job: ExtractionJob): Promise<Result<void, ExtractError>> {
    try {
      await access(job.archivePath);
    } catch {
      const error = this.failure(job, `Archive not found: ${job.archivePath}`, ExtractErrorCode.SOURCE_MISSING);
      this.logger.warn('extract', error.message, { ...error.context });
      return Err(error);
    }

    this.logger.info('extract', `Extracting ${job.archivePath} into ${job.targetDir}`, { ...job });

    let result: Result<void, ExtractError>;
    switch (job.kind) {
      case 'tar':
        result = await this.extractTar(job);
        break;
      case 'zip':
        result = await this.extractZip(job);
        break;
      default:
        return assertNever(job.kind);
    }

    if (!result.ok) {
      this.logger.error('extract', result.error.message, { ...result.error.context });
    }
    return result;
  }

  private failure(
    job: ExtractionJob,
    message: string,
    code: ExtractErrorCode,
    extra: { exitCode?: number | null; cause?: unknown } = {}
  ): ExtractError {
    return new ExtractError(
      message,
      code,
      {
        archivePath: job.archivePath,
        targetDir: job.targetDir,
        kind: job.kind,
        exitCode: extra.exitCode,
      },
      extra.cause instanceof Error ? { cause: extra.cause } : undefined
    );
  }

  private async extractTar(job: ExtractionJob): Promise<Result<void, ExtractError>> {
    try {
      await mkdir(job.targetDir, { recursive: true });
    } catch (error) {
      return Err(
        this.failure(job, `Could not create ${job.targetDir}`, ExtractErrorCode.TOOL_FAILURE, {
          cause: error,
        })
      );
    }

    const result = await this.runner('tar', ['-xf', job.archivePath, '-C', job.targetDir], {
      timeoutMs: 0,
    });
    if (!succeeded(result)) {
      return Err(
        this.failure(
          job,
          `Extraction of ${job.archivePath} failed: ${describeFailure('tar', result)}`,
          ExtractErrorCode.TOOL_FAILURE,
          { exitCode: result.exitCode }
        )
      );
    }
    return Ok(undefined);
  }

  private async extractZip(job: ExtractionJob): Promise<Result<void, ExtractError>> {
    const root = resolve(job.targetDir);

    try {
      const zip = new AdmZip(job.archivePath);
      const entries = zip.getEntries();

      // A `./` directory entry names the target itself
      const writable = entries.filter((entry) => !(entry.isDirectory && resolve(root, entry.entryName) === root));

      // Reject the archive before writing anything if an entry escapes the target
      for (const entry of writable) {
        if (!isWithin(root, resolve(root, entry.entryName))) {
          return Err(
            this.failure(
              job,
              `Archive entry ${entry.entryName} would be written outside ${job.targetDir}`,
              ExtractErrorCode.TOOL_FAILURE
            )
          );
        }
      }

      await mkdir(root, { recursive: true });
      for (const entry of writable) {
        const destination = resolve(root, entry.entryName);
        if (entry.isDirectory) {
          await mkdir(destination, { recursive: true });
          continue;
        }
        await mkdir(dirname(destination), { recursive: true });
        await writeFile(destination, entry.getData());
      }
    } catch (error) {
      return Err(
        this.failure(
          job,
          `Extraction of ${job.archivePath} failed: ${error instanceof Error ? error.message : String(error)}`,
          ExtractErrorCode.TOOL_FAILURE,
          { cause: error }
        )
      );
    }

    return Ok(undefined);
  }
}
