/**
 * Idempotent artifact download with progress sampling.
 * @module fetch/fetcher
 */

import { mkdir, rm, stat } from 'fs/promises';
import { dirname } from 'path';

import type { ProvisionLogger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { Err, Ok, type Result } from '../types/result.js';
import { FetchError, FetchErrorCode } from '../types/errors.js';
import { DownloadTask, PARTIAL_SUFFIX, toProgressSample } from './task.js';
import { httpTransport } from './transport.js';
import type { FetchOptions, FetchOutcome, ProgressSample, Transport } from './types.js';

export const DEFAULT_POLL_INTERVAL_MS = 250;

export interface ArtifactFetcherOptions {
  readonly transport?: Transport;
  readonly logger?: ProvisionLogger;
  readonly pollIntervalMs?: number;
}

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export class ArtifactFetcher {
  private readonly transport: Transport;
  private readonly logger: ProvisionLogger;
  private readonly pollIntervalMs: number;

  constructor(options: ArtifactFetcherOptions = {}) {
    this.transport = options.transport ?? httpTransport;
    this.logger = options.logger ?? createSilentLogger();
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  /**
   * Ensures `destinationPath` holds the artifact at `url`.
   *
   * A non-empty destination is reused without touching the network. A
   * zero-length destination and any leftover `.partial` file are removed
   * before a new transfer starts.
   */
  async fetch(
    url: string,
    destinationPath: string,
    options: FetchOptions = {}
  ): Promise<Result<FetchOutcome, FetchError>> {
    const context = { url, destinationPath };

    try {
      const existing = await fileSize(destinationPath);
      if (existing !== null && existing > 0) {
        this.logger.logFetchSkipped(url, destinationPath);
        return Ok({ destinationPath, bytes: existing, skipped: true });
      }
      if (existing === 0) {
        this.logger.warn('fetch', `Removing empty download at ${destinationPath}`, context);
        await rm(destinationPath, { force: true });
      }

      await mkdir(dirname(destinationPath), { recursive: true });
      await rm(destinationPath + PARTIAL_SUFFIX, { force: true });
    } catch (error) {
      return Err(
        new FetchError(
          `Could not prepare download location ${destinationPath}`,
          FetchErrorCode.TRANSPORT_FAILURE,
          context,
          error instanceof Error ? { cause: error } : undefined
        )
      );
    }

    const task = new DownloadTask(url, destinationPath);
    const result = await this.runTask(task, options);

    if (!result.ok) {
      await rm(task.tempPath, { force: true });
      this.logger.error('fetch', result.error.message, { ...result.error.context });
      return result;
    }

    this.logger.logFetchComplete(url, destinationPath, task.bytesReceived);
    return result;
  }

  /**
   * Starts the task and samples its progress on a timer until it settles.
   * Listeners and the timer are released on every exit path.
   */
  private async runTask(
    task: DownloadTask,
    options: FetchOptions
  ): Promise<Result<FetchOutcome, FetchError>> {
    const pollIntervalMs = options.pollIntervalMs ?? this.pollIntervalMs;
    let latest: ProgressSample = toProgressSample(0, null);
    let reported: ProgressSample | null = null;
    let timer: ReturnType<typeof setInterval> | null = null;

    const onProgress = (sample: ProgressSample): void => {
      latest = sample;
    };

    const report = (): void => {
      if (!options.onProgress || latest === reported) return;
      reported = latest;
      try {
        options.onProgress(latest);
      } catch (error) {
        this.logger.debug('fetch', `Progress callback failed: ${String(error)}`, { url: task.url });
      }
    };

    // Delivers the final sample as soon as the task settles
    const onSettled = (): void => report();

    try {
      task.on('progress', onProgress);
      task.once('settled', onSettled);
      timer = setInterval(report, pollIntervalMs);

      await task.start(this.transport);
    } finally {
      if (timer) clearInterval(timer);
      task.off('progress', onProgress);
      task.off('settled', onSettled);
    }

    if (task.status !== 'completed') {
      return Err(
        task.error ??
          new FetchError(`Download of ${task.url} did not complete`, FetchErrorCode.INCOMPLETE_TRANSFER, {
            url: task.url,
            destinationPath: task.destinationPath,
          })
      );
    }

    return Ok({ destinationPath: task.destinationPath, bytes: task.bytesReceived, skipped: false });
  }
}
