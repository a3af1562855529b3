/**
 * A single transfer from a URL to a destination file.
 * @module fetch/task
 */

import { EventEmitter } from 'events';
import { createWriteStream } from 'fs';
import { rename } from 'fs/promises';
import { Readable, Transform, type TransformCallback } from 'stream';
import { pipeline } from 'stream/promises';

import { FetchError, FetchErrorCode } from '../types/errors.js';
import type { DownloadStatus, ProgressSample, Transport, TransportResponse } from './types.js';

/** Suffix of the in-progress file next to the destination */
export const PARTIAL_SUFFIX = '.partial';

export interface DownloadTaskEvents {
  progress: [sample: ProgressSample];
  settled: [status: DownloadStatus];
}

export function toProgressSample(bytesReceived: number, bytesTotal: number | null): ProgressSample {
  const percent =
    bytesTotal !== null && bytesTotal > 0
      ? Math.min(100, Math.floor((bytesReceived / bytesTotal) * 100))
      : null;
  return { bytesReceived, bytesTotal, percent };
}

/**
 * Streams `url` into `tempPath` and renames it onto `destinationPath` once the
 * byte count checks out. The rename is the only point at which the
 * destination appears. Removing a failed transfer's temp file is left to the
 * owner of the task.
 */
export class DownloadTask extends EventEmitter<DownloadTaskEvents> {
  readonly tempPath: string;
  bytesReceived = 0;
  bytesTotal: number | null = null;
  status: DownloadStatus = 'pending';
  error: FetchError | null = null;
  private completion: Promise<void> | null = null;

  constructor(
    readonly url: string,
    readonly destinationPath: string
  ) {
    super();
    this.tempPath = destinationPath + PARTIAL_SUFFIX;
  }

  get settled(): boolean {
    return this.status === 'completed' || this.status === 'failed';
  }

  /**
   * Starts the transfer. Returns the completion promise, which never rejects;
   * the outcome is in `status` and `error`.
   */
  start(transport: Transport): Promise<void> {
    if (!this.completion) {
      this.status = 'in-progress';
      this.completion = this.run(transport);
    }
    return this.completion;
  }

  private fail(message: string, code: FetchErrorCode, cause?: unknown, status?: number): FetchError {
    return new FetchError(
      message,
      code,
      {
        url: this.url,
        destinationPath: this.destinationPath,
        status,
        bytesReceived: this.bytesReceived,
        bytesTotal: this.bytesTotal,
      },
      cause instanceof Error ? { cause } : undefined
    );
  }

  private async transfer(transport: Transport): Promise<FetchError | null> {
    let response: TransportResponse;
    try {
      response = await transport.open(this.url);
    } catch (error) {
      return this.fail(
        `Download of ${this.url} failed: ${error instanceof Error ? error.message : String(error)}`,
        FetchErrorCode.TRANSPORT_FAILURE,
        error
      );
    }

    if (response.status < 200 || response.status >= 300) {
      // An unreleased body keeps the connection checked out
      let cancelError: unknown;
      try {
        await response.cancel?.();
      } catch (error) {
        cancelError = error;
      }
      return this.fail(
        `Download of ${this.url} failed: HTTP ${response.status} ${response.statusText}`.trimEnd(),
        FetchErrorCode.TRANSPORT_FAILURE,
        cancelError,
        response.status
      );
    }

    this.bytesTotal = response.contentLength;
    this.emit('progress', toProgressSample(0, this.bytesTotal));

    const counter = new Transform({
      transform: (chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) => {
        this.bytesReceived += chunk.length;
        this.emit('progress', toProgressSample(this.bytesReceived, this.bytesTotal));
        callback(null, chunk);
      },
    });

    try {
      await pipeline(Readable.from(response.body), counter, createWriteStream(this.tempPath));
    } catch (error) {
      return this.fail(
        `Download of ${this.url} failed after ${this.bytesReceived} bytes: ${error instanceof Error ? error.message : String(error)}`,
        FetchErrorCode.TRANSPORT_FAILURE,
        error
      );
    }

    if (this.bytesReceived === 0) {
      return this.fail(`Download of ${this.url} produced an empty file`, FetchErrorCode.INCOMPLETE_TRANSFER);
    }
    if (this.bytesTotal !== null && this.bytesReceived !== this.bytesTotal) {
      return this.fail(
        `Download of ${this.url} is incomplete: received ${this.bytesReceived} of ${this.bytesTotal} bytes`,
        FetchErrorCode.INCOMPLETE_TRANSFER
      );
    }

    try {
      await rename(this.tempPath, this.destinationPath);
    } catch (error) {
      return this.fail(
        `Could not move download into place at ${this.destinationPath}`,
        FetchErrorCode.INCOMPLETE_TRANSFER,
        error
      );
    }
    return null;
  }

  private async run(transport: Transport): Promise<void> {
    const failure = await this.transfer(transport);

    if (failure) {
      this.error = failure;
      this.status = 'failed';
    } else {
      this.status = 'completed';
    }
    this.emit('settled', this.status);
  }
}
