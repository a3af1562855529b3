/**
 * JSONL file sink for provisioning log entries.
 *
 * Appends one JSON object per line. Entries are buffered and flushed when the
 * buffer fills, on a periodic timer and on close.
 */

import { appendFile } from 'node:fs/promises';

import type { ProvisionLogEntry } from './logger.js';

export interface LogSink {
  write(entry: ProvisionLogEntry): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * JSONL sink configuration options.
 */
export interface JsonlSinkOptions {
  /** Path to the JSONL output file */
  filePath: string;
  /** Max entries to buffer before auto-flush (default: 50) */
  bufferSize?: number;
  /** Periodic flush interval in ms (default: 2000) */
  flushIntervalMs?: number;
  /** Receives the first write failure of the run */
  onError?: (error: unknown) => void;
}

/**
 * Creates a JSONL file sink.
 */
export function createJsonlSink(options: JsonlSinkOptions): LogSink {
  const {
    filePath,
    bufferSize = 50,
    flushIntervalMs = 2000,
    onError = (error: unknown) => console.error(`[provision] log file write error: ${String(error)}`),
  } = options;

  const buffer: string[] = [];
  let flushTimer: ReturnType<typeof setInterval> | null = null;
  let hasReportedError = false;
  let closed = false;

  /**
   * Writes buffered entries to the file. Never rejects.
   * @param force - If true, write even if closed (used during shutdown)
   */
  async function writeBuffer(force = false): Promise<void> {
    if (buffer.length === 0) return;
    if (closed && !force) return;

    const lines = buffer.splice(0).join('\n') + '\n';

    try {
      await appendFile(filePath, lines, { encoding: 'utf8' });
    } catch (error) {
      // Reported once per run
      if (!hasReportedError) {
        hasReportedError = true;
        onError(error);
      }
    }
  }

  function startFlushTimer(): void {
    if (flushTimer === null && flushIntervalMs > 0) {
      flushTimer = setInterval(() => {
        void writeBuffer();
      }, flushIntervalMs);
      flushTimer.unref();
    }
  }

  function stopFlushTimer(): void {
    if (flushTimer !== null) {
      clearInterval(flushTimer);
      flushTimer = null;
    }
  }

  return {
    write(entry: ProvisionLogEntry): void {
      if (closed) return;

      buffer.push(JSON.stringify(entry));
      startFlushTimer();

      if (buffer.length >= bufferSize) {
        void writeBuffer();
      }
    },

    async flush(): Promise<void> {
      await writeBuffer();
    },

    async close(): Promise<void> {
      if (closed) return;
      closed = true;

      stopFlushTimer();
      await writeBuffer(true);
    },
  };
}
