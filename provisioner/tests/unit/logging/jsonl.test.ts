/**
 * Unit tests for the JSONL log sink
 */

import { readFile } from 'node:fs/promises';
import { describe, it, expect, vi } from 'vitest';
import { createJsonlSink } from '../../../src/logging/jsonl.js';
import type { ProvisionLogEntry } from '../../../src/logging/logger.js';
import { makeTempDir } from '../../helpers/index.js';

function entry(message: string): ProvisionLogEntry {
  return { timestamp: 1_700_000_000_000, runId: 'prov-test', level: 'info', category: 'fetch', message };
}

async function readLines(path: string): Promise<unknown[]> {
  const content = await readFile(path, 'utf8');
  return content
    .trim()
    .split('\n')
    .map((line): unknown => JSON.parse(line));
}

describe('createJsonlSink', () => {
  it('writes one JSON object per line on flush', async () => {
    const dir = makeTempDir();
    const sink = createJsonlSink({ filePath: dir.join('run.jsonl'), flushIntervalMs: 0 });

    sink.write(entry('first'));
    sink.write(entry('second'));
    await sink.flush();
    await sink.close();

    expect(await readLines(dir.join('run.jsonl'))).toEqual([entry('first'), entry('second')]);
  });

  it('flushes on close and ignores later writes', async () => {
    const dir = makeTempDir();
    const sink = createJsonlSink({ filePath: dir.join('run.jsonl'), flushIntervalMs: 0 });

    sink.write(entry('kept'));
    await sink.close();
    sink.write(entry('dropped'));
    await sink.flush();

    expect(await readLines(dir.join('run.jsonl'))).toEqual([entry('kept')]);
  });

  it('appends to an existing file', async () => {
    const dir = makeTempDir({ files: { 'run.jsonl': '{"existing":true}\n' } });
    const sink = createJsonlSink({ filePath: dir.join('run.jsonl'), flushIntervalMs: 0 });

    sink.write(entry('new'));
    await sink.close();

    expect(await readLines(dir.join('run.jsonl'))).toEqual([{ existing: true }, entry('new')]);
  });

  it('reports only the first write failure', async () => {
    const dir = makeTempDir();
    const onError = vi.fn();
    const sink = createJsonlSink({ filePath: dir.join('missing', 'run.jsonl'), flushIntervalMs: 0, onError });

    sink.write(entry('a'));
    await sink.flush();
    sink.write(entry('b'));
    await sink.close();

    expect(onError).toHaveBeenCalledTimes(1);
  });
});
