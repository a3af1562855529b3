/**
 * Unit tests for ArchiveExtractor
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { ArchiveExtractor, isWithin } from '../../../src/extract/extractor.js';
import { createLogger } from '../../../src/logging/logger.js';
import { ExtractErrorCode } from '../../../src/types/errors.js';
import { buildZip, createFakeRunner, makeTempDir } from '../../helpers/index.js';

describe('isWithin', () => {
  it('accepts nested paths', () => {
    expect(isWithin('/opt/toolchain', '/opt/toolchain/spark/bin')).toBe(true);
  });

  it('rejects the root itself and escaping paths', () => {
    expect(isWithin('/opt/toolchain', '/opt/toolchain')).toBe(false);
    expect(isWithin('/opt/toolchain', '/opt/other')).toBe(false);
    expect(isWithin('/opt/toolchain', '/etc/passwd')).toBe(false);
  });
});

describe('ArchiveExtractor', () => {
  describe('zip archives', () => {
    it('unpacks every entry beneath the target', async () => {
      const dir = makeTempDir({
        files: {
          'spark.zip': buildZip({
            'spark-2.4.8/bin/spark-submit': '#!/bin/sh\n',
            'spark-2.4.8/README.md': 'Spark',
          }),
        },
      });
      const target = dir.join('framework');

      const result = await new ArchiveExtractor().extract({
        archivePath: dir.join('spark.zip'),
        targetDir: target,
        kind: 'zip',
      });

      expect(result).toEqual({ ok: true, value: undefined });
      expect(readFileSync(join(target, 'spark-2.4.8', 'bin', 'spark-submit'), 'utf8')).toBe('#!/bin/sh\n');
      expect(readFileSync(join(target, 'spark-2.4.8', 'README.md'), 'utf8')).toBe('Spark');
    });

    it('overwrites files that already exist', async () => {
      const dir = makeTempDir({
        files: {
          'spark.zip': buildZip({ 'spark-2.4.8/README.md': 'new' }),
          'framework/spark-2.4.8/README.md': 'old',
        },
      });

      await new ArchiveExtractor().extract({
        archivePath: dir.join('spark.zip'),
        targetDir: dir.join('framework'),
        kind: 'zip',
      });

      expect(readFileSync(dir.join('framework', 'spark-2.4.8', 'README.md'), 'utf8')).toBe('new');
    });

    it('skips a directory entry that names the target itself', async () => {
      const dir = makeTempDir({
        files: {
          'worker.zip': buildZip({
            './': '',
            'Microsoft.Spark.Worker-2.1.1/': '',
            'Microsoft.Spark.Worker-2.1.1/Microsoft.Spark.Worker': '#!/bin/sh\n',
          }),
        },
      });
      const target = dir.join('worker');

      const result = await new ArchiveExtractor().extract({
        archivePath: dir.join('worker.zip'),
        targetDir: target,
        kind: 'zip',
      });

      expect(result).toEqual({ ok: true, value: undefined });
      expect(readFileSync(join(target, 'Microsoft.Spark.Worker-2.1.1', 'Microsoft.Spark.Worker'), 'utf8')).toBe(
        '#!/bin/sh\n'
      );
    });

    it('rejects a file entry that names the target itself', async () => {
      const dir = makeTempDir({ files: { 'odd.zip': buildZip({ '.': 'data' }) } });
      const target = dir.join('framework');

      const result = await new ArchiveExtractor().extract({
        archivePath: dir.join('odd.zip'),
        targetDir: target,
        kind: 'zip',
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(`Archive entry . would be written outside ${target}`);
      }
    });

    it('rejects an entry that escapes the target without writing anything', async () => {
      const dir = makeTempDir({
        files: { 'evil.zip': buildZip({ 'safe.txt': 'ok', '../evil.txt': 'boom' }) },
      });
      const target = dir.join('framework');

      const result = await new ArchiveExtractor().extract({
        archivePath: dir.join('evil.zip'),
        targetDir: target,
        kind: 'zip',
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ExtractErrorCode.TOOL_FAILURE);
        expect(result.error.message).toBe(`Archive entry ../evil.txt would be written outside ${target}`);
        expect(result.error.fatal).toBe(true);
      }
      expect(existsSync(join(target, 'safe.txt'))).toBe(false);
      expect(existsSync(dir.join('evil.txt'))).toBe(false);
    });

    it('fails on a file that is not a zip archive', async () => {
      const dir = makeTempDir({ files: { 'broken.zip': 'not a zip' } });

      const result = await new ArchiveExtractor().extract({
        archivePath: dir.join('broken.zip'),
        targetDir: dir.join('framework'),
        kind: 'zip',
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ExtractErrorCode.TOOL_FAILURE);
        expect(result.error.message.startsWith(`Extraction of ${dir.join('broken.zip')} failed: `)).toBe(true);
      }
    });
  });

  it('reports a missing archive as non-fatal', async () => {
    const dir = makeTempDir();
    const logger = createLogger();

    const result = await new ArchiveExtractor({ logger }).extract({
      archivePath: dir.join('gone.tgz'),
      targetDir: dir.join('framework'),
      kind: 'tar',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe(ExtractErrorCode.SOURCE_MISSING);
      expect(result.error.message).toBe(`Archive not found: ${dir.join('gone.tgz')}`);
      expect(result.error.fatal).toBe(false);
    }
    expect(logger.getEntriesByLevel('warn')).toHaveLength(1);
  });

  describe('tar archives', () => {
    it('runs tar into the target without a timeout', async () => {
      const dir = makeTempDir({ files: { 'jdk.tgz': 'tar-bytes' } });
      const fake = createFakeRunner(() => ({ exitCode: 0 }));
      const target = dir.join('runtime');

      const result = await new ArchiveExtractor({ runner: fake.runner }).extract({
        archivePath: dir.join('jdk.tgz'),
        targetDir: target,
        kind: 'tar',
      });

      expect(result.ok).toBe(true);
      expect(existsSync(target)).toBe(true);
      expect(fake.calls).toEqual([
        { binary: 'tar', args: ['-xf', dir.join('jdk.tgz'), '-C', target], options: { timeoutMs: 0 } },
      ]);
    });

    it('fails with the exit status of tar', async () => {
      const dir = makeTempDir({ files: { 'jdk.tgz': 'tar-bytes' } });
      const fake = createFakeRunner(() => ({ exitCode: 2, stderr: 'tar: Unexpected EOF in archive' }));
      const logger = createLogger();

      const result = await new ArchiveExtractor({ runner: fake.runner, logger }).extract({
        archivePath: dir.join('jdk.tgz'),
        targetDir: dir.join('runtime'),
        kind: 'tar',
      });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ExtractErrorCode.TOOL_FAILURE);
        expect(result.error.message).toBe(
          `Extraction of ${dir.join('jdk.tgz')} failed: tar exited with status 2: tar: Unexpected EOF in archive`
        );
        expect(result.error.context.exitCode).toBe(2);
      }
      expect(logger.getEntriesByLevel('error')).toHaveLength(1);
    });
  });
});
