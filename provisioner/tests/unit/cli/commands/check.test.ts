/**
 * Tests for the check command
 */

import { describe, it, expect } from 'vitest';
import { formatCheckOutput, runCheck } from '../../../../src/cli/commands/check.js';
import type { CommandScript } from '../../../helpers/index.js';
import { TOOL_VERSIONS, createCommandHarness, makeSpec, makeTempDir, zipChainConfig } from '../../../helpers/index.js';

/** A workspace whose four homes exist and are registered in the process view */
function installedWorkspace(script: CommandScript = TOOL_VERSIONS) {
  const dir = makeTempDir({
    files: {
      'provision.yml': zipChainConfig(),
      'homes/jdk/bin/javac': '',
      'homes/spark/bin/spark-submit': '',
      'homes/hadoop/bin/hadoop': '',
      'homes/worker/Microsoft.Spark.Worker': '',
    },
  });
  const env = {
    PATH: '/usr/bin',
    NO_COLOR: '1',
    JAVA_HOME: dir.join('homes', 'jdk'),
    SPARK_HOME: dir.join('homes', 'spark'),
    HADOOP_HOME: dir.join('homes', 'hadoop'),
    DOTNET_WORKER_DIR: dir.join('homes', 'worker'),
  };
  return { dir, env, harness: createCommandHarness({ cwd: dir.path, env, script }) };
}

describe('runCheck', () => {
  it('should report every dependency as absent on a clean machine', async () => {
    const dir = makeTempDir({ files: { 'provision.yml': zipChainConfig() } });
    const harness = createCommandHarness({ cwd: dir.path });

    const result = await runCheck({}, harness.deps);

    expect(result.exitCode).toBe(1);
    expect(result.summary).toEqual({ present: 0, absent: 4, incompatible: 0, unresolved: 0, allPresent: false });
    expect(harness.stdout.text().split('\n').slice(0, 10)).toEqual([
      '',
      'Dependency Status Check',
      '─'.repeat(40),
      '',
      '✗ Java Development Kit - absent',
      '    JAVA_HOME is not set',
      '',
      '✗ Apache Spark - absent',
      '    SPARK_HOME is not set',
      '',
    ]);
  });

  it('should exit 0 when everything is present', async () => {
    const { env, harness } = installedWorkspace();

    const result = await runCheck({}, harness.deps);

    expect(result.exitCode).toBe(0);
    expect(result.summary.allPresent).toBe(true);
    expect(harness.stdout.text().split('\n').slice(4, 7)).toEqual([
      '✓ Java Development Kit 1.8.0_292',
      `    JAVA_HOME: ${env.JAVA_HOME}`,
      '',
    ]);
  });

  it('should never install or register anything', async () => {
    const dir = makeTempDir({ files: { 'provision.yml': zipChainConfig() } });
    const harness = createCommandHarness({ cwd: dir.path });

    await runCheck({}, harness.deps);

    expect(harness.transport.requests).toEqual([]);
    expect(harness.store.writes).toEqual([]);
  });

  it('should flag a version below the minimum', async () => {
    const script: CommandScript = (binary, args, options) =>
      binary.endsWith('spark-submit') ? { stdout: 'version 2.3.1' } : TOOL_VERSIONS(binary, args, options);
    const { harness } = installedWorkspace(script);

    const result = await runCheck({ only: ['spark'] }, harness.deps);

    expect(result.exitCode).toBe(1);
    expect(result.summary.incompatible).toBe(1);
    expect(harness.stdout.text().split('\n').slice(4, 7)).toEqual([
      '⚠ Apache Spark 2.3.1 - version mismatch',
      '    Required: 2.4 or later',
      '    Apache Spark 2.3.1 is installed but 2.4 or later is required',
    ]);
  });

  it('should write JSON with --json', async () => {
    const { env, harness } = installedWorkspace();

    await runCheck({ only: ['jdk'], json: true }, harness.deps);

    expect(JSON.parse(harness.stdout.text())).toEqual({
      dependencies: [{ name: 'jdk', status: 'present', path: env.JAVA_HOME, version: '1.8.0_292', detail: null }],
      summary: { present: 1, absent: 0, incompatible: 0, unresolved: 0, allPresent: true },
    });
  });

  it('should report a missing config file on stderr', async () => {
    const dir = makeTempDir();
    const harness = createCommandHarness({ cwd: dir.path });

    const result = await runCheck({ config: 'nope.yml' }, harness.deps);

    expect(result.exitCode).toBe(2);
    expect(harness.stderr.text().split('\n')[0]).toBe(`Error: Config file not found: ${dir.join('nope.yml')}`);
  });
});

describe('formatCheckOutput', () => {
  const spec = makeSpec();

  it('should show details and the download URL when verbose', () => {
    const output = formatCheckOutput(
      [{ dependency: 'spark', status: 'present', path: '/opt/spark', version: '2.4.8', detail: '/opt/spark does not exist' }],
      [spec],
      { verbose: true, colored: false }
    );

    expect(output.split('\n').slice(4)).toEqual([
      '✓ Apache Spark 2.4.8',
      '    SPARK_HOME: /opt/spark',
      '    /opt/spark does not exist',
      '    Download: https://mirror.test/dist/spark-2.4.8.zip',
      '',
    ]);
  });

  it('should hide details of present dependencies otherwise', () => {
    const output = formatCheckOutput(
      [{ dependency: 'spark', status: 'present', path: '/opt/spark', detail: 'found on PATH' }],
      [spec],
      { verbose: false, colored: false }
    );

    expect(output.split('\n').slice(4)).toEqual(['✓ Apache Spark', '    SPARK_HOME: /opt/spark', '']);
  });

  it('should mark unknown versions', () => {
    const output = formatCheckOutput(
      [{ dependency: 'spark', status: 'unresolved', path: '/opt/spark', detail: 'no version found' }],
      [spec],
      { verbose: false, colored: false }
    );

    expect(output.split('\n').slice(4)).toEqual(['⚠ Apache Spark - version unknown', '    no version found', '']);
  });
});
