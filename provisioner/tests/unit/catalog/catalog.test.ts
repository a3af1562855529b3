/**
 * Unit tests for the dependency catalog and chain building
 */

import { describe, it, expect } from 'vitest';
import {
  archiveKindForURL,
  artifactFileName,
  buildChain,
  getAllDependencyNames,
  type ChainOptions,
} from '../../../src/catalog/catalog.js';
import type { Platform } from '../../../src/catalog/types.js';
import { ConfigError, ConfigErrorCode } from '../../../src/types/errors.js';

const ROOTS = { runtime: '/r', framework: '/f', extensions: '/e' };

function options(overrides: Partial<ChainOptions> = {}): ChainOptions {
  return { platform: 'linux', downloadHost: 'https://mirror.test', installRoots: ROOTS, ...overrides };
}

describe('getAllDependencyNames', () => {
  it('lists the chain in dependency order', () => {
    expect(getAllDependencyNames()).toEqual(['jdk', 'spark', 'hadoop', 'spark-worker']);
  });
});

describe('archiveKindForURL', () => {
  it('recognises zip archives case-insensitively', () => {
    expect(archiveKindForURL('https://mirror.test/a/worker.ZIP')).toBe('zip');
  });

  it('treats everything else as tar', () => {
    expect(archiveKindForURL('https://mirror.test/a/spark.tgz')).toBe('tar');
    expect(archiveKindForURL('https://mirror.test/a/hadoop.tar.gz?mirror=1')).toBe('tar');
  });
});

describe('artifactFileName', () => {
  it('returns the last path segment without the query', () => {
    expect(artifactFileName('https://mirror.test/dist/spark.tgz?x=1')).toBe('spark.tgz');
  });

  it('rejects URLs without a file name', () => {
    expect(() => artifactFileName('https://mirror.test/')).toThrow(ConfigError);
  });
});

describe('buildChain', () => {
  it('builds the full chain with install roots by family', () => {
    const chain = buildChain(options());

    expect(chain.map((spec) => [spec.name, spec.installRoot])).toEqual([
      ['jdk', '/r'],
      ['spark', '/f'],
      ['hadoop', '/e'],
      ['spark-worker', '/e'],
    ]);
  });

  it('substitutes the download host without a doubled slash', () => {
    const [, spark] = buildChain(options({ downloadHost: 'https://mirror.test/apache/' }));

    expect(spark?.downloadURL).toBe(
      'https://mirror.test/apache/dist/spark/spark-2.4.8/spark-2.4.8-bin-hadoop2.7.tgz'
    );
  });

  it('picks platform-specific artifacts and bootstrap packages', () => {
    const linux = buildChain(options({ only: ['jdk'] }))[0];
    const windows = buildChain(options({ platform: 'win32', only: ['jdk'] }))[0];

    expect(linux?.archiveKind).toBe('tar');
    expect(linux?.bootstrapPackage).toBe('openjdk-8-jdk');
    expect(windows?.archiveKind).toBe('zip');
    expect(windows?.downloadURL).toMatch(/windows_hotspot_8u412b08\.zip$/);
    expect(windows?.bootstrapPackage).toBe('temurin8');
  });

  const nativeArtifacts: { platform: Platform; jdk: string; jdkDir: string; worker: string }[] = [
    {
      platform: 'linux',
      jdk: 'OpenJDK8U-jdk_x64_linux_hotspot_8u412b08.tar.gz',
      jdkDir: 'jdk8u412-b08',
      worker: 'Microsoft.Spark.Worker.netcoreapp3.1.linux-x64-2.1.1.tar.gz',
    },
    {
      platform: 'darwin',
      jdk: 'OpenJDK8U-jdk_x64_mac_hotspot_8u412b08.tar.gz',
      jdkDir: 'jdk8u412-b08/Contents/Home',
      worker: 'Microsoft.Spark.Worker.netcoreapp3.1.osx-x64-2.1.1.tar.gz',
    },
    {
      platform: 'win32',
      jdk: 'OpenJDK8U-jdk_x64_windows_hotspot_8u412b08.zip',
      jdkDir: 'jdk8u412-b08',
      worker: 'Microsoft.Spark.Worker.netcoreapp3.1.win-x64-2.1.1.zip',
    },
  ];

  for (const expected of nativeArtifacts) {
    it(`uses native ${expected.platform} binaries for the runtime and the worker`, () => {
      const [jdk, spark, , worker] = buildChain(options({ platform: expected.platform }));

      expect(jdk && artifactFileName(jdk.downloadURL)).toBe(expected.jdk);
      expect(jdk?.extractedDirName).toBe(expected.jdkDir);
      expect(worker && artifactFileName(worker.downloadURL)).toBe(expected.worker);
      expect(spark?.downloadURL).toBe('https://mirror.test/dist/spark/spark-2.4.8/spark-2.4.8-bin-hadoop2.7.tgz');
    });
  }

  it('has no bootstrap package where the catalog names none', () => {
    const [spark] = buildChain(options({ only: ['spark'] }));

    expect(spark?.bootstrapPackage).toBeNull();
  });

  it('keeps catalog order when restricted', () => {
    const chain = buildChain(options({ only: ['spark-worker', 'jdk'] }));

    expect(chain.map((spec) => spec.name)).toEqual(['jdk', 'spark-worker']);
  });

  it('applies overrides and infers the archive kind from an override URL', () => {
    const [spark] = buildChain(
      options({
        only: ['spark'],
        overrides: [
          {
            name: 'spark',
            minVersion: '3.0',
            downloadURL: 'https://mirror.test/custom/spark.zip',
            extractedDirName: 'spark-custom',
          },
        ],
      })
    );

    expect(spark).toMatchObject({
      minVersion: '3.0',
      downloadURL: 'https://mirror.test/custom/spark.zip',
      archiveKind: 'zip',
      extractedDirName: 'spark-custom',
    });
  });

  it('lets an override clear the minimum version', () => {
    const [jdk] = buildChain(options({ only: ['jdk'], overrides: [{ name: 'jdk', minVersion: null }] }));

    expect(jdk?.minVersion).toBeNull();
  });

  it('returns frozen specs', () => {
    const [jdk] = buildChain(options());

    expect(Object.isFrozen(jdk)).toBe(true);
  });

  it('rejects unknown override names', () => {
    expect(() => buildChain(options({ overrides: [{ name: 'flink' }] }))).toThrow('Unknown dependency: flink');
  });

  it('rejects unknown --only names with the field set', () => {
    try {
      buildChain(options({ only: ['flink'] }));
      expect.unreachable('buildChain should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe(ConfigErrorCode.INVALID_VALUE);
        expect(error.context.field).toBe('only');
      }
    }
  });

  it('rejects an unparseable minimum version', () => {
    expect(() => buildChain(options({ overrides: [{ name: 'spark', minVersion: 'newest' }] }))).toThrow(
      'Invalid minimum version for spark: newest'
    );
  });
});
