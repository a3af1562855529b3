/**
 * Dependency spec and output-stream builders for tests.
 *
 * @module tests/helpers/specs
 */

import type { DependencySpec } from '../../src/catalog/types.js';

/**
 * A framework-like dependency installed from a zip archive; override any field.
 */
export function makeSpec(overrides: Partial<DependencySpec> = {}): DependencySpec {
  return {
    name: 'spark',
    displayName: 'Apache Spark',
    family: 'framework',
    environmentKey: 'SPARK_HOME',
    minVersion: '2.4',
    downloadURL: 'https://mirror.test/dist/spark-2.4.8.zip',
    installRoot: '/opt/toolchain/framework',
    archiveKind: 'zip',
    extractedDirName: 'spark-2.4.8',
    versionCommand: ['bin/spark-submit', ['--version']],
    locateCommand: null,
    bootstrapPackage: null,
    ...overrides,
  };
}

export interface CapturedStream {
  write: (text: string) => void;
  isTTY?: boolean;
  /** Everything written so far */
  readonly text: () => string;
}

export function captureStream(isTTY = false): CapturedStream {
  const chunks: string[] = [];
  return {
    write: (text: string) => {
      chunks.push(text);
    },
    isTTY,
    text: () => chunks.join(''),
  };
}
