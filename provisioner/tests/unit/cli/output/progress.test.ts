/**
 * Tests for CLI Progress Module
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  DependencyProgressTracker,
  Spinner,
  formatBytes,
  formatDependencyStatus,
  formatTransferProgress,
} from '../../../../src/cli/output/progress.js';
import { captureStream } from '../../../helpers/index.js';

describe('progress', () => {
  describe('Spinner', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should animate frames on a TTY', () => {
      const stream = captureStream(true);
      const spinner = new Spinner({ stream, colored: false });

      spinner.start('Downloading');
      vi.advanceTimersByTime(80);
      spinner.stop();

      expect(stream.text()).toBe('\r\x1b[K⠋ Downloading\r\x1b[K⠙ Downloading\r\x1b[K');
    });

    it('should render updated text immediately', () => {
      const stream = captureStream(true);
      const spinner = new Spinner({ stream, colored: false });

      spinner.start('a');
      spinner.update('b');
      spinner.stop();

      expect(stream.text()).toBe('\r\x1b[K⠋ a\r\x1b[K⠙ b\r\x1b[K');
    });

    it('should write nothing when not interactive', () => {
      const stream = captureStream(false);
      const spinner = new Spinner({ stream, colored: false });

      spinner.start('Downloading');
      vi.advanceTimersByTime(500);
      spinner.update('Extracting');
      spinner.stop();

      expect(stream.text()).toBe('');
    });

    it('should color the frame when colors are on', () => {
      const stream = captureStream(true);
      const spinner = new Spinner({ stream, colored: true });

      spinner.start('a');
      spinner.stop();

      expect(stream.text()).toBe('\r\x1b[K\x1b[36m⠋\x1b[0m a\r\x1b[K');
    });
  });

  describe('formatBytes', () => {
    it('should scale to binary units', () => {
      expect(formatBytes(512)).toBe('512 B');
      expect(formatBytes(1536)).toBe('1.5 KiB');
      expect(formatBytes(10 * 1024 * 1024)).toBe('10.0 MiB');
      expect(formatBytes(3 * 1024 ** 4)).toBe('3072.0 GiB');
    });
  });

  describe('formatTransferProgress', () => {
    it('should show percent and totals when the size is known', () => {
      expect(formatTransferProgress({ bytesReceived: 4.5 * 1024 * 1024, bytesTotal: 10 * 1024 * 1024, percent: 45 })).toBe(
        '45% (4.5 MiB of 10.0 MiB)'
      );
    });

    it('should show only the received bytes otherwise', () => {
      expect(formatTransferProgress({ bytesReceived: 2048, bytesTotal: null, percent: null })).toBe('2.0 KiB');
    });
  });

  describe('formatDependencyStatus', () => {
    it('should show pending and running symbols', () => {
      expect(formatDependencyStatus({ name: 'jdk', displayName: 'JDK', status: 'pending' }, false)).toBe('○ JDK');
      expect(formatDependencyStatus({ name: 'jdk', displayName: 'JDK', status: 'running' }, false)).toBe('◐ JDK');
    });

    it('should color the symbol', () => {
      expect(formatDependencyStatus({ name: 'jdk', displayName: 'JDK', status: 'pending' }, true)).toBe(
        '\x1b[90m○\x1b[0m JDK'
      );
    });
  });

  describe('DependencyProgressTracker', () => {
    it('should print one line per dependency with durations and outcomes', () => {
      const stream = captureStream();
      const ticks = [0, 1500, 1500, 2000];
      let index = 0;
      const tracker = new DependencyProgressTracker({ colored: false, stream, now: () => ticks[index++] ?? 0 });
      tracker.register('jdk', 'Java Development Kit');
      tracker.register('spark', 'Apache Spark');
      tracker.register('hadoop', 'Apache Hadoop');

      tracker.start('jdk');
      tracker.complete('jdk', 'installed', '/opt/jdk');
      tracker.start('spark');
      tracker.fail('spark', 'FETCH_TRANSPORT_FAILURE');
      tracker.skipRemaining('not attempted');
      tracker.printSummary();

      expect(stream.text()).toBe(
        [
          '✓ Java Development Kit [1.5s]: installed (/opt/jdk)',
          '✗ Apache Spark [0.5s] (FETCH_TRANSPORT_FAILURE)',
          '⊘ Apache Hadoop (not attempted)',
          '',
        ].join('\n')
      );
    });

    it('should label each outcome', () => {
      const stream = captureStream();
      const tracker = new DependencyProgressTracker({ colored: false, stream, now: () => 0 });
      for (const [name, outcome] of [
        ['a', 'already-present'],
        ['b', 'discovered'],
        ['c', 'bootstrapped'],
      ] as const) {
        tracker.register(name, name.toUpperCase());
        tracker.start(name);
        tracker.complete(name, outcome);
      }

      tracker.printSummary();

      expect(stream.text()).toBe(
        '✓ A [0.0s]: already installed\n✓ B [0.0s]: found on PATH\n✓ C [0.0s]: installed by package manager\n'
      );
    });

    it('should ignore unknown names', () => {
      const tracker = new DependencyProgressTracker({ colored: false, stream: captureStream() });

      tracker.start('nope');
      tracker.complete('nope', 'installed');

      expect(tracker.getAll()).toEqual([]);
    });
  });
});
