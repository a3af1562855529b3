/**
 * Progress Indicators Module
 *
 * Spinner and per-dependency status lines for terminal output.
 *
 * @module cli/output/progress
 */

import type { InstallOutcome } from '../../catalog/types.js';
import type { ProgressSample } from '../../fetch/types.js';
import { colorize, type AnsiCode } from './colors.js';

/**
 * Minimal writable surface; process.stdout and process.stderr satisfy it.
 */
export interface OutputStream {
  write: (text: string) => void;
  isTTY?: boolean;
}

// =============================================================================
// Spinner
// =============================================================================

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'] as const;

export interface SpinnerOptions {
  readonly colored?: boolean;
  /** Interval between frames in ms */
  readonly interval?: number;
  readonly stream?: OutputStream;
  /** Animate; when false only final lines are written (non-TTY output) */
  readonly interactive?: boolean;
}

/**
 * Terminal spinner for progress indication
 */
export class Spinner {
  private readonly interval: number;
  private readonly colored: boolean;
  private readonly stream: OutputStream;
  private readonly interactive: boolean;

  private frameIndex = 0;
  private timer: NodeJS.Timeout | null = null;
  private currentText = '';
  private isRunning = false;

  constructor(options: SpinnerOptions = {}) {
    this.interval = options.interval ?? 80;
    this.colored = options.colored ?? true;
    this.stream = options.stream ?? process.stderr;
    this.interactive = options.interactive ?? this.stream.isTTY === true;
  }

  start(text: string): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.currentText = text;
    if (!this.interactive) return;
    this.render();
    this.timer = setInterval(() => this.render(), this.interval);
    this.timer.unref();
  }

  update(text: string): void {
    this.currentText = text;
    if (this.isRunning && this.interactive) {
      this.render();
    }
  }

  /**
   * Stop the spinner and clear the line
   */
  stop(): void {
    if (!this.isRunning) return;
    this.isRunning = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.interactive) {
      this.clearLine();
    }
  }

  private render(): void {
    const frame = FRAMES[this.frameIndex] ?? FRAMES[0];
    this.clearLine();
    this.stream.write(`${colorize(frame, 'cyan', this.colored)} ${this.currentText}`);
    this.frameIndex = (this.frameIndex + 1) % FRAMES.length;
  }

  private clearLine(): void {
    this.stream.write('\r\x1b[K');
  }
}

// =============================================================================
// Transfer Progress
// =============================================================================

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB'] as const;

/**
 * Human-readable byte count: 1536 -> '1.5 KiB'.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${BYTE_UNITS[0]}` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

/**
 * '45% (4.5 MiB of 10.0 MiB)', or '4.5 MiB' when the total is unknown.
 */
export function formatTransferProgress(sample: ProgressSample): string {
  const received = formatBytes(sample.bytesReceived);
  if (sample.percent === null || sample.bytesTotal === null) {
    return received;
  }
  return `${sample.percent}% (${received} of ${formatBytes(sample.bytesTotal)})`;
}

// =============================================================================
// Dependency Progress
// =============================================================================

export type DependencyStatus = 'pending' | 'running' | 'done' | 'failed' | 'skipped';

export interface DependencyProgress {
  readonly name: string;
  readonly displayName: string;
  status: DependencyStatus;
  startTime?: number;
  endTime?: number;
  outcome?: InstallOutcome;
  path?: string;
  reason?: string;
}

const OUTCOME_LABELS: Record<InstallOutcome, string> = {
  'already-present': 'already installed',
  discovered: 'found on PATH',
  bootstrapped: 'installed by package manager',
  installed: 'installed',
};

/**
 * Format a dependency's status for display
 */
export function formatDependencyStatus(dependency: DependencyProgress, colored: boolean): string {
  const { displayName, status, startTime, endTime, outcome, path, reason } = dependency;

  let statusSymbol: string;
  let statusColor: AnsiCode;

  switch (status) {
    case 'pending':
      statusSymbol = '○';
      statusColor = 'gray';
      break;
    case 'running':
      statusSymbol = '◐';
      statusColor = 'cyan';
      break;
    case 'done':
      statusSymbol = '✓';
      statusColor = 'green';
      break;
    case 'failed':
      statusSymbol = '✗';
      statusColor = 'red';
      break;
    case 'skipped':
      statusSymbol = '⊘';
      statusColor = 'gray';
      break;
  }

  let line = `${colorize(statusSymbol, statusColor, colored)} ${displayName}`;

  if (startTime !== undefined && endTime !== undefined) {
    const duration = ((endTime - startTime) / 1000).toFixed(1);
    line += colorize(` [${duration}s]`, 'gray', colored);
  }

  if (status === 'done' && outcome) {
    line += `: ${OUTCOME_LABELS[outcome]}`;
    if (path) {
      line += colorize(` (${path})`, 'gray', colored);
    }
  }

  if ((status === 'failed' || status === 'skipped') && reason) {
    line += colorize(` (${reason})`, 'gray', colored);
  }

  return line;
}

/**
 * Status tracker for the dependencies of one run
 */
export class DependencyProgressTracker {
  private readonly dependencies = new Map<string, DependencyProgress>();
  private readonly colored: boolean;
  private readonly stream: OutputStream;
  private readonly now: () => number;

  constructor(options: { colored?: boolean; stream?: OutputStream; now?: () => number } = {}) {
    this.colored = options.colored ?? true;
    this.stream = options.stream ?? process.stderr;
    this.now = options.now ?? Date.now;
  }

  register(name: string, displayName: string): void {
    this.dependencies.set(name, { name, displayName, status: 'pending' });
  }

  start(name: string): void {
    const dependency = this.dependencies.get(name);
    if (dependency) {
      dependency.status = 'running';
      dependency.startTime = this.now();
    }
  }

  complete(name: string, outcome: InstallOutcome, path?: string): void {
    const dependency = this.dependencies.get(name);
    if (dependency) {
      dependency.status = 'done';
      dependency.endTime = this.now();
      dependency.outcome = outcome;
      dependency.path = path;
    }
  }

  fail(name: string, reason: string): void {
    const dependency = this.dependencies.get(name);
    if (dependency) {
      dependency.status = 'failed';
      dependency.endTime = this.now();
      dependency.reason = reason;
    }
  }

  /**
   * Marks every dependency still pending as skipped
   */
  skipRemaining(reason: string): void {
    for (const dependency of this.dependencies.values()) {
      if (dependency.status === 'pending') {
        dependency.status = 'skipped';
        dependency.reason = reason;
      }
    }
  }

  getAll(): DependencyProgress[] {
    return Array.from(this.dependencies.values());
  }

  printSummary(): void {
    for (const dependency of this.dependencies.values()) {
      this.stream.write(formatDependencyStatus(dependency, this.colored) + '\n');
    }
  }
}
