/**
 * Provisioning Logger
 *
 * Structured logging for provisioning decisions. Entries are retained in
 * memory for the run report, optionally mirrored to the console and
 * optionally appended to a JSONL file.
 *
 * Log categories:
 * - probe: version queries and comparisons
 * - fetch: transfers, skips and progress
 * - extract: archive extraction
 * - environment: reads, writes and refreshes of environment state
 * - install: installer state transitions
 * - orchestrator: chain start, completion and abort
 */

import type { InstallerTransition } from '../catalog/types.js';
import type { LogSink } from './jsonl.js';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogCategory = 'probe' | 'fetch' | 'extract' | 'environment' | 'install' | 'orchestrator';

/**
 * Structured log entry.
 */
export interface ProvisionLogEntry {
  timestamp: number;
  runId: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Configuration for the provisioning logger.
 */
export interface LoggerConfig {
  /** Minimum log level to record. Default: 'info' */
  minLevel: LogLevel;
  /** Maximum number of log entries to retain. Default: 1000 */
  maxEntries: number;
  /** Whether to also write entries to stderr. Default: false */
  consoleOutput: boolean;
  /** Additional destination for recorded entries */
  sink?: LogSink;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: 'info',
  maxEntries: 1000,
  consoleOutput: false,
};

// =============================================================================
// ProvisionLogger Class
// =============================================================================

export class ProvisionLogger {
  private readonly config: LoggerConfig;
  private entries: ProvisionLogEntry[] = [];
  private readonly runId: string;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.runId = `prov-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
  }

  /**
   * Identifier shared by every entry of this run, for correlating log files.
   */
  getRunId(): string {
    return this.runId;
  }

  private addEntry(
    level: LogLevel,
    category: LogCategory,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }

    const entry: ProvisionLogEntry = {
      timestamp: Date.now(),
      runId: this.runId,
      level,
      category,
      message,
      context,
    };

    this.entries.push(entry);
    if (this.entries.length > this.config.maxEntries) {
      this.entries = this.entries.slice(-this.config.maxEntries);
    }

    this.config.sink?.write(entry);

    if (this.config.consoleOutput) {
      this.outputToConsole(entry);
    }
  }

  /**
   * Console mirror goes to stderr so that `--json` output stays parseable.
   */
  private outputToConsole(entry: ProvisionLogEntry): void {
    const prefix = `[provision:${entry.category}]`;
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
    console.error(`${prefix} ${entry.level}: ${entry.message}${contextStr}`);
  }

  // ===========================================================================
  // Generic Logging
  // ===========================================================================

  log(
    level: LogLevel,
    category: LogCategory,
    message: string,
    context?: Record<string, unknown>
  ): void {
    this.addEntry(level, category, message, context);
  }

  debug(category: LogCategory, message: string, context?: Record<string, unknown>): void {
    this.addEntry('debug', category, message, context);
  }

  info(category: LogCategory, message: string, context?: Record<string, unknown>): void {
    this.addEntry('info', category, message, context);
  }

  warn(category: LogCategory, message: string, context?: Record<string, unknown>): void {
    this.addEntry('warn', category, message, context);
  }

  error(category: LogCategory, message: string, context?: Record<string, unknown>): void {
    this.addEntry('error', category, message, context);
  }

  // ===========================================================================
  // Domain Logging
  // ===========================================================================

  logTransition(transition: InstallerTransition): void {
    const level: LogLevel = transition.to === 'failed' ? 'error' : 'info';
    const detail = transition.detail ? ` (${transition.detail})` : '';
    this.addEntry(
      level,
      'install',
      `${transition.dependency}: ${transition.from} -> ${transition.to}${detail}`,
      { ...transition }
    );
  }

  logFetchSkipped(url: string, destinationPath: string): void {
    this.addEntry('info', 'fetch', `Artifact already downloaded: ${destinationPath}`, {
      url,
      destinationPath,
    });
  }

  logFetchComplete(url: string, destinationPath: string, bytes: number): void {
    this.addEntry('info', 'fetch', `Downloaded ${bytes} bytes to ${destinationPath}`, {
      url,
      destinationPath,
      bytes,
    });
  }

  logEnvironmentWrite(key: string, value: string, scope: string): void {
    this.addEntry('info', 'environment', `Set ${key}=${value} (${scope})`, { key, value, scope });
  }

  logChainComplete(count: number, elapsedMs: number): void {
    this.addEntry('info', 'orchestrator', `Provisioned ${count} dependencies in ${elapsedMs}ms`, {
      count,
      elapsedMs,
    });
  }

  // ===========================================================================
  // Log Retrieval
  // ===========================================================================

  getEntries(): ProvisionLogEntry[] {
    return [...this.entries];
  }

  getEntriesByCategory(category: LogCategory): ProvisionLogEntry[] {
    return this.entries.filter((e) => e.category === category);
  }

  getEntriesByLevel(level: LogLevel): ProvisionLogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Flushes and closes the sink, if any.
   */
  async close(): Promise<void> {
    await this.config.sink?.close();
  }
}

/**
 * Create a new logger with custom configuration.
 */
export function createLogger(config?: Partial<LoggerConfig>): ProvisionLogger {
  return new ProvisionLogger(config);
}

/**
 * Logger that records nothing above `error`; the default for library callers.
 */
export function createSilentLogger(): ProvisionLogger {
  return new ProvisionLogger({ minLevel: 'error', maxEntries: 100 });
}
