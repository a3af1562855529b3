/**
 * External command execution.
 *
 * Every shell-out (version queries, PATH lookups, tar, reg/setx, the
 * package-manager bootstrap) goes through a CommandRunner so that tests can
 * substitute a fake and the engine never depends on a concrete process API.
 *
 * @module process/command-runner
 */

import { spawn } from 'child_process';

/** Default timeout for short commands (version queries, lookups) */
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export interface CommandOptions {
  /** Environment for the child; defaults to process.env */
  readonly env?: Record<string, string | undefined>;
  readonly cwd?: string;
  /** 0 disables the timeout (used for installers and tar) */
  readonly timeoutMs?: number;
}

/**
 * Outcome of a command. Spawn failures (ENOENT, EACCES) are reported through
 * `spawnError` with `exitCode: null` rather than thrown.
 */
export interface CommandResult {
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  /** stdout and stderr interleaved in arrival order */
  readonly output: string;
  readonly spawnError?: NodeJS.ErrnoException;
  readonly timedOut: boolean;
}

export type CommandRunner = (
  binary: string,
  args: readonly string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Runs a binary without a shell and captures its output.
 */
export const runCommand: CommandRunner = (binary, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';
    let output = '';
    let timedOut = false;
    let settled = false;

    const child = spawn(binary, [...args], {
      env: options.env ?? process.env,
      cwd: options.cwd,
      shell: false,
      windowsHide: true,
    });

    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill();
          }, timeoutMs)
        : null;

    const finish = (exitCode: number | null, spawnError?: NodeJS.ErrnoException): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({ exitCode, stdout, stderr, output, spawnError, timedOut });
    };

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
      output += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
      output += chunk;
    });

    child.on('error', (error: NodeJS.ErrnoException) => finish(null, error));
    child.on('close', (code) => finish(code));
  });
};

/**
 * True when the command ran and exited with status 0.
 */
export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.spawnError && !result.timedOut;
}

/**
 * Short human-readable reason for a failed command.
 */
export function describeFailure(binary: string, result: CommandResult): string {
  if (result.spawnError?.code === 'ENOENT') {
    return `${binary} not found`;
  }
  if (result.spawnError) {
    return `${binary} could not be started: ${result.spawnError.message}`;
  }
  if (result.timedOut) {
    return `${binary} timed out`;
  }
  const detail = result.output.trim().split('\n').slice(-3).join(' | ');
  return `${binary} exited with status ${result.exitCode ?? 'unknown'}${detail ? `: ${detail}` : ''}`;
}
