/**
 * ANSI Color Utilities
 *
 * Provides ANSI color codes for terminal output with support for:
 * - NO_COLOR environment variable (standard convention)
 * - FORCE_COLOR environment variable (force colors even without TTY)
 * - TTY detection for automatic color support
 *
 * Reference: https://no-color.org/
 */

// =============================================================================
// ANSI Color Codes
// =============================================================================

export const ANSI = {
  reset: '\x1b[0m',

  bold: '\x1b[1m',
  dim: '\x1b[2m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export type AnsiCode = keyof typeof ANSI;

// =============================================================================
// Color Support Detection
// =============================================================================

/**
 * Check if terminal supports colors.
 *
 * Priority:
 * 1. NO_COLOR set (any value) -> false
 * 2. FORCE_COLOR set (any value) -> true
 * 3. Otherwise -> check if the stream is a TTY
 */
export function supportsColor(
  env: Record<string, string | undefined> = process.env,
  isTTY: boolean = process.stderr?.isTTY ?? false
): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }

  if (env['FORCE_COLOR'] !== undefined) {
    return true;
  }

  return isTTY;
}

// =============================================================================
// Colorization Utilities
// =============================================================================

/**
 * Apply a named ANSI code to text, respecting color support.
 */
export function colorize(text: string, code: AnsiCode, colored: boolean): string {
  if (!colored) {
    return text;
  }
  return `${ANSI[code]}${text}${ANSI.reset}`;
}
