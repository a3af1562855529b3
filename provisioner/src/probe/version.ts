/**
 * Version parsing and comparison utilities for dependency probing.
 * @module probe/version
 */

/**
 * A single version component: a non-negative integer or a wildcard.
 */
export type VersionComponent = number | '*';

/**
 * Normalized, comparable version. Missing trailing components are absent,
 * not zero.
 */
export interface VersionToken {
  readonly components: readonly VersionComponent[];
  /** Text the token was parsed from (e.g. '1.8.0_112') */
  readonly raw: string;
}

/**
 * One to three dotted groups (the first numeric, later ones numeric or a
 * wildcard), optionally followed by an update suffix such as `_112`.
 */
const VERSION_PATTERN = /(\d+)((?:\.(?:\d+|\*|x(?![A-Za-z]))){0,2})(?:_(\d+))?/;

function toComponent(group: string): VersionComponent {
  return group === '*' || group === 'x' ? '*' : parseInt(group, 10);
}

/**
 * Extracts the first version token from free-form command output.
 *
 * @param rawText - Combined output of a version-query command
 * @returns The token, or null when no version-like text is present
 *
 * @example
 * ```ts
 * extractVersion('javac 1.8.0_112'); // components [1, 8, 0, 112], raw '1.8.0_112'
 * extractVersion('Hadoop 2.7.7');    // components [2, 7, 7]
 * extractVersion('command not found'); // null
 * ```
 */
export function extractVersion(rawText: string): VersionToken | null {
  const match = VERSION_PATTERN.exec(rawText);
  if (!match || match[1] === undefined) {
    return null;
  }

  const components: VersionComponent[] = [toComponent(match[1])];
  for (const group of (match[2] ?? '').split('.').slice(1)) {
    components.push(toComponent(group));
  }
  if (match[3] !== undefined) {
    components.push(parseInt(match[3], 10));
  }

  return { components, raw: match[0] };
}

/**
 * Parses a configured minimum version such as '1.8' or '2.4.x'.
 * The whole string must be a version; surrounding text is rejected.
 */
export function parseVersionRequirement(text: string): VersionToken | null {
  const trimmed = text.trim().replace(/^v/, '');
  const token = extractVersion(trimmed);
  return token && token.raw === trimmed ? token : null;
}

/**
 * Checks whether `actual` satisfies `minimum`.
 *
 * Only the minimum's declared length is compared, so 1.8.3 satisfies 1.8.
 * A component `actual` lacks counts as 0, and a wildcard on either side
 * matches. The first differing component decides.
 *
 * @example
 * ```ts
 * isAtLeast(v('1.8.3'), v('1.8')); // true
 * isAtLeast(v('1.7'), v('1.8'));   // false
 * isAtLeast(v('2.0'), v('1.9'));   // true
 * ```
 */
export function isAtLeast(actual: VersionToken, minimum: VersionToken): boolean {
  for (let i = 0; i < minimum.components.length; i++) {
    const required = minimum.components[i] ?? 0;
    const found = actual.components[i] ?? 0;

    if (required === '*' || found === '*') {
      continue;
    }
    if (found > required) {
      return true;
    }
    if (found < required) {
      return false;
    }
  }
  return true;
}
