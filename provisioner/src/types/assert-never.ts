/**
 * Exhaustive switch helper for discriminated unions.
 *
 * @example
 * ```typescript
 * switch (job.kind) {
 *   case 'tar':
 *     return extractTar(job);
 *   case 'zip':
 *     return extractZip(job);
 *   default:
 *     return assertNever(job.kind);
 * }
 * ```
 *
 * @throws Error if reached at runtime (a case is missing)
 */
export function assertNever(x: never, message?: string): never {
  throw new Error(message ?? `Unexpected value: ${JSON.stringify(x)}`);
}
