/**
 * @fileoverview Shared test utilities
 */

/**
 * Sleep for specified milliseconds
 *
 * @example
 * ```typescript
 * await sleep(10);
 * ```
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn` and return what it threw, or undefined
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
