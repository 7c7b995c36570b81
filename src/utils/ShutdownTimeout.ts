/**
 * @fileoverview Timeout utilities for graceful shutdown and bounded waits.
 *
 * Key exports:
 * - withTimeout(): Promise wrapper rejecting with a TIMEOUT AppError
 * - createHardDeadline(): Absolute maximum shutdown time with process.exit(1)
 */

import { timeoutError } from './error.utils';

/**
 * Wrap a promise with timeout enforcement
 *
 * @example
 * ```typescript
 * await withTimeout(orchestrator.shutdown(), { timeoutMs: 5000, operation: 'orchestrator.shutdown' });
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: { timeoutMs: number; operation: string }
): Promise<T> {
  const { timeoutMs, operation } = options;

  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<T>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(timeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutHandle) {
      clearTimeout(timeoutHandle);
    }
  }
}

/**
 * Create a hard deadline that forces process termination
 *
 * Returns the timeout handle so the deadline can be cleared if shutdown completes.
 */
export function createHardDeadline(timeoutMs: number): NodeJS.Timeout {
  const handle = setTimeout(() => {
    console.error(`[Shutdown] HARD DEADLINE (${timeoutMs}ms) exceeded - forcing exit`);
    process.exit(1);
  }, timeoutMs);
  handle.unref();
  return handle;
}
