// packages/core/src/utils/timeout.ts — Bound a promise by a deadline

import { TimeoutError } from './errors.js';

/**
 * Race `promise` against a timer. The timer is cleared either way so no
 * handle outlives the call.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`, ms)), ms);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
  }
}
