/**
 * Utility functions for the workflow core
 */

import { randomUUID } from 'node:crypto';

import { PortTimeoutError } from './errors.js';

/**
 * Exponential backoff delay before retry number `attempt` (1-based)
 *
 * min(base * 2^(attempt - 1), max)
 */
export function computeBackoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(baseDelayMs * Math.pow(2, exponent), maxDelayMs);
}

/**
 * Race a port call against a timer
 *
 * @throws PortTimeoutError when the call does not settle within `timeoutMs`
 */
export async function withTimeout<T>(
  service: string,
  timeoutMs: number,
  fn: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PortTimeoutError(service, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight
 */
export async function forEachWithConcurrency<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item !== undefined) {
        await worker(item);
      }
    }
  });
  await Promise.all(lanes);
}

export function generateCorrelationId(): string {
  return randomUUID();
}
