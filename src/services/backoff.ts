export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff delay before retry number `retry` (1-based):
 * base, 2×base, 4×base, …
 */
export function backoffDelay(baseDelayMs: number, retry: number): number {
  return baseDelayMs * 2 ** Math.max(0, retry - 1);
}
