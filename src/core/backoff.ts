export type Sleep = (ms: number) => Promise<void>;

export function backoffDelay(retry: number, baseMs: number, maxMs: number): number {
  return Math.min(baseMs * 2 ** Math.max(0, retry - 1), maxMs);
}

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
