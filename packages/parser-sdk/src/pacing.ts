import { sleep } from './http.js';
import type { PacingPolicy } from './types.js';

export const DEFAULT_PACING: PacingPolicy = { minDelayMs: 1000, maxDelayMs: 2000 };

export function pacingDelayMs(policy: PacingPolicy, random: () => number = Math.random): number {
  const min = Math.max(0, policy.minDelayMs);
  const max = Math.max(min, policy.maxDelayMs);
  return Math.round(min + random() * (max - min));
}

/**
 * Randomized pause between two requests to the same source. Fixed window, not adaptive.
 */
export async function politePause(policy: PacingPolicy, random?: () => number): Promise<void> {
  const delay = pacingDelayMs(policy, random);
  if (delay > 0) {
    await sleep(delay);
  }
}
