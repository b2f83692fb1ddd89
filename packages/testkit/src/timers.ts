/**
 * Timing utilities for tests
 */

import type { Clock } from "@tablemat/sdk";

/**
 * Wait for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Clock frozen at one instant (epoch milliseconds)
 */
export function fixedClock(epochMs: number): Clock {
  return () => epochMs;
}

/**
 * Clock that advances by `stepMs` on every reading, starting at `startMs`
 */
export function steppingClock(startMs: number, stepMs = 1): Clock {
  let next = startMs;
  return () => {
    const now = next;
    next += stepMs;
    return now;
  };
}
