/**
 * Time-ordered sort keys
 *
 * Ticks are 100ns intervals since 0001-01-01T00:00:00Z, padded to 20 digits so that
 * lexicographic order equals chronological order. A random UUID breaks ties.
 */

import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";

/** Ticks between 0001-01-01 and the Unix epoch */
export const UNIX_EPOCH_TICKS = 621355968000000000n;

/** Largest representable tick count (9999-12-31T23:59:59.9999999Z) */
export const MAX_TICKS = 3155378975999999999n;

const TICK_WIDTH = 20;
const TICKS_PER_MS = 10000;

/**
 * Source of the current time in (fractional) milliseconds since the Unix epoch
 */
export type Clock = () => number;

export const highResolutionClock: Clock = () => performance.timeOrigin + performance.now();

/**
 * Convert epoch milliseconds to ticks
 */
export function toTicks(epochMs: number): bigint {
  return UNIX_EPOCH_TICKS + BigInt(Math.floor(epochMs * TICKS_PER_MS));
}

function pad(ticks: bigint): string {
  return ticks.toString().padStart(TICK_WIDTH, "0");
}

/**
 * Sort key ordering oldest to newest
 */
export function chronologicalKey(clock: Clock = highResolutionClock): string {
  return `${pad(toTicks(clock()))}_${randomUUID()}`;
}

/**
 * Sort key ordering newest to oldest
 */
export function reverseChronologicalKey(clock: Clock = highResolutionClock): string {
  return `${pad(MAX_TICKS - toTicks(clock()))}_${randomUUID()}`;
}
