/**
 * Fat entity codec: spreads one serialized value across a bounded set of string slots
 *
 * Invariants:
 * - Slot keys are zero-padded (E01, E02, ...) so plain string order equals chunk order
 * - join(split(x)) === x for every x that fits in MAX_SLOTS * MAX_CHUNK_SIZE code units
 * - Oversized input is reported, never truncated
 */

import { ObjectTooLargeError } from "../errors.js";
import type { FatEntityChunk } from "../types.js";

/**
 * Largest payload per slot, a few units under the 64K string property limit
 */
export const MAX_CHUNK_SIZE = 63997;

/**
 * Slots a single entity may carry
 */
export const MAX_SLOTS = 16;

export const FAT_ENTITY_CAPACITY = MAX_CHUNK_SIZE * MAX_SLOTS;

const SLOT_PREFIX = "E";
const SLOT_KEY_PATTERN = /^E\d{2,}$/;

export interface FatEntityLimits {
  chunkSize?: number;
  maxSlots?: number;
}

/**
 * Outcome of splitting: the chunks, or the untouched payload when it does not fit
 */
export type SplitResult =
  | { fits: true; chunks: FatEntityChunk[] }
  | { fits: false; payload: string; requiredSlots: number; capacity: number };

/**
 * Slot key for a 1-based slot number
 */
export function slotKey(slot: number, maxSlots = MAX_SLOTS): string {
  const width = Math.max(2, String(maxSlots).length);
  return SLOT_PREFIX + String(slot).padStart(width, "0");
}

/**
 * Is this property name a fat entity slot?
 */
export function isSlotKey(name: string): boolean {
  return SLOT_KEY_PATTERN.test(name);
}

/**
 * Split a serialized value into fixed-size windows
 */
export function trySplit(serialized: string, limits: FatEntityLimits = {}): SplitResult {
  const chunkSize = limits.chunkSize ?? MAX_CHUNK_SIZE;
  const maxSlots = limits.maxSlots ?? MAX_SLOTS;

  const requiredSlots = Math.ceil(serialized.length / chunkSize);
  if (requiredSlots > maxSlots) {
    return { fits: false, payload: serialized, requiredSlots, capacity: chunkSize * maxSlots };
  }

  const chunks: FatEntityChunk[] = [];
  for (let i = 0; i < requiredSlots; i++) {
    chunks.push({
      slotKey: slotKey(i + 1, maxSlots),
      payload: serialized.slice(i * chunkSize, (i + 1) * chunkSize),
    });
  }

  return { fits: true, chunks };
}

/**
 * Split, throwing ObjectTooLargeError when the value does not fit
 */
export function split(serialized: string, limits?: FatEntityLimits): FatEntityChunk[] {
  const result = trySplit(serialized, limits);
  if (!result.fits) {
    throw new ObjectTooLargeError(result.payload, result.capacity);
  }
  return result.chunks;
}

/**
 * Concatenate chunk payloads in ascending slot-key order
 */
export function join(chunks: readonly FatEntityChunk[]): string {
  return [...chunks]
    .sort((a, b) => (a.slotKey < b.slotKey ? -1 : a.slotKey > b.slotKey ? 1 : 0))
    .map((chunk) => chunk.payload)
    .join("");
}
