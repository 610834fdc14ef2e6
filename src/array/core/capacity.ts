/**
 * Capacity policy for the dynamic array.
 *
 * Capacity starts at the floor and only ever doubles or halves, so every
 * reachable capacity is `minCapacity * 2^k`.
 */

import { doubleSlots, halveSlots, type SlotCount } from '../../types/branded.ts';

/**
 * Capacity needed before writing one more element, or `null` when the
 * current buffer still has room.
 */
export function growthTarget(size: SlotCount, capacity: SlotCount): SlotCount | null {
  return size === capacity ? doubleSlots(capacity) : null;
}

/**
 * Capacity after an element is removed, or `null` when no shrink is due.
 * Shrinks exactly when the new size lands on half the capacity and the
 * floor has not been reached.
 */
export function shrinkTarget(
  newSize: SlotCount,
  capacity: SlotCount,
  minCapacity: SlotCount
): SlotCount | null {
  const half = halveSlots(capacity);
  if (newSize !== half || capacity === minCapacity) return null;
  return half;
}
