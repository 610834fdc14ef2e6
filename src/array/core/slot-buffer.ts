/**
 * Fixed-capacity slot storage backing a dynamic array.
 *
 * A SlotBuffer never grows in place: resizing allocates a fresh buffer and
 * copies the live prefix, so a failed allocation leaves the old buffer
 * untouched. Slots in [0, count) are valid; slots beyond are holes.
 */

import type { SlotAllocator } from '../../types/state.ts';
import type { ElementIndex, SlotCount } from '../../types/branded.ts';

// =============================================================================
// Allocation
// =============================================================================

/**
 * Longest array the engine can create.
 */
export const MAX_SLOT_CAPACITY = 2 ** 32 - 1;

/**
 * Allocate `capacity` empty slots.
 * An engine RangeError (invalid array length) is reported as `null`;
 * anything else propagates.
 */
export const defaultAllocator: SlotAllocator = <T>(capacity: number): T[] | null => {
  try {
    return new Array<T>(capacity);
  } catch (error) {
    if (error instanceof RangeError) return null;
    throw error;
  }
};

/**
 * Allocator plus the ceiling it is allowed to reach.
 */
export interface AllocationPolicy {
  readonly allocate: SlotAllocator;
  readonly maxCapacity: number;
}

// =============================================================================
// Slot Buffer
// =============================================================================

export class SlotBuffer<T> {
  /** Backing storage, exactly `capacity` slots long */
  private readonly slots: T[];
  /** Number of allocated slots */
  readonly capacity: SlotCount;

  private constructor(slots: T[], capacity: SlotCount) {
    this.slots = slots;
    this.capacity = capacity;
  }

  /**
   * Allocate an empty buffer, or `null` when the policy refuses.
   */
  static allocate<T>(capacity: SlotCount, policy: AllocationPolicy): SlotBuffer<T> | null {
    if (capacity > policy.maxCapacity) return null;
    const slots = policy.allocate<T>(capacity);
    if (slots === null) return null;
    return new SlotBuffer(slots, capacity);
  }

  /**
   * Allocate a buffer of `capacity` slots holding a copy of [0, count).
   * When `skip` is given that index is dropped and later slots close the gap.
   * This buffer is never modified.
   */
  resize(
    capacity: SlotCount,
    count: SlotCount,
    policy: AllocationPolicy,
    skip?: ElementIndex
  ): SlotBuffer<T> | null {
    const next = SlotBuffer.allocate<T>(capacity, policy);
    if (next === null) return null;

    let target = 0;
    for (let i = 0; i < count; i++) {
      if (i === skip) continue;
      next.slots[target++] = this.slots[i];
    }
    return next;
  }

  get(index: ElementIndex): T {
    return this.slots[index];
  }

  set(index: ElementIndex, value: T): void {
    this.slots[index] = value;
  }

  /**
   * Move [from, end) one slot right, tail first. Slot `from` keeps a stale copy.
   */
  shiftRight(from: ElementIndex, end: SlotCount): void {
    for (let i = end; i > from; i--) {
      this.slots[i] = this.slots[i - 1];
    }
  }

  /**
   * Move (from, end) one slot left, overwriting `from`. Slot `end - 1` keeps a
   * stale copy.
   */
  shiftLeft(from: ElementIndex, end: SlotCount): void {
    for (let i = from; i < end - 1; i++) {
      this.slots[i] = this.slots[i + 1];
    }
  }

  /**
   * Drop the reference held by a slot past the live prefix.
   */
  vacate(index: ElementIndex): void {
    delete this.slots[index];
  }

  /**
   * Read-only view of the raw slots. Only [0, size) is meaningful.
   */
  view(): readonly T[] {
    return this.slots;
  }
}
