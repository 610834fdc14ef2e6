/**
 * Core state types for the dynamic array.
 * Snapshots are read-only; the live buffer stays private to the instance.
 */

import type { SlotCount } from './branded.ts';

// =============================================================================
// Error Latch
// =============================================================================

/**
 * Error states of a dynamic array.
 * Anything other than `Ok` suppresses every mutating operation until the
 * caller clears it or discards the instance.
 */
export const ArrayError = {
  Ok: 'ok',
  OutOfMemory: 'out-of-memory',
  OutOfBounds: 'out-of-bounds',
} as const;

export type ArrayError = (typeof ArrayError)[keyof typeof ArrayError];

/**
 * Operations that can latch an error.
 */
export type ArrayOperation =
  | 'append'
  | 'insertAt'
  | 'setAt'
  | 'getAt'
  | 'removeLast'
  | 'removeAt';

// =============================================================================
// Snapshot
// =============================================================================

/**
 * Immutable view of an array's bookkeeping.
 * `capacity` is 0 only when the initial allocation failed; release keeps it.
 */
export interface DynamicArrayState {
  readonly size: SlotCount;
  readonly capacity: SlotCount;
  readonly minCapacity: SlotCount;
  readonly error: ArrayError;
  readonly released: boolean;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Allocation hook. Returns storage with exactly `capacity` slots, or `null`
 * when the allocation cannot be satisfied.
 */
export type SlotAllocator = <T>(capacity: number) => T[] | null;

/**
 * Configuration options for creating a dynamic array.
 */
export interface DynamicArrayConfig {
  /** Largest slot count any allocation may request (default: 2 ** 32 - 1) */
  maxCapacity?: number;
  /** Storage allocator (default: defaultAllocator) */
  allocate?: SlotAllocator;
}
