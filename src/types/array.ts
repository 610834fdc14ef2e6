/**
 * DynamicArray interface.
 *
 * Every mutating method returns `void` and reports failure through the
 * sticky error latch: once `errorState()` is not `'ok'`, mutating calls do
 * nothing until `clearError()` runs. Read-only accessors always answer.
 */

import type { ArrayError, DynamicArrayState } from './state.ts';
import type { ConstCost, LinearCost } from './cost.ts';
import type { SlotCount } from './branded.ts';
import type {
  DynamicArrayEventMap,
  EventHandler,
  Unsubscribe,
} from '../array/events.ts';

/**
 * Listener function type for snapshot subscriptions.
 */
export type ArrayListener = () => void;

export interface DynamicArray<T> extends Iterable<T> {
  // ---------------------------------------------------------------------------
  // Mutation
  // ---------------------------------------------------------------------------

  /**
   * Write `value` after the last element, doubling capacity when full.
   * Latches `'out-of-memory'` if the larger buffer cannot be allocated.
   */
  append(value: T): void;

  /**
   * Insert `value` at `index` in [0, size], shifting the tail right.
   * Latches `'out-of-bounds'` for any other index, `'out-of-memory'` if
   * growth fails. Neither failure moves an element.
   */
  insertAt(index: number, value: T): void;

  /**
   * Overwrite the element at `index` in [0, size).
   */
  setAt(index: number, value: T): void;

  /**
   * Drop the last element, halving capacity when size falls to half of it.
   * Latches `'out-of-bounds'` when empty.
   */
  removeLast(): void;

  /**
   * Drop the element at `index` in [0, size), shifting the tail left.
   * Shrinks under the same rule as removeLast.
   */
  removeAt(index: number): void;

  /**
   * Free the buffer. The instance must not be reused afterwards; further
   * mutation is ignored and reads return `undefined`.
   */
  release(): void;

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /**
   * Element at `index` in [0, size). Out of range latches `'out-of-bounds'`.
   * Returns `undefined` whenever no element is produced.
   */
  getAt(index: number): ConstCost<T> | undefined;

  size(): ConstCost<SlotCount>;
  capacity(): ConstCost<SlotCount>;
  minCapacity(): ConstCost<SlotCount>;
  isEmpty(): boolean;
  isReleased(): boolean;

  /**
   * First index holding a value `===` to `value`, or -1. Never latches.
   */
  indexOf(value: T): LinearCost<number>;

  /**
   * Copy of the live elements.
   */
  toArray(): LinearCost<readonly T[]>;

  /**
   * Iterate the live elements. Do not mutate the array while iterating.
   */
  values(): IterableIterator<T>;

  // ---------------------------------------------------------------------------
  // Error latch
  // ---------------------------------------------------------------------------

  errorState(): ArrayError;

  /**
   * Reset the latch to `'ok'`.
   * @returns The error that was latched
   */
  clearError(): ArrayError;

  // ---------------------------------------------------------------------------
  // Observation
  // ---------------------------------------------------------------------------

  /**
   * Current immutable snapshot.
   * Returns the same reference while nothing in it has changed.
   */
  getSnapshot(): DynamicArrayState;

  /**
   * Subscribe to snapshot changes.
   * @returns Unsubscribe function
   */
  subscribe(listener: ArrayListener): Unsubscribe;

  /**
   * Subscribe to typed array events.
   *
   * @example
   * ```typescript
   * array.addEventListener('resize', (event) => {
   *   console.log(`${event.direction}: ${event.from} -> ${event.to}`);
   * });
   * ```
   */
  addEventListener<K extends keyof DynamicArrayEventMap>(
    type: K,
    handler: EventHandler<DynamicArrayEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof DynamicArrayEventMap>(
    type: K,
    handler: EventHandler<DynamicArrayEventMap[K]>
  ): void;
}
