/**
 * Dynamic array implementation.
 * Factory function that creates a DynamicArray with encapsulated state.
 *
 * Resizing always goes through a freshly allocated SlotBuffer, so a failed
 * allocation never disturbs the live one. This makes every operation atomic,
 * removals included: when the halved buffer cannot be allocated the element
 * stays where it was and only the error latch changes.
 */

import {
  ArrayError,
  type ArrayOperation,
  type DynamicArrayConfig,
  type DynamicArrayState,
} from '../types/state.ts';
import type { ArrayListener, DynamicArray } from '../types/array.ts';
import {
  addSlots,
  elementIndex,
  isIndexAtMost,
  isIndexBelow,
  slotCount,
  ZERO_SLOTS,
  type ElementIndex,
  type SlotCount,
} from '../types/branded.ts';
import { $, $checked, $cost, $linearFindIndex, $prefix } from '../types/cost.ts';
import { SlotBuffer } from './core/slot-buffer.ts';
import { growthTarget, shrinkTarget } from './core/capacity.ts';
import { resolveAllocationPolicy, validateArrayConfig } from './config.ts';
import {
  createErrorEvent,
  createEventEmitter,
  createReleaseEvent,
  createResizeEvent,
  type Unsubscribe,
} from './events.ts';

/**
 * Create a dynamic array with `initCapacity` slots, which is also the floor
 * capacity never shrinks below.
 *
 * If the first allocation fails the array comes back with its error latched
 * to `'out-of-memory'` and no buffer.
 *
 * @throws RangeError when `initCapacity` is not a positive integer or the
 * configuration is invalid
 */
export function createDynamicArray<T>(
  initCapacity: number,
  config: DynamicArrayConfig = {}
): DynamicArray<T> {
  const validation = validateArrayConfig(initCapacity, config);
  if (!validation.valid) {
    throw new RangeError(`Invalid dynamic array config: ${validation.errors.join('; ')}`);
  }

  const policy = resolveAllocationPolicy(config);
  const floor = slotCount(initCapacity);

  // Internal mutable state
  let buffer: SlotBuffer<T> | null = SlotBuffer.allocate<T>(floor, policy);
  let length: SlotCount = ZERO_SLOTS;
  let allocated: SlotCount = buffer === null ? ZERO_SLOTS : floor;
  let latched: ArrayError = buffer === null ? ArrayError.OutOfMemory : ArrayError.Ok;

  const events = createEventEmitter();
  const listeners = new Set<ArrayListener>();
  let snapshot = createSnapshot();

  function createSnapshot(): DynamicArrayState {
    return Object.freeze({
      size: length,
      capacity: allocated,
      minCapacity: floor,
      error: latched,
      released: buffer === null,
    });
  }

  function notifyListeners(): void {
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        console.error('Array listener threw an error:', error);
      }
    }
  }

  /**
   * Replace the snapshot if the bookkeeping moved. Returns whether it did.
   * Runs before any event goes out so handlers read the new state.
   */
  function refreshSnapshot(): boolean {
    const next = createSnapshot();
    if (
      next.size === snapshot.size &&
      next.capacity === snapshot.capacity &&
      next.error === snapshot.error &&
      next.released === snapshot.released
    ) {
      return false;
    }
    snapshot = next;
    return true;
  }

  /**
   * Publish the outcome of an operation: a resize event if capacity moved
   * since `previousCapacity`, then subscribers if the snapshot changed.
   */
  function commit(previousCapacity: SlotCount): void {
    const changed = refreshSnapshot();

    if (allocated !== previousCapacity && events.hasListeners('resize')) {
      const direction = allocated > previousCapacity ? 'grow' : 'shrink';
      events.emit('resize', createResizeEvent(direction, previousCapacity, allocated));
    }

    if (changed) notifyListeners();
  }

  function latch(
    error: Exclude<ArrayError, 'ok'>,
    operation: ArrayOperation,
    index?: number
  ): void {
    latched = error;
    const changed = refreshSnapshot();

    if (events.hasListeners('error')) {
      events.emit('error', createErrorEvent(error, operation, index));
    }

    if (changed) notifyListeners();
  }

  /**
   * The buffer, if mutation is currently allowed.
   */
  function writable(): SlotBuffer<T> | null {
    return latched === ArrayError.Ok ? buffer : null;
  }

  /**
   * Make room for one more element, doubling when full.
   * Returns the buffer to write into, or null after latching out-of-memory.
   */
  function ensureRoom(current: SlotBuffer<T>, operation: ArrayOperation): SlotBuffer<T> | null {
    const target = growthTarget(length, allocated);
    if (target === null) return current;

    const grown = current.resize(target, length, policy);
    if (grown === null) {
      latch(ArrayError.OutOfMemory, operation);
      return null;
    }
    buffer = grown;
    allocated = grown.capacity;
    return grown;
  }

  /**
   * Remove the element at a valid `index`, shrinking at half occupancy.
   */
  function removeSlot(
    current: SlotBuffer<T>,
    index: ElementIndex,
    operation: ArrayOperation,
    reportedIndex?: number
  ): void {
    const previousCapacity = allocated;
    const newLength = slotCount(length - 1);
    const target = shrinkTarget(newLength, allocated, floor);

    if (target !== null) {
      const shrunk = current.resize(target, length, policy, index);
      if (shrunk === null) {
        latch(ArrayError.OutOfMemory, operation, reportedIndex);
        return;
      }
      buffer = shrunk;
      allocated = shrunk.capacity;
    } else {
      current.shiftLeft(index, length);
      current.vacate(elementIndex(newLength));
    }

    length = newLength;
    commit(previousCapacity);
  }

  function* values(): IterableIterator<T> {
    for (let i = 0; i < length; i++) {
      if (buffer === null) return;
      yield buffer.get(elementIndex(i));
    }
  }

  const array: DynamicArray<T> = {
    append(value: T): void {
      const current = writable();
      if (current === null) return;

      const previousCapacity = allocated;
      const target = ensureRoom(current, 'append');
      if (target === null) return;

      target.set(elementIndex(length), value);
      length = addSlots(length, 1);
      commit(previousCapacity);
    },

    insertAt(index: number, value: T): void {
      const current = writable();
      if (current === null) return;

      if (!isIndexAtMost(index, length)) {
        latch(ArrayError.OutOfBounds, 'insertAt', index);
        return;
      }

      const previousCapacity = allocated;
      const target = ensureRoom(current, 'insertAt');
      if (target === null) return;

      target.shiftRight(index, length);
      target.set(index, value);
      length = addSlots(length, 1);
      commit(previousCapacity);
    },

    setAt(index: number, value: T): void {
      const current = writable();
      if (current === null) return;

      if (!isIndexBelow(index, length)) {
        latch(ArrayError.OutOfBounds, 'setAt', index);
        return;
      }
      current.set(index, value);
    },

    getAt(index: number) {
      const current = writable();
      if (current === null) return undefined;

      if (!isIndexBelow(index, length)) {
        latch(ArrayError.OutOfBounds, 'getAt', index);
        return undefined;
      }
      return $('O(1)', $cost(current.get(index)));
    },

    removeLast(): void {
      const current = writable();
      if (current === null) return;

      if (length === 0) {
        latch(ArrayError.OutOfBounds, 'removeLast');
        return;
      }
      removeSlot(current, elementIndex(length - 1), 'removeLast');
    },

    removeAt(index: number): void {
      const current = writable();
      if (current === null) return;

      if (!isIndexBelow(index, length)) {
        latch(ArrayError.OutOfBounds, 'removeAt', index);
        return;
      }
      removeSlot(current, index, 'removeAt', index);
    },

    release(): void {
      if (buffer === null) return;
      buffer = null;
      const changed = refreshSnapshot();

      if (events.hasListeners('release')) {
        events.emit('release', createReleaseEvent(length, allocated));
      }

      if (changed) notifyListeners();
    },

    size() {
      return $('O(1)', $cost(length));
    },

    capacity() {
      return $('O(1)', $cost(allocated));
    },

    minCapacity() {
      return $('O(1)', $cost(floor));
    },

    isEmpty(): boolean {
      return length === 0;
    },

    isReleased(): boolean {
      return buffer === null;
    },

    indexOf(value: T) {
      const current = buffer;
      if (current === null) return $('O(n)', $cost(-1));
      return $('O(n)', $linearFindIndex((element: T) => element === value, length)($cost(current.view())));
    },

    toArray() {
      const current = buffer;
      if (current === null) return $('O(n)', $cost<readonly T[]>([]));
      return $('O(n)', $checked(() => $prefix(length)($cost(current.view()))));
    },

    values,

    [Symbol.iterator](): IterableIterator<T> {
      return values();
    },

    errorState(): ArrayError {
      return latched;
    },

    clearError(): ArrayError {
      const previous = latched;
      latched = ArrayError.Ok;
      commit(allocated);
      return previous;
    },

    getSnapshot(): DynamicArrayState {
      return snapshot;
    },

    subscribe(listener: ArrayListener): Unsubscribe {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    addEventListener: events.addEventListener,
    removeEventListener: events.removeEventListener,
  };

  return array;
}
