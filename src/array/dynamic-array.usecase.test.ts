/**
 * Use-case tests for the dynamic array.
 * Walks through realistic call sequences and checks the capacity
 * invariants after every step.
 */

import { describe, it, expect } from 'vitest';
import { createDynamicArray } from './dynamic-array.ts';
import { ArrayError } from '../types/state.ts';
import type { DynamicArray } from '../types/array.ts';

/**
 * Whether `capacity` is reachable from `minCapacity` by doubling.
 */
function isReachableCapacity(capacity: number, minCapacity: number): boolean {
  let current = minCapacity;
  while (current < capacity) current *= 2;
  return current === capacity;
}

function expectInvariants<T>(array: DynamicArray<T>): void {
  const size = array.size();
  const capacity = array.capacity();
  const minCapacity = array.minCapacity();
  expect(capacity).toBeGreaterThanOrEqual(Math.max(size, minCapacity));
  expect(isReachableCapacity(capacity, minCapacity)).toBe(true);
}

/**
 * Small deterministic generator so failures reproduce.
 */
function createRandom(seed: number): (bound: number) => number {
  let state = seed;
  return (bound: number) => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state % bound;
  };
}

describe('DynamicArray use cases', () => {
  it('should follow the grow, remove, shrink walkthrough', () => {
    const array = createDynamicArray<number>(2);

    array.append(10);
    array.append(20);
    expect(array.size()).toBe(2);
    expect(array.capacity()).toBe(2);

    array.append(30);
    expect(array.size()).toBe(3);
    expect(array.capacity()).toBe(4);

    array.removeAt(1);
    expect(array.getAt(0)).toBe(10);
    expect(array.getAt(1)).toBe(30);
    expect(array.size()).toBe(2);
    expect(array.capacity()).toBe(2);
    expect(array.errorState()).toBe(ArrayError.Ok);
  });

  it('should behave like a stack', () => {
    const stack = createDynamicArray<string>(1);
    for (const token of ['(', '[', '{']) stack.append(token);

    const popped: string[] = [];
    while (!stack.isEmpty()) {
      const top = stack.getAt(stack.size() - 1);
      if (top !== undefined) popped.push(top);
      stack.removeLast();
    }

    expect(popped).toEqual(['{', '[', '(']);
    expect(stack.capacity()).toBe(1);
    expect(stack.errorState()).toBe(ArrayError.Ok);
  });

  it('should keep a sorted sequence with insertAt', () => {
    const sorted = createDynamicArray<number>(4);
    for (const value of [7, 3, 9, 1, 5, 3]) {
      let index = 0;
      while (index < sorted.size() && (sorted.getAt(index) ?? 0) < value) index++;
      sorted.insertAt(index, value);
    }

    expect(sorted.toArray()).toEqual([1, 3, 3, 5, 7, 9]);
    expect(sorted.capacity()).toBe(8);
  });

  it('should let callers check the latch once after a batch', () => {
    const array = createDynamicArray<number>(1, { maxCapacity: 4 });
    for (let i = 0; i < 10; i++) array.append(i);

    expect(array.errorState()).toBe(ArrayError.OutOfMemory);
    expect(array.toArray()).toEqual([0, 1, 2, 3]);
  });

  it('should match a plain array model across random operations', () => {
    const random = createRandom(42);
    const array = createDynamicArray<number>(2);
    const model: number[] = [];

    for (let step = 0; step < 500; step++) {
      const value = step;
      switch (random(5)) {
        case 0:
          array.append(value);
          model.push(value);
          break;
        case 1: {
          const index = random(model.length + 2);
          array.insertAt(index, value);
          if (index <= model.length) model.splice(index, 0, value);
          break;
        }
        case 2: {
          const index = random(model.length + 1);
          array.setAt(index, value);
          if (index < model.length) model[index] = value;
          break;
        }
        case 3:
          array.removeLast();
          if (model.length > 0) model.pop();
          break;
        default: {
          const index = random(model.length + 1);
          array.removeAt(index);
          if (index < model.length) model.splice(index, 1);
          break;
        }
      }

      if (array.errorState() !== ArrayError.Ok) {
        expect(array.errorState()).toBe(ArrayError.OutOfBounds);
        array.clearError();
      }
      expect(array.toArray()).toEqual(model);
      expectInvariants(array);
    }
  });
});
