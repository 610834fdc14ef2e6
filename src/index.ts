/**
 * Slotted - a generic dynamic array with explicit capacity management
 *
 * Main entry point exporting the array factory, its types, and utilities.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  ArrayOperation,
  DynamicArrayState,
  DynamicArrayConfig,
  SlotAllocator,
  DynamicArray,
  ArrayListener,
  ElementIndex,
  SlotCount,
  ConstCost,
  LinearCost,
} from './types/index.ts';

export { ArrayError } from './types/index.ts';

export {
  elementIndex,
  slotCount,
  isValidIndex,
  isValidCapacity,
  isIndexBelow,
  isIndexAtMost,
  ZERO_SLOTS,
} from './types/index.ts';

// =============================================================================
// Dynamic Array
// =============================================================================

export { createDynamicArray, validateArrayConfig } from './array/index.ts';
export type { ConfigValidationResult } from './array/index.ts';

// =============================================================================
// Allocation
// =============================================================================

export { defaultAllocator, MAX_SLOT_CAPACITY } from './array/index.ts';

// =============================================================================
// Event System
// =============================================================================

export type {
  ArrayEvent,
  ResizeEvent,
  ErrorLatchEvent,
  ReleaseEvent,
  AnyArrayEvent,
  DynamicArrayEventMap,
  EventHandler,
  Unsubscribe,
} from './array/index.ts';
