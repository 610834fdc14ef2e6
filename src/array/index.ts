/**
 * Array exports.
 */

// Factory
export { createDynamicArray } from './dynamic-array.ts';

// Configuration
export { validateArrayConfig, resolveAllocationPolicy } from './config.ts';
export type { ConfigValidationResult } from './config.ts';

// Slot storage and capacity policy
export { SlotBuffer, defaultAllocator, MAX_SLOT_CAPACITY } from './core/slot-buffer.ts';
export type { AllocationPolicy } from './core/slot-buffer.ts';
export { growthTarget, shrinkTarget } from './core/capacity.ts';

// Events
export {
  createEventEmitter,
  createResizeEvent,
  createErrorEvent,
  createReleaseEvent,
} from './events.ts';
export type {
  ArrayEvent,
  ResizeEvent,
  ErrorLatchEvent,
  ReleaseEvent,
  AnyArrayEvent,
  DynamicArrayEventMap,
  EventHandler,
  Unsubscribe,
  ArrayEventEmitter,
} from './events.ts';
