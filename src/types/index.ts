/**
 * Type exports for the dynamic array.
 */

// State types
export type {
  ArrayOperation,
  DynamicArrayState,
  DynamicArrayConfig,
  SlotAllocator,
} from './state.ts';

export { ArrayError } from './state.ts';

// Array interface
export type { DynamicArray, ArrayListener } from './array.ts';

// Branded index and count types
export type { ElementIndex, SlotCount } from './branded.ts';

export {
  elementIndex,
  slotCount,
  isValidIndex,
  isValidCapacity,
  isIndexBelow,
  isIndexAtMost,
  addSlots,
  doubleSlots,
  halveSlots,
  ZERO_SLOTS,
} from './branded.ts';

// Cost brands
export type {
  CostLabel,
  CostBigO,
  Costed,
  ConstCost,
  LinearCost,
  Ctx,
  CheckedPlan,
} from './cost.ts';

export { $, $checked, $cost, $prefix, $linearFindIndex } from './cost.ts';
