/**
 * Branded types for type-safe index and capacity handling.
 *
 * Branded types (also called "opaque types" or "nominal types") prevent
 * accidentally mixing up different kinds of numeric values. An element
 * index points at a slot; a slot count measures how many slots exist.
 * Passing a capacity where an index is expected is a classic off-by-one
 * source, so the two never unify.
 *
 * Caller-supplied indices are plain numbers until a range guard narrows them;
 * slot storage only accepts the narrowed form.
 *
 * Usage:
 * ```typescript
 * const cap = slotCount(8);
 * if (isIndexBelow(at, cap)) buffer.get(at);
 *
 * // Type error: can't assign SlotCount to ElementIndex
 * const wrong: ElementIndex = cap;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

/**
 * Generic brand interface.
 * The brand is a phantom type that only exists in the type system.
 */
interface Brand<B> {
  readonly [brand]: B;
}

/**
 * Create a branded type from a base type.
 * The brand only exists at compile time - no runtime overhead.
 */
type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Index and Count Types
// =============================================================================

/**
 * Zero-based position of an element in the array.
 *
 * Use when:
 * - Reading or writing a slot
 * - Shifting elements during insert/remove
 */
export type ElementIndex = Branded<number, 'ElementIndex'>;

/**
 * Number of slots (a size or a capacity).
 *
 * Semantically distinct from ElementIndex: an index is a position,
 * a count is a quantity.
 */
export type SlotCount = Branded<number, 'SlotCount'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create an ElementIndex from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function elementIndex(value: number): ElementIndex {
  return value as ElementIndex;
}

/**
 * Create a SlotCount from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function slotCount(value: number): SlotCount {
  return value as SlotCount;
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value can address a slot (non-negative safe integer).
 */
export function isValidIndex(value: number): value is ElementIndex {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Check if a value is a usable capacity (positive safe integer).
 */
export function isValidCapacity(value: number): value is SlotCount {
  return Number.isSafeInteger(value) && value >= 1;
}

/**
 * Half-open range check: index in [0, end).
 * Narrows a caller-supplied number to an ElementIndex.
 */
export function isIndexBelow(index: number, end: SlotCount): index is ElementIndex {
  return isValidIndex(index) && index < end;
}

/**
 * Closed range check: index in [0, end].
 */
export function isIndexAtMost(index: number, end: SlotCount): index is ElementIndex {
  return isValidIndex(index) && index <= end;
}

// =============================================================================
// Arithmetic Helpers
// =============================================================================

/**
 * Add a delta to a SlotCount.
 * Preserves the brand type.
 */
export function addSlots(count: SlotCount, delta: number): SlotCount {
  return (count + delta) as SlotCount;
}

/**
 * Double a SlotCount.
 */
export function doubleSlots(count: SlotCount): SlotCount {
  return (count * 2) as SlotCount;
}

/**
 * Halve a SlotCount. Only meaningful on even counts.
 */
export function halveSlots(count: SlotCount): SlotCount {
  return Math.floor(count / 2) as SlotCount;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Zero slots - an empty array's size.
 */
export const ZERO_SLOTS: SlotCount = 0 as SlotCount;
