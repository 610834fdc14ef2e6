/**
 * Configuration validation for dynamic arrays.
 */

import type { DynamicArrayConfig } from '../types/state.ts';
import { isValidCapacity } from '../types/branded.ts';
import { defaultAllocator, MAX_SLOT_CAPACITY, type AllocationPolicy } from './core/slot-buffer.ts';

/**
 * Result of validating an array configuration.
 */
export interface ConfigValidationResult {
  /** Whether the configuration is usable */
  readonly valid: boolean;
  /** Error messages if validation failed */
  readonly errors: readonly string[];
}

/**
 * Validate construction arguments with detailed error messages.
 *
 * @example
 * ```typescript
 * const result = validateArrayConfig(0);
 * if (!result.valid) {
 *   console.error('Invalid array config:', result.errors);
 * }
 * ```
 */
export function validateArrayConfig(
  initCapacity: number,
  config: DynamicArrayConfig = {}
): ConfigValidationResult {
  const errors: string[] = [];

  if (!isValidCapacity(initCapacity)) {
    errors.push(`initCapacity must be a positive integer, got ${initCapacity}`);
  }

  if (config.maxCapacity !== undefined) {
    if (!isValidCapacity(config.maxCapacity)) {
      errors.push(`maxCapacity must be a positive integer, got ${config.maxCapacity}`);
    } else if (isValidCapacity(initCapacity) && config.maxCapacity < initCapacity) {
      errors.push(
        `maxCapacity ${config.maxCapacity} is below initCapacity ${initCapacity}`
      );
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Fill in configuration defaults.
 */
export function resolveAllocationPolicy(config: DynamicArrayConfig = {}): AllocationPolicy {
  return {
    allocate: config.allocate ?? defaultAllocator,
    maxCapacity: config.maxCapacity ?? MAX_SLOT_CAPACITY,
  };
}
