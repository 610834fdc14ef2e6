/**
 * Event system for dynamic arrays.
 * Provides a pub/sub mechanism for capacity changes and latched errors.
 */

import type { ArrayError, ArrayOperation } from '../types/state.ts';
import type { SlotCount } from '../types/branded.ts';

// =============================================================================
// Event Types
// =============================================================================

/**
 * Base event interface.
 */
export interface ArrayEvent {
  readonly type: string;
  readonly timestamp: number;
}

/**
 * Fired after the buffer is replaced by a larger or smaller one.
 */
export interface ResizeEvent extends ArrayEvent {
  readonly type: 'resize';
  readonly direction: 'grow' | 'shrink';
  /** Capacity before the resize */
  readonly from: SlotCount;
  /** Capacity after the resize */
  readonly to: SlotCount;
}

/**
 * Fired when an operation latches an error.
 */
export interface ErrorLatchEvent extends ArrayEvent {
  readonly type: 'error';
  readonly error: Exclude<ArrayError, 'ok'>;
  readonly operation: ArrayOperation;
  /** Index argument of the failing call, when it had one */
  readonly index?: number;
}

/**
 * Fired when the buffer is released.
 */
export interface ReleaseEvent extends ArrayEvent {
  readonly type: 'release';
  readonly size: SlotCount;
  readonly capacity: SlotCount;
}

export type AnyArrayEvent = ResizeEvent | ErrorLatchEvent | ReleaseEvent;

/**
 * Event type to handler mapping.
 */
export interface DynamicArrayEventMap {
  'resize': ResizeEvent;
  'error': ErrorLatchEvent;
  'release': ReleaseEvent;
}

// =============================================================================
// Event Handler Types
// =============================================================================

export type EventHandler<T extends AnyArrayEvent> = (event: T) => void;

/**
 * Unsubscribe function returned by addEventListener.
 */
export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

/**
 * Type-safe emitter for array events.
 */
export interface ArrayEventEmitter {
  /**
   * Add an event listener for a specific event type.
   * @returns Unsubscribe function
   */
  addEventListener<K extends keyof DynamicArrayEventMap>(
    type: K,
    handler: EventHandler<DynamicArrayEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof DynamicArrayEventMap>(
    type: K,
    handler: EventHandler<DynamicArrayEventMap[K]>
  ): void;

  /**
   * Emit an event to all registered handlers.
   * A throwing handler is logged and does not stop the others.
   */
  emit<K extends keyof DynamicArrayEventMap>(
    type: K,
    event: DynamicArrayEventMap[K]
  ): void;

  /**
   * Whether anything listens for `type`. Lets callers skip building events.
   */
  hasListeners(type: keyof DynamicArrayEventMap): boolean;
}

type HandlerSets = {
  [K in keyof DynamicArrayEventMap]: Set<EventHandler<DynamicArrayEventMap[K]>>;
};

/**
 * Create a new array event emitter.
 */
export function createEventEmitter(): ArrayEventEmitter {
  const handlers: HandlerSets = {
    'resize': new Set(),
    'error': new Set(),
    'release': new Set(),
  };

  return {
    addEventListener<K extends keyof DynamicArrayEventMap>(
      type: K,
      handler: EventHandler<DynamicArrayEventMap[K]>
    ): Unsubscribe {
      const typeHandlers: Set<EventHandler<DynamicArrayEventMap[K]>> = handlers[type];
      typeHandlers.add(handler);
      return () => {
        typeHandlers.delete(handler);
      };
    },

    removeEventListener<K extends keyof DynamicArrayEventMap>(
      type: K,
      handler: EventHandler<DynamicArrayEventMap[K]>
    ): void {
      const typeHandlers: Set<EventHandler<DynamicArrayEventMap[K]>> = handlers[type];
      typeHandlers.delete(handler);
    },

    emit<K extends keyof DynamicArrayEventMap>(
      type: K,
      event: DynamicArrayEventMap[K]
    ): void {
      const typeHandlers: Set<EventHandler<DynamicArrayEventMap[K]>> = handlers[type];
      for (const handler of typeHandlers) {
        try {
          handler(event);
        } catch (error) {
          console.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    hasListeners(type: keyof DynamicArrayEventMap): boolean {
      return handlers[type].size > 0;
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

export function createResizeEvent(
  direction: 'grow' | 'shrink',
  from: SlotCount,
  to: SlotCount
): ResizeEvent {
  return Object.freeze({
    type: 'resize' as const,
    timestamp: Date.now(),
    direction,
    from,
    to,
  });
}

/**
 * Create an error event. `index` is omitted for operations without one.
 */
export function createErrorEvent(
  error: Exclude<ArrayError, 'ok'>,
  operation: ArrayOperation,
  index?: number
): ErrorLatchEvent {
  return Object.freeze({
    type: 'error' as const,
    timestamp: Date.now(),
    error,
    operation,
    ...(index === undefined ? {} : { index }),
  });
}

export function createReleaseEvent(size: SlotCount, capacity: SlotCount): ReleaseEvent {
  return Object.freeze({
    type: 'release' as const,
    timestamp: Date.now(),
    size,
    capacity,
  });
}
