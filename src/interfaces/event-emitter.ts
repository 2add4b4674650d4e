/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for TacNet's reactive system.
 *
 * All primitives implement ITacNetEmitter to emit typed events.
 * The event map ensures that listeners receive correctly-typed payloads
 * without runtime type checking.
 */

import type { TacNetEventMap, TacNetEventType } from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends TacNetEventType> = (
  event: TacNetEventMap[T]
) => void;

/**
 * @interface ITacNetEmitter
 * @description Typed event emitter for TacNet events.
 * Provides compile-time safety for event names and payload types.
 */
export interface ITacNetEmitter {
  /**
   * Register a listener for a specific event type.
   * @returns Unsubscribe function.
   */
  on<T extends TacNetEventType>(
    eventType: T,
    listener: EventListener<T>
  ): () => void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<T extends TacNetEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends TacNetEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   */
  emit<T extends TacNetEventType>(event: TacNetEventMap[T]): void;
}
