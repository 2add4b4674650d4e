/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * All stateful primitives extend this to gain event capabilities.
 */

import type {
  ITacNetEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  TacNetEventMap,
  TacNetEventType,
} from "../types/events.js";

/**
 * Concrete typed event emitter for TacNet events.
 * Uses a Map of Sets for O(1) listener registration and removal.
 */
export class TacNetEmitter implements ITacNetEmitter {
  private readonly listeners = new Map<
    TacNetEventType,
    Set<EventListener<TacNetEventType>>
  >();

  on<T extends TacNetEventType>(
    eventType: T,
    listener: EventListener<T>
  ): () => void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener as EventListener<TacNetEventType>);
    return () => this.off(eventType, listener);
  }

  once<T extends TacNetEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends TacNetEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const set = this.listeners.get(eventType);
    if (set) {
      set.delete(listener as EventListener<TacNetEventType>);
      if (set.size === 0) {
        this.listeners.delete(eventType);
      }
    }
  }

  emit<T extends TacNetEventType>(event: TacNetEventMap[T]): void {
    const set = this.listeners.get(event.type);
    if (set) {
      for (const listener of [...set]) {
        listener(event);
      }
    }
  }

  /**
   * Number of listeners registered for an event type.
   */
  listenerCount(eventType: TacNetEventType): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }

  /**
   * Re-emit every event of `eventType` from `source` on this emitter.
   * @returns Unsubscribe function.
   */
  protected relay<T extends TacNetEventType>(
    source: ITacNetEmitter,
    eventType: T
  ): () => void {
    return source.on(eventType, (event) => this.emit<T>(event));
  }
}
