/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for serial counters.
 *
 * The event map ensures that listeners receive correctly-typed payloads
 * without runtime type checking.
 */

import type {
  SerialEvent,
  SerialEventMap,
  SerialEventType,
} from "../types/events.js";
import type { SerialStorage } from "../types/serial.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<
  T extends SerialStorage,
  E extends SerialEventType,
> = (event: SerialEventMap<T>[E]) => void;

/**
 * @interface ISerialEmitter
 * @description Typed event emitter for serial counter events.
 * Provides compile-time safety for event names and payload types.
 */
export interface ISerialEmitter<T extends SerialStorage> {
  /**
   * Register a listener for a specific event type.
   * @param eventType - The event type to listen for.
   * @param listener - Callback function receiving the typed event payload.
   */
  on<E extends SerialEventType>(
    eventType: E,
    listener: EventListener<T, E>
  ): void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<E extends SerialEventType>(
    eventType: E,
    listener: EventListener<T, E>
  ): void;

  /**
   * Remove a previously registered listener.
   */
  off<E extends SerialEventType>(
    eventType: E,
    listener: EventListener<T, E>
  ): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   */
  emit(event: SerialEvent<T>): void;
}
