/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * Counters extend this to gain event capabilities.
 */

import type {
  ISerialEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  SerialEvent,
  SerialEventMap,
  SerialEventType,
} from "../types/events.js";
import type { SerialStorage } from "../types/serial.js";

type ListenerTable<T extends SerialStorage> = {
  [E in keyof SerialEventMap<T>]: Set<EventListener<T, E>>;
};

/**
 * Concrete typed event emitter for serial counter events.
 * One Set per event type for O(1) listener registration and removal.
 */
export class SerialEmitter<T extends SerialStorage> implements ISerialEmitter<T> {
  private readonly listeners: ListenerTable<T> = {
    SERIAL_ADVANCED: new Set(),
    SERIAL_WRAPPED: new Set(),
    SERIAL_RESET: new Set(),
  };

  on<E extends SerialEventType>(
    eventType: E,
    listener: EventListener<T, E>
  ): void {
    this.listeners[eventType].add(listener);
  }

  once<E extends SerialEventType>(
    eventType: E,
    listener: EventListener<T, E>
  ): void {
    const wrapper: EventListener<T, E> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<E extends SerialEventType>(
    eventType: E,
    listener: EventListener<T, E>
  ): void {
    this.listeners[eventType].delete(listener);
  }

  emit(event: SerialEvent<T>): void {
    switch (event.type) {
      case "SERIAL_ADVANCED":
        dispatch(this.listeners.SERIAL_ADVANCED, event);
        break;
      case "SERIAL_WRAPPED":
        dispatch(this.listeners.SERIAL_WRAPPED, event);
        break;
      case "SERIAL_RESET":
        dispatch(this.listeners.SERIAL_RESET, event);
        break;
    }
  }

  /** Number of listeners currently registered for `eventType`. */
  listenerCount(eventType: SerialEventType): number {
    return this.listeners[eventType].size;
  }
}

function dispatch<P>(listeners: ReadonlySet<(event: P) => void>, event: P): void {
  for (const listener of [...listeners]) {
    listener(event);
  }
}
