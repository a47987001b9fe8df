/**
 * @module types/events
 * @description Event catalog for serial counters.
 *
 * Counters emit typed events on every state change so callers can attach
 * their own logging or metrics without the library doing any I/O.
 * Payloads carry raw integers rather than SerialNumber instances so they
 * can be handed straight to a logger.
 */

import type { UnixTimestamp } from "./branded.js";
import type { SerialStorage } from "./serial.js";

// ─── Counter Events ─────────────────────────────────────────────────

/** Emitted after every successful `advance()`. */
export interface SerialAdvancedEvent<T extends SerialStorage> {
  readonly type: "SERIAL_ADVANCED";
  readonly bits: number;
  readonly previous: T;
  readonly current: T;
  readonly step: T;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when an advance carries the counter past zero. */
export interface SerialWrappedEvent<T extends SerialStorage> {
  readonly type: "SERIAL_WRAPPED";
  readonly bits: number;
  readonly previous: T;
  readonly current: T;
  /** Total wraparounds observed since construction or the last reset. */
  readonly wraps: number;
  readonly timestamp: UnixTimestamp;
}

/** Emitted when the counter is explicitly moved to a new value. */
export interface SerialResetEvent<T extends SerialStorage> {
  readonly type: "SERIAL_RESET";
  readonly bits: number;
  readonly previous: T;
  readonly current: T;
  readonly timestamp: UnixTimestamp;
}

// ─── Aggregate Types ────────────────────────────────────────────────

/** Union of all serial counter events. */
export type SerialEvent<T extends SerialStorage> =
  | SerialAdvancedEvent<T>
  | SerialWrappedEvent<T>
  | SerialResetEvent<T>;

/**
 * Extract the event type string literal from a SerialEvent.
 */
export type SerialEventType = SerialEvent<SerialStorage>["type"];

/**
 * Map from event type string to the corresponding event interface.
 */
export type SerialEventMap<T extends SerialStorage> = {
  SERIAL_ADVANCED: SerialAdvancedEvent<T>;
  SERIAL_WRAPPED: SerialWrappedEvent<T>;
  SERIAL_RESET: SerialResetEvent<T>;
};
