/**
 * @module interfaces/serial-counter
 * @description ISerialCounter — a mutable cursor over a sequence space.
 *
 * Serial numbers themselves never change; a counter holds the latest one
 * and replaces it on every advance. Typical owners are packet senders
 * stamping outgoing frames and logs assigning record indices.
 */

import type { SerialStorage } from "../types/serial.js";
import type { ISerialEmitter } from "./event-emitter.js";
import type { ISerialNumber } from "./serial-number.js";
import type { ISerialSpace } from "./serial-space.js";

// ─── Configuration ────────────────────────────────────────────────

export interface SerialCounterConfig<T extends SerialStorage, W extends number> {
  /** Sequence space the counter moves through. */
  space: ISerialSpace<T, W>;
  /** Starting raw value, reduced modulo 2^W. Default: 0 */
  initial?: T;
  /** Increment applied by `advance()`. Default: 1. Must not exceed `space.maxIncrement`. */
  step?: T;
}

/**
 * @interface ISerialCounter
 * @description Emits SERIAL_ADVANCED, SERIAL_WRAPPED and SERIAL_RESET.
 */
export interface ISerialCounter<T extends SerialStorage, W extends number>
  extends ISerialEmitter<T> {
  readonly space: ISerialSpace<T, W>;
  readonly step: T;

  /** The value most recently issued or set. */
  current(): ISerialNumber<T, W>;

  /**
   * @command
   * @description Move forward by `step` and return the new value.
   * @postcondition The returned value compares GREATER than the previous one
   *   (or EQUAL when `step` is zero).
   */
  advance(): ISerialNumber<T, W>;

  /**
   * @command
   * @description Jump to `raw` (reduced modulo 2^W) and clear the wrap count.
   * @throws {SerialError} INVALID_VALUE if `raw` is not an unsigned integer.
   */
  reset(raw: T): ISerialNumber<T, W>;

  /** Number of times the counter has passed zero since construction or reset. */
  wraps(): number;
}
