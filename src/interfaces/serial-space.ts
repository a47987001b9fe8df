/**
 * @module interfaces/serial-space
 * @description ISerialSpace — the set of serial numbers of one bit width.
 *
 * A space owns the modulus and the comparison rule. Serial numbers are
 * only ever compared or combined with numbers of the same space.
 */

import type { SerialOrdering, SerialStorage, StorageKind } from "../types/serial.js";
import type { ISerialArithmetic } from "./arithmetic.js";
import type { ISerialNumber } from "./serial-number.js";

/**
 * @interface ISerialSpace
 * @description Factory and rule book for serial numbers of width W.
 */
export interface ISerialSpace<T extends SerialStorage, W extends number> {
  readonly bits: W;
  readonly storage: StorageKind;
  readonly arithmetic: ISerialArithmetic<T>;
  /** 2^W. */
  readonly modulus: T;
  /** 2^(W−1). */
  readonly halfRange: T;
  /** Largest offset accepted by `add`: 2^(W−1) − 1. */
  readonly maxIncrement: T;
  /** 2^W − 1. */
  readonly max: T;
  /** The serial number 0. */
  readonly zero: ISerialNumber<T, W>;

  /**
   * @command
   * @description Wrap a raw unsigned integer, reducing it modulo 2^W.
   * @throws {SerialError} INVALID_VALUE if `raw` is not an unsigned integer
   *   of this space's storage kind.
   */
  from(raw: T): ISerialNumber<T, W>;

  /** Whether `raw` is accepted by {@link from}. */
  isValue(raw: unknown): raw is T;

  /** Whether `offset` is accepted by `add`. */
  isSafeIncrement(offset: unknown): offset is T;

  /**
   * @query
   * @description RFC 1982 comparison of two raw values already in `[0, 2^W)`.
   */
  compareValues(a: T, b: T): SerialOrdering;
}
