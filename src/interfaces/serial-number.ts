/**
 * @module interfaces/serial-number
 * @description ISerialNumber — one immutable position in a sequence space.
 *
 * Equality is bitwise. Ordering follows RFC 1982: `a` is greater than
 * `b` when `(a − b) mod 2^W` lies strictly between zero and half the
 * modulus, less when it lies strictly above half, and undefined when it
 * is exactly half. The undefined case is reported, never tie-broken.
 */

import type { SerialOrdering, SerialSign, SerialStorage } from "../types/serial.js";
import type { ISerialSpace } from "./serial-space.js";

/**
 * Errors that may be thrown by serial number operations.
 */
export class SerialError extends Error {
  constructor(
    message: string,
    public readonly code:
      | "INVALID_WIDTH"
      | "INVALID_VALUE"
      | "OFFSET_OUT_OF_RANGE"
      | "INCOMPARABLE"
      | "WIDTH_MISMATCH"
  ) {
    super(message);
    this.name = "SerialError";
  }
}

/**
 * @interface ISerialNumber
 * @description A wrapped unsigned integer of width W.
 */
export interface ISerialNumber<T extends SerialStorage, W extends number> {
  /** The space this value belongs to. */
  readonly space: ISerialSpace<T, W>;
  /** Underlying integer in `[0, 2^W)`. */
  readonly value: T;

  // ─── Queries ────────────────────────────────────────────────────

  /**
   * @query
   * @description Three-way RFC 1982 comparison of this value against `other`.
   * @throws {SerialError} WIDTH_MISMATCH if `other` belongs to another space.
   */
  compare(other: ISerialNumber<T, W>): SerialOrdering;

  /**
   * @query
   * @description Comparison as a sign for sorting.
   * @throws {SerialError} INCOMPARABLE for an antipodal pair.
   */
  compareStrict(other: ISerialNumber<T, W>): SerialSign;

  /** Bitwise equality; values of different spaces are never equal. */
  equals(other: ISerialNumber<T, W>): boolean;

  /** `false` only when the two values are exactly half the modulus apart. */
  isComparableTo(other: ISerialNumber<T, W>): boolean;

  isLessThan(other: ISerialNumber<T, W>): boolean;
  isLessThanOrEqual(other: ISerialNumber<T, W>): boolean;
  isGreaterThan(other: ISerialNumber<T, W>): boolean;
  isGreaterThanOrEqual(other: ISerialNumber<T, W>): boolean;

  /**
   * @query
   * @description The later of the two values.
   * @throws {SerialError} INCOMPARABLE for an antipodal pair.
   */
  max(other: ISerialNumber<T, W>): ISerialNumber<T, W>;

  /**
   * @query
   * @description The earlier of the two values.
   * @throws {SerialError} INCOMPARABLE for an antipodal pair.
   */
  min(other: ISerialNumber<T, W>): ISerialNumber<T, W>;

  // ─── Arithmetic ─────────────────────────────────────────────────

  /**
   * @description Serial addition. The result always compares greater
   * than this value unless `offset` is zero.
   *
   * @param offset - Unsigned integer no larger than `2^(W−1) − 1`.
   * @throws {SerialError} OFFSET_OUT_OF_RANGE otherwise.
   */
  add(offset: T): ISerialNumber<T, W>;

  /** `add(1)`. */
  next(): ISerialNumber<T, W>;

  /**
   * @description Unchecked modular addition. Any unsigned integer offset
   * is accepted; when `offset mod 2^W` is half the modulus or more, the
   * order of the result relative to this value is unspecified.
   *
   * @throws {SerialError} INVALID_VALUE if `offset` is not an unsigned integer.
   */
  wrappingAdd(offset: T): ISerialNumber<T, W>;

  // ─── Conversion ─────────────────────────────────────────────────

  toRaw(): T;
  toString(): string;
}
