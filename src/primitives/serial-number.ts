/**
 * @module primitives/serial-number
 * @description Immutable RFC 1982 serial number.
 *
 * No `valueOf` is defined: the native `<` and `>` operators must never be
 * used on serial numbers, since magnitude order is not serial order.
 *
 * @example
 * ```ts
 * const a = Serial16.from(1000);
 * a.compare(Serial16.from(33000)); // "LESS"
 * a.compare(Serial16.from(34000)); // "GREATER"
 * Serial16.from(0).compare(Serial16.from(32768)); // "UNDEFINED"
 * ```
 */

import type { ISerialNumber } from "../interfaces/serial-number.js";
import { SerialError } from "../interfaces/serial-number.js";
import type { ISerialSpace } from "../interfaces/serial-space.js";
import type { SerialOrdering, SerialSign, SerialStorage } from "../types/serial.js";

export class SerialNumber<T extends SerialStorage, W extends number>
  implements ISerialNumber<T, W>
{
  /**
   * @throws {SerialError} INVALID_VALUE unless `value` lies in `[0, 2^W)`.
   *   Use `space.from()` to wrap arbitrary unsigned integers.
   */
  constructor(
    readonly space: ISerialSpace<T, W>,
    readonly value: T
  ) {
    if (!space.arithmetic.isCanonical(value)) {
      throw new SerialError(
        `Value ${String(value)} is not a ${space.bits}-bit unsigned integer`,
        "INVALID_VALUE"
      );
    }
  }

  // ─── Ordering ───────────────────────────────────────────────────

  compare(other: ISerialNumber<T, W>): SerialOrdering {
    this.assertSameSpace(other);
    return this.space.compareValues(this.value, other.value);
  }

  compareStrict(other: ISerialNumber<T, W>): SerialSign {
    const ordering = this.compare(other);
    switch (ordering) {
      case "LESS":
        return -1;
      case "EQUAL":
        return 0;
      case "GREATER":
        return 1;
      case "UNDEFINED":
        throw new SerialError(
          `${this.toString()} and ${other.toString()} are antipodal in a ${this.space.bits}-bit space`,
          "INCOMPARABLE"
        );
    }
  }

  equals(other: ISerialNumber<T, W>): boolean {
    return this.isSameSpace(other) && this.value === other.value;
  }

  isComparableTo(other: ISerialNumber<T, W>): boolean {
    return this.compare(other) !== "UNDEFINED";
  }

  isLessThan(other: ISerialNumber<T, W>): boolean {
    return this.compare(other) === "LESS";
  }

  isLessThanOrEqual(other: ISerialNumber<T, W>): boolean {
    const ordering = this.compare(other);
    return ordering === "LESS" || ordering === "EQUAL";
  }

  isGreaterThan(other: ISerialNumber<T, W>): boolean {
    return this.compare(other) === "GREATER";
  }

  isGreaterThanOrEqual(other: ISerialNumber<T, W>): boolean {
    const ordering = this.compare(other);
    return ordering === "GREATER" || ordering === "EQUAL";
  }

  max(other: ISerialNumber<T, W>): ISerialNumber<T, W> {
    return this.compareStrict(other) < 0 ? other : this;
  }

  min(other: ISerialNumber<T, W>): ISerialNumber<T, W> {
    return this.compareStrict(other) > 0 ? other : this;
  }

  // ─── Arithmetic ─────────────────────────────────────────────────

  add(offset: T): SerialNumber<T, W> {
    if (!this.space.isSafeIncrement(offset)) {
      throw new SerialError(
        `Offset ${String(offset)} is outside [0, ${this.space.arithmetic.format(this.space.maxIncrement)}] for a ${this.space.bits}-bit space`,
        "OFFSET_OUT_OF_RANGE"
      );
    }
    return new SerialNumber(
      this.space,
      this.space.arithmetic.wrappingAdd(this.value, offset)
    );
  }

  next(): SerialNumber<T, W> {
    return this.add(this.space.arithmetic.one);
  }

  wrappingAdd(offset: T): SerialNumber<T, W> {
    if (!this.space.isValue(offset)) {
      throw new SerialError(
        `Offset ${String(offset)} is not an unsigned integer`,
        "INVALID_VALUE"
      );
    }
    return new SerialNumber(
      this.space,
      this.space.arithmetic.wrappingAdd(this.value, offset)
    );
  }

  // ─── Conversion ─────────────────────────────────────────────────

  toRaw(): T {
    return this.value;
  }

  toString(): string {
    return this.space.arithmetic.format(this.value);
  }

  // ─── Internal ───────────────────────────────────────────────────

  private isSameSpace(other: ISerialNumber<T, W>): boolean {
    return (
      other.space.bits === this.space.bits &&
      other.space.storage === this.space.storage
    );
  }

  private assertSameSpace(other: ISerialNumber<T, W>): void {
    if (!this.isSameSpace(other)) {
      throw new SerialError(
        `Cannot combine a ${this.space.bits}-bit ${this.space.storage} serial with a ${other.space.bits}-bit ${other.space.storage} serial`,
        "WIDTH_MISMATCH"
      );
    }
  }
}
