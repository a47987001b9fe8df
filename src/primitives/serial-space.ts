/**
 * @module primitives/serial-space
 * @description Sequence spaces and the RFC 1982 comparison rule.
 *
 * For two values `a` and `b` of a W-bit space with modulus M = 2^W, let
 * `diff = (a − b) mod M`:
 *
 * | diff              | result      |
 * | ----------------- | ----------- |
 * | 0                 | `EQUAL`     |
 * | (0, M/2)          | `GREATER`   |
 * | M/2               | `UNDEFINED` |
 * | (M/2, M)          | `LESS`      |
 *
 * The rule is written once against {@link ISerialArithmetic}; each space
 * only supplies the modulus.
 */

import type { ISerialArithmetic } from "../interfaces/arithmetic.js";
import { SerialError } from "../interfaces/serial-number.js";
import type { ISerialSpace } from "../interfaces/serial-space.js";
import type { SerialOrdering, SerialStorage, StorageKind } from "../types/serial.js";
import { BigIntArithmetic, NumberArithmetic } from "./arithmetic.js";
import { SerialNumber } from "./serial-number.js";

export class SerialSpace<T extends SerialStorage, W extends number>
  implements ISerialSpace<T, W>
{
  readonly storage: StorageKind;
  readonly modulus: T;
  readonly halfRange: T;
  readonly maxIncrement: T;
  readonly max: T;
  readonly zero: SerialNumber<T, W>;

  constructor(
    readonly bits: W,
    readonly arithmetic: ISerialArithmetic<T>
  ) {
    if (arithmetic.bits !== bits) {
      throw new SerialError(
        `Arithmetic is ${arithmetic.bits}-bit, space is ${bits}-bit`,
        "INVALID_WIDTH"
      );
    }
    this.storage = arithmetic.storage;
    this.modulus = arithmetic.modulus;
    this.halfRange = arithmetic.halfRange;
    this.maxIncrement = arithmetic.wrappingSub(arithmetic.halfRange, arithmetic.one);
    this.max = arithmetic.max;
    this.zero = new SerialNumber(this, arithmetic.zero);
  }

  from(raw: T): SerialNumber<T, W> {
    if (!this.isValue(raw)) {
      throw new SerialError(
        `Expected an unsigned ${this.storage} integer, got ${String(raw)}`,
        "INVALID_VALUE"
      );
    }
    return new SerialNumber(this, this.arithmetic.reduce(raw));
  }

  isValue(raw: unknown): raw is T {
    return this.arithmetic.isUnsigned(raw);
  }

  isSafeIncrement(offset: unknown): offset is T {
    return (
      this.arithmetic.isUnsigned(offset) &&
      !this.arithmetic.lessThan(this.maxIncrement, offset)
    );
  }

  compareValues(a: T, b: T): SerialOrdering {
    this.assertCanonical(a);
    this.assertCanonical(b);

    const diff = this.arithmetic.wrappingSub(a, b);
    if (diff === this.arithmetic.zero) {
      return "EQUAL";
    }
    if (diff === this.halfRange) {
      return "UNDEFINED";
    }
    return this.arithmetic.lessThan(diff, this.halfRange) ? "GREATER" : "LESS";
  }

  toString(): string {
    return `SerialSpace(${this.bits}-bit ${this.storage})`;
  }

  private assertCanonical(value: T): void {
    if (!this.arithmetic.isCanonical(value)) {
      throw new SerialError(
        `Value ${String(value)} is not a ${this.bits}-bit unsigned integer`,
        "INVALID_VALUE"
      );
    }
  }
}

// ─── Factories ──────────────────────────────────────────────────────

/**
 * Define a space of width `bits` (1–32) stored as `number`.
 *
 * @example
 * ```ts
 * const Serial14 = defineSerialSpace(14);
 * Serial14.from(16_381).isLessThan(Serial14.from(5)); // true
 * ```
 *
 * @throws {SerialError} INVALID_WIDTH for other widths.
 */
export function defineSerialSpace<W extends number>(bits: W): SerialSpace<number, W> {
  return new SerialSpace(bits, new NumberArithmetic(bits));
}

/**
 * Define a space of width `bits` (1–64) stored as `bigint`.
 *
 * @throws {SerialError} INVALID_WIDTH for other widths.
 */
export function defineBigSerialSpace<W extends number>(bits: W): SerialSpace<bigint, W> {
  return new SerialSpace(bits, new BigIntArithmetic(bits));
}
