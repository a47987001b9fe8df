/**
 * @module interfaces/arithmetic
 * @description ISerialArithmetic — the numeric trait a sequence space is
 * built on.
 *
 * One implementation exists per storage kind. Every operation works on
 * raw integers already reduced into `[0, modulus)` unless noted, and
 * every result is reduced into that range again.
 */

import type { SerialStorage, StorageKind } from "../types/serial.js";

/**
 * @interface ISerialArithmetic
 * @description Modular integer arithmetic for one bit width.
 */
export interface ISerialArithmetic<T extends SerialStorage> {
  /** Bit width W. */
  readonly bits: number;
  /** Runtime storage tag. */
  readonly storage: StorageKind;
  /** 2^W. */
  readonly modulus: T;
  /** 2^(W−1): the antipodal distance. */
  readonly halfRange: T;
  /** 2^W − 1. */
  readonly max: T;
  readonly zero: T;
  readonly one: T;

  /**
   * Whether `value` is a non-negative integer of this storage kind.
   * Does not check the width: out-of-range values are reduced by {@link reduce}.
   */
  isUnsigned(value: unknown): value is T;

  /** Whether `value` already lies in `[0, modulus)`. */
  isCanonical(value: T): boolean;

  /** `value mod 2^W` for any unsigned integer. */
  reduce(value: T): T;

  /** `(a + b) mod 2^W`. `b` may be any unsigned integer. */
  wrappingAdd(a: T, b: T): T;

  /** `(a − b) mod 2^W`. `b` may be any unsigned integer. */
  wrappingSub(a: T, b: T): T;

  /** Plain magnitude comparison `a < b`. */
  lessThan(a: T, b: T): boolean;

  /** Decimal rendering. */
  format(value: T): string;
}
