/**
 * @module primitives/arithmetic
 * @description Modular arithmetic for the two storage kinds.
 *
 * `number` covers widths up to 32 bits: operands stay below 2^32, so
 * every intermediate sum or difference is an exact safe integer.
 * `bigint` covers widths up to 64 bits using `BigInt.asUintN`.
 */

import type { ISerialArithmetic } from "../interfaces/arithmetic.js";
import { SerialError } from "../interfaces/serial-number.js";

/** Widest space representable with `number` storage. */
export const MAX_NUMBER_BITS = 32;

/** Widest space representable with `bigint` storage. */
export const MAX_BIGINT_BITS = 64;

function assertWidth(bits: number, limit: number): void {
  if (!Number.isInteger(bits) || bits < 1 || bits > limit) {
    throw new SerialError(
      `Serial width must be an integer in [1, ${limit}], got ${bits}`,
      "INVALID_WIDTH"
    );
  }
}

// ─── number ─────────────────────────────────────────────────────────

export class NumberArithmetic implements ISerialArithmetic<number> {
  readonly storage = "number";
  readonly modulus: number;
  readonly halfRange: number;
  readonly max: number;
  readonly zero = 0;
  readonly one = 1;

  constructor(readonly bits: number) {
    assertWidth(bits, MAX_NUMBER_BITS);
    this.modulus = 2 ** bits;
    this.halfRange = 2 ** (bits - 1);
    this.max = this.modulus - 1;
  }

  isUnsigned(value: unknown): value is number {
    return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
  }

  isCanonical(value: number): boolean {
    return this.isUnsigned(value) && value < this.modulus;
  }

  reduce(value: number): number {
    // + 0 folds -0 into 0
    return (value % this.modulus) + 0;
  }

  wrappingAdd(a: number, b: number): number {
    return (a + (b % this.modulus)) % this.modulus;
  }

  wrappingSub(a: number, b: number): number {
    return (a - (b % this.modulus) + this.modulus) % this.modulus;
  }

  lessThan(a: number, b: number): boolean {
    return a < b;
  }

  format(value: number): string {
    return String(value);
  }
}

// ─── bigint ─────────────────────────────────────────────────────────

export class BigIntArithmetic implements ISerialArithmetic<bigint> {
  readonly storage = "bigint";
  readonly modulus: bigint;
  readonly halfRange: bigint;
  readonly max: bigint;
  readonly zero = 0n;
  readonly one = 1n;

  constructor(readonly bits: number) {
    assertWidth(bits, MAX_BIGINT_BITS);
    this.modulus = 1n << BigInt(bits);
    this.halfRange = 1n << BigInt(bits - 1);
    this.max = this.modulus - 1n;
  }

  isUnsigned(value: unknown): value is bigint {
    return typeof value === "bigint" && value >= 0n;
  }

  isCanonical(value: bigint): boolean {
    return this.isUnsigned(value) && value < this.modulus;
  }

  reduce(value: bigint): bigint {
    return BigInt.asUintN(this.bits, value);
  }

  wrappingAdd(a: bigint, b: bigint): bigint {
    return BigInt.asUintN(this.bits, a + b);
  }

  wrappingSub(a: bigint, b: bigint): bigint {
    return BigInt.asUintN(this.bits, a - b);
  }

  lessThan(a: bigint, b: bigint): boolean {
    return a < b;
  }

  format(value: bigint): string {
    return value.toString();
  }
}
