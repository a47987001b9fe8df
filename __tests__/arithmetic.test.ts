import { describe, it, expect } from "vitest";
import {
  NumberArithmetic,
  BigIntArithmetic,
} from "../src/primitives/arithmetic.js";
import { SerialSpace } from "../src/primitives/serial-space.js";
import { SerialError } from "../src/interfaces/serial-number.js";

describe("NumberArithmetic", () => {
  const u16 = new NumberArithmetic(16);

  it("should wrap addition and subtraction", () => {
    expect(u16.wrappingAdd(65535, 1)).toBe(0);
    expect(u16.wrappingAdd(65000, 1000)).toBe(464);
    expect(u16.wrappingSub(0, 1)).toBe(65535);
    expect(u16.wrappingSub(1000, 33000)).toBe(33536);
    expect(u16.wrappingSub(1000, 34000)).toBe(32536);
  });

  it("should reduce right-hand operands wider than the modulus", () => {
    expect(u16.wrappingAdd(1, 65536 * 3 + 2)).toBe(3);
    expect(u16.wrappingSub(1, 65536 * 3 + 2)).toBe(65535);
  });

  it("should stay exact at 32 bits", () => {
    const u32 = new NumberArithmetic(32);
    expect(u32.wrappingAdd(4_294_967_295, 4_294_967_295)).toBe(4_294_967_294);
    expect(u32.wrappingSub(0, 4_294_967_295)).toBe(1);
  });

  it("should tell canonical values from merely unsigned ones", () => {
    expect(u16.isUnsigned(70000)).toBe(true);
    expect(u16.isCanonical(70000)).toBe(false);
    expect(u16.isCanonical(65535)).toBe(true);
  });

  it("should throw SerialError for widths above 32", () => {
    expect(() => new NumberArithmetic(33)).toThrow(SerialError);
  });
});

describe("BigIntArithmetic", () => {
  const u64 = new BigIntArithmetic(64);

  it("should wrap addition and subtraction", () => {
    expect(u64.wrappingAdd(2n ** 64n - 1n, 1n)).toBe(0n);
    expect(u64.wrappingSub(0n, 1n)).toBe(2n ** 64n - 1n);
  });

  it("should support narrow widths", () => {
    const u8 = new BigIntArithmetic(8);
    expect(u8.modulus).toBe(256n);
    expect(u8.wrappingAdd(200n, 100n)).toBe(44n);
    expect(u8.reduce(511n)).toBe(255n);
  });

  it("should format as decimal", () => {
    expect(u64.format(2n ** 63n)).toBe("9223372036854775808");
  });
});

describe("SerialSpace constructor", () => {
  it("should reject arithmetic of a different width", () => {
    expect(() => new SerialSpace(16, new NumberArithmetic(8))).toThrow(SerialError);
  });
});
