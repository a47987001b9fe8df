import { describe, it, expect } from "vitest";
import { SerialNumber } from "../src/primitives/serial-number.js";
import { defineSerialSpace } from "../src/primitives/serial-space.js";
import { SerialError } from "../src/interfaces/serial-number.js";
import {
  Serial8,
  Serial16,
  Serial24,
  Serial32,
  Serial64,
} from "../src/widths/index.js";

// ─── Helpers ───────────────────────────────────────────────────────

function errorCode(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof SerialError) {
      return error.code;
    }
    throw error;
  }
  return undefined;
}

// ─── Tests ──────────────────────────────────────────────────────────

describe("SerialNumber", () => {
  describe("constructor", () => {
    it("should accept canonical values", () => {
      const value = new SerialNumber(Serial8, 7);
      expect(value.equals(Serial8.from(7))).toBe(true);
    });

    it("should throw INVALID_VALUE for values outside [0, 2^W)", () => {
      expect(errorCode(() => new SerialNumber(Serial8, 256))).toBe("INVALID_VALUE");
      expect(errorCode(() => new SerialNumber(Serial64, 2n ** 64n))).toBe("INVALID_VALUE");
    });
  });

  describe("equals()", () => {
    it("should be reflexive and compare bitwise", () => {
      const a = Serial16.from(7);
      expect(a.equals(a)).toBe(true);
      expect(a.equals(Serial16.from(7))).toBe(true);
      expect(a.equals(Serial16.from(8))).toBe(false);
    });

    it("should treat separately defined spaces of the same width as one space", () => {
      const Other16 = defineSerialSpace(16);
      expect(Other16.from(5).equals(Serial16.from(5))).toBe(true);
      expect(Other16.from(5).compare(Serial16.from(4))).toBe("GREATER");
    });

    it("should never equate values of different widths", () => {
      const narrowBits: number = 8;
      const wideBits: number = 16;
      const narrow = defineSerialSpace(narrowBits);
      const wide = defineSerialSpace(wideBits);
      expect(narrow.from(5).equals(wide.from(5))).toBe(false);
    });
  });

  describe("compare()", () => {
    it("should never order a value against itself", () => {
      for (const raw of [0, 1, 32767, 32768, 65535]) {
        const a = Serial16.from(raw);
        expect(a.compare(a)).toBe("EQUAL");
        expect(a.isLessThan(a)).toBe(false);
        expect(a.isGreaterThan(a)).toBe(false);
      }
    });

    it("should reproduce the RFC 1982 16-bit examples", () => {
      expect(Serial16.from(1000).isLessThan(Serial16.from(33000))).toBe(true);
      expect(Serial16.from(1000).isGreaterThan(Serial16.from(33000))).toBe(false);
      expect(Serial16.from(1000).isGreaterThan(Serial16.from(34000))).toBe(true);
      expect(Serial16.from(1000).isLessThan(Serial16.from(34000))).toBe(false);
    });

    it("should report the antipodal pair as UNDEFINED", () => {
      const a = Serial16.from(0);
      const b = Serial16.from(32768);
      expect(a.compare(b)).toBe("UNDEFINED");
      expect(b.compare(a)).toBe("UNDEFINED");
      expect(a.isComparableTo(b)).toBe(false);
    });

    it("should answer false to every predicate for the antipodal pair", () => {
      const a = Serial8.from(10);
      const b = Serial8.from(138);
      expect(a.isLessThan(b)).toBe(false);
      expect(a.isLessThanOrEqual(b)).toBe(false);
      expect(a.isGreaterThan(b)).toBe(false);
      expect(a.isGreaterThanOrEqual(b)).toBe(false);
      expect(a.equals(b)).toBe(false);
    });

    it("should include equality in the non-strict predicates", () => {
      const a = Serial32.from(4_294_967_295);
      expect(a.isLessThanOrEqual(Serial32.from(4_294_967_295))).toBe(true);
      expect(a.isGreaterThanOrEqual(Serial32.from(4_294_967_295))).toBe(true);
      expect(a.isLessThanOrEqual(Serial32.from(3))).toBe(true);
      expect(a.isGreaterThanOrEqual(Serial32.from(3))).toBe(false);
    });

    it("should order 64-bit values across the wrap", () => {
      const a = Serial64.from(2n ** 64n - 3n);
      const b = Serial64.from(3n);
      expect(a.isLessThan(b)).toBe(true);
      expect(b.isGreaterThan(a)).toBe(true);
    });

    it("should throw WIDTH_MISMATCH when comparing across widths", () => {
      const narrowBits: number = 8;
      const wideBits: number = 16;
      const narrow = defineSerialSpace(narrowBits);
      const wide = defineSerialSpace(wideBits);
      expect(errorCode(() => narrow.from(1).compare(wide.from(1)))).toBe("WIDTH_MISMATCH");
      expect(errorCode(() => narrow.from(1).isLessThan(wide.from(2)))).toBe("WIDTH_MISMATCH");
    });
  });

  describe("compareStrict()", () => {
    it("should map orderings to signs", () => {
      expect(Serial16.from(1).compareStrict(Serial16.from(2))).toBe(-1);
      expect(Serial16.from(2).compareStrict(Serial16.from(2))).toBe(0);
      expect(Serial16.from(2).compareStrict(Serial16.from(1))).toBe(1);
    });

    it("should sort a window that straddles the wrap", () => {
      const values = [Serial16.from(2), Serial16.from(65535), Serial16.from(0)];
      const sorted = [...values].sort((a, b) => a.compareStrict(b));
      expect(sorted.map((v) => v.toRaw())).toEqual([65535, 0, 2]);
    });

    it("should throw INCOMPARABLE for the antipodal pair", () => {
      expect(() => Serial16.from(0).compareStrict(Serial16.from(32768))).toThrow(SerialError);
      expect(errorCode(() => Serial16.from(0).compareStrict(Serial16.from(32768)))).toBe(
        "INCOMPARABLE"
      );
    });
  });

  describe("max() / min()", () => {
    it("should pick the later and earlier value across the wrap", () => {
      const late = Serial16.from(2);
      const early = Serial16.from(65535);
      expect(early.max(late)).toBe(late);
      expect(late.max(early)).toBe(late);
      expect(early.min(late)).toBe(early);
      expect(late.min(early)).toBe(early);
    });

    it("should throw INCOMPARABLE for the antipodal pair", () => {
      expect(errorCode(() => Serial8.from(0).max(Serial8.from(128)))).toBe("INCOMPARABLE");
      expect(errorCode(() => Serial8.from(0).min(Serial8.from(128)))).toBe("INCOMPARABLE");
    });
  });

  describe("add()", () => {
    it("should add within the space", () => {
      expect(Serial32.from(1000).add(7).equals(Serial32.from(1007))).toBe(true);
    });

    it("should wrap past the modulus", () => {
      expect(Serial32.from(4_294_967_290).add(10).equals(Serial32.from(4))).toBe(true);
      expect(Serial64.from(2n ** 64n - 1n).add(2n).equals(Serial64.from(1n))).toBe(true);
    });

    it("should close every preset width: (M − 1) + 1 == 0", () => {
      expect(Serial8.from(255).add(1).equals(Serial8.zero)).toBe(true);
      expect(Serial16.from(65535).add(1).equals(Serial16.zero)).toBe(true);
      expect(Serial24.from(16_777_215).add(1).equals(Serial24.zero)).toBe(true);
      expect(Serial32.from(4_294_967_295).add(1).equals(Serial32.zero)).toBe(true);
      expect(Serial64.from(2n ** 64n - 1n).add(1n).equals(Serial64.zero)).toBe(true);
    });

    it("should move every 8-bit value forward for every legal offset", () => {
      for (let raw = 0; raw < 256; raw++) {
        const a = Serial8.from(raw);
        expect(a.add(0).compare(a)).toBe("EQUAL");
        for (let k = 1; k <= 127; k++) {
          if (a.add(k).compare(a) !== "GREATER") {
            throw new Error(`${raw} + ${k} did not compare greater`);
          }
        }
      }
    });

    it("should move 64-bit values forward by the largest legal offset", () => {
      const k = Serial64.maxIncrement;
      for (const raw of [0n, 1n, 2n ** 63n, 2n ** 64n - 1n]) {
        const a = Serial64.from(raw);
        expect(a.add(k).compare(a)).toBe("GREATER");
      }
    });

    it("should throw OFFSET_OUT_OF_RANGE at half the modulus or beyond", () => {
      expect(errorCode(() => Serial8.from(0).add(128))).toBe("OFFSET_OUT_OF_RANGE");
      expect(errorCode(() => Serial16.from(0).add(40000))).toBe("OFFSET_OUT_OF_RANGE");
      expect(errorCode(() => Serial64.from(0n).add(2n ** 63n))).toBe("OFFSET_OUT_OF_RANGE");
    });

    it("should throw OFFSET_OUT_OF_RANGE for negative or fractional offsets", () => {
      expect(errorCode(() => Serial8.from(0).add(-1))).toBe("OFFSET_OUT_OF_RANGE");
      expect(errorCode(() => Serial8.from(0).add(1.5))).toBe("OFFSET_OUT_OF_RANGE");
    });

    it("should leave the original value untouched", () => {
      const a = Serial16.from(10);
      a.add(5);
      expect(a.toRaw()).toBe(10);
    });
  });

  describe("next()", () => {
    it("should step by one and wrap", () => {
      expect(Serial32.from(0xffff_fffe).next().toRaw()).toBe(0xffff_ffff);
      expect(Serial32.from(0xffff_ffff).next().toRaw()).toBe(0);
    });
  });

  describe("wrappingAdd()", () => {
    it("should accept offsets of half the modulus and report the result as incomparable", () => {
      const a = Serial8.from(0);
      const b = a.wrappingAdd(128);
      expect(b.toRaw()).toBe(128);
      expect(b.compare(a)).toBe("UNDEFINED");
    });

    it("should reduce offsets larger than the modulus", () => {
      expect(Serial8.from(10).wrappingAdd(300).toRaw()).toBe(54);
      expect(Serial64.from(10n).wrappingAdd(2n ** 64n + 1n).toRaw()).toBe(11n);
    });

    it("should agree with add() inside the safe range", () => {
      expect(Serial16.from(65000).wrappingAdd(1000).equals(Serial16.from(65000).add(1000))).toBe(true);
    });

    it("should throw INVALID_VALUE for offsets that are not unsigned integers", () => {
      expect(errorCode(() => Serial8.from(0).wrappingAdd(-1))).toBe("INVALID_VALUE");
      expect(errorCode(() => Serial64.from(0n).wrappingAdd(-1n))).toBe("INVALID_VALUE");
    });
  });

  describe("conversion", () => {
    it("should return the raw integer", () => {
      expect(Serial16.from(42).toRaw()).toBe(42);
      expect(Serial16.from(42).value).toBe(42);
      expect(Serial64.from(42n).toRaw()).toBe(42n);
    });

    it("should render decimal strings", () => {
      expect(Serial16.from(42).toString()).toBe("42");
      expect(Serial64.from(2n ** 64n - 1n).toString()).toBe("18446744073709551615");
      expect(`${Serial8.from(300)}`).toBe("44");
    });
  });
});
