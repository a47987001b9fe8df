/**
 * @module serial-arithmetic
 * @description RFC 1982 serial number arithmetic.
 *
 * Exports the value types, the interfaces, the arithmetic and space
 * implementations, the counter with its event system, and ready-made
 * 8, 16, 24, 32 and 64-bit spaces.
 *
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Primitives ─────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Preset Widths ──────────────────────────────────────────────────
export * from "./widths/index.js";
