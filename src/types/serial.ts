/**
 * @module types/serial
 * @description Core value types for RFC 1982 serial number arithmetic.
 *
 * A serial number is an unsigned integer of a fixed bit width W whose
 * value space wraps at M = 2^W. Widths up to 32 bits are stored as
 * `number`; wider spaces (up to 64 bits) are stored as `bigint`.
 */

// ─── Storage ────────────────────────────────────────────────────────

/**
 * Primitive carrying the raw integer of a serial number.
 */
export type SerialStorage = number | bigint;

/**
 * Runtime tag for the storage kind of a sequence space.
 */
export type StorageKind = "number" | "bigint";

// ─── Ordering ───────────────────────────────────────────────────────

/**
 * Result of a three-way serial comparison of `a` against `b`.
 *
 * - `LESS`: `b` is ahead of `a` by less than half the modulus.
 * - `EQUAL`: identical values.
 * - `GREATER`: `a` is ahead of `b` by less than half the modulus.
 * - `UNDEFINED`: the values are exactly half the modulus apart
 *   (antipodal). RFC 1982 defines no order for this pair.
 */
export type SerialOrdering = "LESS" | "EQUAL" | "GREATER" | "UNDEFINED";

/**
 * Sign of a strict comparison, usable as an `Array.prototype.sort` result.
 */
export type SerialSign = -1 | 0 | 1;
