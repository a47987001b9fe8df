/**
 * @module primitives
 * @description Implementations of the serial arithmetic, spaces, values
 * and counters, plus the base event emitter.
 */

export { NumberArithmetic, BigIntArithmetic, MAX_NUMBER_BITS, MAX_BIGINT_BITS } from "./arithmetic.js";
export { SerialEmitter } from "./base-emitter.js";
export { SerialNumber } from "./serial-number.js";
export { SerialSpace, defineSerialSpace, defineBigSerialSpace } from "./serial-space.js";
export { SerialCounter } from "./serial-counter.js";
