/**
 * @module interfaces
 * @description Public interface exports for serial number arithmetic.
 */

export * from "./event-emitter.js";
export * from "./arithmetic.js";
export * from "./serial-number.js";
export * from "./serial-space.js";
export * from "./serial-counter.js";
