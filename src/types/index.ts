/**
 * @module types
 * @description Public type exports for serial number arithmetic.
 */

export * from "./branded.js";
export * from "./serial.js";
export * from "./events.js";
