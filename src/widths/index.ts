/**
 * @module widths
 * @description Ready-made sequence spaces for the common counter widths.
 * 24 bits is included for protocols that pack a 3-byte counter.
 */

import type { SerialNumber } from "../primitives/serial-number.js";
import { defineBigSerialSpace, defineSerialSpace } from "../primitives/serial-space.js";

export const Serial8 = defineSerialSpace(8);
export const Serial16 = defineSerialSpace(16);
export const Serial24 = defineSerialSpace(24);
export const Serial32 = defineSerialSpace(32);
export const Serial64 = defineBigSerialSpace(64);

export type Serial8Number = SerialNumber<number, 8>;
export type Serial16Number = SerialNumber<number, 16>;
export type Serial24Number = SerialNumber<number, 24>;
export type Serial32Number = SerialNumber<number, 32>;
export type Serial64Number = SerialNumber<bigint, 64>;
