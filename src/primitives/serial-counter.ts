/**
 * @module primitives/serial-counter
 * @description Mutable cursor issuing successive serial numbers.
 *
 * @example
 * ```ts
 * const counter = new SerialCounter({ space: Serial8, initial: 254 });
 * counter.on("SERIAL_WRAPPED", (e) => log.info(`wrapped ${e.wraps} times`));
 * counter.advance(); // 255
 * counter.advance(); // 0, emits SERIAL_WRAPPED
 * ```
 */

import { SerialEmitter } from "./base-emitter.js";
import type {
  ISerialCounter,
  SerialCounterConfig,
} from "../interfaces/serial-counter.js";
import type { ISerialNumber } from "../interfaces/serial-number.js";
import { SerialError } from "../interfaces/serial-number.js";
import type { ISerialSpace } from "../interfaces/serial-space.js";
import { unixNow } from "../types/branded.js";
import type { SerialStorage } from "../types/serial.js";

export class SerialCounter<T extends SerialStorage, W extends number>
  extends SerialEmitter<T>
  implements ISerialCounter<T, W>
{
  readonly space: ISerialSpace<T, W>;
  readonly step: T;

  private value: ISerialNumber<T, W>;
  private wrapCount = 0;

  /**
   * @throws {SerialError} OFFSET_OUT_OF_RANGE if `step` exceeds `space.maxIncrement`.
   * @throws {SerialError} INVALID_VALUE if `initial` is not an unsigned integer.
   */
  constructor(config: SerialCounterConfig<T, W>) {
    super();
    const { space } = config;
    const step = config.step ?? space.arithmetic.one;
    if (!space.isSafeIncrement(step)) {
      throw new SerialError(
        `Counter step ${String(step)} exceeds ${space.arithmetic.format(space.maxIncrement)} for a ${space.bits}-bit space`,
        "OFFSET_OUT_OF_RANGE"
      );
    }

    this.space = space;
    this.step = step;
    this.value = space.from(config.initial ?? space.arithmetic.zero);
  }

  current(): ISerialNumber<T, W> {
    return this.value;
  }

  advance(): ISerialNumber<T, W> {
    const previous = this.value;
    const next = previous.add(this.step);
    this.value = next;

    const wrapped = this.space.arithmetic.lessThan(next.value, previous.value);
    if (wrapped) {
      this.wrapCount++;
    }

    const timestamp = unixNow();
    this.emit({
      type: "SERIAL_ADVANCED",
      bits: this.space.bits,
      previous: previous.value,
      current: next.value,
      step: this.step,
      timestamp,
    });
    if (wrapped) {
      this.emit({
        type: "SERIAL_WRAPPED",
        bits: this.space.bits,
        previous: previous.value,
        current: next.value,
        wraps: this.wrapCount,
        timestamp,
      });
    }

    return next;
  }

  reset(raw: T): ISerialNumber<T, W> {
    const previous = this.value;
    this.value = this.space.from(raw);
    this.wrapCount = 0;

    this.emit({
      type: "SERIAL_RESET",
      bits: this.space.bits,
      previous: previous.value,
      current: this.value.value,
      timestamp: unixNow(),
    });

    return this.value;
  }

  wraps(): number {
    return this.wrapCount;
  }
}
