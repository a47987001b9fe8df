/**
 * @module types/branded
 * @description Branded types for compile-time safety across the library.
 *
 * Branded types keep raw primitives from being mistaken for values that
 * carry extra meaning. A plain number is not a UnixTimestamp until it is
 * produced by {@link unixNow}.
 */

/** Unique symbol for branding. Not exported — internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

/**
 * A Unix timestamp in seconds.
 */
export type UnixTimestamp = Brand<number, "UnixTimestamp">;

/** Current wall-clock time as a UnixTimestamp. */
export function unixNow(): UnixTimestamp {
  return Math.floor(Date.now() / 1000) as UnixTimestamp;
}
