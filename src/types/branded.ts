/**
 * @module types/branded
 * @description Branded types for compile-time safety across the envelope protocol.
 *
 * Wire-level integers share the JavaScript `number` representation, so a
 * message id could silently be passed where a type id is expected. Brands
 * make those mix-ups a compile error while costing nothing at runtime.
 *
 * @example
 * ```ts
 * const raw = 42;
 * // Type error: number is not assignable to MessageId
 * const id: MessageId = raw;
 * // Correct:
 * const id = toMessageId(raw);
 * ```
 */

/** Unique symbol for branding. Not exported. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Wire Format Brands ─────────────────────────────────────────────

/**
 * Compact message type identifier carried in the first header byte.
 * Registered types use 1–255; 0 is never assigned.
 */
export type TypeId = Brand<number, "TypeId">;

/**
 * Per-sender message identifier (uint16). Wraps to 0 after 65535.
 */
export type MessageId = Brand<number, "MessageId">;

/**
 * Seconds since the Unix epoch as a float64, on the sender's clock.
 */
export type Seconds = Brand<number, "Seconds">;

// ─── Addressing Brands ──────────────────────────────────────────────

/**
 * Acoustic modem address of a remote node (destination or source).
 */
export type ModemAddress = Brand<number, "ModemAddress">;

// ─── Constructors ───────────────────────────────────────────────────

export const MAX_TYPE_ID = 0xff;
export const MAX_MESSAGE_ID = 0xffff;

function isIntegerInRange(value: number, min: number, max: number): boolean {
  return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Brand a number as a TypeId.
 * @throws {RangeError} If the value is not an integer in 0–255.
 */
export function toTypeId(value: number): TypeId {
  if (!isIntegerInRange(value, 0, MAX_TYPE_ID)) {
    throw new RangeError(`Type id must be an integer in 0-${MAX_TYPE_ID}, got ${value}`);
  }
  return value as TypeId;
}

/**
 * Brand a number as a MessageId.
 * @throws {RangeError} If the value is not an integer in 0–65535.
 */
export function toMessageId(value: number): MessageId {
  if (!isIntegerInRange(value, 0, MAX_MESSAGE_ID)) {
    throw new RangeError(`Message id must be an integer in 0-${MAX_MESSAGE_ID}, got ${value}`);
  }
  return value as MessageId;
}

export function toSeconds(value: number): Seconds {
  return value as Seconds;
}

export function toModemAddress(value: number): ModemAddress {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`Modem address must be a non-negative integer, got ${value}`);
  }
  return value as ModemAddress;
}
