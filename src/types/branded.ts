/**
 * @module types/branded
 * @description Branded types for compile-time safety across the runtime.
 *
 * Branded types keep raw numbers from being passed where a protocol-level
 * value is expected. A plain `number` can never be used as a CycleId, and a
 * sequence counter can only be produced through {@link toSequenceNumber},
 * which applies the 16-bit wrap.
 *
 * @example
 * ```ts
 * const raw = 70000;
 * // Type error: number is not assignable to SequenceNumber
 * const seq: SequenceNumber = raw;
 * // Correct:
 * const seq = toSequenceNumber(raw); // 4464
 * ```
 */

/** Unique symbol for branding. Module-private. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Scheduler Brands ───────────────────────────────────────────────

/**
 * Stable index of a registered cycle inside the manager's fixed table.
 * Assigned in registration order starting at 0.
 */
export type CycleId = Brand<number, "CycleId">;

// ─── Wire Format Brands ─────────────────────────────────────────────

/**
 * A 16-bit frame sequence counter (0–65535). Wraps silently.
 */
export type SequenceNumber = Brand<number, "SequenceNumber">;

/** Number of distinct sequence values before the counter wraps. */
export const SEQUENCE_MODULUS = 0x10000;

/**
 * Reduce any integer to a 16-bit sequence number.
 */
export function toSequenceNumber(value: number): SequenceNumber {
  return (((value % SEQUENCE_MODULUS) + SEQUENCE_MODULUS) %
    SEQUENCE_MODULUS) as SequenceNumber;
}

/**
 * Advance a sequence number by one, wrapping at 2^16.
 */
export function nextSequence(sequence: SequenceNumber): SequenceNumber {
  return toSequenceNumber(sequence + 1);
}
