/**
 * Checked and saturating arithmetic.
 *
 * Millisecond values (timestamps, durations, delays) and storage sizes are
 * plain `number`s and must stay safe integers. Asset amounts are `bigint`s
 * confined to the unsigned 128-bit range. Every helper throws
 * {@link CalculationOverflowError} instead of wrapping or losing precision.
 *
 * @module
 */

import { CalculationOverflowError } from '../types/errors.js';

/** Largest millisecond value the runtime can represent exactly. */
export const MAX_SAFE_MILLIS = Number.MAX_SAFE_INTEGER;

/** Largest asset amount (u128). */
export const MAX_AMOUNT = (1n << 128n) - 1n;

/** True for integers in [0, 2^53 - 1]. */
export function isNonNegativeSafeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/** True for amounts in [0, 2^128 - 1]. */
export function isValidAmount(value: bigint): boolean {
  return value >= 0n && value <= MAX_AMOUNT;
}

function ensureSafe(result: number, operation: string): number {
  if (!Number.isSafeInteger(result)) {
    throw new CalculationOverflowError(operation);
  }
  return result;
}

/** a + b, both safe integers, result a safe integer. */
export function checkedAdd(a: number, b: number, operation: string): number {
  return ensureSafe(ensureSafe(a, operation) + ensureSafe(b, operation), operation);
}

/** a - b, both safe integers, result a safe integer. */
export function checkedSub(a: number, b: number, operation: string): number {
  return ensureSafe(ensureSafe(a, operation) - ensureSafe(b, operation), operation);
}

/** a * b, both safe integers, result a safe integer. */
export function checkedMul(a: number, b: number, operation: string): number {
  return ensureSafe(ensureSafe(a, operation) * ensureSafe(b, operation), operation);
}

/** a + b clamped to the safe integer range. */
export function saturatingAdd(a: number, b: number): number {
  return clampSafe(a + b);
}

/** a - b clamped to the safe integer range. */
export function saturatingSub(a: number, b: number): number {
  return clampSafe(a - b);
}

function clampSafe(value: number): number {
  if (value >= Number.MAX_SAFE_INTEGER) return Number.MAX_SAFE_INTEGER;
  if (value <= Number.MIN_SAFE_INTEGER) return Number.MIN_SAFE_INTEGER;
  return value;
}

function ensureAmount(value: bigint, operation: string): bigint {
  if (!isValidAmount(value)) {
    throw new CalculationOverflowError(operation);
  }
  return value;
}

/** a + b within the u128 range. */
export function checkedAddAmount(a: bigint, b: bigint, operation: string): bigint {
  return ensureAmount(ensureAmount(a, operation) + ensureAmount(b, operation), operation);
}

/** a - b within the u128 range; a negative result is an overflow. */
export function checkedSubAmount(a: bigint, b: bigint, operation: string): bigint {
  return ensureAmount(ensureAmount(a, operation) - ensureAmount(b, operation), operation);
}

/** a * b within the u128 range. */
export function checkedMulAmount(a: bigint, b: bigint, operation: string): bigint {
  return ensureAmount(ensureAmount(a, operation) * ensureAmount(b, operation), operation);
}

/** Widen a safe integer to an amount operand. */
export function toAmount(value: number, operation: string): bigint {
  if (!isNonNegativeSafeInteger(value)) {
    throw new CalculationOverflowError(operation);
  }
  return BigInt(value);
}
