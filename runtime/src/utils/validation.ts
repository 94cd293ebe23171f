/**
 * Shared validation helpers for accumulate-errors validators.
 *
 * Used by the marketplace config loader. Each check function pushes errors
 * onto a shared array so callers can report all problems at once.
 *
 * @module
 */

// ============================================================================
// Result type
// ============================================================================

/** Outcome of an accumulate-errors validation pass. */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** Build a {@link ValidationResult} from an error list. */
export function validationResult(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

// ============================================================================
// Type guards
// ============================================================================

/** Check if a value is a non-null, non-array object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Field checks
// ============================================================================

/** Push an error if `value` is not one of the allowed strings. */
export function requireOneOf(
  value: unknown,
  field: string,
  allowed: ReadonlySet<string>,
  errors: string[],
): void {
  if (typeof value !== "string" || !allowed.has(value)) {
    errors.push(`${field} must be one of: ${[...allowed].join(", ")}`);
  }
}

/** Push an error if `value` is not a safe integer in [min, max]. */
export function requireIntRange(
  value: unknown,
  field: string,
  min: number,
  max: number,
  errors: string[],
): void {
  if (
    typeof value !== "number" ||
    !Number.isSafeInteger(value) ||
    value < min ||
    value > max
  ) {
    errors.push(`${field} must be an integer between ${min} and ${max}`);
  }
}

/**
 * Check an optional object-valued field.
 * Returns the record when present and valid, `undefined` otherwise.
 */
export function optionalRecord(
  value: unknown,
  field: string,
  errors: string[],
): Record<string, unknown> | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    errors.push(`${field} must be an object`);
    return undefined;
  }
  return value;
}
