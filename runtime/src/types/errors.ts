/**
 * Error types and utilities for @cronmarket/runtime
 *
 * Provides the base runtime error class, the complete string error code
 * table, and helpers for inspecting errors raised by marketplace operations.
 */

// ============================================================================
// Runtime Error Codes
// ============================================================================

/**
 * String error codes for every failure a marketplace call can report.
 * Grouped by how the caller is expected to react.
 */
export const RuntimeErrorCodes = {
  // Admission-rejected: the call is refused, nothing was mutated
  /** Advertisement carries no pricing variant */
  EMPTY_PRICING: 'EMPTY_PRICING',
  /** Job start time has already passed */
  OVERDUE_MATCH: 'OVERDUE_MATCH',
  /** Number of proposed sources differs from the job's slot count */
  INCORRECT_SOURCE_COUNT: 'INCORRECT_SOURCE_COUNT',
  /** Source already holds an assignment for the job */
  DUPLICATE_SOURCE_IN_MATCH: 'DUPLICATE_SOURCE_IN_MATCH',
  /** Job only accepts attested sources and the source is not attested */
  UNVERIFIED_SOURCE_IN_MATCH: 'UNVERIFIED_SOURCE_IN_MATCH',
  /** Job would end after the provider's scheduling window */
  SCHEDULING_WINDOW_EXCEEDED: 'SCHEDULING_WINDOW_EXCEEDED',
  /** Job needs more memory than the provider offers */
  MAX_MEMORY_EXCEEDED: 'MAX_MEMORY_EXCEEDED',
  /** Job needs more network requests than the provider's quota */
  NETWORK_REQUEST_QUOTA_EXCEEDED: 'NETWORK_REQUEST_QUOTA_EXCEEDED',
  /** Provider has no remaining storage capacity */
  INSUFFICIENT_STORAGE_CAPACITY: 'INSUFFICIENT_STORAGE_CAPACITY',
  /** Source is not on the job's allowed-source list */
  SOURCE_NOT_ALLOWED: 'SOURCE_NOT_ALLOWED',
  /** Consumer is not on the provider's allowed-consumer list */
  CONSUMER_NOT_ALLOWED: 'CONSUMER_NOT_ALLOWED',
  /** Provider fees exceed the job's reward */
  INSUFFICIENT_REWARD: 'INSUFFICIENT_REWARD',
  /** Job executions collide with another job assigned to the provider */
  SCHEDULE_OVERLAP: 'SCHEDULE_OVERLAP',
  /** Matches in one call are rewarded in different assets */
  MULTIPLE_REWARD_ASSETS_IN_MATCH: 'MULTIPLE_REWARD_ASSETS_IN_MATCH',
  /** Match list is empty */
  EMPTY_MATCHING: 'EMPTY_MATCHING',
  /** Provider has not advertised */
  ADVERTISEMENT_NOT_FOUND: 'ADVERTISEMENT_NOT_FOUND',
  /** Provider has no pricing for the job's reward asset */
  ADVERTISEMENT_PRICING_NOT_FOUND: 'ADVERTISEMENT_PRICING_NOT_FOUND',
  /** Provider still holds assignments */
  CANNOT_DELETE_ADVERTISEMENT_WHILE_MATCHED: 'CANNOT_DELETE_ADVERTISEMENT_WHILE_MATCHED',
  /** Advertisement field outside its integer or amount range */
  INVALID_ADVERTISEMENT: 'INVALID_ADVERTISEMENT',
  /** Proposed start delay is not a non-negative integer */
  INVALID_START_DELAY: 'INVALID_START_DELAY',

  // Lifecycle violations
  /** Acknowledge for a job the caller is not matched to */
  CANNOT_ACKNOWLEDGE_WHEN_NOT_MATCHED: 'CANNOT_ACKNOWLEDGE_WHEN_NOT_MATCHED',
  /** Report before acknowledging the assignment */
  CANNOT_REPORT_WHEN_NOT_ACKNOWLEDGED: 'CANNOT_REPORT_WHEN_NOT_ACKNOWLEDGED',
  /** Report count would exceed the SLA total */
  MORE_REPORTS_THAN_EXPECTED: 'MORE_REPORTS_THAN_EXPECTED',
  /** Report does not coincide with any agreed execution */
  REPORT_OUTSIDE_SCHEDULE: 'REPORT_OUTSIDE_SCHEDULE',
  /** Report from a source without an assignment */
  REPORT_FROM_UNASSIGNED_SOURCE: 'REPORT_FROM_UNASSIGNED_SOURCE',
  /** Reported operation hash has the wrong length */
  INVALID_OPERATION_HASH: 'INVALID_OPERATION_HASH',

  // Arithmetic
  /** Checked arithmetic left the representable range */
  CALCULATION_OVERFLOW: 'CALCULATION_OVERFLOW',

  // Invariant violations (severe)
  /** Job status missing for a job the store references */
  JOB_STATUS_NOT_FOUND: 'JOB_STATUS_NOT_FOUND',
  /** Capacity missing for an advertised source */
  CAPACITY_NOT_FOUND: 'CAPACITY_NOT_FOUND',

  // Payments
  /** Escrow could not pay out */
  FAILED_TO_PAY: 'FAILED_TO_PAY',
  /** Consumer funds could not be locked */
  REWARD_LOCK_FAILED: 'REWARD_LOCK_FAILED',

  // Job registration
  /** No registration stored for the job */
  JOB_REGISTRATION_NOT_FOUND: 'JOB_REGISTRATION_NOT_FOUND',
  /** Script is not a valid ipfs url */
  INVALID_SCRIPT_VALUE: 'INVALID_SCRIPT_VALUE',
  /** Registration size or schedule field is not a non-negative integer */
  INVALID_JOB_REGISTRATION: 'INVALID_JOB_REGISTRATION',
  /** Allowed-source list is present but empty */
  TOO_FEW_ALLOWED_SOURCES: 'TOO_FEW_ALLOWED_SOURCES',
  /** Allowed-source list exceeds its bound */
  TOO_MANY_ALLOWED_SOURCES: 'TOO_MANY_ALLOWED_SOURCES',
  /** Schedule duration is zero */
  JOB_REGISTRATION_ZERO_DURATION: 'JOB_REGISTRATION_ZERO_DURATION',
  /** Schedule has more executions than allowed */
  JOB_REGISTRATION_SCHEDULE_EXCEEDS_MAXIMUM_EXECUTIONS:
    'JOB_REGISTRATION_SCHEDULE_EXCEEDS_MAXIMUM_EXECUTIONS',
  /** Schedule has no execution */
  JOB_REGISTRATION_SCHEDULE_CONTAINS_ZERO_EXECUTIONS:
    'JOB_REGISTRATION_SCHEDULE_CONTAINS_ZERO_EXECUTIONS',
  /** Schedule duration is not shorter than its interval */
  JOB_REGISTRATION_DURATION_EXCEEDS_INTERVAL: 'JOB_REGISTRATION_DURATION_EXCEEDS_INTERVAL',
  /** Schedule starts in the past */
  JOB_REGISTRATION_START_IN_PAST: 'JOB_REGISTRATION_START_IN_PAST',
  /** Schedule ends before it starts */
  JOB_REGISTRATION_END_BEFORE_START: 'JOB_REGISTRATION_END_BEFORE_START',
  /** Job requests zero slots */
  JOB_REGISTRATION_ZERO_SLOTS: 'JOB_REGISTRATION_ZERO_SLOTS',
  /** Job requests more slots than allowed */
  JOB_REGISTRATION_TOO_MANY_SLOTS: 'JOB_REGISTRATION_TOO_MANY_SLOTS',
  /** Job offers a zero reward */
  JOB_REGISTRATION_ZERO_REWARD: 'JOB_REGISTRATION_ZERO_REWARD',
  /** Job can no longer be changed in its current status */
  JOB_REGISTRATION_UNMODIFIABLE: 'JOB_REGISTRATION_UNMODIFIABLE',

  // Collaborators and plumbing
  /** Reward asset rejected by the asset validator */
  ASSET_NOT_ALLOWED: 'ASSET_NOT_ALLOWED',
  /** Bounded container received too many items */
  LENGTH_EXCEEDED: 'LENGTH_EXCEEDED',
  /** Clock did not produce a usable millisecond timestamp */
  FAILED_TIMESTAMP_CONVERSION: 'FAILED_TIMESTAMP_CONVERSION',
  /** Configuration file missing, unreadable or invalid */
  CONFIG_VALIDATION_ERROR: 'CONFIG_VALIDATION_ERROR',
} as const;

/** Union type of all runtime error code values */
export type RuntimeErrorCode = (typeof RuntimeErrorCodes)[keyof typeof RuntimeErrorCodes];

// ============================================================================
// Base Runtime Error Class
// ============================================================================

/**
 * Base class for all runtime errors.
 *
 * @example
 * ```typescript
 * try {
 *   marketplace.proposeMatching(matcher, matches);
 * } catch (err) {
 *   if (err instanceof RuntimeError) {
 *     console.log(`Runtime error: ${err.code} - ${err.message}`);
 *   }
 * }
 * ```
 */
export class RuntimeError extends Error {
  /** The error code identifying this error type */
  public readonly code: RuntimeErrorCode;

  constructor(message: string, code: RuntimeErrorCode) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
    // Maintain proper stack trace in V8 environments.
    // Using this.constructor ensures subclass constructors are hidden from the
    // stack, making the redundant captureStackTrace calls in subclasses unnecessary.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// ============================================================================
// Shared Error Classes
// ============================================================================

/**
 * Error thrown when checked arithmetic would leave the representable range.
 *
 * @example
 * ```typescript
 * const total = checkedMulAmount(fee, BigInt(count), 'total fee');
 * ```
 */
export class CalculationOverflowError extends RuntimeError {
  /** What was being calculated */
  public readonly operation: string;

  constructor(operation: string) {
    super(`Calculation overflow in ${operation}`, RuntimeErrorCodes.CALCULATION_OVERFLOW);
    this.name = 'CalculationOverflowError';
    this.operation = operation;
  }
}

/**
 * Error thrown when a bounded container receives more items than it holds.
 */
export class LengthExceededError extends RuntimeError {
  /** Name of the bounded collection */
  public readonly collection: string;
  /** The configured maximum */
  public readonly max: number;
  /** The number of items supplied */
  public readonly actual: number;

  constructor(collection: string, max: number, actual: number) {
    super(
      `${collection} holds at most ${max} ${max === 1 ? 'item' : 'items'}, got ${actual}`,
      RuntimeErrorCodes.LENGTH_EXCEEDED,
    );
    this.name = 'LengthExceededError';
    this.collection = collection;
    this.max = max;
    this.actual = actual;
  }
}

/**
 * Error thrown when the clock returns something that is not a millisecond
 * timestamp.
 */
export class TimestampConversionError extends RuntimeError {
  constructor(value: number) {
    super(
      `Clock returned an invalid millisecond timestamp: ${value}`,
      RuntimeErrorCodes.FAILED_TIMESTAMP_CONVERSION,
    );
    this.name = 'TimestampConversionError';
  }
}

/**
 * Error thrown when a configuration file cannot be used.
 */
export class ConfigValidationError extends RuntimeError {
  /** Individual validation problems */
  public readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(message, RuntimeErrorCodes.CONFIG_VALIDATION_ERROR);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check whether an error is a runtime error carrying the given code.
 *
 * @example
 * ```typescript
 * try {
 *   marketplace.report(source, jobId, false, result);
 * } catch (err) {
 *   if (hasErrorCode(err, RuntimeErrorCodes.REPORT_OUTSIDE_SCHEDULE)) {
 *     // retry once the next execution window opens
 *   }
 * }
 * ```
 */
export function hasErrorCode(error: unknown, code: RuntimeErrorCode): boolean {
  return error instanceof RuntimeError && error.code === code;
}

/**
 * Extract a human-readable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
