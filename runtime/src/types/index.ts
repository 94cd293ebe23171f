/**
 * Shared error types for @cronmarket/runtime
 * @module
 */

export {
  RuntimeErrorCodes,
  type RuntimeErrorCode,
  RuntimeError,
  CalculationOverflowError,
  LengthExceededError,
  TimestampConversionError,
  ConfigValidationError,
  hasErrorCode,
  errorMessage,
} from './errors.js';
