/**
 * Utility exports for @cronmarket/runtime
 * @module
 */

export {
  type Logger,
  type LogLevel,
  DEFAULT_LOG_PREFIX,
  createLogger,
  isLogLevel,
  silentLogger,
} from './logger.js';

export {
  SCRIPT_PREFIX,
  SCRIPT_LENGTH,
  OPERATION_HASH_LENGTH,
  accountKey,
  jobKey,
  shortKey,
  isValidScript,
} from './encoding.js';

export {
  MAX_SAFE_MILLIS,
  MAX_AMOUNT,
  isNonNegativeSafeInteger,
  isValidAmount,
  checkedAdd,
  checkedSub,
  checkedMul,
  saturatingAdd,
  saturatingSub,
  checkedAddAmount,
  checkedSubAmount,
  checkedMulAmount,
  toAmount,
} from './numeric.js';

export { BoundedList } from './bounded.js';

export {
  type ValidationResult,
  validationResult,
  isRecord,
  requireOneOf,
  requireIntRange,
  optionalRecord,
} from './validation.js';
