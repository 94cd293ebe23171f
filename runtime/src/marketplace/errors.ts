/**
 * Marketplace error types.
 *
 * @module
 */

import { RuntimeError, RuntimeErrorCodes } from '../types/errors.js';

/** Codes raised when a proposed match or advertisement change is rejected. */
export type MatchAdmissionCode =
  | typeof RuntimeErrorCodes.EMPTY_PRICING
  | typeof RuntimeErrorCodes.OVERDUE_MATCH
  | typeof RuntimeErrorCodes.INCORRECT_SOURCE_COUNT
  | typeof RuntimeErrorCodes.DUPLICATE_SOURCE_IN_MATCH
  | typeof RuntimeErrorCodes.UNVERIFIED_SOURCE_IN_MATCH
  | typeof RuntimeErrorCodes.SCHEDULING_WINDOW_EXCEEDED
  | typeof RuntimeErrorCodes.MAX_MEMORY_EXCEEDED
  | typeof RuntimeErrorCodes.NETWORK_REQUEST_QUOTA_EXCEEDED
  | typeof RuntimeErrorCodes.INSUFFICIENT_STORAGE_CAPACITY
  | typeof RuntimeErrorCodes.SOURCE_NOT_ALLOWED
  | typeof RuntimeErrorCodes.CONSUMER_NOT_ALLOWED
  | typeof RuntimeErrorCodes.INSUFFICIENT_REWARD
  | typeof RuntimeErrorCodes.MULTIPLE_REWARD_ASSETS_IN_MATCH
  | typeof RuntimeErrorCodes.EMPTY_MATCHING
  | typeof RuntimeErrorCodes.ADVERTISEMENT_NOT_FOUND
  | typeof RuntimeErrorCodes.ADVERTISEMENT_PRICING_NOT_FOUND
  | typeof RuntimeErrorCodes.CANNOT_DELETE_ADVERTISEMENT_WHILE_MATCHED
  | typeof RuntimeErrorCodes.INVALID_ADVERTISEMENT
  | typeof RuntimeErrorCodes.INVALID_START_DELAY;

/** Codes raised by acknowledge and report. */
export type AssignmentLifecycleCode =
  | typeof RuntimeErrorCodes.CANNOT_ACKNOWLEDGE_WHEN_NOT_MATCHED
  | typeof RuntimeErrorCodes.CANNOT_REPORT_WHEN_NOT_ACKNOWLEDGED
  | typeof RuntimeErrorCodes.MORE_REPORTS_THAN_EXPECTED
  | typeof RuntimeErrorCodes.REPORT_OUTSIDE_SCHEDULE
  | typeof RuntimeErrorCodes.REPORT_FROM_UNASSIGNED_SOURCE
  | typeof RuntimeErrorCodes.INVALID_OPERATION_HASH;

/** Store inconsistencies. Always a bug, never a caller mistake. */
export type InvariantCode =
  | typeof RuntimeErrorCodes.JOB_STATUS_NOT_FOUND
  | typeof RuntimeErrorCodes.CAPACITY_NOT_FOUND;

export type RewardPaymentCode =
  | typeof RuntimeErrorCodes.FAILED_TO_PAY
  | typeof RuntimeErrorCodes.REWARD_LOCK_FAILED;

export type JobRegistrationCode =
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_NOT_FOUND
  | typeof RuntimeErrorCodes.INVALID_SCRIPT_VALUE
  | typeof RuntimeErrorCodes.INVALID_JOB_REGISTRATION
  | typeof RuntimeErrorCodes.TOO_FEW_ALLOWED_SOURCES
  | typeof RuntimeErrorCodes.TOO_MANY_ALLOWED_SOURCES
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_ZERO_DURATION
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_SCHEDULE_EXCEEDS_MAXIMUM_EXECUTIONS
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_SCHEDULE_CONTAINS_ZERO_EXECUTIONS
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_DURATION_EXCEEDS_INTERVAL
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_START_IN_PAST
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_END_BEFORE_START
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_ZERO_SLOTS
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_TOO_MANY_SLOTS
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_ZERO_REWARD
  | typeof RuntimeErrorCodes.JOB_REGISTRATION_UNMODIFIABLE;

export class MatchAdmissionError extends RuntimeError {
  constructor(code: MatchAdmissionCode, message: string) {
    super(message, code);
    this.name = 'MatchAdmissionError';
  }
}

export class AssignmentLifecycleError extends RuntimeError {
  constructor(code: AssignmentLifecycleCode, message: string) {
    super(message, code);
    this.name = 'AssignmentLifecycleError';
  }
}

export class MarketplaceInvariantError extends RuntimeError {
  constructor(code: InvariantCode, message: string) {
    super(message, code);
    this.name = 'MarketplaceInvariantError';
  }
}

export class RewardPaymentError extends RuntimeError {
  constructor(code: RewardPaymentCode, message: string) {
    super(message, code);
    this.name = 'RewardPaymentError';
  }
}

export class JobRegistrationError extends RuntimeError {
  constructor(code: JobRegistrationCode, message: string) {
    super(message, code);
    this.name = 'JobRegistrationError';
  }
}

export class AssetNotAllowedError extends RuntimeError {
  public readonly assetId: string;

  constructor(assetId: string) {
    super(`Reward asset "${assetId}" is not allowed`, RuntimeErrorCodes.ASSET_NOT_ALLOWED);
    this.name = 'AssetNotAllowedError';
    this.assetId = assetId;
  }
}

