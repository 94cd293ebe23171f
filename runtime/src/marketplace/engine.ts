/**
 * In-memory compute marketplace: advertisements, matching of jobs to
 * providers and the assignment lifecycle.
 *
 * Every public method is synchronous and all-or-nothing. Reads and writes go
 * through one staged {@link StoreTransaction} that is committed only after
 * every check passed; events are delivered after the commit. Reward locks
 * and payouts cannot be undone and therefore come after all checks.
 *
 * @module
 */

import type { PublicKey } from '@solana/web3.js';
import { checkSchedule, executionCount, fits, overlaps } from '../schedule/schedule.js';
import type { JobHooks, JobRegistry } from '../registry/types.js';
import type { AssetValidator, RewardManager } from '../rewards/types.js';
import type { SourceAttestation } from '../attestation/attestation.js';
import { RuntimeErrorCodes, TimestampConversionError, errorMessage } from '../types/errors.js';
import { BoundedList } from '../utils/bounded.js';
import { OPERATION_HASH_LENGTH, accountKey, jobKey, shortKey } from '../utils/encoding.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  checkedAdd,
  checkedAddAmount,
  checkedMulAmount,
  checkedSub,
  checkedSubAmount,
  MAX_SAFE_MILLIS,
  isNonNegativeSafeInteger,
  isValidAmount,
  saturatingAdd,
  saturatingSub,
  toAmount,
} from '../utils/numeric.js';
import { requireIntRange } from '../utils/validation.js';
import {
  AssignmentLifecycleError,
  JobRegistrationError,
  MarketplaceInvariantError,
  MatchAdmissionError,
  RewardPaymentError,
  type InvariantCode,
} from './errors.js';
import { checkSchedulingWindow, feePerExecution, totalRewardAmount } from './pricing.js';
import { MarketplaceStore, type StoreTransaction } from './store.js';
import type {
  AdvertisementRestriction,
  Advertisement,
  AllowedSourcesUpdate,
  Assignment,
  AssignmentRecord,
  ComputeMarketplaceOptions,
  ExecutionResult,
  JobId,
  JobRegistration,
  JobStatus,
  MarketplaceEvents,
  MarketplaceLimits,
  Match,
  PlannedExecution,
  PricingVariant,
  Reward,
} from './types.js';

export const DEFAULT_MARKETPLACE_LIMITS: Readonly<MarketplaceLimits> = {
  reportToleranceMs: 12_000,
  maxExecutionsPerJob: 1_000,
  maxPricingVariants: 100,
  maxAllowedConsumers: 100,
  maxSlots: 64,
};

/** Events are queued while a transaction is open and delivered after commit. */
type PendingEvent = () => void;

interface AdmittedSlot {
  fee: bigint;
  capacity: number;
}

export class ComputeMarketplace implements JobHooks {
  private readonly store = new MarketplaceStore();
  private readonly registry: JobRegistry;
  private readonly rewards: RewardManager;
  private readonly assets: AssetValidator;
  private readonly attestation: SourceAttestation;
  private readonly limits: MarketplaceLimits;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private events: MarketplaceEvents = {};

  constructor(options: ComputeMarketplaceOptions) {
    this.registry = options.registry;
    this.rewards = options.rewards;
    this.assets = options.assets;
    this.attestation = options.attestation;
    this.limits = { ...DEFAULT_MARKETPLACE_LIMITS, ...(options.limits ?? {}) };
    this.clock = options.now ?? Date.now;
    this.logger = (options.logger ?? silentLogger).child('marketplace');
  }

  /** Register event callbacks, merging with those already set. */
  on(events: MarketplaceEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ==========================================================================
  // Advertisements
  // ==========================================================================

  /**
   * Store or update the caller's advertisement.
   *
   * Remaining capacity follows the change in advertised capacity and may go
   * negative; pricing variants are upserted per asset.
   */
  advertise(source: PublicKey, advertisement: Advertisement): void {
    if (advertisement.pricing.length === 0) {
      throw new MatchAdmissionError(RuntimeErrorCodes.EMPTY_PRICING, 'Advertisement must contain pricing');
    }
    const pricing = BoundedList.from(advertisement.pricing, this.limits.maxPricingVariants, 'pricing');
    const allowedConsumers =
      advertisement.allowedConsumers === undefined
        ? undefined
        : BoundedList.from(advertisement.allowedConsumers, this.limits.maxAllowedConsumers, 'allowedConsumers').items;
    const errors = advertisementErrors(advertisement);
    if (errors.length > 0) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.INVALID_ADVERTISEMENT,
        `Invalid advertisement: ${errors.join('; ')}`,
      );
    }
    for (const variant of pricing) {
      this.assets.validate(variant.rewardAsset);
    }

    const key = accountKey(source);
    const tx = this.store.begin();
    const previous = tx.restrictions.get(key);
    const capacity =
      previous === undefined
        ? advertisement.storageCapacity
        : saturatingSub(
            saturatingAdd(tx.capacity.get(key) ?? 0, advertisement.storageCapacity),
            previous.storageCapacity,
          );

    tx.capacity.set(key, capacity);
    tx.restrictions.set(key, {
      maxMemory: advertisement.maxMemory,
      networkRequestQuota: advertisement.networkRequestQuota,
      storageCapacity: advertisement.storageCapacity,
      allowedConsumers,
    });
    for (const variant of pricing) {
      tx.pricing.set(key, variant.rewardAsset, variant);
    }
    tx.commit();

    this.logger.debug(`Advertisement stored for ${shortKey(key)}, capacity ${capacity}`);
    this.events.onAdvertisementStored?.(source, advertisement);
  }

  /** Remove the caller's advertisement. Refused while it holds assignments. */
  deleteAdvertisement(source: PublicKey): void {
    const key = accountKey(source);
    const tx = this.store.begin();
    if (!tx.restrictions.has(key)) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.ADVERTISEMENT_NOT_FOUND,
        `No advertisement for ${shortKey(key)}`,
      );
    }
    if (tx.assignments.hasAny(key)) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.CANNOT_DELETE_ADVERTISEMENT_WHILE_MATCHED,
        `${shortKey(key)} still holds assignments`,
      );
    }

    tx.pricing.deletePrefix(key);
    tx.capacity.delete(key);
    tx.restrictions.delete(key);
    tx.commit();

    this.logger.debug(`Advertisement removed for ${shortKey(key)}`);
    this.events.onAdvertisementRemoved?.(source);
  }

  // ==========================================================================
  // Matching
  // ==========================================================================

  /**
   * Admit every match or none, then pay the unspent budget to `caller`.
   *
   * The payout happens after the commit. If it fails the matches stay in
   * place and {@link RewardPaymentError} is thrown.
   *
   * @returns the reward paid to the caller
   */
  proposeMatching(caller: PublicKey, matches: readonly Match[]): Reward {
    const now = this.now();
    const tx = this.store.begin();
    const pending: PendingEvent[] = [];

    const remaining = this.processMatching(tx, matches, now, pending);
    tx.commit();
    this.flush(pending);
    this.logger.info(`Matched ${matches.length} job(s), ${remaining.amount} ${remaining.assetId} to matcher`);

    this.pay(() => this.rewards.payMatcherReward(remaining, caller), 'matcher reward', caller);
    return remaining;
  }

  private processMatching(
    tx: StoreTransaction,
    matches: readonly Match[],
    now: number,
    pending: PendingEvent[],
  ): Reward {
    let remaining: Reward | null = null;

    for (const match of matches) {
      const registration = this.requireRegistration(match.jobId);
      const { schedule, requirements } = registration;
      const key = jobKey(match.jobId);

      if (now >= schedule.startTime) {
        throw new MatchAdmissionError(
          RuntimeErrorCodes.OVERDUE_MATCH,
          `Job ${key} started at ${schedule.startTime}`,
        );
      }
      if (match.sources.length !== requirements.slots) {
        throw new MatchAdmissionError(
          RuntimeErrorCodes.INCORRECT_SOURCE_COUNT,
          `Job ${key} needs ${requirements.slots} source(s), got ${match.sources.length}`,
        );
      }
      const assetId = requirements.reward.assetId;
      this.assets.validate(assetId);

      const count = executionCount(schedule);
      let totalFee = 0n;

      for (const [slot, planned] of match.sources.entries()) {
        const admitted = this.admitSlot(tx, match.jobId, registration, planned, now);
        totalFee = checkedAddAmount(
          totalFee,
          checkedMulAmount(admitted.fee, toAmount(count, 'total fee'), 'total fee'),
          'total fee',
        );

        const sourceKey = accountKey(planned.source);
        if (tx.assignments.get(sourceKey, key) !== undefined) {
          throw new MatchAdmissionError(
            RuntimeErrorCodes.DUPLICATE_SOURCE_IN_MATCH,
            `${shortKey(sourceKey)} is already assigned to job ${key}`,
          );
        }
        tx.assignments.set(sourceKey, key, {
          source: planned.source,
          jobId: match.jobId,
          assignment: {
            slot,
            startDelay: planned.startDelay,
            feePerExecution: { assetId, amount: admitted.fee },
            acknowledged: false,
            sla: { total: count, met: 0 },
          },
        });
        tx.capacity.set(sourceKey, checkedSub(admitted.capacity, registration.storage, 'remaining capacity'));
      }

      const totalReward = totalRewardAmount(registration);
      if (totalFee > totalReward) {
        throw new MatchAdmissionError(
          RuntimeErrorCodes.INSUFFICIENT_REWARD,
          `Job ${key} pays ${totalReward} in total, fees amount to ${totalFee}`,
        );
      }
      const diff = checkedSubAmount(totalReward, totalFee, 'remaining reward');

      if (remaining === null) {
        remaining = { assetId, amount: diff };
      } else if (remaining.assetId !== assetId) {
        throw new MatchAdmissionError(
          RuntimeErrorCodes.MULTIPLE_REWARD_ASSETS_IN_MATCH,
          `Matches mix reward assets ${remaining.assetId} and ${assetId}`,
        );
      } else {
        remaining = { assetId, amount: checkedAddAmount(remaining.amount, diff, 'remaining reward') };
      }

      tx.jobStatus.set(key, { kind: 'matched' });
      pending.push(() => this.events.onJobRegistrationMatched?.(match));
    }

    if (remaining === null) {
      throw new MatchAdmissionError(RuntimeErrorCodes.EMPTY_MATCHING, 'No matches proposed');
    }
    return remaining;
  }

  /** All per-slot checks, in order. Returns the fee and the provider's capacity. */
  private admitSlot(
    tx: StoreTransaction,
    jobId: JobId,
    registration: JobRegistration,
    planned: PlannedExecution,
    now: number,
  ): AdmittedSlot {
    const { schedule } = registration;
    const sourceKey = accountKey(planned.source);
    const short = shortKey(sourceKey);

    if (!isNonNegativeSafeInteger(planned.startDelay)) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.INVALID_START_DELAY,
        `Start delay ${planned.startDelay} for ${short} is not a non-negative integer`,
      );
    }
    if (registration.allowOnlyVerifiedSources && !this.attestation.isSourceVerified(planned.source, now)) {
      throw new MatchAdmissionError(RuntimeErrorCodes.UNVERIFIED_SOURCE_IN_MATCH, `${short} is not attested`);
    }

    const restriction = tx.restrictions.get(sourceKey);
    if (!restriction) {
      throw new MatchAdmissionError(RuntimeErrorCodes.ADVERTISEMENT_NOT_FOUND, `No advertisement for ${short}`);
    }
    const assetId = registration.requirements.reward.assetId;
    const pricing = tx.pricing.get(sourceKey, assetId);
    if (!pricing) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.ADVERTISEMENT_PRICING_NOT_FOUND,
        `${short} has no pricing for ${assetId}`,
      );
    }

    checkSchedulingWindow(pricing.schedulingWindow, schedule, planned.startDelay, now);

    if (restriction.maxMemory < registration.memory) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.MAX_MEMORY_EXCEEDED,
        `${short} offers ${restriction.maxMemory} bytes of memory, job needs ${registration.memory}`,
      );
    }
    // duration is in ms, requests and quota per second
    if (
      BigInt(schedule.duration) * BigInt(restriction.networkRequestQuota) <
      BigInt(registration.networkRequests) * 1000n
    ) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.NETWORK_REQUEST_QUOTA_EXCEEDED,
        `${short} allows ${restriction.networkRequestQuota} requests/s, job needs ${registration.networkRequests}`,
      );
    }

    const capacity = tx.capacity.get(sourceKey);
    if (capacity === undefined) {
      throw this.invariant(RuntimeErrorCodes.CAPACITY_NOT_FOUND, `No capacity recorded for ${short}`);
    }
    if (capacity <= 0) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.INSUFFICIENT_STORAGE_CAPACITY,
        `${short} has no storage capacity left`,
      );
    }

    if (!isWhitelisted(planned.source, registration.allowedSources)) {
      throw new MatchAdmissionError(RuntimeErrorCodes.SOURCE_NOT_ALLOWED, `${short} is not an allowed source`);
    }
    if (!isWhitelisted(jobId.consumer, restriction.allowedConsumers)) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.CONSUMER_NOT_ALLOWED,
        `${short} does not accept jobs from ${shortKey(accountKey(jobId.consumer))}`,
      );
    }

    const key = jobKey(jobId);
    for (const [otherKey, other] of tx.assignments.entries(sourceKey)) {
      // the same pair is reported as a duplicate, not an overlap
      if (otherKey === key) continue;
      const otherRegistration = this.requireRegistration(other.jobId);
      fits(schedule, planned.startDelay, otherRegistration.schedule, other.assignment.startDelay);
    }

    const fee = feePerExecution(registration, pricing);
    if (fee > registration.requirements.reward.amount) {
      throw new MatchAdmissionError(
        RuntimeErrorCodes.INSUFFICIENT_REWARD,
        `${short} charges ${fee} per execution, job pays ${registration.requirements.reward.amount}`,
      );
    }

    return { fee, capacity };
  }

  // ==========================================================================
  // Assignment lifecycle
  // ==========================================================================

  /** Accept an assignment. A repeated acknowledge is a no-op. */
  acknowledgeMatch(source: PublicKey, jobId: JobId): void {
    const sourceKey = accountKey(source);
    const key = jobKey(jobId);
    const tx = this.store.begin();

    const record = tx.assignments.get(sourceKey, key);
    if (!record) {
      throw new AssignmentLifecycleError(
        RuntimeErrorCodes.CANNOT_ACKNOWLEDGE_WHEN_NOT_MATCHED,
        `${shortKey(sourceKey)} is not matched to job ${key}`,
      );
    }
    if (record.assignment.acknowledged) {
      return;
    }

    const status = tx.jobStatus.get(key);
    if (!status) {
      throw this.invariant(RuntimeErrorCodes.JOB_STATUS_NOT_FOUND, `No status for matched job ${key}`);
    }
    const next = advanceStatus(status);
    if (!next) {
      throw new AssignmentLifecycleError(
        RuntimeErrorCodes.CANNOT_ACKNOWLEDGE_WHEN_NOT_MATCHED,
        `Job ${key} is not matched`,
      );
    }

    const assignment: Assignment = { ...record.assignment, acknowledged: true };
    tx.assignments.set(sourceKey, key, { ...record, assignment });
    tx.jobStatus.set(key, next);
    tx.commit();

    this.logger.debug(`${shortKey(sourceKey)} acknowledged job ${key}`);
    this.events.onJobRegistrationAssigned?.(jobId, source, assignment);
  }

  /**
   * Record one execution and pay its fee. With `last`, the assignment, job
   * status and registration are removed and the provider's capacity is
   * restored.
   *
   * The fee is paid after the commit. If the payment fails the report stays
   * recorded and {@link RewardPaymentError} is thrown.
   */
  report(source: PublicKey, jobId: JobId, last: boolean, result: ExecutionResult): void {
    if (result.kind === 'success' && result.operationHash.length !== OPERATION_HASH_LENGTH) {
      throw new AssignmentLifecycleError(
        RuntimeErrorCodes.INVALID_OPERATION_HASH,
        `Operation hash must be ${OPERATION_HASH_LENGTH} bytes, got ${result.operationHash.length}`,
      );
    }
    const sourceKey = accountKey(source);
    const key = jobKey(jobId);
    const tx = this.store.begin();

    const record = tx.assignments.get(sourceKey, key);
    if (!record) {
      throw new AssignmentLifecycleError(
        RuntimeErrorCodes.REPORT_FROM_UNASSIGNED_SOURCE,
        `${shortKey(sourceKey)} is not assigned to job ${key}`,
      );
    }
    if (!record.assignment.acknowledged) {
      throw new AssignmentLifecycleError(
        RuntimeErrorCodes.CANNOT_REPORT_WHEN_NOT_ACKNOWLEDGED,
        `${shortKey(sourceKey)} has not acknowledged job ${key}`,
      );
    }
    const { sla } = record.assignment;
    if (sla.met >= sla.total) {
      throw new AssignmentLifecycleError(
        RuntimeErrorCodes.MORE_REPORTS_THAN_EXPECTED,
        `Job ${key} expects ${sla.total} report(s)`,
      );
    }

    const registration = this.requireRegistration(jobId);
    const now = this.now();
    const windowEnd = checkedAdd(now, this.limits.reportToleranceMs, 'report window');
    if (!overlaps(registration.schedule, record.assignment.startDelay, now, windowEnd)) {
      throw new AssignmentLifecycleError(
        RuntimeErrorCodes.REPORT_OUTSIDE_SCHEDULE,
        `No execution of job ${key} between ${now} and ${windowEnd}`,
      );
    }

    const assignment: Assignment = {
      ...record.assignment,
      sla: { total: sla.total, met: sla.met + 1 },
    };
    if (last) {
      tx.assignments.delete(sourceKey, key);
      tx.jobStatus.delete(key);
      tx.capacity.set(
        sourceKey,
        checkedAdd(tx.capacity.get(sourceKey) ?? 0, registration.storage, 'restored capacity'),
      );
    } else {
      tx.assignments.set(sourceKey, key, { ...record, assignment });
    }
    tx.commit();
    if (last) {
      this.registry.removeRegistration(jobId);
      this.logger.info(`Job ${key} completed by ${shortKey(sourceKey)} (${assignment.sla.met}/${sla.total})`);
    } else {
      this.logger.debug(`Report ${assignment.sla.met}/${sla.total} for job ${key} from ${shortKey(sourceKey)}`);
    }

    this.pay(() => this.rewards.payReward(assignment.feePerExecution, source), 'execution fee', source);

    if (result.kind === 'success') {
      this.events.onExecutionSuccess?.(jobId, source, result.operationHash);
    } else {
      this.events.onExecutionFailure?.(jobId, source, result.message);
    }
    this.events.onReported?.(jobId, source, assignment);
  }

  // ==========================================================================
  // Job hooks
  // ==========================================================================

  /**
   * Validate a new or replaced registration, run its instant match and lock
   * the full budget from the consumer.
   *
   * The lock is the last fallible step and runs before the commit, so a
   * failed lock leaves no state behind.
   */
  onRegistered(consumer: PublicKey, registration: JobRegistration): void {
    const now = this.now();
    const { requirements } = registration;
    const errors = registrationErrors(registration);
    if (errors.length > 0) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.INVALID_JOB_REGISTRATION,
        `Invalid registration for ${registration.script}: ${errors.join('; ')}`,
      );
    }
    const violation = checkSchedule(registration.schedule, now, this.limits.maxExecutionsPerJob);
    if (violation !== undefined) {
      throw new JobRegistrationError(violation, `Invalid schedule for ${registration.script}`);
    }
    if (requirements.slots <= 0) {
      throw new JobRegistrationError(RuntimeErrorCodes.JOB_REGISTRATION_ZERO_SLOTS, 'Job needs at least one slot');
    }
    if (requirements.slots > this.limits.maxSlots) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.JOB_REGISTRATION_TOO_MANY_SLOTS,
        `Job asks for ${requirements.slots} slots, at most ${this.limits.maxSlots} allowed`,
      );
    }
    if (requirements.reward.amount <= 0n) {
      throw new JobRegistrationError(RuntimeErrorCodes.JOB_REGISTRATION_ZERO_REWARD, 'Job reward must be positive');
    }
    this.assets.validate(requirements.reward.assetId);

    const jobId: JobId = { consumer, script: registration.script };
    const key = jobKey(jobId);
    const tx = this.store.begin();
    const pending: PendingEvent[] = [];

    const status = tx.jobStatus.get(key);
    if (status === undefined) {
      tx.jobStatus.set(key, { kind: 'open' });
    } else if (status.kind !== 'open') {
      throw new JobRegistrationError(
        RuntimeErrorCodes.JOB_REGISTRATION_UNMODIFIABLE,
        `Job ${key} is ${status.kind} and cannot be replaced`,
      );
    }

    if (requirements.instantMatch !== undefined) {
      this.processMatching(tx, [{ jobId, sources: requirements.instantMatch }], now, pending);
    }

    const total: Reward = { assetId: requirements.reward.assetId, amount: totalRewardAmount(registration) };
    this.rewards.lockReward(total, consumer);
    tx.commit();
    this.flush(pending);

    this.logger.debug(`Job ${key} registered, locked ${total.amount} ${total.assetId}`);
  }

  /** Allowed while the job is open or once it is overdue. */
  onDeregistered(consumer: PublicKey, script: string): void {
    const jobId: JobId = { consumer, script };
    const key = jobKey(jobId);
    const tx = this.store.begin();

    const status = tx.jobStatus.get(key);
    if (!status) {
      throw this.invariant(RuntimeErrorCodes.JOB_STATUS_NOT_FOUND, `No status for job ${key}`);
    }
    if (status.kind !== 'open' && this.now() < this.requireRegistration(jobId).schedule.startTime) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.JOB_REGISTRATION_UNMODIFIABLE,
        `Job ${key} is ${status.kind} and not yet overdue`,
      );
    }

    tx.jobStatus.delete(key);
    tx.commit();
    this.logger.debug(`Job ${key} deregistered`);
  }

  /** Only open jobs may change their allowed sources. */
  onAllowedSourcesUpdated(
    consumer: PublicKey,
    registration: JobRegistration,
    updates: readonly AllowedSourcesUpdate[],
  ): void {
    const key = jobKey({ consumer, script: registration.script });
    const status = this.store.jobStatus.get(key);
    if (!status) {
      throw this.invariant(RuntimeErrorCodes.JOB_STATUS_NOT_FOUND, `No status for job ${key}`);
    }
    if (status.kind !== 'open') {
      throw new JobRegistrationError(
        RuntimeErrorCodes.JOB_REGISTRATION_UNMODIFIABLE,
        `Job ${key} is ${status.kind}, allowed sources are fixed`,
      );
    }
    this.logger.debug(`Job ${key}: ${updates.length} allowed source update(s)`);
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getJobStatus(jobId: JobId): JobStatus | undefined {
    return this.store.jobStatus.get(jobKey(jobId));
  }

  getAssignment(source: PublicKey, jobId: JobId): Assignment | undefined {
    const assignment = this.store.assignments.get(accountKey(source))?.get(jobKey(jobId))?.assignment;
    return assignment && copyAssignment(assignment);
  }

  /** Assignments held by `source`. */
  listAssignments(source: PublicKey): AssignmentRecord[] {
    return [...(this.store.assignments.get(accountKey(source))?.values() ?? [])].map((record) => ({
      ...record,
      assignment: copyAssignment(record.assignment),
    }));
  }

  getAdvertisement(source: PublicKey): AdvertisementRestriction | undefined {
    return this.store.restrictions.get(accountKey(source));
  }

  getPricing(source: PublicKey, assetId: string): PricingVariant | undefined {
    return this.store.pricing.get(accountKey(source))?.get(assetId);
  }

  /** Remaining storage capacity; negative when over-committed. */
  getCapacity(source: PublicKey): number | undefined {
    return this.store.capacity.get(accountKey(source));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private now(): number {
    const value = this.clock();
    if (!isNonNegativeSafeInteger(value)) {
      throw new TimestampConversionError(value);
    }
    return value;
  }

  private requireRegistration(jobId: JobId): JobRegistration {
    const registration = this.registry.getRegistration(jobId);
    if (!registration) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.JOB_REGISTRATION_NOT_FOUND,
        `No registration for job ${jobKey(jobId)}`,
      );
    }
    return registration;
  }

  private invariant(code: InvariantCode, message: string): MarketplaceInvariantError {
    this.logger.error(`Store inconsistency (${code}): ${message}`);
    return new MarketplaceInvariantError(code, message);
  }

  private flush(pending: readonly PendingEvent[]): void {
    for (const emit of pending) {
      emit();
    }
  }

  private pay(payment: () => void, what: string, payee: PublicKey): void {
    try {
      payment();
    } catch (err) {
      this.logger.warn(`Paying ${what} to ${shortKey(accountKey(payee))} failed after commit: ${errorMessage(err)}`);
      if (err instanceof RewardPaymentError) {
        throw err;
      }
      throw new RewardPaymentError(RuntimeErrorCodes.FAILED_TO_PAY, errorMessage(err));
    }
  }
}

/** Queries hand out copies so callers cannot edit stored assignments. */
function copyAssignment(assignment: Assignment): Assignment {
  return { ...assignment, feePerExecution: { ...assignment.feePerExecution }, sla: { ...assignment.sla } };
}

function advertisementErrors(advertisement: Advertisement): string[] {
  const errors: string[] = [];
  requireIntRange(advertisement.maxMemory, 'maxMemory', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(advertisement.networkRequestQuota, 'networkRequestQuota', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(advertisement.storageCapacity, 'storageCapacity', 0, MAX_SAFE_MILLIS, errors);
  advertisement.pricing.forEach((variant, i) => {
    for (const field of ['feePerMillisecond', 'feePerStorageByte', 'baseFeePerExecution'] as const) {
      if (!isValidAmount(variant[field])) {
        errors.push(`pricing[${i}].${field} is out of range`);
      }
    }
    const window = variant.schedulingWindow;
    const bound = window.kind === 'end' ? window.end : window.delta;
    requireIntRange(bound, `pricing[${i}].schedulingWindow.${window.kind}`, 0, MAX_SAFE_MILLIS, errors);
  });
  return errors;
}

function registrationErrors(registration: JobRegistration): string[] {
  const errors: string[] = [];
  const { schedule } = registration;
  requireIntRange(registration.memory, 'memory', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(registration.networkRequests, 'networkRequests', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(registration.storage, 'storage', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(registration.requirements.slots, 'requirements.slots', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(schedule.startTime, 'schedule.startTime', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(schedule.endTime, 'schedule.endTime', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(schedule.duration, 'schedule.duration', 0, MAX_SAFE_MILLIS, errors);
  requireIntRange(schedule.interval, 'schedule.interval', 0, MAX_SAFE_MILLIS, errors);
  return errors;
}

function isWhitelisted(account: PublicKey, whitelist: readonly PublicKey[] | undefined): boolean {
  return whitelist === undefined || whitelist.some((entry) => entry.equals(account));
}

function advanceStatus(status: JobStatus): JobStatus | null {
  switch (status.kind) {
    case 'open':
      return null;
    case 'matched':
      return { kind: 'assigned', count: 1 };
    case 'assigned':
      return { kind: 'assigned', count: status.count + 1 };
  }
}
