/**
 * Runtime marketplace types.
 *
 * Amounts are `bigint` (u128 range), times and sizes are integer `number`s
 * (milliseconds, bytes), accounts are {@link PublicKey}s.
 *
 * @module
 */

import type { PublicKey } from '@solana/web3.js';
import type { Schedule } from '../schedule/types.js';
import type { LogLevel, Logger } from '../utils/logger.js';
import type { JobRegistry } from '../registry/types.js';
import type { AssetValidator, RewardManager } from '../rewards/types.js';
import type { SourceAttestation } from '../attestation/attestation.js';

// ============================================================================
// Jobs
// ============================================================================

/** A job is identified by its consumer and script. */
export interface JobId {
  consumer: PublicKey;
  script: string;
}

/** Amount of one asset. */
export interface Reward {
  assetId: string;
  amount: bigint;
}

/** One slot of a match: the provider and its offset from the job's cadence. */
export interface PlannedExecution {
  source: PublicKey;
  startDelay: number;
}

export interface JobRequirements {
  /** Number of providers that run every execution. */
  slots: number;
  /** Reward per slot per execution. */
  reward: Reward;
  /** Sources to match right at registration. */
  instantMatch?: readonly PlannedExecution[];
}

export interface JobRegistration {
  script: string;
  /** Whitelist of providers; absent means any provider. */
  allowedSources?: readonly PublicKey[];
  allowOnlyVerifiedSources: boolean;
  schedule: Schedule;
  /** Bytes of memory per execution. */
  memory: number;
  /** Network requests per second. */
  networkRequests: number;
  /** Bytes of storage held for the lifetime of the job. */
  storage: number;
  requirements: JobRequirements;
}

export type JobStatus =
  | { kind: 'open' }
  | { kind: 'matched' }
  | { kind: 'assigned'; count: number };

/** Change to a registration's allowed sources. */
export interface AllowedSourcesUpdate {
  operation: 'add' | 'remove';
  source: PublicKey;
}

// ============================================================================
// Advertisements
// ============================================================================

/** Deadline up to which a provider accepts work. */
export type SchedulingWindow =
  | { kind: 'end'; end: number }
  | { kind: 'delta'; delta: number };

/** A provider's price for one reward asset. */
export interface PricingVariant {
  rewardAsset: string;
  feePerMillisecond: bigint;
  feePerStorageByte: bigint;
  baseFeePerExecution: bigint;
  schedulingWindow: SchedulingWindow;
}

/** Capability envelope of a provider. */
export interface AdvertisementRestriction {
  maxMemory: number;
  /** Network requests per second. */
  networkRequestQuota: number;
  storageCapacity: number;
  /** Whitelist of consumers; absent means any consumer. */
  allowedConsumers?: readonly PublicKey[];
}

export interface Advertisement extends AdvertisementRestriction {
  pricing: readonly PricingVariant[];
}

// ============================================================================
// Matching and assignments
// ============================================================================

/** Proposed pairing of a job with one provider per slot. */
export interface Match {
  jobId: JobId;
  sources: readonly PlannedExecution[];
}

export interface Sla {
  total: number;
  met: number;
}

/** Committed pairing of one provider to one slot of a job. */
export interface Assignment {
  slot: number;
  startDelay: number;
  feePerExecution: Reward;
  acknowledged: boolean;
  sla: Sla;
}

/** An assignment together with the pair it belongs to. */
export interface AssignmentRecord {
  source: PublicKey;
  jobId: JobId;
  assignment: Assignment;
}

export type ExecutionResult =
  | { kind: 'success'; operationHash: Uint8Array }
  | { kind: 'failure'; message: string };

// ============================================================================
// Events
// ============================================================================

/**
 * Marketplace callbacks. Invoked synchronously, only after the operation
 * that caused them has committed.
 */
export interface MarketplaceEvents {
  /** A provider stored or updated its advertisement */
  onAdvertisementStored?: (source: PublicKey, advertisement: Advertisement) => void;
  /** A provider removed its advertisement */
  onAdvertisementRemoved?: (source: PublicKey) => void;
  /** All slots of a job were matched */
  onJobRegistrationMatched?: (match: Match) => void;
  /** A provider acknowledged its assignment */
  onJobRegistrationAssigned?: (jobId: JobId, source: PublicKey, assignment: Assignment) => void;
  /** A provider reported an execution */
  onReported?: (jobId: JobId, source: PublicKey, assignment: Assignment) => void;
  onExecutionSuccess?: (jobId: JobId, source: PublicKey, operationHash: Uint8Array) => void;
  onExecutionFailure?: (jobId: JobId, source: PublicKey, message: string) => void;
}

// ============================================================================
// Configuration
// ============================================================================

export interface MarketplaceLimits {
  /** Slack granted to reports: `[now, now + tolerance]` must hit an execution. */
  reportToleranceMs: number;
  maxExecutionsPerJob: number;
  maxPricingVariants: number;
  maxAllowedConsumers: number;
  maxSlots: number;
}

/** Shape of the JSON config file. */
export interface MarketplaceConfig extends MarketplaceLimits {
  /** Bound on a registration's allowed sources, enforced by the registry. */
  maxAllowedSources: number;
  logging: {
    level: LogLevel;
  };
}

export interface ComputeMarketplaceOptions {
  registry: JobRegistry;
  rewards: RewardManager;
  assets: AssetValidator;
  attestation: SourceAttestation;
  limits?: Partial<MarketplaceLimits>;
  /** Milliseconds since epoch. Defaults to `Date.now`. */
  now?: () => number;
  logger?: Logger;
}
