/**
 * Runtime marketplace module.
 *
 * @module
 */

export {
  MatchAdmissionError,
  AssignmentLifecycleError,
  MarketplaceInvariantError,
  RewardPaymentError,
  JobRegistrationError,
  AssetNotAllowedError,
  type MatchAdmissionCode,
  type AssignmentLifecycleCode,
  type InvariantCode,
  type RewardPaymentCode,
  type JobRegistrationCode,
} from './errors.js';

export { ComputeMarketplace, DEFAULT_MARKETPLACE_LIMITS } from './engine.js';

export { feePerExecution, totalRewardAmount, checkSchedulingWindow } from './pricing.js';

export {
  DEFAULT_MARKETPLACE_CONFIG,
  getDefaultConfigPath,
  loadMarketplaceConfig,
  parseMarketplaceConfig,
  validateMarketplaceConfig,
} from './config.js';

export {
  createMarketplaceRuntime,
  type MarketplaceCollaborators,
  type MarketplaceRuntime,
} from './factory.js';

export type {
  JobId,
  Reward,
  PlannedExecution,
  JobRequirements,
  JobRegistration,
  JobStatus,
  AllowedSourcesUpdate,
  SchedulingWindow,
  PricingVariant,
  AdvertisementRestriction,
  Advertisement,
  Match,
  Sla,
  Assignment,
  AssignmentRecord,
  ExecutionResult,
  MarketplaceEvents,
  MarketplaceLimits,
  MarketplaceConfig,
  ComputeMarketplaceOptions,
} from './types.js';
