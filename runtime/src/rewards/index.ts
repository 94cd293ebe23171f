/**
 * Reward custody and asset policy.
 *
 * @module
 */

export { EscrowRewardManager, type EscrowRewardManagerConfig } from './reward-manager.js';
export { AllowListAssetValidator } from './asset-validator.js';
export type { RewardManager, AssetValidator } from './types.js';
