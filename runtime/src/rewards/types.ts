/**
 * Reward collaborator contracts.
 *
 * @module
 */

import type { PublicKey } from '@solana/web3.js';
import type { Reward } from '../marketplace/types.js';

/**
 * Custody of job rewards. Every method is a non-revertible side effect and
 * throws when it cannot complete.
 */
export interface RewardManager {
  /** Move `reward` from the consumer into escrow. */
  lockReward(reward: Reward, payer: PublicKey): void;
  /** Pay a provider out of escrow for one execution. */
  payReward(reward: Reward, payee: PublicKey): void;
  /** Pay the unspent part of a job's budget to whoever proposed the match. */
  payMatcherReward(reward: Reward, payee: PublicKey): void;
}

/** Policy gate on acceptable reward assets. */
export interface AssetValidator {
  /** @throws {AssetNotAllowedError} */
  validate(assetId: string): void;
}
