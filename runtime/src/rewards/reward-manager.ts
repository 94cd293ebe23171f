/**
 * In-memory escrow implementation of {@link RewardManager}.
 *
 * Keeps per-account balances and a single escrow pool per asset. Locking
 * moves funds from an account into the pool; paying moves them out.
 *
 * @module
 */

import type { PublicKey } from '@solana/web3.js';
import { RuntimeErrorCodes } from '../types/errors.js';
import { accountKey, shortKey } from '../utils/encoding.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { checkedAddAmount, isValidAmount } from '../utils/numeric.js';
import { RewardPaymentError } from '../marketplace/errors.js';
import type { Reward } from '../marketplace/types.js';
import type { RewardManager } from './types.js';

export interface EscrowRewardManagerConfig {
  logger?: Logger;
}

export class EscrowRewardManager implements RewardManager {
  /** asset → account → balance */
  private readonly balances = new Map<string, Map<string, bigint>>();
  /** asset → escrowed amount */
  private readonly escrow = new Map<string, bigint>();
  private readonly logger: Logger;

  constructor(config: EscrowRewardManagerConfig = {}) {
    this.logger = (config.logger ?? silentLogger).child('rewards');
  }

  /** Credit an account, e.g. to fund a consumer. */
  deposit(account: PublicKey, reward: Reward): void {
    const balances = this.balancesFor(reward.assetId);
    const key = accountKey(account);
    balances.set(key, checkedAddAmount(balances.get(key) ?? 0n, reward.amount, 'deposit'));
  }

  balanceOf(account: PublicKey, assetId: string): bigint {
    return this.balances.get(assetId)?.get(accountKey(account)) ?? 0n;
  }

  escrowed(assetId: string): bigint {
    return this.escrow.get(assetId) ?? 0n;
  }

  lockReward(reward: Reward, payer: PublicKey): void {
    if (reward.amount === 0n) return;
    const balances = this.balancesFor(reward.assetId);
    const key = accountKey(payer);
    const balance = balances.get(key) ?? 0n;
    if (!isValidAmount(reward.amount) || balance < reward.amount) {
      throw new RewardPaymentError(
        RuntimeErrorCodes.REWARD_LOCK_FAILED,
        `Cannot lock ${reward.amount} ${reward.assetId} from ${shortKey(key)}: balance ${balance}`,
      );
    }
    const escrowed = checkedAddAmount(this.escrowed(reward.assetId), reward.amount, 'lock reward');
    balances.set(key, balance - reward.amount);
    this.escrow.set(reward.assetId, escrowed);
    this.logger.debug(`Locked ${reward.amount} ${reward.assetId} from ${shortKey(key)}`);
  }

  payReward(reward: Reward, payee: PublicKey): void {
    this.release(reward, payee);
  }

  payMatcherReward(reward: Reward, payee: PublicKey): void {
    this.release(reward, payee);
  }

  private release(reward: Reward, payee: PublicKey): void {
    if (reward.amount === 0n) return;
    const escrowed = this.escrowed(reward.assetId);
    if (!isValidAmount(reward.amount) || escrowed < reward.amount) {
      throw new RewardPaymentError(
        RuntimeErrorCodes.FAILED_TO_PAY,
        `Cannot pay ${reward.amount} ${reward.assetId}: escrow holds ${escrowed}`,
      );
    }
    const balances = this.balancesFor(reward.assetId);
    const key = accountKey(payee);
    const credited = checkedAddAmount(balances.get(key) ?? 0n, reward.amount, 'pay reward');
    this.escrow.set(reward.assetId, escrowed - reward.amount);
    balances.set(key, credited);
    this.logger.debug(`Paid ${reward.amount} ${reward.assetId} to ${shortKey(key)}`);
  }

  private balancesFor(assetId: string): Map<string, bigint> {
    let balances = this.balances.get(assetId);
    if (!balances) {
      balances = new Map();
      this.balances.set(assetId, balances);
    }
    return balances;
  }
}
