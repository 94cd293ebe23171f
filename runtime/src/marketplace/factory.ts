/**
 * Wiring of a registry and a marketplace from one {@link MarketplaceConfig}.
 *
 * @module
 */

import { InMemoryJobRegistry } from '../registry/registry.js';
import type { SourceAttestation } from '../attestation/attestation.js';
import type { AssetValidator, RewardManager } from '../rewards/types.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ComputeMarketplace } from './engine.js';
import type { MarketplaceConfig } from './types.js';

export interface MarketplaceCollaborators {
  rewards: RewardManager;
  assets: AssetValidator;
  attestation: SourceAttestation;
  now?: () => number;
  /** Defaults to a console logger at `config.logging.level`. */
  logger?: Logger;
}

export interface MarketplaceRuntime {
  registry: InMemoryJobRegistry;
  marketplace: ComputeMarketplace;
  logger: Logger;
}

/**
 * Build a registry whose hooks drive a new marketplace.
 *
 * @example
 * ```typescript
 * const config = await loadMarketplaceConfig();
 * const { registry, marketplace } = createMarketplaceRuntime(config, {
 *   rewards: new EscrowRewardManager(),
 *   assets: new AllowListAssetValidator(['usdc']),
 *   attestation: new InMemoryAttestationRegistry(),
 * });
 * ```
 */
export function createMarketplaceRuntime(
  config: MarketplaceConfig,
  collaborators: MarketplaceCollaborators,
): MarketplaceRuntime {
  const logger = collaborators.logger ?? createLogger(config.logging.level);
  const registry = new InMemoryJobRegistry({ maxAllowedSources: config.maxAllowedSources, logger });
  const marketplace = new ComputeMarketplace({
    registry,
    rewards: collaborators.rewards,
    assets: collaborators.assets,
    attestation: collaborators.attestation,
    limits: {
      reportToleranceMs: config.reportToleranceMs,
      maxExecutionsPerJob: config.maxExecutionsPerJob,
      maxPricingVariants: config.maxPricingVariants,
      maxAllowedConsumers: config.maxAllowedConsumers,
      maxSlots: config.maxSlots,
    },
    now: collaborators.now,
    logger,
  });
  registry.setHooks(marketplace);
  return { registry, marketplace, logger };
}
