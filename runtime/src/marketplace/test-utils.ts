import { Keypair, type PublicKey } from "@solana/web3.js";
import { vi } from "vitest";
import { InMemoryAttestationRegistry } from "../attestation/attestation.js";
import { InMemoryJobRegistry } from "../registry/registry.js";
import { AllowListAssetValidator } from "../rewards/asset-validator.js";
import { EscrowRewardManager } from "../rewards/reward-manager.js";
import { RuntimeError, type RuntimeErrorCode } from "../types/errors.js";
import { SCRIPT_LENGTH, SCRIPT_PREFIX } from "../utils/encoding.js";
import type { Logger } from "../utils/logger.js";
import { ComputeMarketplace } from "./engine.js";
import type {
  Advertisement,
  JobId,
  JobRegistration,
  JobRequirements,
  MarketplaceLimits,
  PricingVariant,
} from "./types.js";

export const USDC = "usdc";
export const ETH = "eth";

/** Four executions: [1000, 1500), [2000, 2500), [3000, 3500), [4000, 4500). */
export const HOURLY = { startTime: 1000, endTime: 5000, duration: 500, interval: 1000 };

/** Deterministic, valid script URL for job number `n`. */
export function script(n: number): string {
  const prefix = `${SCRIPT_PREFIX}Qm`;
  return `${prefix}${String(n).padStart(SCRIPT_LENGTH - prefix.length, "0")}`;
}

/** 1 per ms and 1 per byte: 600 per execution for the default job. */
export function createPricing(overrides: Partial<PricingVariant> = {}): PricingVariant {
  return {
    rewardAsset: USDC,
    feePerMillisecond: 1n,
    feePerStorageByte: 1n,
    baseFeePerExecution: 0n,
    schedulingWindow: { kind: "delta", delta: 100_000 },
    ...overrides,
  };
}

export function createAdvertisement(overrides: Partial<Advertisement> = {}): Advertisement {
  return {
    pricing: [createPricing()],
    maxMemory: 4096,
    networkRequestQuota: 10,
    storageCapacity: 1000,
    ...overrides,
  };
}

export function createRegistration(
  n: number,
  overrides: Partial<Omit<JobRegistration, "requirements">> = {},
  requirements: Partial<JobRequirements> = {},
): JobRegistration {
  return {
    script: script(n),
    allowOnlyVerifiedSources: false,
    schedule: { ...HOURLY },
    memory: 1024,
    networkRequests: 1,
    storage: 100,
    ...overrides,
    requirements: {
      slots: 1,
      reward: { assetId: USDC, amount: 600n },
      ...requirements,
    },
  };
}

export interface MarketplaceHarnessOptions {
  limits?: Partial<MarketplaceLimits>;
  maxAllowedSources?: number;
  rewards?: EscrowRewardManager;
  logger?: Logger;
}

export function makeMarketplace(options: MarketplaceHarnessOptions = {}) {
  let nowMs = 0;
  const registry = new InMemoryJobRegistry({ maxAllowedSources: options.maxAllowedSources });
  const rewards = options.rewards ?? new EscrowRewardManager();
  const attestation = new InMemoryAttestationRegistry();
  const marketplace = new ComputeMarketplace({
    registry,
    rewards,
    assets: new AllowListAssetValidator([USDC, ETH]),
    attestation,
    limits: options.limits,
    now: () => nowMs,
    logger: options.logger,
  });
  registry.setHooks(marketplace);

  const consumer = Keypair.generate().publicKey;
  const matcher = Keypair.generate().publicKey;
  rewards.deposit(consumer, { assetId: USDC, amount: 1_000_000n });
  rewards.deposit(consumer, { assetId: ETH, amount: 1_000_000n });

  return {
    marketplace,
    registry,
    rewards,
    attestation,
    consumer,
    matcher,
    setNow: (next: number) => {
      nowMs = next;
    },
    register: (registration: JobRegistration): JobId => {
      registry.register(consumer, registration);
      return { consumer, script: registration.script };
    },
    provider: (advertisement: Advertisement = createAdvertisement()): PublicKey => {
      const source = Keypair.generate().publicKey;
      marketplace.advertise(source, advertisement);
      return source;
    },
  };
}

/** Logger whose methods are spies; `child` returns the same logger. */
export function createSpyLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    setLevel: vi.fn(),
    child: (): Logger => logger,
  };
  return logger;
}

/** Run `action` and return the runtime error code it threw. */
export function thrownCode(action: () => unknown): RuntimeErrorCode | undefined {
  try {
    action();
  } catch (err) {
    if (err instanceof RuntimeError) {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
