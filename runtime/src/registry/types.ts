/**
 * Job registry contracts.
 *
 * @module
 */

import type { PublicKey } from '@solana/web3.js';
import type { AllowedSourcesUpdate, JobId, JobRegistration } from '../marketplace/types.js';
import type { Logger } from '../utils/logger.js';

/** Read and remove access the marketplace needs from the registry. */
export interface JobRegistry {
  getRegistration(jobId: JobId): JobRegistration | undefined;
  removeRegistration(jobId: JobId): void;
}

/**
 * Lifecycle notifications from the registry. Invoked synchronously; a hook
 * that throws aborts the registry call that triggered it.
 */
export interface JobHooks {
  onRegistered(consumer: PublicKey, registration: JobRegistration): void;
  onDeregistered(consumer: PublicKey, script: string): void;
  onAllowedSourcesUpdated(
    consumer: PublicKey,
    registration: JobRegistration,
    updates: readonly AllowedSourcesUpdate[],
  ): void;
}

export interface InMemoryJobRegistryConfig {
  hooks?: JobHooks;
  /** Default: 100 */
  maxAllowedSources?: number;
  logger?: Logger;
}
