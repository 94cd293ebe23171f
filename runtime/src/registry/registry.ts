/**
 * In-memory job registry.
 *
 * Owns job registrations and forwards lifecycle events to {@link JobHooks}.
 * A hook failure restores the registry to its state before the call.
 *
 * @module
 */

import type { PublicKey } from '@solana/web3.js';
import { RuntimeErrorCodes } from '../types/errors.js';
import { isValidScript, jobKey, SCRIPT_LENGTH, SCRIPT_PREFIX } from '../utils/encoding.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { JobRegistrationError } from '../marketplace/errors.js';
import type { AllowedSourcesUpdate, JobId, JobRegistration } from '../marketplace/types.js';
import type { InMemoryJobRegistryConfig, JobHooks, JobRegistry } from './types.js';

const DEFAULT_MAX_ALLOWED_SOURCES = 100;

export class InMemoryJobRegistry implements JobRegistry {
  private readonly registrations = new Map<string, JobRegistration>();
  private readonly maxAllowedSources: number;
  private readonly logger: Logger;
  private hooks: JobHooks | null;

  constructor(config: InMemoryJobRegistryConfig = {}) {
    this.hooks = config.hooks ?? null;
    this.maxAllowedSources = config.maxAllowedSources ?? DEFAULT_MAX_ALLOWED_SOURCES;
    this.logger = (config.logger ?? silentLogger).child('registry');
  }

  /** Attach the component notified of registrations. */
  setHooks(hooks: JobHooks): void {
    this.hooks = hooks;
  }

  getRegistration(jobId: JobId): JobRegistration | undefined {
    return this.registrations.get(jobKey(jobId));
  }

  removeRegistration(jobId: JobId): void {
    this.registrations.delete(jobKey(jobId));
  }

  /**
   * Store a registration, replacing any previous one for the same script,
   * and run `onRegistered`.
   */
  register(consumer: PublicKey, registration: JobRegistration): void {
    if (!isValidScript(registration.script)) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.INVALID_SCRIPT_VALUE,
        `Script must be a ${SCRIPT_LENGTH}-character ${SCRIPT_PREFIX} URL`,
      );
    }
    if (registration.allowedSources !== undefined) {
      this.checkAllowedSources(registration.allowedSources);
    }

    const jobId = { consumer, script: registration.script };
    this.withRollback(jobId, () => {
      this.registrations.set(jobKey(jobId), registration);
      this.hooks?.onRegistered(consumer, registration);
    });
    this.logger.debug(`Registered ${jobKey(jobId)}`);
  }

  /** Run `onDeregistered`, then drop the registration. */
  deregister(consumer: PublicKey, script: string): void {
    const jobId = { consumer, script };
    this.requireRegistration(jobId);
    this.withRollback(jobId, () => {
      this.hooks?.onDeregistered(consumer, script);
      this.registrations.delete(jobKey(jobId));
    });
    this.logger.debug(`Deregistered ${jobKey(jobId)}`);
  }

  /**
   * Apply additions and removals to a registration's allowed sources.
   * An emptied list means any source is allowed again.
   */
  updateAllowedSources(consumer: PublicKey, script: string, updates: readonly AllowedSourcesUpdate[]): void {
    const jobId = { consumer, script };
    const current = this.requireRegistration(jobId);

    const sources = new Map<string, PublicKey>((current.allowedSources ?? []).map((s) => [s.toBase58(), s]));
    for (const update of updates) {
      if (update.operation === 'add') {
        sources.set(update.source.toBase58(), update.source);
      } else {
        sources.delete(update.source.toBase58());
      }
    }
    if (sources.size > this.maxAllowedSources) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.TOO_MANY_ALLOWED_SOURCES,
        `allowedSources holds at most ${this.maxAllowedSources} sources, got ${sources.size}`,
      );
    }

    const updated: JobRegistration = {
      ...current,
      allowedSources: sources.size === 0 ? undefined : [...sources.values()],
    };
    this.withRollback(jobId, () => {
      this.hooks?.onAllowedSourcesUpdated(consumer, updated, updates);
      this.registrations.set(jobKey(jobId), updated);
    });
  }

  private requireRegistration(jobId: JobId): JobRegistration {
    const registration = this.registrations.get(jobKey(jobId));
    if (!registration) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.JOB_REGISTRATION_NOT_FOUND,
        `No registration for ${jobKey(jobId)}`,
      );
    }
    return registration;
  }

  private checkAllowedSources(sources: readonly PublicKey[]): void {
    if (sources.length === 0) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.TOO_FEW_ALLOWED_SOURCES,
        'allowedSources must name at least one source when present',
      );
    }
    if (sources.length > this.maxAllowedSources) {
      throw new JobRegistrationError(
        RuntimeErrorCodes.TOO_MANY_ALLOWED_SOURCES,
        `allowedSources holds at most ${this.maxAllowedSources} sources, got ${sources.length}`,
      );
    }
  }

  private withRollback(jobId: JobId, action: () => void): void {
    const key = jobKey(jobId);
    const previous = this.registrations.get(key);
    try {
      action();
    } catch (err) {
      if (previous) {
        this.registrations.set(key, previous);
      } else {
        this.registrations.delete(key);
      }
      throw err;
    }
  }
}
