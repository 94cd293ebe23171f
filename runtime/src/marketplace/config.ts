/**
 * Marketplace configuration file loading and validation.
 *
 * @module
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigValidationError, errorMessage } from '../types/errors.js';
import { isLogLevel } from '../utils/logger.js';
import { MAX_SAFE_MILLIS } from '../utils/numeric.js';
import {
  isRecord,
  optionalRecord,
  requireIntRange,
  requireOneOf,
  validationResult,
  type ValidationResult,
} from '../utils/validation.js';
import { DEFAULT_MARKETPLACE_LIMITS } from './engine.js';
import type { MarketplaceConfig } from './types.js';

export const DEFAULT_MARKETPLACE_CONFIG: Readonly<MarketplaceConfig> = {
  ...DEFAULT_MARKETPLACE_LIMITS,
  maxAllowedSources: 100,
  logging: { level: 'info' },
};

const NUMERIC_FIELDS = [
  'reportToleranceMs',
  'maxExecutionsPerJob',
  'maxPricingVariants',
  'maxAllowedConsumers',
  'maxAllowedSources',
  'maxSlots',
] as const;

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set(['debug', 'info', 'warn', 'error']);

export function getDefaultConfigPath(): string {
  return process.env.CRONMARKET_CONFIG ?? join(homedir(), '.cronmarket', 'config.json');
}

// ============================================================================
// Config loading
// ============================================================================

/** Read a JSON config file. Missing fields take their default. */
export async function loadMarketplaceConfig(path: string = getDefaultConfigPath()): Promise<MarketplaceConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigValidationError(`Failed to read config file at ${path}: ${errorMessage(err)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigValidationError(`Invalid JSON in ${path}: ${errorMessage(err)}`);
  }

  return parseMarketplaceConfig(parsed);
}

/** Validate `obj` and merge it over {@link DEFAULT_MARKETPLACE_CONFIG}. */
export function parseMarketplaceConfig(obj: unknown): MarketplaceConfig {
  const result = validateMarketplaceConfig(obj);
  if (!result.valid || !isRecord(obj)) {
    throw new ConfigValidationError(`Invalid marketplace config: ${result.errors.join('; ')}`, result.errors);
  }

  const config: MarketplaceConfig = {
    ...DEFAULT_MARKETPLACE_CONFIG,
    logging: { ...DEFAULT_MARKETPLACE_CONFIG.logging },
  };
  for (const field of NUMERIC_FIELDS) {
    const value = obj[field];
    if (typeof value === 'number') {
      config[field] = value;
    }
  }
  if (isRecord(obj.logging) && isLogLevel(obj.logging.level)) {
    config.logging.level = obj.logging.level;
  }
  return config;
}

// ============================================================================
// Config validation
// ============================================================================

export function validateMarketplaceConfig(obj: unknown): ValidationResult {
  if (!isRecord(obj)) {
    return validationResult(['Config must be a non-null object']);
  }
  const errors: string[] = [];

  for (const field of NUMERIC_FIELDS) {
    if (obj[field] !== undefined) {
      // a zero tolerance is valid, every bound needs at least one entry
      const min = field === 'reportToleranceMs' ? 0 : 1;
      requireIntRange(obj[field], field, min, MAX_SAFE_MILLIS, errors);
    }
  }

  const logging = optionalRecord(obj.logging, 'logging', errors);
  if (logging?.level !== undefined) {
    requireOneOf(logging.level, 'logging.level', VALID_LOG_LEVELS, errors);
  }

  return validationResult(errors);
}
