/**
 * Allow-list asset policy.
 *
 * @module
 */

import { AssetNotAllowedError } from '../marketplace/errors.js';
import type { AssetValidator } from './types.js';

/** Accepts exactly the listed asset ids. */
export class AllowListAssetValidator implements AssetValidator {
  private readonly allowed: ReadonlySet<string>;

  constructor(assetIds: Iterable<string>) {
    this.allowed = new Set(assetIds);
  }

  validate(assetId: string): void {
    if (!this.allowed.has(assetId)) {
      throw new AssetNotAllowedError(assetId);
    }
  }
}
