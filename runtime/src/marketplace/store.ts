/**
 * Marketplace state and staged transactions over it.
 *
 * Every public marketplace call opens one {@link StoreTransaction}, reads and
 * writes through it, and commits only once all checks passed. Until
 * {@link StoreTransaction.commit} the underlying maps are untouched, so a
 * throwing call leaves no trace. Stored values are treated as immutable:
 * updates replace a value, they never modify it in place.
 *
 * @module
 */

import type {
  AdvertisementRestriction,
  AssignmentRecord,
  JobStatus,
  PricingVariant,
} from './types.js';

const DELETED = Symbol('deleted');
type Staged<V> = V | typeof DELETED;

/** Map overlay that buffers writes until {@link commit}. */
export class StagedMap<K, V> {
  private readonly writes = new Map<K, Staged<V>>();

  constructor(private readonly base: Map<K, V>) {}

  get(key: K): V | undefined {
    const staged = this.writes.get(key);
    if (staged === DELETED) return undefined;
    return staged ?? this.base.get(key);
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V): void {
    this.writes.set(key, value);
  }

  delete(key: K): void {
    this.writes.set(key, DELETED);
  }

  commit(): void {
    for (const [key, value] of this.writes) {
      if (value === DELETED) {
        this.base.delete(key);
      } else {
        this.base.set(key, value);
      }
    }
    this.writes.clear();
  }
}

/** Two-level map overlay keyed by (outer, inner). */
export class StagedDoubleMap<K1, K2, V> {
  private readonly writes = new Map<K1, Map<K2, Staged<V>>>();
  private readonly cleared = new Set<K1>();

  constructor(private readonly base: Map<K1, Map<K2, V>>) {}

  get(outer: K1, inner: K2): V | undefined {
    const staged = this.writes.get(outer)?.get(inner);
    if (staged === DELETED) return undefined;
    if (staged !== undefined) return staged;
    return this.cleared.has(outer) ? undefined : this.base.get(outer)?.get(inner);
  }

  set(outer: K1, inner: K2, value: V): void {
    this.stagedFor(outer).set(inner, value);
  }

  delete(outer: K1, inner: K2): void {
    this.stagedFor(outer).set(inner, DELETED);
  }

  /** Remove every entry under `outer`. */
  deletePrefix(outer: K1): void {
    this.cleared.add(outer);
    this.writes.delete(outer);
  }

  /** Current entries under `outer`, staged writes applied. */
  entries(outer: K1): Array<[K2, V]> {
    const merged = new Map<K2, V>(this.cleared.has(outer) ? [] : this.base.get(outer) ?? []);
    for (const [inner, value] of this.writes.get(outer) ?? []) {
      if (value === DELETED) {
        merged.delete(inner);
      } else {
        merged.set(inner, value);
      }
    }
    return [...merged];
  }

  hasAny(outer: K1): boolean {
    return this.entries(outer).length > 0;
  }

  commit(): void {
    for (const outer of this.cleared) {
      this.base.delete(outer);
    }
    for (const [outer, staged] of this.writes) {
      const inner = this.base.get(outer) ?? new Map<K2, V>();
      for (const [key, value] of staged) {
        if (value === DELETED) {
          inner.delete(key);
        } else {
          inner.set(key, value);
        }
      }
      if (inner.size === 0) {
        this.base.delete(outer);
      } else {
        this.base.set(outer, inner);
      }
    }
    this.writes.clear();
    this.cleared.clear();
  }

  private stagedFor(outer: K1): Map<K2, Staged<V>> {
    let staged = this.writes.get(outer);
    if (!staged) {
      staged = new Map();
      this.writes.set(outer, staged);
    }
    return staged;
  }
}

/**
 * Committed marketplace state. Providers and jobs are keyed by
 * `accountKey` and `jobKey`.
 */
export class MarketplaceStore {
  /** provider → restriction */
  readonly restrictions = new Map<string, AdvertisementRestriction>();
  /** provider → asset → pricing */
  readonly pricing = new Map<string, Map<string, PricingVariant>>();
  /** provider → remaining storage; may be negative */
  readonly capacity = new Map<string, number>();
  /** provider → job → assignment */
  readonly assignments = new Map<string, Map<string, AssignmentRecord>>();
  /** job → status */
  readonly jobStatus = new Map<string, JobStatus>();

  begin(): StoreTransaction {
    return new StoreTransaction(this);
  }
}

/** Staged view of a {@link MarketplaceStore}. Single use. */
export class StoreTransaction {
  readonly restrictions: StagedMap<string, AdvertisementRestriction>;
  readonly pricing: StagedDoubleMap<string, string, PricingVariant>;
  readonly capacity: StagedMap<string, number>;
  readonly assignments: StagedDoubleMap<string, string, AssignmentRecord>;
  readonly jobStatus: StagedMap<string, JobStatus>;
  private committed = false;

  constructor(store: MarketplaceStore) {
    this.restrictions = new StagedMap(store.restrictions);
    this.pricing = new StagedDoubleMap(store.pricing);
    this.capacity = new StagedMap(store.capacity);
    this.assignments = new StagedDoubleMap(store.assignments);
    this.jobStatus = new StagedMap(store.jobStatus);
  }

  commit(): void {
    if (this.committed) {
      throw new Error('Transaction already committed');
    }
    this.committed = true;
    this.restrictions.commit();
    this.pricing.commit();
    this.capacity.commit();
    this.assignments.commit();
    this.jobStatus.commit();
  }
}
