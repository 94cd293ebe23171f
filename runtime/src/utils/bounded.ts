/**
 * Fixed-capacity list.
 *
 * @module
 */

import { LengthExceededError } from '../types/errors.js';

/**
 * Read-only list whose length never exceeds `max`.
 *
 * Construction is the only place the bound is checked; there are no mutators.
 */
export class BoundedList<T> implements Iterable<T> {
  private constructor(
    readonly items: readonly T[],
    readonly max: number,
  ) {}

  /**
   * @param name - Collection name used in the error message
   * @throws {LengthExceededError} when `items` holds more than `max` entries
   */
  static from<T>(items: Iterable<T>, max: number, name: string): BoundedList<T> {
    const copy = [...items];
    if (copy.length > max) {
      throw new LengthExceededError(name, max, copy.length);
    }
    return new BoundedList(copy, max);
  }

  get length(): number {
    return this.items.length;
  }

  get isEmpty(): boolean {
    return this.items.length === 0;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
