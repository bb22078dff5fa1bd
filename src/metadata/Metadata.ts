/**
 * Metadata
 *
 * Immutable mapping read from the `--- meta ---` front matter. Keys keep the
 * order they were declared in.
 *
 * @since 2026-10-19
 */

import type { Span } from '../span/index.js';
import type { MetadataValue } from './types.js';

export class Metadata {
  private readonly values: ReadonlyMap<string, MetadataValue>;

  constructor(
    entries: Iterable<readonly [string, MetadataValue]>,
    readonly span: Span
  ) {
    this.values = new Map(entries);
    Object.freeze(this);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  /**
   * Value for `key`, or `fallback` when the key is absent
   */
  get(key: string): MetadataValue | undefined;
  get<T>(key: string, fallback: T): MetadataValue | T;
  get<T>(key: string, fallback?: T): MetadataValue | T | undefined {
    const value = this.values.get(key);
    return value === undefined ? fallback : value;
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  entries(): Array<[string, MetadataValue]> {
    return [...this.values.entries()];
  }

  get size(): number {
    return this.values.size;
  }

  toJSON(): Record<string, MetadataValue> {
    return Object.fromEntries(this.values);
  }
}
