/**
 * In-Memory Key-Value Store
 *
 * Simple in-memory implementation for testing and local development.
 * Values are cloned on the way in and out, so nothing outside the store
 * holds a live reference to stored state.
 */

import type { KeyValueStore } from '../types.js';

export class MemoryKeyValueStore<V> implements KeyValueStore<V> {
  private entries: Map<string, V> = new Map();

  get(key: string): V | undefined {
    const value = this.entries.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  set(key: string, value: V): void {
    this.entries.set(key, structuredClone(value));
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  /** Clear all entries (for testing) */
  clear(): void {
    this.entries.clear();
  }
}
