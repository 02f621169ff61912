/**
 * Keyed Cache
 * @module cache/keyed-cache
 *
 * Per-key cache with an explicit population state:
 *
 *   Missing -> Populating -> Populated -> (refresh) Populating -> Populated
 *
 * While a key is populating, readers see the prior value when there is one
 * and otherwise share the in-flight load. A value is installed only once it
 * is fully built, and only if no newer load or write for the key started in
 * the meantime. A failed load leaves the prior value in place and rejects
 * its caller.
 */

import { createModuleLogger, type StructuredLogger } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Loads the value of one key
 */
export type Loader<V> = () => Promise<V>;

/**
 * Population state of a key
 */
export const CacheState = {
  MISSING: 'missing',
  POPULATING: 'populating',
  POPULATED: 'populated',
} as const;

export type CacheState = typeof CacheState[keyof typeof CacheState];

/**
 * Cache statistics
 */
export interface CacheStats {
  hits: number;
  misses: number;
  loads: number;
  failures: number;
  size: number;
}

interface CacheEntry<V> {
  /** Generation of the load or write that owns this entry */
  readonly generation: number;
  /** Installed value, boxed so any V can be cached */
  readonly current?: { readonly value: V };
  readonly loading?: Promise<V>;
}

// ============================================================================
// Keyed Cache
// ============================================================================

export class KeyedCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly logger: StructuredLogger;
  private generation = 0;
  private stats = { hits: 0, misses: 0, loads: 0, failures: 0 };

  constructor(readonly name: string) {
    this.logger = createModuleLogger(`cache:${name}`);
  }

  /**
   * Installed value, if any; never waits for a load
   */
  tryGet(key: string): V | undefined {
    const current = this.entries.get(key)?.current;
    if (current) {
      this.stats.hits++;
      return current.value;
    }
    this.stats.misses++;
    return undefined;
  }

  exists(key: string): boolean {
    return this.entries.get(key)?.current !== undefined;
  }

  state(key: string): CacheState {
    const entry = this.entries.get(key);
    if (!entry) return CacheState.MISSING;
    return entry.loading ? CacheState.POPULATING : CacheState.POPULATED;
  }

  /**
   * Installed value, or the result of the in-flight load, or a new load
   */
  async get(key: string, loader: Loader<V>): Promise<V> {
    const entry = this.entries.get(key);
    if (entry?.current) {
      this.stats.hits++;
      return entry.current.value;
    }
    this.stats.misses++;
    return entry?.loading ?? this.load(key, loader);
  }

  /**
   * Load the key again; readers keep the prior value until the new one is in
   */
  async refresh(key: string, loader: Loader<V>): Promise<V> {
    return this.load(key, loader);
  }

  /**
   * Install a value directly, superseding any in-flight load of the key
   */
  set(key: string, value: V): void {
    this.entries.set(key, { generation: ++this.generation, current: { value } });
  }

  /**
   * Replace the whole cache with the given entries
   */
  fill(entries: Iterable<readonly [string, V]>, duration = 0): void {
    this.entries.clear();
    for (const [key, value] of entries) this.set(key, value);
    this.logger.cacheFilled(this.name, this.entries.size, duration);
  }

  remove(key: string): boolean {
    const removed = this.entries.delete(key);
    if (removed) this.logger.cacheInvalidated(this.name, key);
    return removed;
  }

  /**
   * Remove every key the predicate selects
   */
  removeWhere(predicate: (key: string) => boolean): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (predicate(key) && this.remove(key)) removed++;
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Every installed value
   */
  values(): V[] {
    const values: V[] = [];
    for (const entry of this.entries.values()) {
      if (entry.current) values.push(entry.current.value);
    }
    return values;
  }

  getStats(): CacheStats {
    let size = 0;
    for (const entry of this.entries.values()) {
      if (entry.current) size++;
    }
    return { ...this.stats, size };
  }

  private load(key: string, loader: Loader<V>): Promise<V> {
    const generation = ++this.generation;
    const prior = this.entries.get(key)?.current;
    const start = Date.now();
    this.stats.loads++;

    const loading = Promise.resolve()
      .then(loader)
      .then(
        (value) => {
          if (this.entries.get(key)?.generation === generation) {
            this.entries.set(key, { generation, current: { value } });
            this.logger.cacheRefreshed(this.name, key, Date.now() - start);
          }
          return value;
        },
        (error: unknown) => {
          this.stats.failures++;
          const latest = this.entries.get(key);
          if (latest?.generation === generation) {
            if (latest.current) this.entries.set(key, { generation, current: latest.current });
            else this.entries.delete(key);
          }
          this.logger.cacheRefreshFailed(this.name, key, error);
          throw error;
        }
      );

    this.entries.set(key, { generation, current: prior, loading });
    return loading;
  }
}
