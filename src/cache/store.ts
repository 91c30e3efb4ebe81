/**
 * Key-value storage for computed churn days.
 */

export interface CacheStore {
  /** Values for the keys that exist; missing keys are absent from the map. */
  getMany(keys: string[]): Promise<Map<string, string>>;
  set(key: string, value: string): Promise<void>;
}

export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, string>();

  async getMany(keys: string[]): Promise<Map<string, string>> {
    const found = new Map<string, string>();
    for (const key of keys) {
      const value = this.entries.get(key);
      if (value !== undefined) {
        found.set(key, value);
      }
    }
    return found;
  }

  async set(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Cache format version. It is part of every key, so bumping it orphans
 * every entry written under the previous version.
 */
export class CacheVersion {
  private version: number;

  constructor(initial = 0) {
    this.version = initial;
  }

  get current(): number {
    return this.version;
  }

  bump(): number {
    this.version += 1;
    return this.version;
  }
}
