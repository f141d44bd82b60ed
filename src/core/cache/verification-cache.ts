import { sha256File } from '../../utils/hash.js';
import { emptyCacheState, type CacheEntry, type CacheStats, type CacheStore } from './types.js';

export interface VerificationCacheOptions {
  store: CacheStore;
  ttlSeconds: number;
  maxEntries: number;
  now?: () => number;
}

/**
 * Results of read-only checks keyed by the content hash of the resource they inspected.
 * A changed file hashes differently, so it can only miss. Expired entries are dropped on
 * the next write; past `maxEntries` the oldest `created_at` goes first.
 */
export class VerificationCache {
  private readonly store: CacheStore;
  private readonly now: () => number;
  readonly ttlSeconds: number;
  readonly maxEntries: number;

  constructor(opts: VerificationCacheOptions) {
    this.store = opts.store;
    this.ttlSeconds = opts.ttlSeconds;
    this.maxEntries = opts.maxEntries;
    this.now = opts.now ?? Date.now;
  }

  async get(resourceHash: string, checkKind: string): Promise<CacheEntry | null> {
    const state = await this.store.read();
    const now = this.now();
    const entry = state.entries.find((e) => e.resource_hash === resourceHash && e.check_kind === checkKind);
    if (!entry || !isLive(entry, now)) return null;
    return entry;
  }

  async put(resourceHash: string, checkKind: string, result: unknown, ttlSeconds: number = this.ttlSeconds): Promise<void> {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new RangeError(`cache ttl must be a positive number of seconds, got ${ttlSeconds}`);
    }
    const now = this.now();
    const entry: CacheEntry = {
      resource_hash: resourceHash,
      check_kind: checkKind,
      result,
      created_at: new Date(now).toISOString(),
      ttl_seconds: ttlSeconds
    };

    await this.store.update((state) => {
      const kept = state.entries.filter(
        (e) => isLive(e, now) && !(e.resource_hash === resourceHash && e.check_kind === checkKind)
      );
      kept.push(entry);
      // Stable sort: among equal timestamps the earlier insertion is evicted first.
      kept.sort((a, b) => Date.parse(a.created_at) - Date.parse(b.created_at));
      state.entries = kept.slice(Math.max(0, kept.length - this.maxEntries));
    });
  }

  /**
   * Remove every entry; returns how many there were. Works on a damaged cache file too,
   * which then counts as 0.
   */
  async clear(): Promise<number> {
    const previous = await this.store.replace(emptyCacheState());
    return previous?.entries.length ?? 0;
  }

  async stats(): Promise<CacheStats> {
    const state = await this.store.read();
    const now = this.now();
    const times = state.entries.map((e) => e.created_at).sort((a, b) => Date.parse(a) - Date.parse(b));
    return {
      entries: state.entries.length,
      expired: state.entries.filter((e) => !isLive(e, now)).length,
      maxEntries: this.maxEntries,
      oldestCreatedAt: times[0] ?? null,
      newestCreatedAt: times.length > 0 ? times[times.length - 1] : null
    };
  }
}

/** sha256 hex of a resource's bytes, or `null` if it does not exist. */
export async function hashFile(path: string): Promise<string | null> {
  return await sha256File(path);
}

function isLive(entry: CacheEntry, now: number): boolean {
  const created = Date.parse(entry.created_at);
  return now - created < entry.ttl_seconds * 1000;
}
