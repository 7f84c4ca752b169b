import { Result, createError, createSuccess } from '../../utils/result';
import { CancellationError } from '../../utils/errors';
import { CacheError, CacheSchema, ICacheService } from './cache.interface';
import { decodeEntry } from './cache-entry';

interface MemoryEntry {
  payload: string;
  expiresAt: number;
}

/**
 * Process-local cache for development and tests.
 *
 * Values are stored as JSON so reads return fresh copies, exactly like the
 * Redis backend. Map insertion order doubles as LRU order: a hit is deleted
 * and re-inserted, and the oldest key is evicted once `maxEntries` is reached.
 */
export class MemoryCacheService implements ICacheService {
  static readonly DEFAULT_MAX_ENTRIES = 1024;

  private readonly entries = new Map<string, MemoryEntry>();

  constructor(
    private readonly maxEntries: number = MemoryCacheService.DEFAULT_MAX_ENTRIES,
    private readonly now: () => number = Date.now
  ) {}

  async get<T>(key: string, schema: CacheSchema<T>, signal?: AbortSignal): Promise<Result<T | null, CacheError>> {
    if (signal?.aborted) {
      return createError(new CancellationError());
    }

    const entry = this.entries.get(key);
    if (!entry) {
      return createSuccess(null);
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return createSuccess(null);
    }

    // LRU touch
    this.entries.delete(key);
    this.entries.set(key, entry);
    return createSuccess(decodeEntry(key, entry.payload, schema));
  }

  async set<T>(key: string, value: T, ttlSeconds: number, signal?: AbortSignal): Promise<Result<void, CacheError>> {
    if (signal?.aborted) {
      return createError(new CancellationError());
    }

    if (this.entries.size >= this.maxEntries && !this.entries.has(key)) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
      }
    }

    this.entries.delete(key);
    this.entries.set(key, {
      payload: JSON.stringify(value),
      expiresAt: this.now() + ttlSeconds * 1000
    });
    return createSuccess(undefined);
  }

  get size(): number {
    return this.entries.size;
  }
}
