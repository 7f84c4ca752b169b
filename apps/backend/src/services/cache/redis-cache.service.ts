import { OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { commandOptions, createClient } from 'redis';
import { Logger } from '../../utils/logger';
import { Result, createError, createSuccess } from '../../utils/result';
import { CacheInfrastructureError, CancellationError } from '../../utils/errors';
import { toAppError } from '../../utils/error-utils';
import { CacheError, CacheSchema, ICacheService } from './cache.interface';
import { decodeEntry } from './cache-entry';

export interface RedisCacheOptions {
  url: string;
  keyPrefix: string;
}

type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis-backed cache. Commands fail immediately while the connection is down
 * instead of queueing, and every failure surfaces as CacheInfrastructureError.
 */
export class RedisCacheService implements ICacheService, OnModuleInit, OnModuleDestroy {
  private client: RedisClient;
  private logger = new Logger('RedisCacheService');

  constructor(private readonly options: RedisCacheOptions) {
    this.client = createClient({
      url: options.url,
      disableOfflineQueue: true
    });

    this.client.on('error', (err: unknown) => {
      this.logger.error('Redis client error', err);
    });

    this.client.on('ready', () => {
      this.logger.info('Redis client connected');
    });
  }

  onModuleInit(): void {
    if (this.client.isOpen) {
      return;
    }

    // Not awaited: node-redis keeps retrying in the background, and requests
    // fail with CACHE_UNAVAILABLE until it is ready.
    void this.client.connect().catch((error: unknown) => {
      this.logger.error('Failed to connect to Redis', error);
    });
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.client.isOpen) {
      return;
    }

    if (this.client.isReady) {
      await this.client.quit();
    } else {
      await this.client.disconnect();
    }
    this.logger.info('Redis client disconnected');
  }

  async get<T>(key: string, schema: CacheSchema<T>, signal?: AbortSignal): Promise<Result<T | null, CacheError>> {
    if (signal?.aborted) {
      return createError(new CancellationError());
    }

    try {
      const payload = await this.client.get(commandOptions({ signal }), this.prefixed(key));
      if (payload === null) {
        return createSuccess(null);
      }

      this.logger.debug(`Retrieved from cache: ${key}`);
      return createSuccess(decodeEntry(key, payload, schema));
    } catch (error) {
      return createError(this.toCacheError(error, 'get', key, signal));
    }
  }

  async set<T>(key: string, value: T, ttlSeconds: number, signal?: AbortSignal): Promise<Result<void, CacheError>> {
    if (signal?.aborted) {
      return createError(new CancellationError());
    }

    try {
      await this.client.set(commandOptions({ signal }), this.prefixed(key), JSON.stringify(value), { EX: ttlSeconds });
      this.logger.debug(`Cached ${key} with expiry ${ttlSeconds}s`);
      return createSuccess(undefined);
    } catch (error) {
      return createError(this.toCacheError(error, 'set', key, signal));
    }
  }

  private prefixed(key: string): string {
    return `${this.options.keyPrefix}${key}`;
  }

  private toCacheError(error: unknown, operation: 'get' | 'set', key: string, signal?: AbortSignal): CacheError {
    const appError = toAppError(
      error,
      (message) => new CacheInfrastructureError(`Cache ${operation} failed: ${message}`, { key }),
      signal
    );

    if (appError instanceof CancellationError) {
      return appError;
    }

    this.logger.error(`Cache ${operation} failed for key ${key}`, error);
    return appError instanceof CacheInfrastructureError
      ? appError
      : new CacheInfrastructureError(appError.message, { key });
  }
}
