import { z } from 'zod';
import { Result } from '../../utils/result';
import { CacheInfrastructureError, CancellationError } from '../../utils/errors';

export const CACHE_SERVICE = 'CACHE_SERVICE';

export type CacheError = CacheInfrastructureError | CancellationError;

export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * String-keyed store with per-entry expiry. A miss resolves to `null`;
 * only an unusable store is an error.
 */
export interface ICacheService {
  get<T>(key: string, schema: CacheSchema<T>, signal?: AbortSignal): Promise<Result<T | null, CacheError>>;
  set<T>(key: string, value: T, ttlSeconds: number, signal?: AbortSignal): Promise<Result<void, CacheError>>;
}
