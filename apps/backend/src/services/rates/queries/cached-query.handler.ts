import { z } from 'zod';
import { Logger } from '../../../utils/logger';
import { CancellationError, UnsupportedProviderError, ValidationError } from '../../../utils/errors';
import { Result, createError, createSuccess, isFailure } from '../../../utils/result';
import { validateRequest } from '../../../middleware/validation';
import { CacheError, CacheSchema, ICacheService } from '../../cache/cache.interface';
import { IRateProvider, ProviderError } from '../interfaces/rate-provider.interface';
import { RateProviderFactory } from '../rate-provider-factory.service';

export interface RatesQueryOptions {
  activeProvider: string;
}

export type RatesQueryError = ValidationError | UnsupportedProviderError | ProviderError | CacheError;

/**
 * Cache-aside pipeline shared by the rate queries:
 * validate, look up the cache, call the active provider on a miss, store.
 *
 * Provider failures are returned as-is and never cached. The signal is checked
 * between steps; once it has aborted nothing is written to the cache.
 */
export abstract class CachedQueryHandler<TQuery, TResult> {
  protected abstract readonly logger: Logger;
  protected abstract readonly querySchema: z.ZodType<TQuery, z.ZodTypeDef, unknown>;
  protected abstract readonly resultSchema: CacheSchema<TResult>;
  protected abstract readonly ttlSeconds: number;

  constructor(
    protected readonly cache: ICacheService,
    protected readonly providerFactory: RateProviderFactory,
    protected readonly options: RatesQueryOptions
  ) {}

  protected abstract cacheKey(query: TQuery): string;

  protected abstract fetch(
    provider: IRateProvider,
    query: TQuery,
    signal?: AbortSignal
  ): Promise<Result<TResult, ProviderError>>;

  async execute(input: unknown, signal?: AbortSignal): Promise<Result<TResult, RatesQueryError>> {
    const validation = validateRequest(input, this.querySchema);
    if (isFailure(validation)) {
      return validation;
    }

    if (signal?.aborted) {
      return createError(new CancellationError());
    }

    const key = this.cacheKey(validation.data);
    const cached = await this.cache.get(key, this.resultSchema, signal);
    if (!cached.success) {
      return cached;
    }

    if (cached.data !== null) {
      this.logger.info(`Cache hit for ${key}`);
      return createSuccess(cached.data);
    }

    const provider = this.providerFactory.createProvider(this.options.activeProvider);
    if (!provider.success) {
      this.logger.error(provider.error.message, { providers: this.providerFactory.getProviderNames() });
      return provider;
    }

    const fetched = await this.fetch(provider.data, validation.data, signal);
    if (!fetched.success) {
      return fetched;
    }

    if (signal?.aborted) {
      return createError(new CancellationError());
    }

    const stored = await this.cache.set(key, fetched.data, this.ttlSeconds, signal);
    if (!stored.success) {
      return stored;
    }

    return createSuccess(fetched.data);
  }
}
