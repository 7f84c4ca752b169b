import { Inject, Injectable } from '@nestjs/common';
import { Logger } from '../../../utils/logger';
import { Result } from '../../../utils/result';
import { CACHE_SERVICE, ICacheService } from '../../cache/cache.interface';
import { IRateProvider, ProviderError } from '../interfaces/rate-provider.interface';
import { RateSnapshot, rateSnapshotSchema } from '../interfaces/rates.types';
import { RateProviderFactory } from '../rate-provider-factory.service';
import { CONVERSION_TTL_SECONDS, RATES_QUERY_OPTIONS } from '../rates.constants';
import { CachedQueryHandler, RatesQueryOptions } from './cached-query.handler';
import { ConvertCurrencyQuery, convertCurrencyQuerySchema } from './rate-query.schemas';

/**
 * Converts an amount between two currencies. The amount is already in
 * canonical form here, so "100", "100.0" and "0100" share one cache entry.
 */
@Injectable()
export class ConvertCurrencyHandler extends CachedQueryHandler<ConvertCurrencyQuery, RateSnapshot> {
  protected readonly logger = new Logger('ConvertCurrencyHandler');
  protected readonly querySchema = convertCurrencyQuerySchema;
  protected readonly resultSchema = rateSnapshotSchema;
  protected readonly ttlSeconds = CONVERSION_TTL_SECONDS;

  constructor(
    @Inject(CACHE_SERVICE) cache: ICacheService,
    providerFactory: RateProviderFactory,
    @Inject(RATES_QUERY_OPTIONS) options: RatesQueryOptions
  ) {
    super(cache, providerFactory, options);
  }

  protected cacheKey(query: ConvertCurrencyQuery): string {
    return `convert:${query.fromCurrency}:${query.toCurrency}:${query.amount}`;
  }

  protected fetch(
    provider: IRateProvider,
    query: ConvertCurrencyQuery,
    signal?: AbortSignal
  ): Promise<Result<RateSnapshot, ProviderError>> {
    return provider.convert(query.fromCurrency, query.toCurrency, query.amount, signal);
  }
}
