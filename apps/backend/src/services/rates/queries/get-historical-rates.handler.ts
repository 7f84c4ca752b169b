import { Inject, Injectable } from '@nestjs/common';
import { Logger } from '../../../utils/logger';
import { Result } from '../../../utils/result';
import { CACHE_SERVICE, ICacheService } from '../../cache/cache.interface';
import { IRateProvider, ProviderError } from '../interfaces/rate-provider.interface';
import { HistoricalRateSet, historicalRateSetSchema } from '../interfaces/rates.types';
import { RateProviderFactory } from '../rate-provider-factory.service';
import { HISTORICAL_RATES_TTL_SECONDS, RATES_QUERY_OPTIONS } from '../rates.constants';
import { CachedQueryHandler, RatesQueryOptions } from './cached-query.handler';
import { HistoricalRatesQuery, historicalRatesQuerySchema } from './rate-query.schemas';

@Injectable()
export class GetHistoricalRatesHandler extends CachedQueryHandler<HistoricalRatesQuery, HistoricalRateSet> {
  protected readonly logger = new Logger('GetHistoricalRatesHandler');
  protected readonly querySchema = historicalRatesQuerySchema;
  protected readonly resultSchema = historicalRateSetSchema;
  protected readonly ttlSeconds = HISTORICAL_RATES_TTL_SECONDS;

  constructor(
    @Inject(CACHE_SERVICE) cache: ICacheService,
    providerFactory: RateProviderFactory,
    @Inject(RATES_QUERY_OPTIONS) options: RatesQueryOptions
  ) {
    super(cache, providerFactory, options);
  }

  // Each page is cached separately.
  protected cacheKey(query: HistoricalRatesQuery): string {
    const { baseCurrency, startDate, endDate, page, pageSize } = query;
    return `historical:${baseCurrency}:${startDate}:${endDate}:${page}:${pageSize}`;
  }

  protected fetch(
    provider: IRateProvider,
    query: HistoricalRatesQuery,
    signal?: AbortSignal
  ): Promise<Result<HistoricalRateSet, ProviderError>> {
    return provider.getHistoricalRates(query, signal);
  }
}
