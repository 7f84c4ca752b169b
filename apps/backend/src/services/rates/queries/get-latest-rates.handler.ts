import { Inject, Injectable } from '@nestjs/common';
import { Logger } from '../../../utils/logger';
import { Result } from '../../../utils/result';
import { CACHE_SERVICE, ICacheService } from '../../cache/cache.interface';
import { IRateProvider, ProviderError } from '../interfaces/rate-provider.interface';
import { RateSnapshot, rateSnapshotSchema } from '../interfaces/rates.types';
import { RateProviderFactory } from '../rate-provider-factory.service';
import { LATEST_RATES_TTL_SECONDS, RATES_QUERY_OPTIONS } from '../rates.constants';
import { CachedQueryHandler, RatesQueryOptions } from './cached-query.handler';
import { LatestRatesQuery, latestRatesQuerySchema } from './rate-query.schemas';

@Injectable()
export class GetLatestRatesHandler extends CachedQueryHandler<LatestRatesQuery, RateSnapshot> {
  protected readonly logger = new Logger('GetLatestRatesHandler');
  protected readonly querySchema = latestRatesQuerySchema;
  protected readonly resultSchema = rateSnapshotSchema;
  protected readonly ttlSeconds = LATEST_RATES_TTL_SECONDS;

  constructor(
    @Inject(CACHE_SERVICE) cache: ICacheService,
    providerFactory: RateProviderFactory,
    @Inject(RATES_QUERY_OPTIONS) options: RatesQueryOptions
  ) {
    super(cache, providerFactory, options);
  }

  protected cacheKey(query: LatestRatesQuery): string {
    return `rates:latest:${query.baseCurrency}`;
  }

  protected fetch(
    provider: IRateProvider,
    query: LatestRatesQuery,
    signal?: AbortSignal
  ): Promise<Result<RateSnapshot, ProviderError>> {
    return provider.getLatestRates(query.baseCurrency, signal);
  }
}
