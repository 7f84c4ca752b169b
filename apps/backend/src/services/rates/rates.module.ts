import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AxiosInstance } from 'axios';
import { AppConfig } from '../../config';
import { createHttpClient } from '../../utils/http-client';
import { FrankfurterProvider } from './providers/frankfurter.provider';
import { RateProviderFactory } from './rate-provider-factory.service';
import { RATES_HTTP_CLIENT, RATES_QUERY_OPTIONS } from './rates.constants';
import { RatesQueryOptions } from './queries/cached-query.handler';
import { GetLatestRatesHandler } from './queries/get-latest-rates.handler';
import { ConvertCurrencyHandler } from './queries/convert-currency.handler';
import { GetHistoricalRatesHandler } from './queries/get-historical-rates.handler';

@Module({
  providers: [
    {
      provide: RATES_HTTP_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): AxiosInstance => {
        const rates = configService.get('rates', { infer: true });
        return createHttpClient({
          baseURL: rates.frankfurterBaseUrl,
          timeoutMs: rates.timeoutMs,
          maxRetries: rates.maxRetries,
          retryDelayMs: rates.retryDelayMs,
          breaker: rates.breaker,
        });
      },
    },
    {
      provide: RATES_QUERY_OPTIONS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): RatesQueryOptions => ({
        activeProvider: configService.get('rates', { infer: true }).activeProvider,
      }),
    },

    // Providers
    RateProviderFactory,
    FrankfurterProvider,

    // Query handlers
    GetLatestRatesHandler,
    ConvertCurrencyHandler,
    GetHistoricalRatesHandler,
  ],
  exports: [
    RateProviderFactory,
    GetLatestRatesHandler,
    ConvertCurrencyHandler,
    GetHistoricalRatesHandler,
  ],
})
export class RatesModule {
  constructor(
    private providerFactory: RateProviderFactory,
    private frankfurterProvider: FrankfurterProvider
  ) {
    // Register rate providers
    this.providerFactory.registerProvider(this.frankfurterProvider);
  }
}
