import { Inject, Injectable } from '@nestjs/common';
import { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { Logger } from '../../../utils/logger';
import { Result, createError, createSuccess, mapResult } from '../../../utils/result';
import { CancellationError, UpstreamError } from '../../../utils/errors';
import { toAppError } from '../../../utils/error-utils';
import { withoutExcludedCurrencies } from '../../../utils/currency';
import { IRateProvider, ProviderError } from '../interfaces/rate-provider.interface';
import {
    HistoricalRateSet,
    HistoricalRatesRequest,
    RateSnapshot,
    UpstreamLatestResponse,
    upstreamHistoricalSchema,
    upstreamLatestSchema
} from '../interfaces/rates.types';
import { FRANKFURTER_PROVIDER_NAME, RATES_HTTP_CLIENT } from '../rates.constants';
import { paginateHistoricalRates } from './historical-pagination';

const INVALID_RESPONSE = 'Invalid response from Frankfurter API';

const toSnapshot = (latest: UpstreamLatestResponse): RateSnapshot => ({
    ...latest,
    rates: withoutExcludedCurrencies(latest.rates)
});

/**
 * Rate provider backed by the Frankfurter API (ECB reference rates).
 * Frankfurter has no pagination, so historical series are paged here.
 */
@Injectable()
export class FrankfurterProvider implements IRateProvider {
    readonly providerName = FRANKFURTER_PROVIDER_NAME;
    private logger = new Logger('FrankfurterProvider');

    constructor(
        @Inject(RATES_HTTP_CLIENT) private readonly http: AxiosInstance
    ) {}

    async getLatestRates(
        baseCurrency: string,
        signal?: AbortSignal
    ): Promise<Result<RateSnapshot, ProviderError>> {
        const response = await this.fetch('latest', { from: baseCurrency }, upstreamLatestSchema, signal);
        return mapResult(response, toSnapshot);
    }

    async convert(
        fromCurrency: string,
        toCurrency: string,
        amount: string,
        signal?: AbortSignal
    ): Promise<Result<RateSnapshot, ProviderError>> {
        const response = await this.fetch(
            'latest',
            { from: fromCurrency, to: toCurrency, amount },
            upstreamLatestSchema,
            signal
        );
        return mapResult(response, toSnapshot);
    }

    async getHistoricalRates(
        request: HistoricalRatesRequest,
        signal?: AbortSignal
    ): Promise<Result<HistoricalRateSet, ProviderError>> {
        const response = await this.fetch(
            `${request.startDate}..${request.endDate}`,
            { from: request.baseCurrency },
            upstreamHistoricalSchema,
            signal
        );
        return mapResult(response, (series) => paginateHistoricalRates(series, request));
    }

    private async fetch<T>(
        path: string,
        params: Record<string, string>,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        signal?: AbortSignal
    ): Promise<Result<T, ProviderError>> {
        if (signal?.aborted) {
            return createError(new CancellationError());
        }

        let body: unknown;
        try {
            const response = await this.http.get<unknown>(path, { params, signal });
            body = response.data;
        } catch (error) {
            return createError(this.toProviderError(error, path, signal));
        }

        const parsed = schema.safeParse(body);
        if (!parsed.success) {
            this.logger.error(INVALID_RESPONSE, { path, issues: parsed.error.errors });
            return createError(new UpstreamError(INVALID_RESPONSE, { path }));
        }

        return createSuccess(parsed.data);
    }

    private toProviderError(error: unknown, path: string, signal?: AbortSignal): ProviderError {
        const status = error instanceof AxiosError ? error.response?.status : undefined;
        const appError = toAppError(
            error,
            (message) => new UpstreamError(`Frankfurter API request failed: ${message}`, { path, status }),
            signal
        );

        if (appError instanceof CancellationError) {
            return appError;
        }

        const upstreamError = appError instanceof UpstreamError
            ? appError
            : new UpstreamError(appError.message, { path, status });
        this.logger.warn('Frankfurter API request failed', { path, status, message: upstreamError.message });
        return upstreamError;
    }
}
