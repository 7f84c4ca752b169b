import { Result } from '../../../utils/result';
import { CancellationError, UpstreamError } from '../../../utils/errors';
import { HistoricalRateSet, HistoricalRatesRequest, RateSnapshot } from './rates.types';

export type ProviderError = UpstreamError | CancellationError;

/**
 * An upstream source of exchange rates. Implementations strip excluded
 * currencies from everything they return.
 */
export interface IRateProvider {
    readonly providerName: string;

    getLatestRates(
        baseCurrency: string,
        signal?: AbortSignal
    ): Promise<Result<RateSnapshot, ProviderError>>;

    /**
     * @param amount - canonical decimal text, forwarded to upstream verbatim
     */
    convert(
        fromCurrency: string,
        toCurrency: string,
        amount: string,
        signal?: AbortSignal
    ): Promise<Result<RateSnapshot, ProviderError>>;

    getHistoricalRates(
        request: HistoricalRatesRequest,
        signal?: AbortSignal
    ): Promise<Result<HistoricalRateSet, ProviderError>>;
}
