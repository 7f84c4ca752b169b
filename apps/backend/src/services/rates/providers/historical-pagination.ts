import { withoutExcludedCurrencies } from '../../../utils/currency';
import { HistoricalRateSet, HistoricalRatesRequest, UpstreamHistoricalResponse } from '../interfaces/rates.types';

/**
 * Reshape an upstream time series into one page of a HistoricalRateSet.
 *
 * Entries outside [startDate, endDate] are dropped, the rest sorted by date
 * and sliced to the requested page. `totalRecords` is the number of entries
 * upstream returned, before any filtering.
 */
export function paginateHistoricalRates(
  upstream: UpstreamHistoricalResponse,
  request: HistoricalRatesRequest
): HistoricalRateSet {
  const { baseCurrency, startDate, endDate, page, pageSize } = request;
  const entries = Object.entries(upstream.rates);

  // yyyy-MM-dd sorts lexicographically in date order
  const pageEntries = entries
    .filter(([date]) => date >= startDate && date <= endDate)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .slice((page - 1) * pageSize, page * pageSize);

  const totalRecords = entries.length;

  return {
    amount: upstream.amount,
    base: baseCurrency,
    startDate,
    endDate,
    page,
    pageSize,
    totalRecords,
    totalPages: Math.ceil(totalRecords / pageSize),
    rates: Object.fromEntries(
      pageEntries.map(([date, rates]) => [date, withoutExcludedCurrencies(rates)])
    ),
  };
}
