import { z } from 'zod';

const rateTableSchema = z.record(z.string(), z.number());

export const rateSnapshotSchema = z.object({
  amount: z.number(),
  base: z.string(),
  date: z.string(),
  rates: rateTableSchema,
});

/**
 * Rates for one base currency on one day. For conversions `amount` is the
 * converted amount and `rates` holds the converted value per target currency.
 */
export type RateSnapshot = z.infer<typeof rateSnapshotSchema>;

export const historicalRateSetSchema = z.object({
  amount: z.number(),
  base: z.string(),
  startDate: z.string(),
  endDate: z.string(),
  page: z.number().int(),
  pageSize: z.number().int(),
  totalRecords: z.number().int(),
  totalPages: z.number().int(),
  // Keyed by yyyy-MM-dd, ascending.
  rates: z.record(z.string(), rateTableSchema),
});

export type HistoricalRateSet = z.infer<typeof historicalRateSetSchema>;

export interface HistoricalRatesRequest {
  baseCurrency: string;
  startDate: string;
  endDate: string;
  page: number;
  pageSize: number;
}

// Wire shapes returned by the Frankfurter API.

export const upstreamLatestSchema = z.object({
  amount: z.number(),
  base: z.string(),
  date: z.string(),
  rates: rateTableSchema,
});

export type UpstreamLatestResponse = z.infer<typeof upstreamLatestSchema>;

export const upstreamHistoricalSchema = z.object({
  amount: z.number(),
  base: z.string(),
  start_date: z.string(),
  end_date: z.string(),
  rates: z.record(z.string().regex(/^\d{4}-\d{2}-\d{2}$/), rateTableSchema),
});

export type UpstreamHistoricalResponse = z.infer<typeof upstreamHistoricalSchema>;
