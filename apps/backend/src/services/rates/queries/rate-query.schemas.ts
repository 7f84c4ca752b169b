import { z } from 'zod';
import { CURRENCY_CODE_PATTERN, EXCLUDED_CURRENCIES, isExcludedCurrency, normalizeAmount } from '../../../utils/currency';
import { toCanonicalDate, today } from '../../../utils/dates';

const currencyCode = (label: string) =>
  z.string({ required_error: `${label} is required.` })
    .regex(CURRENCY_CODE_PATTERN, `${label} must be a valid 3-letter ISO code.`);

// An unparseable date fails the field outright, so the range checks below
// only ever see yyyy-MM-dd strings.
const canonicalDate = (label: string) =>
  z.string({ required_error: `${label} is required.` })
    .transform(toCanonicalDate)
    .pipe(z.string({ invalid_type_error: `${label} must be a valid date.` }));

// Query-string integers: absent or empty means `fallback`. Only plain decimal
// digits are accepted so cache keys never carry `0x2` or `1e+308`.
const queryInteger = (fallback: number, message: string, schema: z.ZodNumber) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? fallback : value),
    z.union([z.string(), z.number()], { errorMap: () => ({ message }) })
      .transform(String)
      .refine((value) => /^\d+$/.test(value), message)
      .transform(Number)
      .pipe(schema.int(message).max(Number.MAX_SAFE_INTEGER, message))
  );

export const latestRatesQuerySchema = z.object({
  baseCurrency: currencyCode('Base currency'),
});

export type LatestRatesQuery = z.infer<typeof latestRatesQuerySchema>;

export const convertCurrencyQuerySchema = z.object({
  fromCurrency: currencyCode('From currency'),
  toCurrency: currencyCode('To currency'),
  amount: z.union([z.string(), z.number()], { required_error: 'Amount is required.' })
    .transform((value) => String(value).trim())
    .refine((value) => /^\d+(\.\d+)?$/.test(value), 'Amount must be a decimal number.')
    .transform(normalizeAmount)
    .refine((value) => value !== '0', 'Amount must be positive.'),
}).superRefine((query, ctx) => {
  if (isExcludedCurrency(query.fromCurrency) || isExcludedCurrency(query.toCurrency)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Currencies ${EXCLUDED_CURRENCIES.join(', ')} are not supported.`,
    });
  }
});

export type ConvertCurrencyQuery = z.infer<typeof convertCurrencyQuerySchema>;

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 10;

const PAGE_MESSAGE = 'Page must be a positive integer.';
const PAGE_SIZE_MESSAGE = `Page size must be between 1 and ${MAX_PAGE_SIZE}.`;

export const historicalRatesQuerySchema = z.object({
  baseCurrency: currencyCode('Base currency'),
  startDate: canonicalDate('Start date'),
  endDate: canonicalDate('End date'),
  page: queryInteger(1, PAGE_MESSAGE, z.number().min(1, PAGE_MESSAGE)),
  pageSize: queryInteger(
    DEFAULT_PAGE_SIZE,
    PAGE_SIZE_MESSAGE,
    z.number().min(1, PAGE_SIZE_MESSAGE).max(MAX_PAGE_SIZE, PAGE_SIZE_MESSAGE)
  ),
}).superRefine((query, ctx) => {
  const currentDate = today();

  if (query.startDate > currentDate || query.endDate > currentDate) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['endDate'], message: 'Dates cannot be in the future.' });
  }

  if (query.endDate < query.startDate) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['endDate'],
      message: 'EndDate must be greater than or equal to StartDate.',
    });
  }
});

export type HistoricalRatesQuery = z.infer<typeof historicalRatesQuerySchema>;
