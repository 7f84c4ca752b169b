import { GetHistoricalRatesHandler } from './get-historical-rates.handler';
import { HistoricalRateSet } from '../interfaces/rates.types';
import { ValidationError } from '../../../utils/errors';
import { createSuccess } from '../../../utils/result';
import { createFactory, createMockProvider, createSpiedCache } from '../../../../test/utils/rate-fakes';

const page: HistoricalRateSet = {
  amount: 1,
  base: 'EUR',
  startDate: '2025-01-01',
  endDate: '2025-01-05',
  page: 1,
  pageSize: 10,
  totalRecords: 3,
  totalPages: 1,
  rates: {
    '2025-01-02': { USD: 1.02 },
    '2025-01-03': { USD: 1.03 },
    '2025-01-04': { USD: 1.04 },
  },
};

describe('GetHistoricalRatesHandler', () => {
  let provider: ReturnType<typeof createMockProvider>;
  let spiedCache: ReturnType<typeof createSpiedCache>;
  let handler: GetHistoricalRatesHandler;

  beforeEach(() => {
    provider = createMockProvider();
    provider.getHistoricalRates.mockResolvedValue(createSuccess(page));
    spiedCache = createSpiedCache();
    handler = new GetHistoricalRatesHandler(spiedCache.cache, createFactory(provider), { activeProvider: 'frankfurter' });
  });

  it('applies paging defaults and caches the page for a day', async () => {
    const result = await handler.execute({ baseCurrency: 'EUR', startDate: '2025-01-01', endDate: '2025-01-05' });

    expect(result).toEqual({ success: true, data: page });
    expect(provider.getHistoricalRates).toHaveBeenCalledWith(
      { baseCurrency: 'EUR', startDate: '2025-01-01', endDate: '2025-01-05', page: 1, pageSize: 10 },
      undefined
    );
    expect(spiedCache.set).toHaveBeenCalledWith('historical:EUR:2025-01-01:2025-01-05:1:10', page, 86400, undefined);
  });

  it('builds the key from canonical dates and parsed paging', async () => {
    await handler.execute({
      baseCurrency: 'EUR',
      startDate: '2025-01-01T08:00:00',
      endDate: '2025-01-05',
      page: '2',
      pageSize: '5',
    });

    expect(spiedCache.get).toHaveBeenCalledWith('historical:EUR:2025-01-01:2025-01-05:2:5', expect.anything(), undefined);
  });

  it('keys paging on plain decimal integers', async () => {
    await handler.execute({
      baseCurrency: 'EUR',
      startDate: '2025-01-01',
      endDate: '2025-01-05',
      page: '007',
      pageSize: '050',
    });

    expect(spiedCache.get).toHaveBeenCalledWith('historical:EUR:2025-01-01:2025-01-05:7:50', expect.anything(), undefined);
  });

  it('reads back a cached page identical to the stored one', async () => {
    const query = { baseCurrency: 'EUR', startDate: '2025-01-01', endDate: '2025-01-05' };
    await handler.execute(query);

    const cached = await handler.execute(query);

    expect(cached).toEqual({ success: true, data: page });
    expect(provider.getHistoricalRates).toHaveBeenCalledTimes(1);
  });

  it.each([
    [
      { startDate: '2025-01-05', endDate: '2025-01-01' },
      'endDate: EndDate must be greater than or equal to StartDate.',
    ],
    [
      { startDate: '2999-01-01', endDate: '2999-01-02' },
      'endDate: Dates cannot be in the future.',
    ],
    [
      { startDate: 'yesterday', endDate: '2025-01-01' },
      'startDate: Start date must be a valid date.',
    ],
    [
      { startDate: '2025-01-01', endDate: '2025-01-05', pageSize: '101' },
      'pageSize: Page size must be between 1 and 100.',
    ],
    [
      { startDate: '2025-01-01', endDate: '2025-01-05', page: '0' },
      'page: Page must be a positive integer.',
    ],
    [
      { startDate: '2025-01-01', endDate: '2025-01-05', page: 'abc' },
      'page: Page must be a positive integer.',
    ],
    [
      { startDate: '2025-01-01', endDate: '2025-01-05', page: '0x2' },
      'page: Page must be a positive integer.',
    ],
    [
      { startDate: '2025-01-01', endDate: '2025-01-05', page: '-1' },
      'page: Page must be a positive integer.',
    ],
    [
      { startDate: '2025-01-01', endDate: '2025-01-05', pageSize: '1e308' },
      'pageSize: Page size must be between 1 and 100.',
    ],
    [
      { startDate: '2025-01-01', endDate: '2025-01-05', pageSize: '2.5' },
      'pageSize: Page size must be between 1 and 100.',
    ],
  ])('rejects %p before any cache or provider call', async (query, message) => {
    const result = await handler.execute({ baseCurrency: 'EUR', ...query });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.message).toBe(message);
    expect(spiedCache.get).not.toHaveBeenCalled();
    expect(provider.getHistoricalRates).not.toHaveBeenCalled();
  });
});
