import { FrankfurterProvider } from './frankfurter.provider';
import { CancellationError, UpstreamError } from '../../../utils/errors';
import { FakeUpstream, createFakeHttpClient, rateSeries } from '../../../../test/utils/test-utils';

const latestBody = {
  amount: 1,
  base: 'EUR',
  date: '2025-01-03',
  rates: { USD: 1.03, TRY: 36.4, GBP: 0.83, PLN: 4.27 },
};

function setup(upstream: FakeUpstream) {
  const { client, adapter } = createFakeHttpClient(upstream);
  return { provider: new FrankfurterProvider(client), adapter };
}

describe('FrankfurterProvider', () => {
  it('is registered under the name frankfurter', () => {
    const { provider } = setup(() => ({ status: 200, body: latestBody }));

    expect(provider.providerName).toBe('frankfurter');
  });

  describe('getLatestRates', () => {
    it('requests latest rates for the base and strips excluded currencies', async () => {
      const { provider, adapter } = setup(() => ({ status: 200, body: latestBody }));

      const result = await provider.getLatestRates('EUR');

      expect(result).toEqual({
        success: true,
        data: { amount: 1, base: 'EUR', date: '2025-01-03', rates: { USD: 1.03, GBP: 0.83 } },
      });
      expect(adapter).toHaveBeenCalledTimes(1);
      expect(adapter.mock.calls[0][0]).toMatchObject({ url: 'latest', params: { from: 'EUR' } });
    });

    it('maps a server error to UpstreamError carrying the status', async () => {
      const { provider } = setup(() => ({ status: 500, body: { message: 'boom' } }));

      const result = await provider.getLatestRates('EUR');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(UpstreamError);
      expect(result.error.details).toEqual({ path: 'latest', status: 500 });
    });

    it('fails fast with UpstreamError once the circuit opens', async () => {
      const { provider, adapter } = setup(() => ({ status: 503, body: {} }));
      for (let i = 0; i < 5; i++) {
        await provider.getLatestRates('EUR');
      }

      const result = await provider.getLatestRates('EUR');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(UpstreamError);
      expect(result.error.message).toBe('Upstream circuit is open');
      expect(adapter).toHaveBeenCalledTimes(5);
    });

    it('rejects a body of the wrong shape', async () => {
      const { provider } = setup(() => ({ status: 200, body: { rates: 'none' } }));

      const result = await provider.getLatestRates('EUR');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(UpstreamError);
      expect(result.error.message).toBe('Invalid response from Frankfurter API');
    });

    it('does not call upstream once the signal has aborted', async () => {
      const { provider, adapter } = setup(() => ({ status: 200, body: latestBody }));
      const controller = new AbortController();
      controller.abort();

      const result = await provider.getLatestRates('EUR', controller.signal);

      expect(result.success).toBe(false);
      expect(!result.success && result.error).toBeInstanceOf(CancellationError);
      expect(adapter).not.toHaveBeenCalled();
    });
  });

  describe('convert', () => {
    it('forwards the amount text unchanged', async () => {
      const { provider, adapter } = setup(() => ({
        status: 200,
        body: { amount: 100, base: 'EUR', date: '2025-01-03', rates: { USD: 103.45 } },
      }));

      const result = await provider.convert('EUR', 'USD', '100.5');

      expect(result).toEqual({
        success: true,
        data: { amount: 100, base: 'EUR', date: '2025-01-03', rates: { USD: 103.45 } },
      });
      expect(adapter.mock.calls[0][0]).toMatchObject({
        url: 'latest',
        params: { from: 'EUR', to: 'USD', amount: '100.5' },
      });
    });
  });

  describe('getHistoricalRates', () => {
    it('requests the date range and returns the requested page', async () => {
      const { provider, adapter } = setup(() => ({
        status: 200,
        body: {
          amount: 1,
          base: 'EUR',
          start_date: '2025-01-01',
          end_date: '2025-01-05',
          rates: rateSeries(
            ['2025-01-05', '2025-01-02', '2025-01-01', '2025-01-03'],
            { USD: 1.04, THB: 35.5 }
          ),
        },
      }));

      const result = await provider.getHistoricalRates({
        baseCurrency: 'EUR',
        startDate: '2025-01-01',
        endDate: '2025-01-05',
        page: 1,
        pageSize: 2,
      });

      expect(adapter.mock.calls[0][0]).toMatchObject({
        url: '2025-01-01..2025-01-05',
        params: { from: 'EUR' },
      });
      expect(result).toEqual({
        success: true,
        data: {
          amount: 1,
          base: 'EUR',
          startDate: '2025-01-01',
          endDate: '2025-01-05',
          page: 1,
          pageSize: 2,
          totalRecords: 4,
          totalPages: 2,
          rates: {
            '2025-01-01': { USD: 1.04 },
            '2025-01-02': { USD: 1.04 },
          },
        },
      });
    });
  });
});
