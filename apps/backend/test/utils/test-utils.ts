// apps/backend/test/utils/test-utils.ts
import { AxiosAdapter, AxiosError, AxiosResponse, CanceledError, InternalAxiosRequestConfig } from 'axios';
import { AppConfig } from '../../src/config';
import { Role } from '../../src/types';
import { generateToken } from '../../src/utils/jwt';
import { CircuitBreakerSettings, createHttpClient } from '../../src/utils/http-client';

export const TEST_JWT_CONFIG: AppConfig['jwt'] = {
  secret: 'test-secret',
  issuer: 'rates-gateway',
  audience: 'rates-gateway',
  expiresInSeconds: 3600,
};

export interface FakeReply {
  status: number;
  body: unknown;
}

export type FakeUpstream = (config: InternalAxiosRequestConfig) => FakeReply;

/**
 * axios adapter answering from `upstream` in process. Non-2xx replies reject
 * the same way the http adapter does.
 */
export function createFakeAdapter(
  upstream: FakeUpstream
): jest.Mock<ReturnType<AxiosAdapter>, Parameters<AxiosAdapter>> {
  return jest.fn<ReturnType<AxiosAdapter>, Parameters<AxiosAdapter>>(async (config) => {
    if (config.signal?.aborted) {
      throw new CanceledError();
    }

    const { status, body } = upstream(config);
    const response: AxiosResponse = {
      data: body,
      status,
      statusText: String(status),
      headers: {},
      config,
    };

    if (status < 200 || status >= 300) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }

    return response;
  });
}

export const TEST_BREAKER: CircuitBreakerSettings = {
  errorThresholdPercentage: 50,
  volumeThreshold: 5,
  resetTimeoutMs: 60_000,
};

export function createFakeHttpClient(
  upstream: FakeUpstream,
  maxRetries = 0,
  breaker: CircuitBreakerSettings = TEST_BREAKER
) {
  const adapter = createFakeAdapter(upstream);
  const client = createHttpClient({
    baseURL: 'https://frankfurter.test/v1/',
    timeoutMs: 1000,
    maxRetries,
    retryDelayMs: 1,
    breaker,
    adapter,
  });
  return { client, adapter };
}

export function createTestToken(role: Role, userId = 'test'): string {
  return generateToken({ userId, role }, TEST_JWT_CONFIG);
}

/**
 * Helper function to build a yyyy-MM-dd keyed series for fake upstream replies
 */
export function rateSeries(
  dates: string[],
  rates: Record<string, number>
): Record<string, Record<string, number>> {
  return Object.fromEntries(dates.map((date) => [date, { ...rates }]));
}
