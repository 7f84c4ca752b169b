import axios, {
  AxiosAdapter,
  AxiosError,
  AxiosInstance,
  AxiosResponse,
  CreateAxiosDefaults,
  InternalAxiosRequestConfig,
} from 'axios';
import CircuitBreaker from 'opossum';
import { Logger } from './logger';
import { UpstreamError } from './errors';
import { isAbortError } from './error-utils';
import { sleep } from './index';

declare module 'axios' {
  interface InternalAxiosRequestConfig {
    retryCount?: number;
  }
}

export interface CircuitBreakerSettings {
  /** Share of failed requests in the rolling window that opens the circuit. */
  errorThresholdPercentage: number;
  /** Requests the window must see before the circuit may open. */
  volumeThreshold: number;
  resetTimeoutMs: number;
}

export interface HttpClientOptions {
  baseURL: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  breaker: CircuitBreakerSettings;
  adapter?: CreateAxiosDefaults['adapter'];
}

const BREAKER_WINDOW_MS = 30_000;

const logger = new Logger('HttpClient');

export function retryDelay(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * 2 ** (attempt - 1);
  const jitter = Math.random() * baseDelayMs;
  return Math.round(exponential + jitter);
}

// Server errors, timeouts, throttling and network failures count against the
// circuit. Cancellations and other 4xx replies do not.
export function isTransientFailure(error: unknown): boolean {
  if (isAbortError(error)) {
    return false;
  }
  if (!(error instanceof AxiosError)) {
    return true;
  }

  const status = error.response?.status;
  return status === undefined || status >= 500 || status === 408 || status === 429;
}

const isOpenCircuit = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'EOPENBREAKER';

function withCircuitBreaker(options: HttpClientOptions): AxiosAdapter {
  const transport = axios.getAdapter(options.adapter ?? axios.defaults.adapter);
  const breaker = new CircuitBreaker(
    (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => transport(config),
    {
      timeout: false,
      errorThresholdPercentage: options.breaker.errorThresholdPercentage,
      volumeThreshold: options.breaker.volumeThreshold,
      resetTimeout: options.breaker.resetTimeoutMs,
      rollingCountTimeout: BREAKER_WINDOW_MS,
      errorFilter: (error: unknown) => !isTransientFailure(error),
    }
  );

  breaker.on('open', () => {
    logger.warn(`Circuit opened for ${options.baseURL}; failing fast for ${options.breaker.resetTimeoutMs}ms`);
  });
  breaker.on('halfOpen', () => {
    logger.info(`Circuit half-open for ${options.baseURL}; letting a trial request through`);
  });
  breaker.on('close', () => {
    logger.info(`Circuit closed for ${options.baseURL}`);
  });

  return async (config) => {
    try {
      return await breaker.fire(config);
    } catch (error) {
      if (isOpenCircuit(error)) {
        throw new UpstreamError('Upstream circuit is open', { baseURL: options.baseURL });
      }
      throw error;
    }
  };
}

/**
 * axios instance that retries 429 responses with exponential backoff.
 * A pending retry is abandoned as soon as the request's signal aborts.
 * Each attempt passes a circuit breaker; while it is open requests fail
 * with UpstreamError without reaching the network.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeoutMs,
    adapter: withCircuitBreaker(options),
    headers: { Accept: 'application/json' },
  });

  client.interceptors.response.use(undefined, async (error: unknown) => {
    if (!(error instanceof AxiosError) || !error.config || error.response?.status !== 429) {
      throw error;
    }

    const config = error.config;
    const attempt = (config.retryCount ?? 0) + 1;
    if (attempt > options.maxRetries) {
      throw error;
    }

    const delay = retryDelay(attempt, options.retryDelayMs);
    logger.warn(`Retry ${attempt} after ${delay}ms due to 429 Too Many Requests`, { url: config.url });

    const signal = config.signal instanceof AbortSignal ? config.signal : undefined;
    await sleep(delay, signal);

    config.retryCount = attempt;
    return client.request(config);
  });

  return client;
}
