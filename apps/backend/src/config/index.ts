import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import type { CircuitBreakerSettings } from '../utils/http-client';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: positiveInt(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.string().default('info'),
  JWT_SECRET: z.string({ required_error: 'is required' }).min(1, 'is required'),
  JWT_ISSUER: z.string().default('rates-gateway'),
  JWT_AUDIENCE: z.string().default('rates-gateway'),
  JWT_EXPIRES_IN_SECONDS: positiveInt(3600),
  AUTH_USERNAME: z.string().default('test'),
  AUTH_PASSWORD: z.string().default('password'),
  RATE_PROVIDER: z.string().default('frankfurter'),
  FRANKFURTER_BASE_URL: z.string().url().default('https://api.frankfurter.dev/v1/'),
  UPSTREAM_TIMEOUT_MS: positiveInt(5000),
  UPSTREAM_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  UPSTREAM_RETRY_DELAY_MS: positiveInt(1000),
  UPSTREAM_BREAKER_FAILURE_PERCENT: z.coerce.number().int().min(1).max(100).default(50),
  UPSTREAM_BREAKER_MIN_THROUGHPUT: positiveInt(5),
  UPSTREAM_BREAKER_RESET_MS: positiveInt(60000),
  CACHE_STORE: z.enum(['redis', 'memory']).default('redis'),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  CACHE_KEY_PREFIX: z.string().default('rates-gateway:'),
  THROTTLE_LIMIT: positiveInt(100),
  THROTTLE_TTL_MS: positiveInt(60000),
  SLOW_REQUEST_MS: positiveInt(200),
  CORS_ORIGINS: z.string().default(''),
});

export type CacheStore = 'redis' | 'memory';

export interface AppConfig {
  server: {
    port: number;
    env: 'development' | 'production' | 'test';
    corsOrigins: string[];
    slowRequestMs: number;
  };
  logging: {
    level: string;
  };
  jwt: {
    secret: string;
    issuer: string;
    audience: string;
    expiresInSeconds: number;
  };
  auth: {
    username: string;
    password: string;
  };
  rates: {
    activeProvider: string;
    frankfurterBaseUrl: string;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
    breaker: CircuitBreakerSettings;
  };
  cache: {
    store: CacheStore;
    redisUrl: string;
    keyPrefix: string;
  };
  throttle: {
    limit: number;
    ttlMs: number;
  };
}

/**
 * Build the application config from environment variables.
 * Throws listing every missing or malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.errors.map((err) => `${err.path.join('.')} ${err.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;

  return {
    server: {
      port: vars.PORT,
      env: vars.NODE_ENV,
      corsOrigins: vars.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
      slowRequestMs: vars.SLOW_REQUEST_MS,
    },
    logging: {
      level: vars.LOG_LEVEL,
    },
    jwt: {
      secret: vars.JWT_SECRET,
      issuer: vars.JWT_ISSUER,
      audience: vars.JWT_AUDIENCE,
      expiresInSeconds: vars.JWT_EXPIRES_IN_SECONDS,
    },
    auth: {
      username: vars.AUTH_USERNAME,
      password: vars.AUTH_PASSWORD,
    },
    rates: {
      activeProvider: vars.RATE_PROVIDER,
      frankfurterBaseUrl: vars.FRANKFURTER_BASE_URL,
      timeoutMs: vars.UPSTREAM_TIMEOUT_MS,
      maxRetries: vars.UPSTREAM_MAX_RETRIES,
      retryDelayMs: vars.UPSTREAM_RETRY_DELAY_MS,
      breaker: {
        errorThresholdPercentage: vars.UPSTREAM_BREAKER_FAILURE_PERCENT,
        volumeThreshold: vars.UPSTREAM_BREAKER_MIN_THROUGHPUT,
        resetTimeoutMs: vars.UPSTREAM_BREAKER_RESET_MS,
      },
    },
    cache: {
      store: vars.CACHE_STORE,
      redisUrl: vars.REDIS_URL,
      keyPrefix: vars.CACHE_KEY_PREFIX,
    },
    throttle: {
      limit: vars.THROTTLE_LIMIT,
      ttlMs: vars.THROTTLE_TTL_MS,
    },
  };
}

// Factory for ConfigModule.forRoot({ load: [configuration] })
export const configuration = (): AppConfig => loadConfig(process.env);

export default configuration;
