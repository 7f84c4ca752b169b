import { Injectable, OnModuleInit } from '@nestjs/common';
import { Logger } from '../../utils/logger';
import { UnsupportedProviderError } from '../../utils/errors';
import { Result, createError, createSuccess } from '../../utils/result';
import { IRateProvider } from './interfaces/rate-provider.interface';

/**
 * Registry of rate providers, keyed by case-insensitive name.
 * Providers are registered while the application boots; the registry is
 * sealed once its module has initialised.
 */
@Injectable()
export class RateProviderFactory implements OnModuleInit {
  private providers: Map<string, IRateProvider> = new Map();
  private sealed = false;
  private logger = new Logger('RateProviderFactory');

  onModuleInit(): void {
    this.seal();
  }

  registerProvider(provider: IRateProvider): void {
    if (this.sealed) {
      throw new Error(`Cannot register provider ${provider.providerName}: registry is sealed`);
    }

    const key = provider.providerName.toLowerCase();
    if (this.providers.has(key)) {
      this.logger.warn(`Rate provider ${provider.providerName} is already registered. Overwriting.`);
    }

    this.providers.set(key, provider);
    this.logger.info(`Registered rate provider: ${provider.providerName}`);
  }

  seal(): void {
    this.sealed = true;
  }

  createProvider(providerName: string): Result<IRateProvider, UnsupportedProviderError> {
    const provider = this.providers.get(providerName.toLowerCase());

    if (!provider) {
      return createError(new UnsupportedProviderError(providerName));
    }

    return createSuccess(provider);
  }

  getProviderNames(): string[] {
    return Array.from(this.providers.values()).map((provider) => provider.providerName);
  }
}
