import { RateProviderFactory } from './rate-provider-factory.service';
import { IRateProvider } from './interfaces/rate-provider.interface';
import { UnsupportedProviderError } from '../../utils/errors';

function stubProvider(providerName: string): IRateProvider {
  return {
    providerName,
    getLatestRates: jest.fn(),
    convert: jest.fn(),
    getHistoricalRates: jest.fn(),
  };
}

describe('RateProviderFactory', () => {
  let factory: RateProviderFactory;

  beforeEach(() => {
    factory = new RateProviderFactory();
  });

  it('resolves a registered provider by name, ignoring case', () => {
    const provider = stubProvider('frankfurter');
    factory.registerProvider(provider);

    const result = factory.createProvider('Frankfurter');

    expect(result).toEqual({ success: true, data: provider });
  });

  it('returns UnsupportedProviderError for an unknown name', () => {
    factory.registerProvider(stubProvider('frankfurter'));

    const result = factory.createProvider('Foo');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(UnsupportedProviderError);
    expect(result.error.message).toBe('Provider Foo not supported.');
  });

  it('lists registered provider names', () => {
    factory.registerProvider(stubProvider('frankfurter'));
    factory.registerProvider(stubProvider('ecb'));

    expect(factory.getProviderNames()).toEqual(['frankfurter', 'ecb']);
  });

  it('refuses registrations once the module has initialised', () => {
    factory.onModuleInit();

    expect(() => factory.registerProvider(stubProvider('late'))).toThrow(
      'Cannot register provider late: registry is sealed'
    );
  });
});
