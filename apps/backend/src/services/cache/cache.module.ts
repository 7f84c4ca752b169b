import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../config';
import { Logger } from '../../utils/logger';
import { CACHE_SERVICE, ICacheService } from './cache.interface';
import { MemoryCacheService } from './memory-cache.service';
import { RedisCacheService } from './redis-cache.service';

const logger = new Logger('CachingModule');

@Global()
@Module({
  providers: [
    {
      provide: CACHE_SERVICE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>): ICacheService => {
        const cache = configService.get('cache', { infer: true });

        if (cache.store === 'memory') {
          logger.info('Using in-memory cache store');
          return new MemoryCacheService();
        }

        logger.info('Using Redis cache store');
        return new RedisCacheService({ url: cache.redisUrl, keyPrefix: cache.keyPrefix });
      },
    },
  ],
  exports: [CACHE_SERVICE],
})
export class CachingModule {}
