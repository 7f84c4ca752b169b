import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { AppConfig, configuration } from './config';
import { CachingModule } from './services/cache/cache.module';
import { ApiModule } from './api/api.module';

@Module({
  imports: [
    // .env is read by config/index.ts; this only exposes the validated result.
    ConfigModule.forRoot({
      isGlobal: true,
      ignoreEnvFile: true,
      cache: true,
      load: [configuration],
    }),
    // Fixed window per client IP
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const throttle = configService.get('throttle', { infer: true });
        return [{ ttl: throttle.ttlMs, limit: throttle.limit }];
      },
    }),
    CachingModule,
    ApiModule,
  ],
  providers: [
    { provide: APP_GUARD, useClass: ThrottlerGuard },
  ],
})
export class AppModule {}
