// apps/backend/src/api/api.module.ts

import { Module } from '@nestjs/common';
import { RatesController } from './controllers/rates.controller';
import { AuthController } from './controllers/auth.controller';
import { HealthController } from './controllers/health.controller';
import { AuthGuard } from './guards/auth.guard';
import { RolesGuard } from './guards/roles.guard';
import { RatesModule } from '../services/rates/rates.module';

@Module({
  imports: [
    RatesModule,
  ],
  controllers: [
    RatesController,
    AuthController,
    HealthController,
  ],
  providers: [
    AuthGuard,
    RolesGuard,
  ],
})
export class ApiModule {}
