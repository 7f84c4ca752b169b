// apps/backend/src/api/controllers/health.controller.ts
import { Controller, Get } from '@nestjs/common';

@Controller()
export class HealthController {
  @Get('/health')
  health() {
    return { status: 'ok' };
  }
}
