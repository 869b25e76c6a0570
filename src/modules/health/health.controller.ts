import { Controller, Get } from '@nestjs/common';
import { env } from '../../config/env.validation';

@Controller('health')
export class HealthController {
  @Get()
  health() {
    return {
      status: 'ok',
      currency: env.TARGET_CURRENCY,
    };
  }
}
