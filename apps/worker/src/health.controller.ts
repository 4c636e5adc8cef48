import { Controller, Get } from '@nestjs/common';
import { ScreenerCycleService } from './screener/screener-cycle.service';
import type { ScreenerHealth } from './screener/screener-cycle.service';

@Controller('health')
export class HealthController {
  constructor(private readonly screenerCycleService: ScreenerCycleService) {}

  @Get()
  health(): { ok: true } {
    return { ok: true };
  }

  @Get('screener')
  screener(): { ok: true } & ScreenerHealth {
    return { ok: true, ...this.screenerCycleService.getHealth() };
  }
}
