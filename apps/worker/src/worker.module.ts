import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { HealthController } from './health.controller';
import { ScreenerModule } from './screener/screener.module';
import { DashboardModule } from './dashboard/dashboard.module';

@Module({
  imports: [CoreModule, ScreenerModule, DashboardModule],
  controllers: [HealthController],
})
export class WorkerModule {}
