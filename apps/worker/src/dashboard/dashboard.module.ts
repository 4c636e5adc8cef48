import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { ScreenerModule } from '../screener/screener.module';
import { TerminalDashboardService } from './terminal-dashboard.service';

@Module({
  imports: [CoreModule, ScreenerModule],
  providers: [TerminalDashboardService],
})
export class DashboardModule {}
