import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import { ScreenerCycleService } from '../screener/screener-cycle.service';
import { formatDashboard } from './dashboard.formatter';

const CLEAR_SCREEN = '\u001b[2J\u001b[H';

@Injectable()
export class TerminalDashboardService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TerminalDashboardService.name);
  private timer?: NodeJS.Timeout;
  private lastRenderedCycle: number | null = null;

  constructor(
    @Inject(SCREENER_CONFIG) private readonly config: ScreenerConfig,
    private readonly screener: ScreenerCycleService,
  ) {}

  onModuleInit(): void {
    if (!this.config.dashboardEnabled) {
      this.logger.log('Terminal dashboard disabled (DASHBOARD_ENABLED=false).');
      return;
    }
    if (!process.stdout.isTTY) {
      this.logger.warn('Terminal dashboard disabled: stdout is not a TTY.');
      return;
    }

    this.timer = setInterval(() => this.render(), this.config.refreshRateSeconds * 1000);
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  render(): void {
    const feed = this.screener.latestFeed();
    const cycle = feed?.cycle ?? null;
    if (cycle !== null && cycle === this.lastRenderedCycle) {
      return;
    }
    this.lastRenderedCycle = cycle;
    process.stdout.write(
      `${CLEAR_SCREEN}${formatDashboard(feed, { timeZone: this.config.displayTimeZone })}\n`,
    );
  }
}
