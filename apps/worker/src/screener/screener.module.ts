import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { MarketDataModule } from '@libs/market-data';
import { SignalsModule } from '@libs/signals';
import { ScreenerCycleService } from './screener-cycle.service';

@Module({
  imports: [CoreModule, MarketDataModule, SignalsModule],
  providers: [ScreenerCycleService],
  exports: [ScreenerCycleService],
})
export class ScreenerModule {}
