import { Module } from '@nestjs/common';
import { CLOCK, CoreModule, SCREENER_CONFIG } from '@libs/core';
import type { Clock, ScreenerConfig } from '@libs/core';
import { MARKET_DATA_PROVIDER } from './interfaces';
import { BybitMarketDataProvider } from './providers/bybit.provider';
import { RequestGate } from './request-gate';
import { SnapshotFetcher } from './snapshot-fetcher.service';

@Module({
  imports: [CoreModule],
  providers: [
    BybitMarketDataProvider,
    { provide: MARKET_DATA_PROVIDER, useExisting: BybitMarketDataProvider },
    {
      provide: RequestGate,
      inject: [SCREENER_CONFIG, CLOCK],
      useFactory: (config: ScreenerConfig, clock: Clock) =>
        new RequestGate(
          {
            maxRequestsPerWindow: config.maxRequestsPerWindow,
            windowSeconds: config.windowSeconds,
            safetyFactor: config.safetyFactor,
          },
          clock,
        ),
    },
    SnapshotFetcher,
  ],
  exports: [RequestGate, SnapshotFetcher, MARKET_DATA_PROVIDER],
})
export class MarketDataModule {}
