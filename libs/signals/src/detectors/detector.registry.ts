import { Inject, Injectable } from '@nestjs/common';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import { createBigTradeDetector } from './big-trade.detector';
import { createPriceMoveDetector } from './price-move.detector';
import { createVolumeSpikeDetector } from './volume-spike.detector';
import type { Detector } from './types';

export type DetectorConfig = Pick<
  ScreenerConfig,
  | 'bigTradeThresholdUsd'
  | 'priceChangeThresholdPct'
  | 'trendConfirmationPeriods'
  | 'volumeSpikeThresholdPct'
>;

@Injectable()
export class DetectorRegistry {
  private readonly detectors: Detector[];

  constructor(@Inject(SCREENER_CONFIG) config: DetectorConfig) {
    this.detectors = [
      createBigTradeDetector({ thresholdUsd: config.bigTradeThresholdUsd }),
      createPriceMoveDetector({
        thresholdPct: config.priceChangeThresholdPct,
        trendConfirmationPeriods: config.trendConfirmationPeriods,
      }),
      createVolumeSpikeDetector({ thresholdPct: config.volumeSpikeThresholdPct }),
    ];
  }

  getAll(): Detector[] {
    return this.detectors;
  }
}
