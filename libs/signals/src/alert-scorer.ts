import { Inject, Injectable } from '@nestjs/common';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import type { SymbolSnapshot } from '@libs/market-data';
import { isTrendConfirmed } from './detectors/price-move.detector';
import type { Alert, AlertKind, DirectionalBias, RollingWindowView } from './types';

export type ScoringConfig = Pick<
  ScreenerConfig,
  | 'bigTradeThresholdUsd'
  | 'priceChangeThresholdPct'
  | 'volumeSpikeThresholdPct'
  | 'trendConfirmationPeriods'
  | 'minSignalScore'
  | 'combinedSignalBonus'
  | 'volumePriceCorrelationThreshold'
  | 'directionalBiasRequired'
>;

export interface SignalScore {
  score: number;
  directionalBias: DirectionalBias | null;
  highQuality: boolean;
}

const TREND_BONUS_BIG_TRADE = 1.5;
const TREND_BONUS_PRICE_MOVE = 2;
const STRONG_MOVE_BONUS = 1.5;
const CORRELATION_BONUS = 1.8;
const NO_BIAS_PENALTY = 0.3;

const mean = (values: readonly number[]): number =>
  values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Pearson correlation between each snapshot-to-snapshot price change and the
 * 24h volume at the end of that step. 0 with fewer than 3 snapshots or when
 * either series is flat.
 */
export const volumePriceCorrelation = (snapshots: readonly SymbolSnapshot[]): number => {
  if (snapshots.length < 3) {
    return 0;
  }
  const changes: number[] = [];
  const volumes: number[] = [];
  for (let i = 1; i < snapshots.length; i += 1) {
    changes.push(snapshots[i].lastPrice - snapshots[i - 1].lastPrice);
    volumes.push(snapshots[i].volume24h);
  }

  const changeMean = mean(changes);
  const volumeMean = mean(volumes);
  let covariance = 0;
  let changeVariance = 0;
  let volumeVariance = 0;
  for (let i = 0; i < changes.length; i += 1) {
    const dc = changes[i] - changeMean;
    const dv = volumes[i] - volumeMean;
    covariance += dc * dv;
    changeVariance += dc * dc;
    volumeVariance += dv * dv;
  }
  if (changeVariance === 0 || volumeVariance === 0) {
    return 0;
  }
  return covariance / Math.sqrt(changeVariance * volumeVariance);
};

/**
 * Quality score of one alert. Each kind starts from its size relative to its
 * threshold (x10 big trade, x8 price move, x5 volume spike), earns trend,
 * strong-move and correlation bonuses, is multiplied by the combined bonus
 * when another kind fired on the symbol recently, and keeps 30% when no
 * direction can be inferred while one is required.
 */
export const scoreAlert = (
  alert: Alert,
  window: RollingWindowView,
  recentKinds: ReadonlySet<AlertKind>,
  config: ScoringConfig,
): SignalScore => {
  const prices = window.snapshots.map((snapshot) => snapshot.lastPrice);
  const trend = (direction: 'up' | 'down') =>
    isTrendConfirmed(prices, direction, config.trendConfirmationPeriods);

  let score = 0;
  let bias: DirectionalBias | null = null;

  switch (alert.kind) {
    case 'BIG_TRADE': {
      score = (alert.magnitude / config.bigTradeThresholdUsd) * 10;
      if (alert.direction === 'buy') {
        bias = 'long';
        if (trend('up')) {
          score *= TREND_BONUS_BIG_TRADE;
        }
      } else if (alert.direction === 'sell') {
        bias = 'short';
        if (trend('down')) {
          score *= TREND_BONUS_BIG_TRADE;
        }
      }
      break;
    }
    case 'PRICE_MOVE': {
      score = (alert.magnitude / config.priceChangeThresholdPct) * 8;
      const direction = alert.direction === 'down' ? 'down' : 'up';
      bias = direction === 'up' ? 'long' : 'short';
      if (trend(direction)) {
        score *= TREND_BONUS_PRICE_MOVE;
      }
      if (alert.magnitude > config.priceChangeThresholdPct * 2) {
        score *= STRONG_MOVE_BONUS;
      }
      break;
    }
    case 'VOLUME_SPIKE': {
      score = (alert.magnitude / (config.volumeSpikeThresholdPct / 100)) * 5;
      if (prices.length >= 3) {
        const last = prices[prices.length - 1];
        const earlier = prices[prices.length - 3];
        if (last > earlier) {
          bias = 'long';
        } else if (last < earlier) {
          bias = 'short';
        }
      }
      const correlation = volumePriceCorrelation(window.snapshots);
      if (Math.abs(correlation) > config.volumePriceCorrelationThreshold) {
        score *= CORRELATION_BONUS;
        if (bias === null) {
          bias = correlation > 0 ? 'long' : 'short';
        }
      }
      break;
    }
  }

  if (recentKinds.size > 1) {
    score *= config.combinedSignalBonus;
  }
  if (config.directionalBiasRequired && bias === null) {
    score *= NO_BIAS_PENALTY;
  }

  const rounded = Math.round(score * 100) / 100;
  return {
    score: rounded,
    directionalBias: bias,
    highQuality:
      rounded >= config.minSignalScore && (!config.directionalBiasRequired || bias !== null),
  };
};

@Injectable()
export class AlertScorer {
  constructor(@Inject(SCREENER_CONFIG) private readonly config: ScoringConfig) {}

  score(alert: Alert, window: RollingWindowView, recentKinds: ReadonlySet<AlertKind>): Alert {
    return { ...alert, ...scoreAlert(alert, window, recentKinds, this.config) };
  }
}
