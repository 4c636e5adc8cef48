import { formatPrice, formatSignedPct } from '../format';
import type { Detector } from './types';

interface PriceMoveConfig {
  thresholdPct: number;
  trendConfirmationPeriods: number;
}

/**
 * True when each of the last `periods` snapshot-to-snapshot moves goes in
 * `direction`. Needs `periods + 1` prices.
 */
export const isTrendConfirmed = (
  prices: readonly number[],
  direction: 'up' | 'down',
  periods: number,
): boolean => {
  if (periods < 1 || prices.length < periods + 1) {
    return false;
  }
  for (let i = prices.length - periods; i < prices.length; i += 1) {
    const step = prices[i] - prices[i - 1];
    if (direction === 'up' ? step <= 0 : step >= 0) {
      return false;
    }
  }
  return true;
};

export const createPriceMoveDetector = (config: PriceMoveConfig): Detector => ({
  kind: 'PRICE_MOVE',
  displayName: 'Price move',
  requiresHistory: true,
  detect: ({ snapshot, window }) => {
    const reference = window.snapshots[0];
    if (!reference || reference.lastPrice <= 0) {
      return [];
    }

    const changePct = ((snapshot.lastPrice - reference.lastPrice) / reference.lastPrice) * 100;
    const magnitude = Math.abs(changePct);
    if (magnitude < config.thresholdPct) {
      return [];
    }

    const direction = changePct > 0 ? 'up' : 'down';
    const trendConfirmed = isTrendConfirmed(
      window.snapshots.map((item) => item.lastPrice),
      direction,
      config.trendConfirmationPeriods,
    );

    return [
      {
        kind: 'PRICE_MOVE',
        symbol: snapshot.symbol,
        magnitude,
        timestamp: snapshot.timestamp,
        direction,
        summary: `Price ${direction} ${formatSignedPct(changePct)} (${formatPrice(
          reference.lastPrice,
        )} -> ${formatPrice(snapshot.lastPrice)})${trendConfirmed ? ', trend confirmed' : ''}`,
        details: {
          referencePrice: reference.lastPrice,
          changePct,
          windowStart: reference.timestamp,
          trendConfirmed,
        },
      },
    ];
  },
});
