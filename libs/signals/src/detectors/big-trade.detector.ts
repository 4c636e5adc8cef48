import { formatPrice, formatUsd } from '../format';
import type { Detector } from './types';

interface BigTradeConfig {
  thresholdUsd: number;
}

export const createBigTradeDetector = (config: BigTradeConfig): Detector => ({
  kind: 'BIG_TRADE',
  displayName: 'Big trade',
  requiresHistory: false,
  detect: ({ trades }) =>
    trades
      .filter((trade) => trade.notional >= config.thresholdUsd)
      .map((trade) => ({
        kind: 'BIG_TRADE',
        symbol: trade.symbol,
        magnitude: trade.notional,
        timestamp: trade.timestamp,
        direction: trade.side,
        summary: `Big ${trade.side} trade ${formatUsd(trade.notional)} @ ${formatPrice(trade.price)}`,
        details: { price: trade.price, size: trade.size },
      })),
});
