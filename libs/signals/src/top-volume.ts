import type { SymbolSnapshot } from '@libs/market-data';
import type { TopVolumeEntry } from './types';

export const compareSymbols = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Highest 24h volume first, ties broken by symbol, at most `limit` rows. */
export const rankTopVolume = (
  snapshots: Iterable<SymbolSnapshot>,
  limit: number,
): TopVolumeEntry[] =>
  [...snapshots]
    .sort((a, b) => b.volume24h - a.volume24h || compareSymbols(a.symbol, b.symbol))
    .slice(0, Math.max(0, limit))
    .map((snapshot) => ({
      symbol: snapshot.symbol,
      volume: snapshot.volume24h,
      price: snapshot.lastPrice,
      change24hPct: snapshot.change24hPct,
    }));
