import type { AlertKindName } from '@libs/core';
import type { SymbolSnapshot, TradeEvent } from '@libs/market-data';

export type AlertKind = AlertKindName;

export type AlertDirection = 'buy' | 'sell' | 'up' | 'down';

export type DirectionalBias = 'long' | 'short';

export interface Alert {
  readonly kind: AlertKind;
  readonly symbol: string;
  /** Notional for big trades, |change %| for price moves, delta ratio for volume spikes. */
  readonly magnitude: number;
  readonly timestamp: number;
  readonly summary: string;
  readonly direction?: AlertDirection;
  readonly details?: Readonly<Record<string, number | boolean>>;
  /** Set once the alert has been scored; detectors leave these unset. */
  readonly score?: number;
  readonly directionalBias?: DirectionalBias | null;
  readonly highQuality?: boolean;
}

export interface TopVolumeEntry {
  readonly symbol: string;
  readonly volume: number;
  readonly price: number;
  readonly change24hPct: number;
}

export interface RollingWindowView {
  readonly symbol: string;
  /** Oldest first; the last entry is the current snapshot. */
  readonly snapshots: readonly SymbolSnapshot[];
  readonly trades: readonly TradeEvent[];
}

export interface DetectionInput {
  snapshot: SymbolSnapshot;
  /** Trades first seen this cycle. */
  trades: readonly TradeEvent[];
  window: RollingWindowView;
}

export interface ScreenerFeed {
  readonly cycle: number;
  readonly asOf: number;
  readonly topVolume: readonly TopVolumeEntry[];
  /** Symbols whose trades were watched for big-trade alerts this cycle. */
  readonly monitoredSymbols: readonly string[];
  readonly alerts: readonly Alert[];
  readonly degradedSymbols: readonly string[];
}
