import { Inject, Injectable } from '@nestjs/common';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import type { SymbolSnapshot, TradeEvent } from '@libs/market-data';
import { RollingWindow } from './rolling-window';
import type { RollingWindowView } from './types';

export type StateUpdateResult =
  | { status: 'accepted'; newTrades: TradeEvent[]; evicted: number }
  | { status: 'stale'; lastTimestamp: number };

interface SymbolState {
  snapshots: RollingWindow<SymbolSnapshot>;
  trades: RollingWindow<TradeEvent>;
  tradeIds: Set<string>;
}

/**
 * Per-symbol rolling windows of snapshots and trades. Single writer: the
 * screener cycle applies updates one symbol at a time.
 */
@Injectable()
export class SymbolStateStore {
  private readonly states = new Map<string, SymbolState>();
  private readonly windowMs: number;

  constructor(@Inject(SCREENER_CONFIG) config: Pick<ScreenerConfig, 'rollingWindowSeconds'>) {
    this.windowMs = config.rollingWindowSeconds * 1000;
  }

  update(symbol: string, snapshot: SymbolSnapshot, trades: readonly TradeEvent[]): StateUpdateResult {
    const existing = this.states.get(symbol);
    const last = existing?.snapshots.last();
    if (last && snapshot.timestamp < last.timestamp) {
      return { status: 'stale', lastTimestamp: last.timestamp };
    }

    const state = existing ?? this.create(symbol);
    const cutoff = snapshot.timestamp - this.windowMs;
    state.snapshots.push(snapshot);

    const newest = state.trades.last()?.timestamp ?? Number.NEGATIVE_INFINITY;
    const newTrades: TradeEvent[] = [];
    for (const trade of [...trades].sort((a, b) => a.timestamp - b.timestamp)) {
      if (
        trade.symbol !== symbol ||
        trade.timestamp < cutoff ||
        trade.timestamp < newest ||
        state.tradeIds.has(trade.id)
      ) {
        continue;
      }
      state.tradeIds.add(trade.id);
      state.trades.push(trade);
      newTrades.push(trade);
    }

    const evicted =
      state.snapshots.evictBefore(cutoff) +
      state.trades.evictBefore(cutoff, (trade) => state.tradeIds.delete(trade.id));

    return { status: 'accepted', newTrades, evicted };
  }

  window(symbol: string): RollingWindowView | undefined {
    const state = this.states.get(symbol);
    if (!state) {
      return undefined;
    }
    return Object.freeze({
      symbol,
      snapshots: Object.freeze(state.snapshots.toArray()),
      trades: Object.freeze(state.trades.toArray()),
    });
  }

  /** Forgets symbols whose newest snapshot has left the window. */
  prune(now: number): string[] {
    const cutoff = now - this.windowMs;
    const removed: string[] = [];
    for (const [symbol, state] of this.states) {
      const last = state.snapshots.last();
      if (!last || last.timestamp < cutoff) {
        this.states.delete(symbol);
        removed.push(symbol);
      }
    }
    return removed;
  }

  symbols(): string[] {
    return [...this.states.keys()];
  }

  private create(symbol: string): SymbolState {
    const state: SymbolState = {
      snapshots: new RollingWindow<SymbolSnapshot>(),
      trades: new RollingWindow<TradeEvent>(),
      tradeIds: new Set<string>(),
    };
    this.states.set(symbol, state);
    return state;
  }
}
