import {
  TransportFailureError,
  normalizeBybitTicker,
} from '@libs/market-data';
import type {
  InstrumentInfo,
  InstrumentPage,
  MarketDataProvider,
  NormalizedItem,
  SymbolSnapshot,
  TradeEvent,
} from '@libs/market-data';

export interface FakeTicker {
  symbol: string;
  lastPrice: number | string;
  volume: number;
  changePct?: number;
}

/** In-process stand-in for the exchange, scripted per test. */
export class FakeMarketDataProvider implements MarketDataProvider {
  readonly provider = 'fake';
  instruments: InstrumentInfo[] | Error = [];
  tickers: FakeTicker[] | Error = [];
  trades = new Map<string, TradeEvent[] | Error>();
  tickerDelayMs = 0;
  tickerCalls = 0;
  tradeCalls = new Map<string, number>();
  tickersInFlight = 0;
  peakTickersInFlight = 0;

  async fetchInstruments(): Promise<InstrumentPage> {
    if (this.instruments instanceof Error) {
      throw this.instruments;
    }
    return { instruments: this.instruments, nextCursor: null };
  }

  async fetchTickers(asOf: number): Promise<NormalizedItem<SymbolSnapshot>[]> {
    this.tickerCalls += 1;
    this.tickersInFlight += 1;
    this.peakTickersInFlight = Math.max(this.peakTickersInFlight, this.tickersInFlight);
    try {
      if (this.tickerDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.tickerDelayMs));
      }
      if (this.tickers instanceof Error) {
        throw this.tickers;
      }
      return this.tickers.map((ticker) =>
        normalizeBybitTicker(
          {
            symbol: ticker.symbol,
            lastPrice: String(ticker.lastPrice),
            price24hPcnt: String((ticker.changePct ?? 0) / 100),
            turnover24h: String(ticker.volume),
          },
          asOf,
        ),
      );
    } finally {
      this.tickersInFlight -= 1;
    }
  }

  async fetchRecentTrades(symbol: string): Promise<TradeEvent[]> {
    this.tradeCalls.set(symbol, (this.tradeCalls.get(symbol) ?? 0) + 1);
    const scripted = this.trades.get(symbol) ?? [];
    if (scripted instanceof Error) {
      throw scripted;
    }
    return scripted;
  }
}

export const perpetual = (symbol: string, status = 'Trading'): InstrumentInfo => ({
  symbol,
  contractType: 'LinearPerpetual',
  status,
  baseCoin: symbol.replace(/USDT$/, ''),
  quoteCoin: 'USDT',
});

export const transportDown = () => new TransportFailureError('connect ECONNREFUSED');
