export type TradeSide = 'buy' | 'sell';

export interface InstrumentInfo {
  symbol: string;
  contractType: string;
  status: string;
  baseCoin: string;
  quoteCoin: string;
}

export interface SymbolSnapshot {
  readonly symbol: string;
  readonly lastPrice: number;
  /** 24h traded value in quote currency. */
  readonly volume24h: number;
  readonly change24hPct: number;
  readonly timestamp: number;
}

export interface TradeEvent {
  readonly id: string;
  readonly symbol: string;
  readonly side: TradeSide;
  readonly price: number;
  readonly size: number;
  readonly notional: number;
  readonly timestamp: number;
}

export type NormalizedItem<T> =
  | { ok: true; value: T }
  | { ok: false; symbol: string | null; reason: string };

export interface InstrumentPage {
  instruments: InstrumentInfo[];
  nextCursor: string | null;
}

export type SymbolUniverse =
  | { mode: 'fixed'; symbols: readonly string[] }
  | { mode: 'top-volume'; tradeSymbolsLimit: number };

export type SoftFailureReason = 'malformed' | 'missing' | 'rate-limit-timeout';
export type HardFailureReason = 'transport' | 'cancelled';

export type SymbolFetchOutcome =
  | {
      status: 'ok';
      symbol: string;
      snapshot: SymbolSnapshot;
      trades: readonly TradeEvent[];
    }
  | { status: 'soft-failure'; symbol: string; reason: SoftFailureReason; message: string }
  | {
      status: 'hard-failure';
      symbol: string;
      reason: HardFailureReason;
      message: string;
      attempts: number;
    };

export interface FetchReport {
  asOf: number;
  outcomes: SymbolFetchOutcome[];
  /** Symbols whose recent trades were requested this cycle, sorted. */
  monitoredSymbols: string[];
  degradedSymbols: string[];
}

export interface GateStats {
  effectiveMax: number;
  windowMs: number;
  inWindow: number;
  queued: number;
  granted: number;
  throttled: number;
  timedOut: number;
  closed: boolean;
}
