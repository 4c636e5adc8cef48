import type {
  InstrumentPage,
  NormalizedItem,
  SymbolSnapshot,
  TradeEvent,
} from './models';

export const MARKET_DATA_PROVIDER = Symbol('MARKET_DATA_PROVIDER');

/**
 * Public market-data source. Implementations throw `TransportFailureError`
 * for retryable failures and `MalformedPayloadError` for payloads that cannot
 * be used; they never talk to the request gate themselves.
 */
export interface MarketDataProvider {
  readonly provider: string;
  fetchInstruments(cursor?: string, signal?: AbortSignal): Promise<InstrumentPage>;
  /** One item per listed symbol; snapshots carry `asOf` as their timestamp. */
  fetchTickers(asOf: number, signal?: AbortSignal): Promise<NormalizedItem<SymbolSnapshot>[]>;
  /** Oldest first. */
  fetchRecentTrades(symbol: string, limit: number, signal?: AbortSignal): Promise<TradeEvent[]>;
}
