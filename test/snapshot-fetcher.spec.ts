import { describe, expect, it, vi } from 'vitest';
import { buildScreenerConfig, envSchema } from '@libs/core';
import { RequestGate, SnapshotFetcher, universeFromConfig } from '@libs/market-data';
import type { TradeEvent } from '@libs/market-data';
import { FakeMarketDataProvider, perpetual, transportDown } from './support/fake-provider';

const AS_OF = Date.UTC(2024, 0, 1, 0, 0, 0);

const configFor = (env: Record<string, string>) =>
  buildScreenerConfig(envSchema.parse({ FETCH_RETRY_BASE_DELAY_MS: '0', ...env }));

const roomyGate = () =>
  new RequestGate({ maxRequestsPerWindow: 1_000, windowSeconds: 1, safetyFactor: 1 });

const btcTrade: TradeEvent = {
  id: 'exec-1',
  symbol: 'BTCUSDT',
  side: 'buy',
  price: 50_000,
  size: 1,
  notional: 50_000,
  timestamp: AS_OF - 500,
};

const setup = (env: Record<string, string>, gate = roomyGate()) => {
  const config = configFor(env);
  const provider = new FakeMarketDataProvider();
  const fetcher = new SnapshotFetcher(config, provider, gate);
  return { config, provider, fetcher, universe: universeFromConfig(config) };
};

describe('snapshot fetcher', () => {
  it('returns one typed outcome per requested symbol', async () => {
    const { provider, fetcher, universe } = setup({ SCREENER_SYMBOLS: 'btcusdt,ETHUSDT,SOLUSDT' });
    provider.instruments = [perpetual('BTCUSDT'), perpetual('ETHUSDT'), perpetual('SOLUSDT')];
    provider.tickers = [
      { symbol: 'BTCUSDT', lastPrice: 50_000, volume: 1_000_000_000 },
      { symbol: 'ETHUSDT', lastPrice: 'oops', volume: 500_000_000 },
    ];
    provider.trades.set('BTCUSDT', [btcTrade]);

    const report = await fetcher.fetch(universe, AS_OF);

    expect(report.asOf).toBe(AS_OF);
    expect(report.outcomes).toHaveLength(3);
    expect(report.outcomes[0]).toEqual({
      status: 'ok',
      symbol: 'BTCUSDT',
      snapshot: {
        symbol: 'BTCUSDT',
        lastPrice: 50_000,
        volume24h: 1_000_000_000,
        change24hPct: 0,
        timestamp: AS_OF,
      },
      trades: [btcTrade],
    });
    expect(report.outcomes[1]).toMatchObject({
      status: 'soft-failure',
      symbol: 'ETHUSDT',
      reason: 'malformed',
    });
    expect(report.outcomes[2]).toEqual({
      status: 'soft-failure',
      symbol: 'SOLUSDT',
      reason: 'missing',
      message: 'absent from ticker response',
    });
    expect(report.monitoredSymbols).toEqual(['BTCUSDT']);
    expect(report.degradedSymbols).toEqual([]);
  });

  it('retries transient trade failures through the gate', async () => {
    const gate = roomyGate();
    const { provider, fetcher, universe } = setup({ SCREENER_SYMBOLS: 'BTCUSDT' }, gate);
    provider.instruments = [perpetual('BTCUSDT')];
    provider.tickers = [{ symbol: 'BTCUSDT', lastPrice: 50_000, volume: 1 }];
    provider.trades.set('BTCUSDT', [btcTrade]);
    const spy = vi
      .spyOn(provider, 'fetchRecentTrades')
      .mockRejectedValueOnce(transportDown())
      .mockRejectedValueOnce(transportDown());

    const report = await fetcher.fetch(universe, AS_OF);

    expect(report.outcomes[0]).toMatchObject({ status: 'ok', trades: [btcTrade] });
    expect(spy).toHaveBeenCalledTimes(3);
    // instruments + tickers + three trade attempts
    expect(gate.getStats().granted).toBe(5);
  });

  it('degrades a symbol after consecutive failed cycles and recovers it', async () => {
    const { provider, fetcher, universe } = setup({
      SCREENER_SYMBOLS: 'BTCUSDT',
      DEGRADED_AFTER_CYCLES: '2',
      FETCH_RETRY_ATTEMPTS: '2',
    });
    provider.instruments = [perpetual('BTCUSDT')];
    provider.tickers = [{ symbol: 'BTCUSDT', lastPrice: 50_000, volume: 1 }];
    provider.trades.set('BTCUSDT', transportDown());

    const first = await fetcher.fetch(universe, AS_OF);
    expect(first.outcomes[0]).toEqual({
      status: 'hard-failure',
      symbol: 'BTCUSDT',
      reason: 'transport',
      message: 'connect ECONNREFUSED',
      attempts: 2,
    });
    expect(first.degradedSymbols).toEqual([]);

    const second = await fetcher.fetch(universe, AS_OF + 5_000);
    expect(second.degradedSymbols).toEqual(['BTCUSDT']);

    provider.trades.set('BTCUSDT', []);
    const third = await fetcher.fetch(universe, AS_OF + 10_000);
    expect(third.outcomes[0].status).toBe('ok');
    expect(third.degradedSymbols).toEqual([]);
    expect(fetcher.degradedSymbols()).toEqual([]);
  });

  it('fetches trades only for the top symbols by volume', async () => {
    const { provider, fetcher, universe } = setup({ TRADE_SYMBOLS_LIMIT: '2' });
    provider.instruments = [
      perpetual('BTCUSDT'),
      perpetual('ETHUSDT'),
      perpetual('SOLUSDT'),
      perpetual('DOGEUSDT', 'Settling'),
    ];
    provider.tickers = [
      { symbol: 'SOLUSDT', lastPrice: 150, volume: 500 },
      { symbol: 'BTCUSDT', lastPrice: 50_000, volume: 900 },
      { symbol: 'DOGEUSDT', lastPrice: 0.1, volume: 800 },
      { symbol: 'ETHUSDT', lastPrice: 3_000, volume: 700 },
    ];

    const report = await fetcher.fetch(universe, AS_OF);

    expect(report.outcomes.map((outcome) => `${outcome.symbol}:${outcome.status}`)).toEqual([
      'BTCUSDT:ok',
      'ETHUSDT:ok',
      'SOLUSDT:ok',
    ]);
    expect(Object.fromEntries(provider.tradeCalls)).toEqual({ BTCUSDT: 1, ETHUSDT: 1 });
    expect(report.monitoredSymbols).toEqual(['BTCUSDT', 'ETHUSDT']);
  });

  it('keeps going without the instrument listing and loads it on a later cycle', async () => {
    const { provider, fetcher, universe } = setup({});
    provider.instruments = transportDown();
    provider.tickers = [
      { symbol: 'BTCUSDT', lastPrice: 50_000, volume: 900 },
      { symbol: 'BTCUSD', lastPrice: 50_100, volume: 100 },
    ];

    const first = await fetcher.fetch(universe, AS_OF);
    expect(first.outcomes.map((outcome) => outcome.symbol)).toEqual(['BTCUSD', 'BTCUSDT']);

    provider.instruments = [perpetual('BTCUSDT')];
    const second = await fetcher.fetch(universe, AS_OF + 5_000);
    expect(second.outcomes.map((outcome) => outcome.symbol)).toEqual(['BTCUSDT']);
  });

  it('reports a gate timeout as a soft failure', async () => {
    const gate = new RequestGate({ maxRequestsPerWindow: 1, windowSeconds: 60, safetyFactor: 1 });
    const { provider, fetcher, universe } = setup(
      { SCREENER_SYMBOLS: 'BTCUSDT', GATE_ACQUIRE_TIMEOUT_MS: '20' },
      gate,
    );
    provider.instruments = [perpetual('BTCUSDT')];

    const report = await fetcher.fetch(universe, AS_OF);

    expect(report.outcomes).toEqual([
      {
        status: 'soft-failure',
        symbol: 'BTCUSDT',
        reason: 'rate-limit-timeout',
        message: 'rate limit gate did not grant within 20ms',
      },
    ]);
    expect(provider.tickerCalls).toBe(0);
  });

  it('marks every symbol failed when the ticker request keeps failing', async () => {
    const { provider, fetcher, universe } = setup({ SCREENER_SYMBOLS: 'BTCUSDT,ETHUSDT' });
    provider.tickers = transportDown();

    const report = await fetcher.fetch(universe, AS_OF);

    expect(report.outcomes.map((outcome) => [outcome.symbol, outcome.status])).toEqual([
      ['BTCUSDT', 'hard-failure'],
      ['ETHUSDT', 'hard-failure'],
    ]);
    expect(provider.tickerCalls).toBe(3);
    expect(report.monitoredSymbols).toEqual([]);
  });

  it('reports cancelled fetches without counting them against symbol health', async () => {
    const { provider, fetcher, universe } = setup({
      SCREENER_SYMBOLS: 'BTCUSDT',
      DEGRADED_AFTER_CYCLES: '1',
    });
    provider.tickers = [{ symbol: 'BTCUSDT', lastPrice: 50_000, volume: 1 }];
    const controller = new AbortController();
    controller.abort();

    const report = await fetcher.fetch(universe, AS_OF, controller.signal);

    expect(report.outcomes).toEqual([
      {
        status: 'hard-failure',
        symbol: 'BTCUSDT',
        reason: 'cancelled',
        message: 'acquisition aborted',
        attempts: 1,
      },
    ]);
    expect(report.degradedSymbols).toEqual([]);
  });
});
