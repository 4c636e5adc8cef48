import { Inject, Injectable, Logger } from '@nestjs/common';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import {
  GateClosedError,
  MalformedPayloadError,
  RateLimitTimeoutError,
  TransportFailureError,
  errorMessage,
} from './errors';
import { MARKET_DATA_PROVIDER } from './interfaces';
import type { MarketDataProvider } from './interfaces';
import type {
  FetchReport,
  SymbolFetchOutcome,
  SymbolSnapshot,
  SymbolUniverse,
} from './models';
import { isTradablePerpetual } from './normalizers';
import { RequestGate } from './request-gate';
import { SymbolHealthTracker } from './symbol-health';
import { runWithConcurrency } from './utils/concurrency.util';
import { retry } from './utils/retry.util';
import type { RetryResult } from './utils/retry.util';

type FailedResult = Extract<RetryResult<unknown>, { ok: false }>;

export const universeFromConfig = (
  config: Pick<ScreenerConfig, 'symbols' | 'tradeSymbolsLimit'>,
): SymbolUniverse =>
  config.symbols.length
    ? { mode: 'fixed', symbols: config.symbols }
    : { mode: 'top-volume', tradeSymbolsLimit: config.tradeSymbolsLimit };

/**
 * Pulls one cycle of market data through the request gate: a single ticker
 * request for the whole category, then recent trades per symbol with bounded
 * concurrency. Every symbol ends up with exactly one typed outcome.
 */
@Injectable()
export class SnapshotFetcher {
  private readonly logger = new Logger(SnapshotFetcher.name);
  private readonly health: SymbolHealthTracker;
  private tradable: Set<string> | null = null;
  private lastSymbols: string[] = [];

  constructor(
    @Inject(SCREENER_CONFIG) private readonly config: ScreenerConfig,
    @Inject(MARKET_DATA_PROVIDER) private readonly provider: MarketDataProvider,
    private readonly gate: RequestGate,
  ) {
    this.health = new SymbolHealthTracker(config.degradedAfterCycles);
  }

  async fetch(universe: SymbolUniverse, asOf: number, signal?: AbortSignal): Promise<FetchReport> {
    await this.ensureInstruments(signal);

    const tickers = await this.gated(() => this.provider.fetchTickers(asOf, signal), signal);
    if (!tickers.ok) {
      const symbols = universe.mode === 'fixed' ? dedupe(universe.symbols) : this.lastSymbols;
      if (!signal?.aborted) {
        this.logger.warn(
          JSON.stringify({
            event: 'fetch_failed',
            symbol: null,
            stage: 'tickers',
            message: errorMessage(tickers.error),
          }),
        );
      }
      const outcomes = symbols.map((symbol) => this.classify(symbol, tickers, signal));
      return this.report(asOf, outcomes, []);
    }

    const snapshots = new Map<string, SymbolSnapshot>();
    const malformed = new Map<string, string>();
    for (const item of tickers.value) {
      if (item.ok) {
        if (!this.tradable || this.tradable.has(item.value.symbol)) {
          snapshots.set(item.value.symbol, item.value);
        }
      } else if (item.symbol) {
        malformed.set(item.symbol, item.reason);
      }
    }

    const outcomes: SymbolFetchOutcome[] = [];
    const ready: SymbolSnapshot[] = [];

    if (universe.mode === 'fixed') {
      for (const symbol of dedupe(universe.symbols)) {
        const snapshot = snapshots.get(symbol);
        const reason = malformed.get(symbol);
        if (snapshot) {
          ready.push(snapshot);
        } else if (reason !== undefined) {
          outcomes.push({ status: 'soft-failure', symbol, reason: 'malformed', message: reason });
        } else {
          outcomes.push({
            status: 'soft-failure',
            symbol,
            reason: 'missing',
            message: this.tradable && !this.tradable.has(symbol)
              ? 'not a tradable perpetual'
              : 'absent from ticker response',
          });
        }
      }
    } else {
      ready.push(...snapshots.values());
      for (const [symbol, reason] of malformed) {
        if (!this.tradable || this.tradable.has(symbol)) {
          outcomes.push({ status: 'soft-failure', symbol, reason: 'malformed', message: reason });
        }
      }
    }

    const withTrades =
      universe.mode === 'fixed'
        ? ready
        : [...ready]
            .sort((a, b) => b.volume24h - a.volume24h || bySymbol(a, b))
            .slice(0, universe.tradeSymbolsLimit);
    const tradeSymbols = new Set(withTrades.map((snapshot) => snapshot.symbol));

    const tradeOutcomes = await runWithConcurrency(
      withTrades,
      this.config.fetchConcurrency,
      async (snapshot): Promise<SymbolFetchOutcome> => {
        const trades = await this.gated(
          () =>
            this.provider.fetchRecentTrades(snapshot.symbol, this.config.recentTradesLimit, signal),
          signal,
        );
        if (!trades.ok) {
          return this.classify(snapshot.symbol, trades, signal);
        }
        return { status: 'ok', symbol: snapshot.symbol, snapshot, trades: trades.value };
      },
    );
    outcomes.push(...tradeOutcomes);

    for (const snapshot of ready) {
      if (!tradeSymbols.has(snapshot.symbol)) {
        outcomes.push({ status: 'ok', symbol: snapshot.symbol, snapshot, trades: [] });
      }
    }

    outcomes.sort(bySymbol);
    this.lastSymbols = outcomes.map((outcome) => outcome.symbol);
    return this.report(asOf, outcomes, [...tradeSymbols].sort());
  }

  degradedSymbols(): string[] {
    return this.health.degradedSymbols();
  }

  /** Loads the perpetual listing until it succeeds once; failures are non-fatal. */
  private async ensureInstruments(signal?: AbortSignal): Promise<void> {
    if (this.tradable) {
      return;
    }
    const symbols = new Set<string>();
    let cursor: string | undefined;
    do {
      const page = await this.gated(() => this.provider.fetchInstruments(cursor, signal), signal);
      if (!page.ok) {
        this.logger.warn(
          JSON.stringify({ event: 'instruments_load_failed', message: errorMessage(page.error) }),
        );
        return;
      }
      for (const instrument of page.value.instruments) {
        if (isTradablePerpetual(instrument)) {
          symbols.add(instrument.symbol);
        }
      }
      cursor = page.value.nextCursor ?? undefined;
    } while (cursor);

    this.tradable = symbols;
    this.logger.log(JSON.stringify({ event: 'instruments_loaded', count: symbols.size }));
  }

  private gated<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<RetryResult<T>> {
    const timeoutMs = this.config.gateTimeoutMs > 0 ? this.config.gateTimeoutMs : undefined;
    return retry(
      async () => {
        await this.gate.acquire(1, { timeoutMs, signal });
        return task();
      },
      {
        attempts: this.config.retryAttempts,
        baseDelayMs: this.config.retryBaseDelayMs,
        shouldRetry: (error) => error instanceof TransportFailureError,
        onRetry: (error, attempt, delayMs) =>
          this.logger.debug(
            JSON.stringify({ event: 'fetch_retry', attempt, delayMs, message: errorMessage(error) }),
          ),
        signal,
      },
    );
  }

  private classify(symbol: string, result: FailedResult, signal?: AbortSignal): SymbolFetchOutcome {
    const { error, attempts } = result;
    const message = errorMessage(error);
    if (signal?.aborted || error instanceof GateClosedError) {
      return { status: 'hard-failure', symbol, reason: 'cancelled', message, attempts };
    }
    if (error instanceof RateLimitTimeoutError) {
      return { status: 'soft-failure', symbol, reason: 'rate-limit-timeout', message };
    }
    if (error instanceof MalformedPayloadError) {
      return { status: 'soft-failure', symbol, reason: 'malformed', message };
    }
    return { status: 'hard-failure', symbol, reason: 'transport', message, attempts };
  }

  private report(
    asOf: number,
    outcomes: SymbolFetchOutcome[],
    monitoredSymbols: string[],
  ): FetchReport {
    for (const outcome of outcomes) {
      if (outcome.status === 'ok') {
        if (this.health.recordSuccess(outcome.symbol) === 'recovered') {
          this.logger.log(JSON.stringify({ event: 'symbol_recovered', symbol: outcome.symbol }));
        }
        continue;
      }
      if (outcome.status === 'hard-failure' && outcome.reason === 'cancelled') {
        continue;
      }
      this.logger.warn(
        JSON.stringify({
          event: 'fetch_failed',
          symbol: outcome.symbol,
          reason: outcome.reason,
          message: outcome.message,
        }),
      );
      if (this.health.recordFailure(outcome.symbol) === 'degraded') {
        this.logger.warn(
          JSON.stringify({
            event: 'symbol_degraded',
            symbol: outcome.symbol,
            consecutiveFailures: this.health.consecutiveFailures(outcome.symbol),
          }),
        );
      }
    }
    return {
      asOf,
      outcomes,
      monitoredSymbols,
      degradedSymbols: this.health.degradedSymbols(),
    };
  }
}

const dedupe = (symbols: readonly string[]): string[] => [...new Set(symbols)];

const bySymbol = (a: { symbol: string }, b: { symbol: string }): number =>
  a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
