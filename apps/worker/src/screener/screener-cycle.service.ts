import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { CLOCK, SCREENER_CONFIG } from '@libs/core';
import type { Clock, ScreenerConfig } from '@libs/core';
import {
  GateClosedError,
  RequestGate,
  SnapshotFetcher,
  errorMessage,
  sleep,
  universeFromConfig,
} from '@libs/market-data';
import type { GateStats, SymbolSnapshot, SymbolUniverse } from '@libs/market-data';
import {
  AlertDeduplicator,
  AlertRanker,
  AlertScorer,
  DetectionEngine,
  SymbolStateStore,
  rankTopVolume,
} from '@libs/signals';
import type { Alert, ScreenerFeed } from '@libs/signals';

export interface ScreenerHealth {
  running: boolean;
  cycles: number;
  lastCycleAt: number | null;
  lastCycleDurationMs: number | null;
  lastError: string | null;
  alertCount: number;
  degradedSymbols: readonly string[];
  gate: GateStats;
}

/**
 * Drives the fetch, state, detection and ranking pipeline on a fixed cadence.
 * Cycles never overlap: the next one starts `updateIntervalSeconds` after the
 * previous one started, or immediately when it overran.
 */
@Injectable()
export class ScreenerCycleService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ScreenerCycleService.name);
  private readonly controller = new AbortController();
  private readonly universe: SymbolUniverse;
  private loop: Promise<void> | null = null;
  private latest: ScreenerFeed | null = null;
  private cycles = 0;
  private lastCycleDurationMs: number | null = null;
  private lastError: string | null = null;

  constructor(
    @Inject(SCREENER_CONFIG) private readonly config: ScreenerConfig,
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly fetcher: SnapshotFetcher,
    private readonly store: SymbolStateStore,
    private readonly engine: DetectionEngine,
    private readonly deduplicator: AlertDeduplicator,
    private readonly scorer: AlertScorer,
    private readonly ranker: AlertRanker,
    private readonly gate: RequestGate,
  ) {
    this.universe = universeFromConfig(config);
  }

  onModuleInit(): void {
    this.logger.log(
      JSON.stringify({
        event: 'screener_started',
        universe: this.universe.mode,
        intervalSeconds: this.config.updateIntervalSeconds,
      }),
    );
    this.start();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.loop || this.controller.signal.aborted) {
      return;
    }
    this.loop = this.runLoop(this.controller.signal);
  }

  async stop(): Promise<void> {
    this.controller.abort();
    this.gate.close();
    const loop = this.loop;
    this.loop = null;
    if (loop) {
      await loop;
    }
    this.logger.log(JSON.stringify({ event: 'screener_stopped', cycles: this.cycles }));
  }

  latestFeed(): ScreenerFeed | null {
    return this.latest;
  }

  getHealth(): ScreenerHealth {
    return {
      running: this.loop !== null,
      cycles: this.cycles,
      lastCycleAt: this.latest?.asOf ?? null,
      lastCycleDurationMs: this.lastCycleDurationMs,
      lastError: this.lastError,
      alertCount: this.latest?.alerts.length ?? 0,
      degradedSymbols: this.latest?.degradedSymbols ?? [],
      gate: this.gate.getStats(),
    };
  }

  async runCycle(signal?: AbortSignal): Promise<ScreenerFeed> {
    const asOf = this.clock.now();
    const cycle = this.cycles + 1;

    const report = await this.fetcher.fetch(this.universe, asOf, signal);
    if (signal?.aborted) {
      throw new GateClosedError('cycle aborted');
    }
    this.cycles = cycle;

    const snapshots: SymbolSnapshot[] = [];
    const candidates: Alert[] = [];
    let failed = 0;
    let stale = 0;

    for (const outcome of report.outcomes) {
      if (outcome.status !== 'ok') {
        failed += 1;
        continue;
      }
      snapshots.push(outcome.snapshot);

      const update = this.store.update(outcome.symbol, outcome.snapshot, outcome.trades);
      if (update.status === 'stale') {
        stale += 1;
        this.logger.debug(
          JSON.stringify({
            event: 'stale_snapshot',
            symbol: outcome.symbol,
            timestamp: outcome.snapshot.timestamp,
            lastTimestamp: update.lastTimestamp,
          }),
        );
        continue;
      }

      const window = this.store.window(outcome.symbol);
      if (!window) {
        continue;
      }
      try {
        candidates.push(
          ...this.engine.detect({ snapshot: outcome.snapshot, trades: update.newTrades, window }),
        );
      } catch (error) {
        this.logger.warn(
          JSON.stringify({ event: 'detect_failed', symbol: outcome.symbol, message: errorMessage(error) }),
        );
      }
    }

    const admitted = this.ranker
      .rank(candidates)
      .filter((alert) => this.deduplicator.admit(alert))
      .map((alert) => {
        const window = this.store.window(alert.symbol);
        return window
          ? this.scorer.score(alert, window, this.deduplicator.recentKinds(alert.symbol, asOf))
          : alert;
      });
    const alerts = this.ranker.publish(admitted, asOf);
    this.deduplicator.sweep(asOf);
    this.store.prune(asOf);

    const feed: ScreenerFeed = Object.freeze({
      cycle,
      asOf,
      topVolume: Object.freeze(rankTopVolume(snapshots, this.config.topCoinsLimit)),
      monitoredSymbols: Object.freeze([...report.monitoredSymbols]),
      alerts,
      degradedSymbols: Object.freeze([...report.degradedSymbols]),
    });
    this.latest = feed;

    this.lastCycleDurationMs = this.clock.now() - asOf;
    this.logger.log(
      JSON.stringify({
        event: 'cycle_complete',
        cycle,
        symbols: snapshots.length,
        failed,
        stale,
        candidates: candidates.length,
        admitted: admitted.length,
        highQuality: alerts.filter((alert) => alert.highQuality).length,
        durationMs: this.lastCycleDurationMs,
      }),
    );
    return feed;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const intervalMs = this.config.updateIntervalSeconds * 1000;
    while (!signal.aborted) {
      const startedAt = this.clock.now();
      try {
        await this.runCycle(signal);
        this.lastError = null;
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        this.lastError = errorMessage(error);
        this.logger.error(JSON.stringify({ event: 'cycle_failed', message: this.lastError }));
      }

      const elapsed = this.clock.now() - startedAt;
      try {
        await sleep(Math.max(0, intervalMs - elapsed), signal);
      } catch (error) {
        if (error instanceof GateClosedError) {
          break;
        }
        throw error;
      }
    }
  }
}
