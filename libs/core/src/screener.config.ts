import { registerAs } from '@nestjs/config';
import type { Env } from './env.schema';
import { ALERT_KINDS, SIGNAL_STRENGTH_SCORES, envSchema } from './env.schema';

export const SCREENER_CONFIG = Symbol('SCREENER_CONFIG');

export type AlertKindName = (typeof ALERT_KINDS)[number];

/**
 * Immutable runtime configuration handed to the screener core at startup.
 * Durations keep the unit in their name.
 */
export interface ScreenerConfig {
  readonly useTestEndpoint: boolean;
  readonly restUrl?: string;
  readonly restTimeoutMs: number;
  readonly category: 'linear' | 'inverse';

  readonly topCoinsLimit: number;
  readonly updateIntervalSeconds: number;
  readonly refreshRateSeconds: number;
  readonly dashboardEnabled: boolean;
  /** IANA zone for dashboard timestamps. */
  readonly displayTimeZone: string;

  readonly volumeSpikeThresholdPct: number;
  readonly priceChangeThresholdPct: number;
  readonly bigTradeThresholdUsd: number;
  readonly alertCooldownSeconds: number;
  readonly alertKindPriority: readonly AlertKindName[];
  readonly maxAlerts: number;

  /** Score at or above which a signal with a clear bias is high quality. */
  readonly minSignalScore: number;
  readonly combinedSignalBonus: number;
  readonly volumePriceCorrelationThreshold: number;
  readonly directionalBiasRequired: boolean;

  readonly rollingWindowSeconds: number;
  readonly minWindowSnapshots: number;
  readonly trendConfirmationPeriods: number;

  readonly maxRequestsPerWindow: number;
  readonly windowSeconds: number;
  readonly safetyFactor: number;
  readonly gateTimeoutMs: number;

  readonly symbols: readonly string[];
  readonly tradeSymbolsLimit: number;
  readonly recentTradesLimit: number;
  readonly fetchConcurrency: number;
  readonly retryAttempts: number;
  readonly retryBaseDelayMs: number;
  readonly degradedAfterCycles: number;
}

export const buildScreenerConfig = (env: Env): ScreenerConfig =>
  Object.freeze({
    useTestEndpoint: env.BYBIT_USE_TESTNET,
    restUrl: env.BYBIT_REST_URL,
    restTimeoutMs: env.BYBIT_REST_TIMEOUT_MS,
    category: env.BYBIT_CATEGORY,

    topCoinsLimit: env.TOP_COINS_LIMIT,
    updateIntervalSeconds: env.UPDATE_INTERVAL_SECONDS,
    refreshRateSeconds: env.REFRESH_RATE_SECONDS,
    dashboardEnabled: env.DASHBOARD_ENABLED,
    displayTimeZone: env.DISPLAY_TIMEZONE,

    volumeSpikeThresholdPct: env.VOLUME_SPIKE_THRESHOLD_PCT,
    priceChangeThresholdPct: env.PRICE_CHANGE_THRESHOLD_PCT,
    bigTradeThresholdUsd: env.BIG_TRADE_THRESHOLD_USD,
    alertCooldownSeconds: env.ALERT_COOLDOWN_SECONDS,
    alertKindPriority: Object.freeze([...env.ALERT_KIND_PRIORITY]),
    maxAlerts: env.MAX_ALERTS,

    minSignalScore: env.MIN_SIGNAL_SCORE ?? SIGNAL_STRENGTH_SCORES[env.SIGNAL_STRENGTH],
    combinedSignalBonus: env.COMBINED_SIGNAL_BONUS,
    volumePriceCorrelationThreshold: env.VOLUME_PRICE_CORRELATION_THRESHOLD,
    directionalBiasRequired: env.DIRECTIONAL_BIAS_REQUIRED,

    rollingWindowSeconds: env.ROLLING_WINDOW_SECONDS,
    minWindowSnapshots: env.MIN_WINDOW_SNAPSHOTS,
    trendConfirmationPeriods: env.TREND_CONFIRMATION_PERIODS,

    maxRequestsPerWindow: env.MAX_REQUESTS_PER_WINDOW,
    windowSeconds: env.RATE_LIMIT_WINDOW_SECONDS,
    safetyFactor: env.RATE_LIMIT_SAFETY_FACTOR,
    gateTimeoutMs: env.GATE_ACQUIRE_TIMEOUT_MS,

    symbols: Object.freeze([...env.SCREENER_SYMBOLS]),
    tradeSymbolsLimit: env.TRADE_SYMBOLS_LIMIT,
    recentTradesLimit: env.RECENT_TRADES_LIMIT,
    fetchConcurrency: env.FETCH_CONCURRENCY,
    retryAttempts: env.FETCH_RETRY_ATTEMPTS,
    retryBaseDelayMs: env.FETCH_RETRY_BASE_DELAY_MS,
    degradedAfterCycles: env.DEGRADED_AFTER_CYCLES,
  });

export const screenerConfig = registerAs('screener', (): ScreenerConfig =>
  buildScreenerConfig(envSchema.parse(process.env)),
);
