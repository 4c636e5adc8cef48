import { z } from 'zod';

const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toFloat = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === '') return def;
    if (typeof v === 'boolean') return v;
    const s = String(v).trim().toLowerCase();
    if (['true', '1', 'yes', 'y', 'on'].includes(s)) return true;
    if (['false', '0', 'no', 'n', 'off'].includes(s)) return false;
    return v;
  }, z.boolean());

const optionalFloat = () =>
  z.preprocess((v) => {
    if (v === undefined || v === null || String(v).trim() === '') return undefined;
    const n = typeof v === 'number' ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().positive().optional());

const csv = (def: string[] = []) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    if (Array.isArray(v)) return v.map(String);
    const s = String(v).trim();
    if (!s) return def;
    return s.split(',').map((x) => x.trim()).filter(Boolean);
  }, z.array(z.string()));

export const ALERT_KINDS = ['BIG_TRADE', 'VOLUME_SPIKE', 'PRICE_MOVE'] as const;

/** Minimum score a signal needs to count as high quality, per strength level. */
export const SIGNAL_STRENGTH_SCORES = { low: 8, moderate: 12, strong: 16 } as const;

const alertKindList = csv([...ALERT_KINDS])
  .pipe(z.array(z.string().toUpperCase().pipe(z.enum(ALERT_KINDS))))
  .refine((kinds) => new Set(kinds).size === kinds.length, {
    message: 'ALERT_KIND_PRIORITY must not repeat a kind',
  });

const optionalUrl = z.preprocess(
  (v) => (v === undefined || v === null || String(v).trim() === '' ? undefined : String(v).trim()),
  z.string().url().optional(),
);

const symbolList = csv([]).pipe(z.array(z.string().toUpperCase()));

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('production'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    WORKER_PORT: toInt(3001).pipe(z.number().int().min(1).max(65535)),

    BYBIT_USE_TESTNET: toBool(false),
    BYBIT_REST_URL: optionalUrl,
    BYBIT_REST_TIMEOUT_MS: toInt(10000).pipe(z.number().int().min(1000).max(120_000)),
    BYBIT_CATEGORY: z.enum(['linear', 'inverse']).default('linear'),

    TOP_COINS_LIMIT: toInt(20).pipe(z.number().int().min(1).max(500)),
    UPDATE_INTERVAL_SECONDS: toFloat(5).pipe(z.number().positive().max(3600)),
    REFRESH_RATE_SECONDS: toFloat(1).pipe(z.number().positive().max(3600)),
    DASHBOARD_ENABLED: toBool(true),
    DISPLAY_TIMEZONE: z.string().trim().min(1).default('UTC'),

    VOLUME_SPIKE_THRESHOLD_PCT: toFloat(300).pipe(z.number().positive()),
    PRICE_CHANGE_THRESHOLD_PCT: toFloat(1.5).pipe(z.number().positive().max(1000)),
    BIG_TRADE_THRESHOLD_USD: toFloat(200_000).pipe(z.number().positive()),
    ALERT_COOLDOWN_SECONDS: toInt(600).pipe(z.number().int().min(0).max(7 * 24 * 3600)),
    ALERT_KIND_PRIORITY: alertKindList,
    MAX_ALERTS: toInt(20).pipe(z.number().int().min(1).max(1000)),

    SIGNAL_STRENGTH: z.enum(['low', 'moderate', 'strong']).default('moderate'),
    MIN_SIGNAL_SCORE: optionalFloat(),
    COMBINED_SIGNAL_BONUS: toFloat(2.5).pipe(z.number().min(1).max(100)),
    VOLUME_PRICE_CORRELATION_THRESHOLD: toFloat(0.8).pipe(z.number().min(0).max(1)),
    DIRECTIONAL_BIAS_REQUIRED: toBool(true),

    ROLLING_WINDOW_SECONDS: toInt(600).pipe(z.number().int().min(1).max(24 * 3600)),
    MIN_WINDOW_SNAPSHOTS: toInt(3).pipe(z.number().int().min(2).max(10_000)),
    TREND_CONFIRMATION_PERIODS: toInt(4).pipe(z.number().int().min(1).max(100)),

    MAX_REQUESTS_PER_WINDOW: toInt(600).pipe(z.number().int().min(1).max(100_000)),
    RATE_LIMIT_WINDOW_SECONDS: toFloat(5).pipe(z.number().positive().max(3600)),
    RATE_LIMIT_SAFETY_FACTOR: toFloat(0.8).pipe(z.number().gt(0).max(1)),
    GATE_ACQUIRE_TIMEOUT_MS: toInt(10_000).pipe(z.number().int().min(0).max(600_000)),

    SCREENER_SYMBOLS: symbolList,
    TRADE_SYMBOLS_LIMIT: toInt(20).pipe(z.number().int().min(0).max(1000)),
    RECENT_TRADES_LIMIT: toInt(100).pipe(z.number().int().min(1).max(1000)),
    FETCH_CONCURRENCY: toInt(5).pipe(z.number().int().min(1).max(100)),
    FETCH_RETRY_ATTEMPTS: toInt(3).pipe(z.number().int().min(1).max(10)),
    FETCH_RETRY_BASE_DELAY_MS: toInt(500).pipe(z.number().int().min(0).max(60_000)),
    DEGRADED_AFTER_CYCLES: toInt(3).pipe(z.number().int().min(1).max(1000)),
  });

export type Env = z.infer<typeof envSchema>;
