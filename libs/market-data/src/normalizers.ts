import { z } from 'zod';
import type {
  InstrumentInfo,
  NormalizedItem,
  SymbolSnapshot,
  TradeEvent,
} from './models';

const decimal = z
  .union([z.string().trim().min(1), z.number()])
  .transform((value) => Number(value))
  .pipe(z.number().finite());

const positiveDecimal = decimal.pipe(z.number().positive());
const nonNegativeDecimal = decimal.pipe(z.number().nonnegative());
const epochMs = decimal.pipe(z.number().int().nonnegative());

export const bybitEnvelopeSchema = z.object({
  retCode: z.number().int(),
  retMsg: z.string(),
  result: z.unknown(),
  time: z.number().optional(),
});

export const bybitListResultSchema = z.object({
  category: z.string().optional(),
  list: z.array(z.unknown()),
  nextPageCursor: z.string().optional(),
});

export const bybitTickerSchema = z.object({
  symbol: z.string().min(1),
  lastPrice: positiveDecimal,
  /** Fraction, e.g. "0.0123" for +1.23%. */
  price24hPcnt: decimal,
  /** 24h traded value in quote currency. */
  turnover24h: nonNegativeDecimal,
});

export const bybitTradeSchema = z.object({
  execId: z.string().min(1),
  symbol: z.string().min(1),
  price: positiveDecimal,
  size: positiveDecimal,
  side: z.enum(['Buy', 'Sell']),
  time: epochMs,
});

export const bybitInstrumentSchema = z.object({
  symbol: z.string().min(1),
  contractType: z.string(),
  status: z.string(),
  baseCoin: z.string(),
  quoteCoin: z.string(),
});

const symbolField = z.object({ symbol: z.string() });

const symbolOf = (raw: unknown): string | null => {
  const parsed = symbolField.safeParse(raw);
  return parsed.success ? parsed.data.symbol : null;
};

const describeIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

export const normalizeBybitTicker = (
  raw: unknown,
  asOf: number,
): NormalizedItem<SymbolSnapshot> => {
  const parsed = bybitTickerSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, symbol: symbolOf(raw), reason: describeIssues(parsed.error) };
  }
  const ticker = parsed.data;
  return {
    ok: true,
    value: {
      symbol: ticker.symbol,
      lastPrice: ticker.lastPrice,
      volume24h: ticker.turnover24h,
      change24hPct: ticker.price24hPcnt * 100,
      timestamp: asOf,
    },
  };
};

export const normalizeBybitTrade = (
  raw: unknown,
  symbol: string,
): NormalizedItem<TradeEvent> => {
  const parsed = bybitTradeSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, symbol, reason: describeIssues(parsed.error) };
  }
  const trade = parsed.data;
  if (trade.symbol !== symbol) {
    return { ok: false, symbol, reason: `trade for ${trade.symbol} in ${symbol} page` };
  }
  return {
    ok: true,
    value: {
      id: trade.execId,
      symbol: trade.symbol,
      side: trade.side === 'Buy' ? 'buy' : 'sell',
      price: trade.price,
      size: trade.size,
      notional: trade.price * trade.size,
      timestamp: trade.time,
    },
  };
};

export const normalizeBybitInstrument = (raw: unknown): NormalizedItem<InstrumentInfo> => {
  const parsed = bybitInstrumentSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, symbol: symbolOf(raw), reason: describeIssues(parsed.error) };
  }
  return { ok: true, value: parsed.data };
};

export const isTradablePerpetual = (instrument: InstrumentInfo): boolean =>
  instrument.status === 'Trading' &&
  (instrument.contractType === 'LinearPerpetual' || instrument.contractType === 'InversePerpetual');
