import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import { MalformedPayloadError, TransportFailureError, errorMessage } from '../errors';
import type { MarketDataProvider } from '../interfaces';
import type {
  InstrumentInfo,
  InstrumentPage,
  NormalizedItem,
  SymbolSnapshot,
  TradeEvent,
} from '../models';
import {
  bybitEnvelopeSchema,
  bybitListResultSchema,
  normalizeBybitInstrument,
  normalizeBybitTicker,
  normalizeBybitTrade,
} from '../normalizers';
import { createHttpClient } from '../utils/http.util';
import { getProviderEndpoints } from './providers.config';

/** retCodes meaning "busy or throttled, try later". */
const RETRYABLE_RET_CODES = new Set([10006, 10016, 10018]);
// 403 is Bybit's answer to an IP over its request quota.
const RETRYABLE_HTTP_STATUSES = new Set([403, 429]);

const INSTRUMENTS_PAGE_LIMIT = 1000;

type ListResult = z.infer<typeof bybitListResultSchema>;

@Injectable()
export class BybitMarketDataProvider implements MarketDataProvider {
  readonly provider = 'bybit';
  private readonly logger = new Logger(BybitMarketDataProvider.name);
  private readonly restClient: AxiosInstance;
  private readonly category: ScreenerConfig['category'];

  constructor(@Inject(SCREENER_CONFIG) config: ScreenerConfig) {
    const endpoints = getProviderEndpoints(config);
    this.restClient = createHttpClient(endpoints.rest, config.restTimeoutMs);
    this.category = config.category;
  }

  async fetchInstruments(cursor?: string, signal?: AbortSignal): Promise<InstrumentPage> {
    const result = await this.getList(
      '/v5/market/instruments-info',
      { category: this.category, limit: INSTRUMENTS_PAGE_LIMIT, cursor },
      signal,
    );
    const instruments: InstrumentInfo[] = [];
    for (const raw of result.list) {
      const item = normalizeBybitInstrument(raw);
      if (item.ok) {
        instruments.push(item.value);
      } else {
        this.logger.debug(
          JSON.stringify({ event: 'instrument_skipped', symbol: item.symbol, message: item.reason }),
        );
      }
    }
    return { instruments, nextCursor: result.nextPageCursor || null };
  }

  async fetchTickers(
    asOf: number,
    signal?: AbortSignal,
  ): Promise<NormalizedItem<SymbolSnapshot>[]> {
    const result = await this.getList('/v5/market/tickers', { category: this.category }, signal);
    return result.list.map((raw) => normalizeBybitTicker(raw, asOf));
  }

  async fetchRecentTrades(
    symbol: string,
    limit: number,
    signal?: AbortSignal,
  ): Promise<TradeEvent[]> {
    const result = await this.getList(
      '/v5/market/recent-trade',
      { category: this.category, symbol, limit },
      signal,
    );
    const trades: TradeEvent[] = [];
    for (const raw of result.list) {
      const item = normalizeBybitTrade(raw, symbol);
      if (!item.ok) {
        throw new MalformedPayloadError(`recent-trade page: ${item.reason}`, symbol);
      }
      trades.push(item.value);
    }
    // Bybit lists newest first.
    return trades.sort((a, b) => a.timestamp - b.timestamp);
  }

  private async getList(
    path: string,
    params: Record<string, string | number | undefined>,
    signal?: AbortSignal,
  ): Promise<ListResult> {
    const payload = await this.request(path, params, signal);
    const envelope = bybitEnvelopeSchema.safeParse(payload);
    if (!envelope.success) {
      throw new MalformedPayloadError(`${path}: response is not a Bybit envelope`);
    }
    const { retCode, retMsg, result } = envelope.data;
    if (retCode !== 0) {
      const message = `${path}: retCode ${retCode} ${retMsg}`;
      if (RETRYABLE_RET_CODES.has(retCode)) {
        throw new TransportFailureError(message);
      }
      throw new MalformedPayloadError(message);
    }
    const list = bybitListResultSchema.safeParse(result);
    if (!list.success) {
      throw new MalformedPayloadError(`${path}: result has no list`);
    }
    return list.data;
  }

  private async request(
    path: string,
    params: Record<string, string | number | undefined>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    try {
      const response = await this.restClient.get<unknown>(path, { params, signal });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (status !== undefined && status < 500 && !RETRYABLE_HTTP_STATUSES.has(status)) {
          throw new MalformedPayloadError(`${path}: HTTP ${status}`);
        }
        throw new TransportFailureError(
          status !== undefined ? `${path}: HTTP ${status}` : `${path}: ${error.message}`,
          status,
        );
      }
      throw new TransportFailureError(`${path}: ${errorMessage(error)}`);
    }
  }
}
