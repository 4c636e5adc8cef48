import { describe, expect, it } from 'vitest';
import type { ScreenerFeed } from '@libs/signals';
import { formatDashboard, formatFeedTime } from '../apps/worker/src/dashboard/dashboard.formatter';

const AS_OF = Date.UTC(2024, 0, 1, 12, 0, 5);
const RULE = '-'.repeat(72);

const feed: ScreenerFeed = {
  cycle: 3,
  asOf: AS_OF,
  topVolume: [{ symbol: 'BTCUSDT', volume: 1_500_000_000, price: 50_000, change24hPct: 1.25 }],
  monitoredSymbols: ['BTCUSDT', 'ETHUSDT'],
  alerts: [
    {
      kind: 'BIG_TRADE',
      symbol: 'BTCUSDT',
      magnitude: 250_000,
      timestamp: AS_OF - 7_000,
      direction: 'buy',
      summary: 'Big buy trade $250,000 @ 50,000.00',
      score: 25,
      directionalBias: 'long',
      highQuality: true,
    },
  ],
  degradedSymbols: ['XRPUSDT'],
};

describe('dashboard formatter', () => {
  it('renders the feed as fixed-width sections', () => {
    const lines = formatDashboard(feed, { timeZone: 'UTC' }).split('\n');

    expect(lines).toEqual([
      'Perpetual screener | cycle 3 | 2024-01-01 12:00:05 UTC',
      RULE,
      'TOP VOLUME (24h)',
      `  #  SYMBOL${' '.repeat(10)}${' '.repeat(9)}PRICE${' '.repeat(7)}24H${' '.repeat(6)}VOLUME`,
      `  1  BTCUSDT${' '.repeat(9)}${' '.repeat(5)}50,000.00${' '.repeat(4)}+1.25%${' '.repeat(7)}$1.5B`,
      'MONITORED (2, 1 in top volume): BTCUSDT, ETHUSDT',
      RULE,
      'ALERTS (1, 1 high quality)',
      `* 11:59:58  BIG_TRADE    BTCUSDT${' '.repeat(9)}  25.00  Big buy trade $250,000 @ 50,000.00`,
      RULE,
      'DEGRADED: XRPUSDT',
    ]);
  });

  it('shows placeholders for empty sections', () => {
    const text = formatDashboard(
      { ...feed, topVolume: [], monitoredSymbols: [], alerts: [], degradedSymbols: [] },
      { timeZone: 'UTC' },
    );

    expect(text.split('\n')).toEqual([
      'Perpetual screener | cycle 3 | 2024-01-01 12:00:05 UTC',
      RULE,
      'TOP VOLUME (24h)',
      '  no ticker data this cycle',
      RULE,
      'ALERTS (0, 0 high quality)',
      '  no active alerts',
    ]);
  });

  it('leaves the score column blank for unscored alerts', () => {
    const unscored = {
      ...feed,
      alerts: [{ ...feed.alerts[0], score: undefined, highQuality: undefined }],
    };
    const lines = formatDashboard(unscored, { timeZone: 'UTC' }).split('\n');

    expect(lines).toContain('ALERTS (1, 0 high quality)');
    expect(lines).toContain(
      `  11:59:58  BIG_TRADE    BTCUSDT${' '.repeat(9)}      -  Big buy trade $250,000 @ 50,000.00`,
    );
  });

  it('shows a waiting screen before the first cycle', () => {
    expect(formatDashboard(null, { timeZone: 'UTC' })).toBe(
      ['Perpetual screener', RULE, '  waiting for first cycle...'].join('\n'),
    );
  });

  it('formats times in the configured zone and falls back to UTC', () => {
    expect(formatFeedTime(AS_OF, 'Asia/Tokyo')).toBe('2024-01-01 21:00:05 Asia/Tokyo');
    expect(formatFeedTime(AS_OF, 'Not/AZone')).toBe('2024-01-01 12:00:05 UTC');
  });
});
