import { DateTime } from 'luxon';
import { formatCompactUsd, formatPrice, formatSignedPct } from '@libs/signals';
import type { ScreenerFeed } from '@libs/signals';

export interface DashboardOptions {
  timeZone: string;
}

const RULE = '-'.repeat(72);

export const formatFeedTime = (timestamp: number, timeZone: string): string => {
  const local = DateTime.fromMillis(timestamp, { zone: timeZone });
  const safe = local.isValid ? local : DateTime.fromMillis(timestamp, { zone: 'UTC' });
  return `${safe.toFormat('yyyy-MM-dd HH:mm:ss')} ${safe.zoneName ?? 'UTC'}`;
};

const topVolumeLines = (feed: ScreenerFeed): string[] => {
  if (!feed.topVolume.length) {
    return ['  no ticker data this cycle'];
  }
  const header = `${'#'.padStart(3)}  ${'SYMBOL'.padEnd(16)}${'PRICE'.padStart(14)}${'24H'.padStart(10)}${'VOLUME'.padStart(12)}`;
  const rows = feed.topVolume.map(
    (entry, index) =>
      `${String(index + 1).padStart(3)}  ${entry.symbol.padEnd(16)}${formatPrice(entry.price).padStart(14)}${formatSignedPct(entry.change24hPct).padStart(10)}${formatCompactUsd(entry.volume).padStart(12)}`,
  );
  return [header, ...rows];
};

const alertLines = (feed: ScreenerFeed, timeZone: string): string[] => {
  if (!feed.alerts.length) {
    return ['  no active alerts'];
  }
  return feed.alerts.map((alert) => {
    const time = formatFeedTime(alert.timestamp, timeZone).slice(11, 19);
    const mark = alert.highQuality ? '*' : ' ';
    const score = alert.score === undefined ? '-' : alert.score.toFixed(2);
    return `${mark} ${time}  ${alert.kind.padEnd(13)}${alert.symbol.padEnd(16)}${score.padStart(7)}  ${alert.summary}`;
  });
};

const monitoredLine = (feed: ScreenerFeed): string => {
  const topSymbols = new Set(feed.topVolume.map((entry) => entry.symbol));
  const inTop = feed.monitoredSymbols.filter((symbol) => topSymbols.has(symbol)).length;
  return `MONITORED (${feed.monitoredSymbols.length}, ${inTop} in top volume): ${feed.monitoredSymbols.join(', ')}`;
};

/** Renders the latest feed as plain text, one screen per call. */
export const formatDashboard = (feed: ScreenerFeed | null, options: DashboardOptions): string => {
  if (!feed) {
    return ['Perpetual screener', RULE, '  waiting for first cycle...'].join('\n');
  }

  const lines = [
    `Perpetual screener | cycle ${feed.cycle} | ${formatFeedTime(feed.asOf, options.timeZone)}`,
    RULE,
    'TOP VOLUME (24h)',
    ...topVolumeLines(feed),
  ];

  if (feed.monitoredSymbols.length) {
    lines.push(monitoredLine(feed));
  }

  const highQuality = feed.alerts.filter((alert) => alert.highQuality).length;
  lines.push(
    RULE,
    `ALERTS (${feed.alerts.length}, ${highQuality} high quality)`,
    ...alertLines(feed, options.timeZone),
  );

  if (feed.degradedSymbols.length) {
    lines.push(RULE, `DEGRADED: ${feed.degradedSymbols.join(', ')}`);
  }

  return lines.join('\n');
};
