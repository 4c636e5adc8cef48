import { describe, expect, it } from 'vitest';
import { AlertDeduplicator, AlertRanker, compareAlerts } from '@libs/signals';
import type { Alert, AlertKind } from '@libs/signals';

const alert = (
  kind: AlertKind,
  symbol: string,
  magnitude: number,
  timestamp: number,
): Alert => ({ kind, symbol, magnitude, timestamp, summary: `${kind} ${symbol}` });

describe('alert deduplicator', () => {
  it('suppresses a repeat inside the cooldown and admits one at or past it', () => {
    const deduplicator = new AlertDeduplicator({ alertCooldownSeconds: 600 });

    expect(deduplicator.admit(alert('PRICE_MOVE', 'BTCUSDT', 2, 0))).toBe(true);
    expect(deduplicator.admit(alert('PRICE_MOVE', 'BTCUSDT', 3, 599_999))).toBe(false);
    expect(deduplicator.admit(alert('PRICE_MOVE', 'BTCUSDT', 3, 600_000))).toBe(true);
  });

  it('keys on symbol and kind', () => {
    const deduplicator = new AlertDeduplicator({ alertCooldownSeconds: 600 });

    expect(deduplicator.admit(alert('PRICE_MOVE', 'BTCUSDT', 2, 0))).toBe(true);
    expect(deduplicator.admit(alert('VOLUME_SPIKE', 'BTCUSDT', 4, 1))).toBe(true);
    expect(deduplicator.admit(alert('PRICE_MOVE', 'ETHUSDT', 2, 2))).toBe(true);
    expect(deduplicator.admit(alert('VOLUME_SPIKE', 'BTCUSDT', 5, 3))).toBe(false);
  });

  it('reports cooling keys and sweeps expired ones', () => {
    const deduplicator = new AlertDeduplicator({ alertCooldownSeconds: 10 });
    deduplicator.admit(alert('BIG_TRADE', 'BTCUSDT', 300_000, 0));
    deduplicator.admit(alert('BIG_TRADE', 'ETHUSDT', 300_000, 5_000));

    expect(deduplicator.stateOf('BTCUSDT', 'BIG_TRADE', 9_999)).toBe('cooling');
    expect(deduplicator.stateOf('BTCUSDT', 'BIG_TRADE', 10_000)).toBe('idle');
    expect(deduplicator.stateOf('SOLUSDT', 'BIG_TRADE', 0)).toBe('idle');

    expect(deduplicator.sweep(12_000)).toBe(1);
    expect(deduplicator.size).toBe(1);
  });

  it('remembers which kinds fired on a symbol for twice the cooldown', () => {
    const deduplicator = new AlertDeduplicator({ alertCooldownSeconds: 10 });
    deduplicator.admit(alert('BIG_TRADE', 'BTCUSDT', 300_000, 0));
    deduplicator.admit(alert('PRICE_MOVE', 'BTCUSDT', 6, 5_000));
    deduplicator.admit(alert('VOLUME_SPIKE', 'ETHUSDT', 4, 5_000));

    expect([...deduplicator.recentKinds('BTCUSDT', 15_000)].sort()).toEqual(['BIG_TRADE', 'PRICE_MOVE']);
    expect([...deduplicator.recentKinds('BTCUSDT', 20_000)]).toEqual(['PRICE_MOVE']);
    expect(deduplicator.recentKinds('SOLUSDT', 15_000).size).toBe(0);

    deduplicator.sweep(25_000);
    expect(deduplicator.recentKinds('BTCUSDT', 0).size).toBe(0);
  });
});

describe('alert ranking', () => {
  const config = {
    alertCooldownSeconds: 60,
    alertKindPriority: ['BIG_TRADE', 'VOLUME_SPIKE', 'PRICE_MOVE'] as const,
    maxAlerts: 3,
  };

  it('orders by kind priority, magnitude, recency and symbol', () => {
    const sorted = [
      alert('PRICE_MOVE', 'ETHUSDT', 9, 0),
      alert('VOLUME_SPIKE', 'SOLUSDT', 3, 0),
      alert('BIG_TRADE', 'BTCUSDT', 250_000, 0),
      alert('VOLUME_SPIKE', 'ADAUSDT', 5, 0),
      alert('VOLUME_SPIKE', 'XRPUSDT', 3, 10),
      alert('VOLUME_SPIKE', 'DOTUSDT', 3, 0),
    ].sort(compareAlerts(config.alertKindPriority));

    expect(sorted.map((item) => `${item.kind}:${item.symbol}`)).toEqual([
      'BIG_TRADE:BTCUSDT',
      'VOLUME_SPIKE:ADAUSDT',
      'VOLUME_SPIKE:XRPUSDT',
      'VOLUME_SPIKE:DOTUSDT',
      'VOLUME_SPIKE:SOLUSDT',
      'PRICE_MOVE:ETHUSDT',
    ]);
  });

  it('follows a configured priority', () => {
    const sorted = [alert('BIG_TRADE', 'BTCUSDT', 1, 0), alert('PRICE_MOVE', 'BTCUSDT', 1, 0)].sort(
      compareAlerts(['PRICE_MOVE', 'BIG_TRADE', 'VOLUME_SPIKE']),
    );
    expect(sorted.map((item) => item.kind)).toEqual(['PRICE_MOVE', 'BIG_TRADE']);
  });

  it('retains alerts until their cooldown elapses and truncates the list', () => {
    const ranker = new AlertRanker(config);

    const first = ranker.publish(
      [
        alert('PRICE_MOVE', 'ETHUSDT', 2, 0),
        alert('PRICE_MOVE', 'SOLUSDT', 3, 0),
        alert('BIG_TRADE', 'BTCUSDT', 250_000, 0),
        alert('VOLUME_SPIKE', 'ADAUSDT', 4, 0),
      ],
      0,
    );
    expect(first.map((item) => item.symbol)).toEqual(['BTCUSDT', 'ADAUSDT', 'SOLUSDT']);
    expect(Object.isFrozen(first)).toBe(true);

    const second = ranker.publish([alert('PRICE_MOVE', 'ETHUSDT', 7, 30_000)], 30_000);
    expect(second.map((item) => `${item.symbol}:${item.magnitude}`)).toEqual([
      'BTCUSDT:250000',
      'ADAUSDT:4',
      'ETHUSDT:7',
    ]);

    const third = ranker.publish([], 60_000);
    expect(third.map((item) => item.symbol)).toEqual(['ETHUSDT']);

    expect(ranker.publish([], 90_000)).toEqual([]);
  });
});
