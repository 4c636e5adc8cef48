import { Inject, Injectable } from '@nestjs/common';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import { buildAlertKey } from './alert-dedupe.service';
import { compareSymbols } from './top-volume';
import type { Alert, AlertKind } from './types';

export type AlertRankerConfig = Pick<
  ScreenerConfig,
  'alertCooldownSeconds' | 'alertKindPriority' | 'maxAlerts'
>;

/** Kind priority, then magnitude, then recency, then symbol. */
export const compareAlerts =
  (priority: readonly AlertKind[]) =>
  (a: Alert, b: Alert): number => {
    const rank = (kind: AlertKind) => {
      const index = priority.indexOf(kind);
      return index === -1 ? priority.length : index;
    };
    return (
      rank(a.kind) - rank(b.kind) ||
      b.magnitude - a.magnitude ||
      b.timestamp - a.timestamp ||
      compareSymbols(a.symbol, b.symbol)
    );
  };

/**
 * Keeps the latest admitted alert per (symbol, kind) on display until its
 * cooldown elapses and publishes them in severity order.
 */
@Injectable()
export class AlertRanker {
  private readonly retained = new Map<string, Alert>();
  private readonly cooldownMs: number;
  private readonly compare: (a: Alert, b: Alert) => number;
  private readonly maxAlerts: number;

  constructor(@Inject(SCREENER_CONFIG) config: AlertRankerConfig) {
    this.cooldownMs = config.alertCooldownSeconds * 1000;
    this.compare = compareAlerts(config.alertKindPriority);
    this.maxAlerts = config.maxAlerts;
  }

  rank(alerts: readonly Alert[]): Alert[] {
    return [...alerts].sort(this.compare);
  }

  publish(admitted: readonly Alert[], now: number): readonly Alert[] {
    for (const [key, alert] of this.retained) {
      if (now - alert.timestamp >= this.cooldownMs) {
        this.retained.delete(key);
      }
    }
    for (const alert of admitted) {
      const key = buildAlertKey(alert.symbol, alert.kind);
      const current = this.retained.get(key);
      if (!current || alert.timestamp >= current.timestamp) {
        this.retained.set(key, alert);
      }
    }
    return Object.freeze(this.rank([...this.retained.values()]).slice(0, this.maxAlerts));
  }
}
