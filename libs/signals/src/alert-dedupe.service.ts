import { Inject, Injectable } from '@nestjs/common';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import type { Alert, AlertKind } from './types';

export type CooldownState = 'idle' | 'cooling';

export const buildAlertKey = (symbol: string, kind: AlertKind): string => `${kind}:${symbol}`;

interface AdmittedKind {
  symbol: string;
  kind: AlertKind;
  at: number;
}

/**
 * Cooldown per (symbol, kind). An alert is admitted when no alert of the same
 * key was admitted within the cooldown before it; expiry is checked lazily.
 * Admissions are also remembered for twice the cooldown so that signals of
 * different kinds on one symbol can be recognised as combined.
 */
@Injectable()
export class AlertDeduplicator {
  private readonly lastAdmitted = new Map<string, number>();
  private readonly history = new Map<string, AdmittedKind>();
  private readonly cooldownMs: number;

  constructor(@Inject(SCREENER_CONFIG) config: Pick<ScreenerConfig, 'alertCooldownSeconds'>) {
    this.cooldownMs = config.alertCooldownSeconds * 1000;
  }

  admit(alert: Alert): boolean {
    const key = buildAlertKey(alert.symbol, alert.kind);
    const last = this.lastAdmitted.get(key);
    if (last !== undefined && alert.timestamp - last < this.cooldownMs) {
      return false;
    }
    this.lastAdmitted.set(key, alert.timestamp);
    this.history.set(key, { symbol: alert.symbol, kind: alert.kind, at: alert.timestamp });
    return true;
  }

  /** Kinds admitted for `symbol` within twice the cooldown before `at`. */
  recentKinds(symbol: string, at: number): Set<AlertKind> {
    const kinds = new Set<AlertKind>();
    for (const entry of this.history.values()) {
      if (entry.symbol === symbol && at - entry.at < this.cooldownMs * 2) {
        kinds.add(entry.kind);
      }
    }
    return kinds;
  }

  stateOf(symbol: string, kind: AlertKind, at: number): CooldownState {
    const last = this.lastAdmitted.get(buildAlertKey(symbol, kind));
    return last !== undefined && at - last < this.cooldownMs ? 'cooling' : 'idle';
  }

  /** Drops keys whose cooldown has elapsed at `at`; returns how many. */
  sweep(at: number): number {
    let removed = 0;
    for (const [key, last] of this.lastAdmitted) {
      if (at - last >= this.cooldownMs) {
        this.lastAdmitted.delete(key);
        removed += 1;
      }
    }
    for (const [key, entry] of this.history) {
      if (at - entry.at >= this.cooldownMs * 2) {
        this.history.delete(key);
      }
    }
    return removed;
  }

  get size(): number {
    return this.lastAdmitted.size;
  }
}
