import { Logger } from '@nestjs/common';
import { systemClock } from '@libs/core';
import type { Clock } from '@libs/core';
import { GateClosedError, RateLimitTimeoutError } from './errors';
import type { GateStats } from './models';

export interface RequestGateOptions {
  maxRequestsPerWindow: number;
  windowSeconds: number;
  /** Share of the budget actually used, 0 < f <= 1. */
  safetyFactor: number;
}

export interface AcquireOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

interface Waiter {
  cost: number;
  enqueuedAt: number;
  resolve: () => void;
  reject: (error: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
  detach?: () => void;
}

/**
 * Sliding-window request budget shared by every outbound call.
 *
 * A grant is recorded as one timestamp per unit of cost. A request proceeds
 * when the grants inside `(now - window, now]` plus its cost fit in
 * `floor(max * safetyFactor)`; otherwise it queues. Waiters are served strictly
 * in arrival order and a single timer wakes the queue when the oldest blocking
 * grant leaves the window.
 */
export class RequestGate {
  private readonly logger = new Logger(RequestGate.name);
  readonly effectiveMax: number;
  readonly windowMs: number;
  private readonly grants: number[] = [];
  private grantsHead = 0;
  private readonly queue: Waiter[] = [];
  private wakeTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;
  private granted = 0;
  private throttled = 0;
  private timedOut = 0;

  constructor(
    options: RequestGateOptions,
    private readonly clock: Clock = systemClock,
  ) {
    if (!(options.safetyFactor > 0 && options.safetyFactor <= 1)) {
      throw new RangeError(`safetyFactor must be in (0, 1], got ${options.safetyFactor}`);
    }
    this.effectiveMax = Math.max(
      1,
      Math.floor(options.maxRequestsPerWindow * options.safetyFactor),
    );
    this.windowMs = options.windowSeconds * 1000;
  }

  acquire(cost = 1, options: AcquireOptions = {}): Promise<void> {
    if (this.closed) {
      return Promise.reject(new GateClosedError());
    }
    if (!Number.isInteger(cost) || cost < 1 || cost > this.effectiveMax) {
      return Promise.reject(
        new RangeError(`cost must be an integer in [1, ${this.effectiveMax}], got ${cost}`),
      );
    }
    if (options.signal?.aborted) {
      return Promise.reject(new GateClosedError('acquisition aborted'));
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { cost, enqueuedAt: this.clock.now(), resolve, reject };
      this.queue.push(waiter);

      if (!this.drain()) {
        return;
      }

      this.throttled += 1;
      if (this.queue.length === 1) {
        this.logger.debug(
          JSON.stringify({
            event: 'gate_throttled',
            inWindow: this.inWindow(),
            effectiveMax: this.effectiveMax,
          }),
        );
      }

      if (options.timeoutMs !== undefined) {
        const timeoutMs = options.timeoutMs;
        waiter.timeoutId = setTimeout(() => {
          this.timedOut += 1;
          this.abandon(waiter, new RateLimitTimeoutError(timeoutMs));
        }, timeoutMs);
      }

      const signal = options.signal;
      if (signal) {
        const onAbort = () => this.abandon(waiter, new GateClosedError('acquisition aborted'));
        signal.addEventListener('abort', onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener('abort', onAbort);
      }
    });
  }

  /** Rejects every queued and future acquisition. */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.clearWakeTimer();
    const pending = this.queue.splice(0, this.queue.length);
    for (const waiter of pending) {
      this.settle(waiter);
      waiter.reject(new GateClosedError());
    }
  }

  getStats(): GateStats {
    return {
      effectiveMax: this.effectiveMax,
      windowMs: this.windowMs,
      inWindow: this.inWindow(),
      queued: this.queue.length,
      granted: this.granted,
      throttled: this.throttled,
      timedOut: this.timedOut,
      closed: this.closed,
    };
  }

  /** Grants what fits; returns true when a waiter is still queued. */
  private drain(): boolean {
    const now = this.clock.now();
    this.evict(now);

    while (this.queue.length) {
      const head = this.queue[0];
      if (this.inWindow() + head.cost > this.effectiveMax) {
        break;
      }
      this.queue.shift();
      for (let i = 0; i < head.cost; i += 1) {
        this.grants.push(now);
      }
      this.granted += 1;
      this.settle(head);
      head.resolve();
    }

    if (!this.queue.length) {
      this.clearWakeTimer();
      return false;
    }

    this.scheduleWake(now);
    return true;
  }

  private scheduleWake(now: number): void {
    const head = this.queue[0];
    const mustExpire = this.inWindow() + head.cost - this.effectiveMax;
    const blocking = this.grants[this.grantsHead + mustExpire - 1];
    const delayMs = Math.max(0, blocking + this.windowMs - now);

    this.clearWakeTimer();
    this.wakeTimer = setTimeout(() => {
      this.wakeTimer = null;
      this.drain();
    }, delayMs);
  }

  private abandon(waiter: Waiter, error: Error): void {
    const index = this.queue.indexOf(waiter);
    if (index === -1) {
      return;
    }
    this.queue.splice(index, 1);
    this.settle(waiter);
    waiter.reject(error);
    if (index === 0) {
      this.drain();
    }
  }

  private settle(waiter: Waiter): void {
    if (waiter.timeoutId) {
      clearTimeout(waiter.timeoutId);
    }
    waiter.detach?.();
  }

  private evict(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.grantsHead < this.grants.length && this.grants[this.grantsHead] <= cutoff) {
      this.grantsHead += 1;
    }
    if (this.grantsHead > 1024 && this.grantsHead * 2 > this.grants.length) {
      this.grants.splice(0, this.grantsHead);
      this.grantsHead = 0;
    }
  }

  private inWindow(): number {
    return this.grants.length - this.grantsHead;
  }

  private clearWakeTimer(): void {
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
  }
}
