export type HealthTransition = 'degraded' | 'recovered' | null;

/**
 * Counts consecutive failed cycles per symbol. A symbol becomes degraded on
 * reaching the threshold and recovers on its next success.
 */
export class SymbolHealthTracker {
  private readonly failures = new Map<string, number>();
  private readonly degraded = new Set<string>();

  constructor(private readonly degradedAfterCycles: number) {}

  recordSuccess(symbol: string): HealthTransition {
    this.failures.delete(symbol);
    return this.degraded.delete(symbol) ? 'recovered' : null;
  }

  recordFailure(symbol: string): HealthTransition {
    const count = (this.failures.get(symbol) ?? 0) + 1;
    this.failures.set(symbol, count);
    if (count >= this.degradedAfterCycles && !this.degraded.has(symbol)) {
      this.degraded.add(symbol);
      return 'degraded';
    }
    return null;
  }

  consecutiveFailures(symbol: string): number {
    return this.failures.get(symbol) ?? 0;
  }

  isDegraded(symbol: string): boolean {
    return this.degraded.has(symbol);
  }

  degradedSymbols(): string[] {
    return [...this.degraded].sort();
  }
}
