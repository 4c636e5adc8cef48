import { formatRatio, formatUsd } from '../format';
import type { Detector } from './types';

interface VolumeSpikeConfig {
  /** 300 means the current delta is at least 3x the trailing average. */
  thresholdPct: number;
}

/** Cycle-to-cycle growth of 24h volume; shrinking counts as zero. */
export const volumeDeltas = (volumes: readonly number[]): number[] => {
  const deltas: number[] = [];
  for (let i = 1; i < volumes.length; i += 1) {
    deltas.push(Math.max(0, volumes[i] - volumes[i - 1]));
  }
  return deltas;
};

export const createVolumeSpikeDetector = (config: VolumeSpikeConfig): Detector => ({
  kind: 'VOLUME_SPIKE',
  displayName: 'Volume spike',
  requiresHistory: true,
  detect: ({ snapshot, window }) => {
    const deltas = volumeDeltas(window.snapshots.map((item) => item.volume24h));
    if (deltas.length < 2) {
      return [];
    }

    const current = deltas[deltas.length - 1];
    const earlier = deltas.slice(0, -1);
    const average = earlier.reduce((sum, value) => sum + value, 0) / earlier.length;
    if (average <= 0) {
      return [];
    }

    const ratio = current / average;
    if (ratio * 100 < config.thresholdPct) {
      return [];
    }

    return [
      {
        kind: 'VOLUME_SPIKE',
        symbol: snapshot.symbol,
        magnitude: ratio,
        timestamp: snapshot.timestamp,
        summary: `Volume ${formatRatio(ratio)} trailing average (+${formatUsd(current)})`,
        details: { currentDelta: current, averageDelta: average },
      },
    ];
  },
});
