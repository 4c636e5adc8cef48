import { Inject, Injectable } from '@nestjs/common';
import { SCREENER_CONFIG } from '@libs/core';
import type { ScreenerConfig } from '@libs/core';
import { DetectorRegistry } from './detectors/detector.registry';
import type { Alert, DetectionInput } from './types';

@Injectable()
export class DetectionEngine {
  private readonly minWindowSnapshots: number;

  constructor(
    private readonly registry: DetectorRegistry,
    @Inject(SCREENER_CONFIG) config: Pick<ScreenerConfig, 'minWindowSnapshots'>,
  ) {
    this.minWindowSnapshots = config.minWindowSnapshots;
  }

  hasHistory(input: DetectionInput): boolean {
    return input.window.snapshots.length >= this.minWindowSnapshots;
  }

  /** Runs every detector; history-based ones only once the window is warm. */
  detect(input: DetectionInput): Alert[] {
    const warm = this.hasHistory(input);
    return this.registry
      .getAll()
      .filter((detector) => warm || !detector.requiresHistory)
      .flatMap((detector) => detector.detect(input));
  }
}
