import { Module } from '@nestjs/common';
import { CoreModule } from '@libs/core';
import { AlertDeduplicator } from './alert-dedupe.service';
import { AlertRanker } from './alert-ranker';
import { AlertScorer } from './alert-scorer';
import { DetectionEngine } from './detection-engine';
import { DetectorRegistry } from './detectors/detector.registry';
import { SymbolStateStore } from './symbol-state.store';

@Module({
  imports: [CoreModule],
  providers: [
    SymbolStateStore,
    DetectorRegistry,
    DetectionEngine,
    AlertDeduplicator,
    AlertScorer,
    AlertRanker,
  ],
  exports: [SymbolStateStore, DetectionEngine, AlertDeduplicator, AlertScorer, AlertRanker],
})
export class SignalsModule {}
