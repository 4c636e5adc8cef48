export * from './types';
export * from './format';
export * from './rolling-window';
export * from './symbol-state.store';
export * from './detectors/types';
export * from './detectors/big-trade.detector';
export * from './detectors/price-move.detector';
export * from './detectors/volume-spike.detector';
export * from './detectors/detector.registry';
export * from './detection-engine';
export * from './top-volume';
export * from './alert-dedupe.service';
export * from './alert-scorer';
export * from './alert-ranker';
export * from './signals.module';
