import type { Alert, AlertKind, DetectionInput } from '../types';

export interface Detector {
  kind: AlertKind;
  displayName: string;
  /** Skipped while the symbol's window holds too few snapshots. */
  requiresHistory: boolean;
  detect(input: DetectionInput): Alert[];
}
