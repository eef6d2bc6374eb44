export { RpoInferenceEngine } from "./engine.js";
export type { RpoEngineOptions } from "./engine.js";
export {
  DATABASE_POINT_PREFERENCE,
  pointKind,
  normalizeRecoveryPoint,
  normalizeRestorePoint,
  sortPointsDescending,
  inferCadence,
  selectPreferredPoint,
  latestPoint,
  observedRpoHours,
} from "./points.js";
export type { RecoveryPoint, RecoveryPointKind, RecoveryPointSource, RpoSubject, RpoEvaluation } from "./types.js";
