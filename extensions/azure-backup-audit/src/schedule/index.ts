export {
  parseIsoDuration,
  durationToSeconds,
  normalizeCadence,
  cadenceFromDuration,
  roundHours,
  round2,
  CANONICAL_CADENCE_HOURS,
  CADENCE_SNAP_TOLERANCE_SECONDS,
} from "./duration.js";
export { classifyPolicy } from "./classify.js";
export { extractSchedule, extractPolicySchedule, maxCyclicGap, intervalDuration } from "./extractor.js";

export type { ParsedDuration, CadenceInfo } from "./duration.js";
export type {
  PolicyShape,
  PolicyShapeKind,
  ScheduleInfo,
  ScheduleVariant,
  SimpleSchedule,
  DatabaseSubPolicy,
  DatabaseSubPolicyType,
  RunFrequency,
} from "./types.js";
