export {
  ProtectedResourceSetBuilder,
  DEFAULT_DISCOVERY_STRATEGIES,
  MANAGEMENT_TYPES,
  managementTypeStrategy,
  containerStrategy,
  containerFilter,
  restStrategy,
} from "./discovery.js";
export type {
  DiscoveryContext,
  DiscoveryStrategy,
  DiscoveryResult,
  ProtectedResourceSetBuilderOptions,
} from "./discovery.js";
export {
  evaluateCoverage,
  evaluateRpoThreshold,
  buildFindings,
  postureFindings,
  coverageFindings,
  rpoFindings,
  summarizeFindings,
  MIN_SOFT_DELETE_RETENTION_DAYS,
} from "./evaluator.js";
export type { FindingInputs } from "./evaluator.js";
export { classifyWorkload, normalizeProtectedItem, normalizeBackupInstance, pitrItem } from "./items.js";
export { ProtectedIdSet } from "./protected-set.js";
export type { ProtectedIdEntry } from "./protected-set.js";
export { canonicalResourceId, parseResourceId, resourceGroupOf, vmIdFromContainerName } from "./resource-id.js";
export type { ParsedResourceId } from "./resource-id.js";
export type {
  ProtectionMethod,
  ProtectedItemRecord,
  ProtectedItemRow,
  CoverageRecord,
  Finding,
  FindingCategory,
  FindingSeverity,
  FindingSummary,
} from "./types.js";
