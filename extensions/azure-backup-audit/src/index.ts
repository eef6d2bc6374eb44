/**
 * Azure backup audit: barrel exports.
 */

// Core utilities
export type {
  AuditLogger,
  AzureRetryOptions,
  RestRetryOptions,
  WorkloadClass,
  RpoSource,
  RpoThreshold,
  RpoThresholds,
  InventoryResource,
  AuditSubscription,
} from "./types.js";
export { WORKLOAD_CLASSES } from "./types.js";

export { BackupAuditError, AuthenticationError, ConfigError, isAuthenticationError } from "./errors.js";
export type { BackupAuditErrorCode } from "./errors.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export {
  withAzureRetry,
  shouldRetryAzureError,
  formatErrorMessage,
  restBackoffDelayMs,
  RETRYABLE_STATUSES,
} from "./retry.js";
export {
  enableAuditDiagnostics,
  disableAuditDiagnostics,
  isAuditDiagnosticsEnabled,
  onAuditDiagnosticEvent,
  emitAuditDiagnosticEvent,
} from "./diagnostics.js";
export type { AuditDiagnosticEvent, AuditDiagnosticEventType, AuditDiagnosticListener } from "./diagnostics.js";
export { resolveConfig, getDefaultConfig, configSchema, DEFAULT_API_VERSIONS, DEFAULT_THRESHOLDS } from "./config.js";
export type { BackupAuditConfig, BackupAuditConfigInput, ApiVersions, CredentialMethod } from "./config.js";
export { firstNonEmpty } from "./strategy.js";
export type { Strategy, StrategyOutcome } from "./strategy.js";
export { walkContinuationToken, walkNextLink, findHeader, withQueryParam } from "./pagination.js";
export type { PagedWalkResult, TokenWalkOptions, LinkWalkOptions } from "./pagination.js";

// Transport and credentials
export * from "./http/index.js";
export * from "./credentials/index.js";

// Audit components
export * from "./schedule/index.js";
export * from "./rpo/index.js";
export * from "./posture/index.js";
export * from "./vaults/index.js";
export * from "./coverage/index.js";
export * from "./scanner/index.js";
