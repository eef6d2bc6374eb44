export { BackupAuditScanner, createBackupAuditScanner, formatDiagnosticEvent, isAzureSqlDatabase } from "./scanner.js";
export type { BackupAuditScannerOptions } from "./scanner.js";
export type { AuditRunInput, AuditRunResult, RunContext } from "./types.js";
