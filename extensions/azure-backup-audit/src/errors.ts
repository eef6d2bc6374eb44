/**
 * Azure Backup Audit: Error Types
 *
 * Only authentication and configuration failures are thrown across component
 * boundaries. Transport and shape failures degrade to `null` instead.
 */

export type BackupAuditErrorCode = "AuthenticationFailed" | "InvalidConfig";

export class BackupAuditError extends Error {
  readonly code: BackupAuditErrorCode;

  constructor(code: BackupAuditErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BackupAuditError";
    this.code = code;
  }
}

/** Token acquisition failed. Aborts the whole run. */
export class AuthenticationError extends BackupAuditError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AuthenticationFailed", message, options);
    this.name = "AuthenticationError";
  }
}

export class ConfigError extends BackupAuditError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("InvalidConfig", `Invalid backup audit config: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}
