/**
 * Backup audit configuration schema (TypeBox) and default config.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import { WORKLOAD_CLASSES, type RpoThresholds } from "./types.js";

const thresholdSchema = Type.Object({
  warningHours: Type.Number({ minimum: 0 }),
  criticalHours: Type.Number({ minimum: 0 }),
});

export const configSchema = Type.Object({
  credentialMethod: Type.Optional(
    Type.Union(
      [
        Type.Literal("default"),
        Type.Literal("cli"),
        Type.Literal("service-principal"),
        Type.Literal("managed-identity"),
      ],
      { description: "Credential method: default | cli | service-principal | managed-identity" },
    ),
  ),
  tenantId: Type.Optional(Type.String({ description: "Azure AD tenant ID" })),
  managementEndpoint: Type.Optional(
    Type.String({ description: "ARM endpoint (default https://management.azure.com)" }),
  ),
  retry: Type.Optional(
    Type.Object({
      maxAttempts: Type.Optional(Type.Integer({ minimum: 1, maximum: 10 })),
      baseDelayMs: Type.Optional(Type.Number({ minimum: 0 })),
    }),
  ),
  thresholds: Type.Optional(
    Type.Partial(
      Type.Object({
        VM: thresholdSchema,
        SQLDataBase: thresholdSchema,
        SAPHanaDatabase: thresholdSchema,
        AzureSqlDatabase: thresholdSchema,
      }),
    ),
  ),
  apiVersions: Type.Optional(Type.Record(Type.String(), Type.String())),
  diagnostics: Type.Optional(
    Type.Object({
      enabled: Type.Optional(Type.Boolean()),
      verbose: Type.Optional(Type.Boolean()),
    }),
  ),
});

export type BackupAuditConfigInput = Static<typeof configSchema>;

export type CredentialMethod = NonNullable<BackupAuditConfigInput["credentialMethod"]>;

export type BackupAuditConfig = {
  credentialMethod: CredentialMethod;
  tenantId?: string;
  managementEndpoint: string;
  retry: { maxAttempts: number; baseDelayMs: number };
  thresholds: RpoThresholds;
  apiVersions: ApiVersions;
  diagnostics: { enabled: boolean; verbose: boolean };
};

/**
 * API versions per endpoint family. The `*Legacy` entries are the older
 * generation tried when the current one yields nothing.
 */
export type ApiVersions = {
  recoveryServicesVault: string;
  vaultStorageConfig: string;
  vaultConfig: string;
  vaultConfigLegacy: string;
  backupPolicy: string;
  protectedItems: string;
  protectedItemsLegacy: string;
  recoveryPoints: string;
  dataProtectionVault: string;
  backupInstances: string;
  sqlRestorePoints: string;
};

export const DEFAULT_API_VERSIONS: ApiVersions = {
  recoveryServicesVault: "2024-04-01",
  vaultStorageConfig: "2023-04-01",
  vaultConfig: "2023-04-01",
  vaultConfigLegacy: "2019-05-13",
  backupPolicy: "2023-04-01",
  protectedItems: "2023-04-01",
  protectedItemsLegacy: "2019-05-13",
  recoveryPoints: "2023-04-01",
  dataProtectionVault: "2023-05-01",
  backupInstances: "2023-05-01",
  sqlRestorePoints: "2021-11-01",
};

export const DEFAULT_THRESHOLDS: RpoThresholds = {
  VM: { warningHours: 26, criticalHours: 48 },
  SQLDataBase: { warningHours: 4, criticalHours: 24 },
  SAPHanaDatabase: { warningHours: 4, criticalHours: 24 },
  AzureSqlDatabase: { warningHours: 1, criticalHours: 4 },
};

export function getDefaultConfig(): BackupAuditConfig {
  return {
    credentialMethod: "default",
    managementEndpoint: "https://management.azure.com",
    retry: { maxAttempts: 5, baseDelayMs: 1_000 },
    thresholds: structuredClone(DEFAULT_THRESHOLDS),
    apiVersions: { ...DEFAULT_API_VERSIONS },
    diagnostics: { enabled: false, verbose: false },
  };
}

function isApiVersionKey(key: string): key is keyof ApiVersions {
  return key in DEFAULT_API_VERSIONS;
}

/**
 * Validate raw config and merge it over the defaults.
 * Throws `ConfigError` naming every offending path.
 */
export function resolveConfig(input: unknown = {}): BackupAuditConfig {
  if (!Value.Check(configSchema, input)) {
    const issues = [...Value.Errors(configSchema, input)].map(
      (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigError(issues);
  }

  const defaults = getDefaultConfig();
  const thresholds: RpoThresholds = { ...defaults.thresholds };
  for (const workload of WORKLOAD_CLASSES) {
    const override = input.thresholds?.[workload];
    if (override) thresholds[workload] = override;
  }

  const issues: string[] = [];
  for (const [workload, t] of Object.entries(thresholds)) {
    if (t.warningHours > t.criticalHours) {
      issues.push(`/thresholds/${workload}: warningHours must not exceed criticalHours`);
    }
  }

  const apiVersions: ApiVersions = { ...defaults.apiVersions };
  for (const [key, version] of Object.entries(input.apiVersions ?? {})) {
    if (isApiVersionKey(key)) apiVersions[key] = version;
    else issues.push(`/apiVersions/${key}: unknown endpoint family`);
  }

  if (issues.length > 0) throw new ConfigError(issues);

  return {
    credentialMethod: input.credentialMethod ?? defaults.credentialMethod,
    tenantId: input.tenantId,
    managementEndpoint: (input.managementEndpoint ?? defaults.managementEndpoint).replace(/\/+$/, ""),
    retry: {
      maxAttempts: input.retry?.maxAttempts ?? defaults.retry.maxAttempts,
      baseDelayMs: input.retry?.baseDelayMs ?? defaults.retry.baseDelayMs,
    },
    thresholds,
    apiVersions,
    diagnostics: {
      enabled: input.diagnostics?.enabled ?? defaults.diagnostics.enabled,
      verbose: input.diagnostics?.verbose ?? defaults.diagnostics.verbose,
    },
  };
}
