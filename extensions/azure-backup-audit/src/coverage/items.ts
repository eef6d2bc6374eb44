/**
 * Protected item normalization.
 *
 * SDK models and REST payloads share field names but differ in value types
 * (Date vs ISO string) and in which optional fields are populated. Every
 * discovery path funnels through these adapters so rows look the same
 * whichever path found them.
 */

import type { WorkloadClass } from "../types.js";
import type { VaultRef } from "../posture/types.js";
import type { ProtectedItemRecord } from "./types.js";
import { getField, getPath, readString, readTimestamp } from "../shape.js";
import { parseResourceId, vmIdFromContainerName } from "./resource-id.js";

const CONTAINER_SEGMENT = /\/protectionContainers\/([^/]+)\//i;
const SQL_SERVER_SEGMENT = /\/servers\/([^/]+)\//i;

/** Workload class from `workloadType`, falling back to the item's object type. */
export function classifyWorkload(workloadType: unknown, objectType: unknown): WorkloadClass | null {
  switch (readString(workloadType)?.toLowerCase()) {
    case "vm":
      return "VM";
    case "sqldatabase":
      return "SQLDataBase";
    case "saphanadatabase":
      return "SAPHanaDatabase";
  }

  const type = readString(objectType)?.toLowerCase() ?? "";
  if (type.includes("computevm")) return "VM";
  if (type.includes("sqldatabase")) return "SQLDataBase";
  if (type.includes("saphanadatabase")) return "SAPHanaDatabase";
  return null;
}

export function containerNameOf(itemId: string, properties: unknown): string | null {
  return readString(getField(properties, "containerName")) ?? CONTAINER_SEGMENT.exec(itemId)?.[1] ?? null;
}

function lastSegment(id: string | null): string | null {
  if (!id) return null;
  const segment = id.replace(/\/+$/, "").split("/").pop();
  return segment ? segment : null;
}

/**
 * Source resource id of a Recovery Services item: the explicit
 * `sourceResourceId`, then the VM id, then the container name.
 */
function recoveryServicesSourceId(
  itemId: string,
  name: string,
  properties: unknown,
  subscriptionId: string,
): string | null {
  const explicit =
    parseResourceId(getField(properties, "sourceResourceId")) ??
    parseResourceId(getField(properties, "virtualMachineId"));
  if (explicit) return explicit.canonicalId;

  const container = containerNameOf(itemId, properties);
  return (
    (container ? vmIdFromContainerName(container, subscriptionId) : null) ??
    vmIdFromContainerName(name, subscriptionId)
  );
}

export function normalizeProtectedItem(
  raw: unknown,
  vault: VaultRef,
  discoveredBy: string,
): ProtectedItemRecord | null {
  const itemId = readString(getField(raw, "id"));
  if (!itemId) return null;

  const props = getField(raw, "properties");
  const name = readString(getField(raw, "name")) ?? lastSegment(itemId) ?? itemId;
  const policyId = readString(getField(props, "policyId"));

  return {
    itemId,
    name,
    friendlyName: readString(getField(props, "friendlyName")),
    vaultId: vault.id,
    vaultName: vault.name,
    subscriptionId: vault.subscriptionId,
    sourceResourceId: recoveryServicesSourceId(itemId, name, props, vault.subscriptionId),
    workload: classifyWorkload(getField(props, "workloadType"), getField(props, "protectedItemType")),
    workloadType: readString(getField(props, "workloadType")),
    containerName: containerNameOf(itemId, props),
    policyId,
    policyName: readString(getField(props, "policyName")) ?? lastSegment(policyId),
    lastBackupTime:
      readTimestamp(getField(props, "lastBackupTime")) ?? readTimestamp(getField(props, "lastRecoveryPoint")),
    lastBackupStatus: readString(getField(props, "lastBackupStatus")),
    protectionState:
      readString(getField(props, "protectionState")) ?? readString(getField(props, "protectionStatus")),
    method: "RecoveryServicesVault",
    discoveredBy,
  };
}

/** Data Protection `backupInstances` entry. */
export function normalizeBackupInstance(
  raw: unknown,
  vault: VaultRef,
  discoveredBy: string,
): ProtectedItemRecord | null {
  const itemId = readString(getField(raw, "id"));
  if (!itemId) return null;

  const props = getField(raw, "properties");
  const dataSource = getField(props, "dataSourceInfo");
  const policyId = readString(getPath(props, ["policyInfo", "policyId"]));

  return {
    itemId,
    name: readString(getField(raw, "name")) ?? lastSegment(itemId) ?? itemId,
    friendlyName: readString(getField(props, "friendlyName")) ?? readString(getField(dataSource, "resourceName")),
    vaultId: vault.id,
    vaultName: vault.name,
    subscriptionId: vault.subscriptionId,
    sourceResourceId: parseResourceId(getField(dataSource, "resourceID"))?.canonicalId ?? null,
    workload: null,
    workloadType: readString(getField(dataSource, "datasourceType")),
    containerName: null,
    policyId,
    policyName: lastSegment(policyId),
    lastBackupTime: null,
    lastBackupStatus: null,
    protectionState:
      readString(getPath(props, ["protectionStatus", "status"])) ??
      readString(getField(props, "currentProtectionState")),
    method: "BackupVault",
    discoveredBy,
  };
}

/** Row for an Azure SQL database covered by its built-in point-in-time restore. */
export function pitrItem(
  resource: { id: string; name: string; subscriptionId?: string },
  latestPoint: Date | null,
): ProtectedItemRecord {
  const parsed = parseResourceId(resource.id);
  const server = SQL_SERVER_SEGMENT.exec(resource.id)?.[1] ?? "";
  return {
    itemId: resource.id,
    name: resource.name,
    friendlyName: resource.name,
    vaultId: "",
    vaultName: server,
    subscriptionId: resource.subscriptionId ?? parsed?.subscriptionId ?? "",
    sourceResourceId: parsed?.canonicalId ?? resource.id.toLowerCase(),
    workload: "AzureSqlDatabase",
    workloadType: "AzureSqlDatabase",
    containerName: null,
    policyId: null,
    policyName: null,
    lastBackupTime: latestPoint,
    lastBackupStatus: null,
    protectionState: null,
    method: "PITR",
    discoveredBy: "restorePoints",
  };
}
