/**
 * Protected-Resource Set Builder: Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ProtectedResourceSetBuilder, containerFilter, restStrategy } from "./discovery.js";
import { ProtectedIdSet } from "./protected-set.js";
import type { VaultRef } from "../posture/types.js";
import type { CredentialSource } from "../vaults/types.js";
import { DEFAULT_API_VERSIONS } from "../config.js";
import { AuthenticationError } from "../errors.js";
import { silentLogger } from "../logger.js";
import { FakeRestGetter } from "../testing/fake-rest.js";

function asyncIter<T>(items: T[]): AsyncIterable<T> {
  return {
    async *[Symbol.asyncIterator]() {
      yield* items;
    },
  };
}

const mockProtectedItems = { list: vi.fn() };
const mockContainers = { list: vi.fn() };

vi.mock("@azure/arm-recoveryservicesbackup", () => ({
  RecoveryServicesBackupClient: vi.fn().mockImplementation(function () {
    return {
      backupProtectedItems: mockProtectedItems,
      backupProtectionContainers: mockContainers,
    };
  }),
}));

const mockCreds: CredentialSource = {
  getCredential: vi.fn().mockResolvedValue({ credential: { getToken: vi.fn() } }),
};

const VAULT: VaultRef = {
  id: "/subscriptions/sub-1/resourceGroups/rg-backup/providers/Microsoft.RecoveryServices/vaults/rsv-1",
  name: "rsv-1",
  resourceGroup: "rg-backup",
  location: "uksouth",
  subscriptionId: "sub-1",
  family: "RecoveryServices",
};

const CONTAINER = "IaasVMContainer;iaasvmcontainerv2;rg-app;vm-01";
const VM_SOURCE = "/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Compute/virtualMachines/vm-01";
const VM_KEY = VM_SOURCE.toLowerCase();

function vmItem(vm: string, container = `IaasVMContainer;iaasvmcontainerv2;rg-app;${vm}`) {
  return {
    id: `${VAULT.id}/backupFabrics/Azure/protectionContainers/${container}/protectedItems/VM;iaasvmcontainerv2;rg-app;${vm}`,
    name: `VM;iaasvmcontainerv2;rg-app;${vm}`,
    properties: {
      workloadType: "VM",
      sourceResourceId: `/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Compute/virtualMachines/${vm}`,
    },
  };
}

const IAAS_FILTER = "backupManagementType%20eq%20'AzureIaasVM'";
const WORKLOAD_FILTER = "backupManagementType%20eq%20'AzureWorkload'";
const current = (filter: string | null) =>
  `${VAULT.id}/backupProtectedItems?api-version=${DEFAULT_API_VERSIONS.protectedItems}${filter ? `&$filter=${filter}` : ""}`;
const legacy = (filter: string | null) =>
  `${VAULT.id}/backupProtectedItems?api-version=${DEFAULT_API_VERSIONS.protectedItemsLegacy}${filter ? `&$filter=${filter}` : ""}`;

function makeBuilder(getter: FakeRestGetter, extra: Partial<ConstructorParameters<typeof ProtectedResourceSetBuilder>[0]> = {}) {
  return new ProtectedResourceSetBuilder({
    credentials: mockCreds,
    getter,
    apiVersions: DEFAULT_API_VERSIONS,
    retryOptions: { maxAttempts: 1, minDelayMs: 0, maxDelayMs: 0 },
    logger: silentLogger,
    ...extra,
  });
}

function failSdk() {
  mockProtectedItems.list.mockImplementation(() => {
    throw new Error("Operation returned an invalid status code");
  });
  mockContainers.list.mockImplementation(() => {
    throw new Error("Operation returned an invalid status code");
  });
}

describe("ProtectedResourceSetBuilder", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockProtectedItems.list.mockReset();
    mockContainers.list.mockReset();
  });

  it("uses management-type listing when it returns items", async () => {
    mockProtectedItems.list.mockImplementation((_vault: string, _rg: string, options?: { filter?: string }) =>
      asyncIter(options?.filter === "backupManagementType eq 'AzureIaasVM'" ? [vmItem("vm-01")] : []),
    );
    const getter = new FakeRestGetter();
    const set = new ProtectedIdSet();

    const result = await makeBuilder(getter).discover(VAULT, set);

    expect(result.strategy).toBe("managementType");
    expect(result.tried).toEqual(["managementType"]);
    expect(result.items.map((i) => i.discoveredBy)).toEqual(["managementType"]);
    expect(mockProtectedItems.list).toHaveBeenCalledWith("rsv-1", "rg-backup", {
      filter: "backupManagementType eq 'AzureIaasVM'",
    });
    expect(mockProtectedItems.list).toHaveBeenCalledWith("rsv-1", "rg-backup", {
      filter: "backupManagementType eq 'AzureWorkload'",
    });
    expect(set.get(VM_SOURCE)).toEqual({ resourceId: VM_KEY, method: "RecoveryServicesVault", protectedBy: "rsv-1" });
    expect(getter.calls).toEqual([]);
  });

  it("falls back to listing each registered container when the vault-wide listing fails", async () => {
    const sqlContainer = "VMAppContainer;compute;rg-data;sql-vm-01";
    mockProtectedItems.list.mockImplementation((_vault: string, _rg: string, options?: { filter?: string }) => {
      const filter = options?.filter;
      if (!filter) throw new Error("Operation returned an invalid status code");
      if (filter === containerFilter("AzureIaasVM", CONTAINER)) return asyncIter([vmItem("vm-01")]);
      return asyncIter([]);
    });
    mockContainers.list.mockImplementation((_vault: string, _rg: string, options?: { filter?: string }) => {
      if (options?.filter === "backupManagementType eq 'AzureIaasVM'") return asyncIter([{ name: CONTAINER }]);
      if (options?.filter === "backupManagementType eq 'AzureWorkload'") return asyncIter([{ name: sqlContainer }]);
      return asyncIter([]);
    });
    const set = new ProtectedIdSet();

    const result = await makeBuilder(new FakeRestGetter()).discover(VAULT, set);

    expect(result.strategy).toBe("containers");
    expect(result.tried).toEqual(["managementType", "containers"]);
    expect(result.items.map((i) => i.name)).toEqual(["VM;iaasvmcontainerv2;rg-app;vm-01"]);
    expect(mockProtectedItems.list).toHaveBeenCalledWith("rsv-1", "rg-backup", {
      filter: "backupManagementType eq 'AzureIaasVM' and containerName eq 'IaasVMContainer;iaasvmcontainerv2;rg-app;vm-01'",
    });
    expect(mockProtectedItems.list).toHaveBeenCalledWith("rsv-1", "rg-backup", {
      filter: "backupManagementType eq 'AzureWorkload' and containerName eq 'VMAppContainer;compute;rg-data;sql-vm-01'",
    });
    expect(mockProtectedItems.list.mock.calls.every((call) => call.length === 3)).toBe(true);
    expect(set.has(VM_SOURCE)).toBe(true);
  });

  it("falls back to REST when the SDK fails", async () => {
    failSdk();
    const getter = new FakeRestGetter().on(current(IAAS_FILTER), { value: [vmItem("vm-01")] });
    const set = new ProtectedIdSet();

    const result = await makeBuilder(getter).discover(VAULT, set);

    expect(result.strategy).toBe("rest");
    expect(result.tried).toEqual(["managementType", "containers", "rest"]);
    expect(getter.calls).toEqual([current(IAAS_FILTER), current(WORKLOAD_FILTER)]);
    expect(set.has(VM_SOURCE)).toBe(true);
  });

  it("walks the legacy generation with continuation tokens when the current one is empty", async () => {
    failSdk();
    const getter = new FakeRestGetter()
      .on(current(IAAS_FILTER), { value: [] })
      .on(current(WORKLOAD_FILTER), { value: [] })
      .on(current(null), { value: [] })
      .on(legacy(IAAS_FILTER), { value: [vmItem("vm-01")] }, { "x-ms-continuation": "page2" })
      .on(`${legacy(IAAS_FILTER)}&%24skiptoken=page2`, { value: [vmItem("vm-02")] });
    const set = new ProtectedIdSet();

    const result = await makeBuilder(getter).discover(VAULT, set);

    expect(result.strategy).toBe("rest");
    expect(getter.calls).toEqual([
      current(IAAS_FILTER),
      current(WORKLOAD_FILTER),
      current(null),
      legacy(IAAS_FILTER),
      `${legacy(IAAS_FILTER)}&%24skiptoken=page2`,
      legacy(WORKLOAD_FILTER),
    ]);
    expect(result.items).toHaveLength(2);
    expect(set.size).toBe(2);
  });

  it("returns nothing when every strategy comes up empty", async () => {
    failSdk();
    const set = new ProtectedIdSet();

    const result = await makeBuilder(new FakeRestGetter()).discover(VAULT, set);

    expect(result).toEqual({ items: [], strategy: null, tried: ["managementType", "containers", "rest"] });
    expect(set.size).toBe(0);
  });

  it("rethrows authentication failures", async () => {
    vi.mocked(mockCreds.getCredential).mockRejectedValueOnce(new AuthenticationError("token expired"));

    await expect(makeBuilder(new FakeRestGetter()).discover(VAULT, new ProtectedIdSet())).rejects.toBeInstanceOf(
      AuthenticationError,
    );
  });

  it("warns about items without a source resource", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const share = {
      id: `${VAULT.id}/backupFabrics/Azure/protectionContainers/StorageContainer;storage;rg-app;sa01/protectedItems/AzureFileShare;share1`,
      name: "AzureFileShare;share1",
      properties: { workloadType: "AzureFileShare" },
    };
    const getter = new FakeRestGetter().on(current(IAAS_FILTER), { value: [share] });
    const set = new ProtectedIdSet();

    const result = await makeBuilder(getter, { logger, strategies: [restStrategy] }).discover(VAULT, set);

    expect(result.items).toHaveLength(1);
    expect(set.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith("[Discovery] rsv-1: no source resource id for AzureFileShare;share1");
  });

  it("lists backup instances for backup vaults", async () => {
    const backupVault: VaultRef = {
      ...VAULT,
      id: "/subscriptions/sub-1/resourceGroups/rg-backup/providers/Microsoft.DataProtection/backupVaults/bv-1",
      name: "bv-1",
      family: "DataProtection",
    };
    const getter = new FakeRestGetter().on(
      `${backupVault.id}/backupInstances?api-version=${DEFAULT_API_VERSIONS.backupInstances}`,
      {
        value: [
          {
            id: `${backupVault.id}/backupInstances/disk-01`,
            name: "disk-01",
            properties: {
              dataSourceInfo: {
                resourceID: "/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Compute/disks/disk-01",
              },
            },
          },
        ],
      },
    );
    const set = new ProtectedIdSet();

    const result = await makeBuilder(getter).discover(backupVault, set);

    expect(result.strategy).toBe("backupInstances");
    expect(set.methodOf("/subscriptions/sub-1/resourceGroups/rg-app/providers/Microsoft.Compute/disks/disk-01")).toBe(
      "BackupVault",
    );
    expect(mockProtectedItems.list).not.toHaveBeenCalled();
  });
});
