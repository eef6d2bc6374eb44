import { describe, it, expect } from "vitest";
import { canonicalResourceId, parseResourceId, resourceGroupOf, vmIdFromContainerName } from "./resource-id.js";

const VM_ID = "/subscriptions/Sub-1/resourceGroups/RG-App/providers/Microsoft.Compute/virtualMachines/VM-01";

describe("canonicalResourceId", () => {
  it("lower-cases, trims and drops trailing slashes", () => {
    expect(canonicalResourceId("  /Subscriptions/ABC/ResourceGroups/RG//  ")).toBe("/subscriptions/abc/resourcegroups/rg");
  });
});

describe("parseResourceId", () => {
  it("splits a top-level resource id", () => {
    expect(parseResourceId(VM_ID)).toEqual({
      subscriptionId: "Sub-1",
      resourceGroup: "RG-App",
      resourceType: "Microsoft.Compute/virtualMachines",
      name: "VM-01",
      canonicalId: "/subscriptions/sub-1/resourcegroups/rg-app/providers/microsoft.compute/virtualmachines/vm-01",
    });
  });

  it("joins nested types", () => {
    const parsed = parseResourceId(
      "/subscriptions/sub-1/resourceGroups/rg-data/providers/Microsoft.Sql/servers/sql-01/databases/orders",
    );
    expect(parsed?.resourceType).toBe("Microsoft.Sql/servers/databases");
    expect(parsed?.name).toBe("orders");
  });

  it("matches regardless of casing", () => {
    expect(parseResourceId(VM_ID.toLowerCase())?.resourceGroup).toBe("rg-app");
  });

  it("returns null for values that are not resource ids", () => {
    expect(parseResourceId("vm-01")).toBeNull();
    expect(parseResourceId(42)).toBeNull();
    expect(parseResourceId(undefined)).toBeNull();
  });

  it("reads the resource group", () => {
    expect(resourceGroupOf(VM_ID)).toBe("RG-App");
    expect(resourceGroupOf("not-an-id")).toBeNull();
  });
});

describe("vmIdFromContainerName", () => {
  const expected = "/subscriptions/sub-1/resourcegroups/rg-app/providers/microsoft.compute/virtualmachines/vm-01";

  it("rebuilds the VM id from a container name", () => {
    expect(vmIdFromContainerName("iaasvmcontainerv2;rg-app;vm-01", "sub-1")).toBe(expected);
  });

  it("accepts prefixed item and container names", () => {
    expect(vmIdFromContainerName("VM;iaasvmcontainerv2;RG-App;VM-01", "sub-1")).toBe(expected);
    expect(vmIdFromContainerName("IaasVMContainer;iaasvmcontainerv2;rg-app;vm-01", "sub-1")).toBe(expected);
    expect(vmIdFromContainerName("iaasvmcontainer;rg-app;vm-01", "sub-1")).toBe(expected);
  });

  it("rejects non-VM containers", () => {
    expect(vmIdFromContainerName("StorageContainer;storage;rg-app;sa01", "sub-1")).toBeNull();
    expect(vmIdFromContainerName("vm-01", "sub-1")).toBeNull();
  });
});
