/**
 * ARM resource-id matching.
 *
 * Ids are located by pattern (resource group segment followed by a provider
 * namespace and type/name pairs) rather than by splitting on fixed
 * positions, so casing differences and prefixes such as a vault path do not
 * shift the fields.
 */

const ARM_RESOURCE_ID =
  /\/subscriptions\/([^/\s;]+)\/resourceGroups\/([^/\s;]+)\/providers\/([A-Za-z0-9.]+)\/((?:[^/\s;]+\/[^/\s;]+)(?:\/[^/\s;]+\/[^/\s;]+)*)/i;

const VM_CONTAINER_KIND = /^iaasvmcontainer(?:v2)?$/i;

export type ParsedResourceId = {
  subscriptionId: string;
  resourceGroup: string;
  /** Provider namespace plus nested types, e.g. `Microsoft.Sql/servers/databases`. */
  resourceType: string;
  name: string;
  /** Lower-cased id, usable as a set key. */
  canonicalId: string;
};

/** Lower-case, trimmed, no trailing slash. */
export function canonicalResourceId(id: string): string {
  return id.trim().replace(/\/+$/, "").toLowerCase();
}

export function parseResourceId(value: unknown): ParsedResourceId | null {
  if (typeof value !== "string") return null;
  const match = ARM_RESOURCE_ID.exec(value);
  if (!match) return null;

  const [whole, subscriptionId, resourceGroup, namespace, tail] = match;
  const segments = tail.split("/");
  const types = segments.filter((_, i) => i % 2 === 0);
  const name = segments[segments.length - 1];

  return {
    subscriptionId,
    resourceGroup,
    resourceType: [namespace, ...types].join("/"),
    name,
    canonicalId: canonicalResourceId(whole),
  };
}

export function resourceGroupOf(id: string): string | null {
  return parseResourceId(id)?.resourceGroup ?? null;
}

/**
 * VM id from a Recovery Services container or item name such as
 * `iaasvmcontainerv2;rg-app;vm-01` or `VM;iaasvmcontainerv2;rg-app;vm-01`.
 */
export function vmIdFromContainerName(containerName: string, subscriptionId: string): string | null {
  const parts = containerName.split(";").map((p) => p.trim());
  if (parts.length < 3 || !VM_CONTAINER_KIND.test(parts[parts.length - 3])) return null;

  const resourceGroup = parts[parts.length - 2];
  const vmName = parts[parts.length - 1];
  if (!resourceGroup || !vmName) return null;

  return canonicalResourceId(
    `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}/providers/Microsoft.Compute/virtualMachines/${vmName}`,
  );
}
