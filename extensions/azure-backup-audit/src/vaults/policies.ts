/**
 * Backup policy reads, cached per run.
 *
 * Many protected items share one policy, so each policy id is fetched at
 * most once. Unreadable policies are cached as `null` too. Backup-vault
 * policies are read with the Data Protection API version.
 */

import type { RestGetter } from "../http/types.js";
import type { ApiVersions } from "../config.js";
import { canonicalResourceId } from "../coverage/resource-id.js";

const DATA_PROTECTION_PROVIDER = /\/providers\/microsoft\.dataprotection\//i;

export class PolicyCache {
  private readonly entries = new Map<string, Promise<unknown>>();
  private readonly getter: RestGetter;
  private readonly apiVersions: Pick<ApiVersions, "backupPolicy" | "backupInstances">;

  constructor(getter: RestGetter, apiVersions: Pick<ApiVersions, "backupPolicy" | "backupInstances">) {
    this.getter = getter;
    this.apiVersions = apiVersions;
  }

  /** Raw policy resource, or `null` when it could not be read. */
  get(policyId: string): Promise<unknown> {
    const key = canonicalResourceId(policyId);
    let pending = this.entries.get(key);
    if (!pending) {
      pending = this.fetch(policyId);
      this.entries.set(key, pending);
    }
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }

  private async fetch(policyId: string): Promise<unknown> {
    const apiVersion = DATA_PROTECTION_PROVIDER.test(policyId)
      ? this.apiVersions.backupInstances
      : this.apiVersions.backupPolicy;
    const response = await this.getter.get(`${policyId}?api-version=${apiVersion}`);
    return response ? response.body : null;
  }
}
