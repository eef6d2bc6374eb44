/**
 * Scanner types.
 */

import type { AuditSubscription, InventoryResource } from "../types.js";
import type { VaultPosture } from "../posture/types.js";
import type { CoverageRecord, Finding, FindingSummary, ProtectedItemRow } from "../coverage/types.js";
import type { ProtectedIdSet } from "../coverage/protected-set.js";
import type { PolicyCache } from "../vaults/policies.js";

export type AuditRunInput = {
  subscriptions: readonly AuditSubscription[];
  /** Full resource inventory (VMs, managed databases) for those subscriptions. */
  inventory: readonly InventoryResource[];
};

/** Run-scoped state threaded through the scan; nothing is module-level. */
export type RunContext = {
  protectedIds: ProtectedIdSet;
  findings: Finding[];
  policies: PolicyCache;
  /** Fixed reference time for every elapsed-time computation in the run. */
  now: Date;
};

export type AuditRunResult = {
  startedAt: Date;
  completedAt: Date;
  vaults: VaultPosture[];
  items: ProtectedItemRow[];
  coverage: CoverageRecord[];
  findings: Finding[];
  summary: FindingSummary;
};
