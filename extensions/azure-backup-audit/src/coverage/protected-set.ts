/**
 * Run-scoped set of protected resource ids.
 *
 * Keys are compared case-insensitively. The first method recorded for an id
 * is kept; later additions of the same id are ignored.
 */

import type { ProtectionMethod } from "./types.js";
import { canonicalResourceId } from "./resource-id.js";

export type ProtectedIdEntry = {
  resourceId: string;
  method: ProtectionMethod;
  /** Vault or server that protects the resource. */
  protectedBy: string | null;
};

export class ProtectedIdSet {
  private readonly entries = new Map<string, ProtectedIdEntry>();

  /** Returns true when the id was not in the set yet. */
  add(resourceId: string, method: ProtectionMethod, protectedBy: string | null = null): boolean {
    const key = canonicalResourceId(resourceId);
    if (!key || this.entries.has(key)) return false;
    this.entries.set(key, { resourceId: key, method, protectedBy });
    return true;
  }

  has(resourceId: string): boolean {
    return this.entries.has(canonicalResourceId(resourceId));
  }

  get(resourceId: string): ProtectedIdEntry | null {
    return this.entries.get(canonicalResourceId(resourceId)) ?? null;
  }

  methodOf(resourceId: string): ProtectionMethod | null {
    return this.get(resourceId)?.method ?? null;
  }

  get size(): number {
    return this.entries.size;
  }

  values(): ProtectedIdEntry[] {
    return [...this.entries.values()];
  }
}
