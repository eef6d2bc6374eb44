/**
 * Azure Backup Audit: Pagination Walkers
 *
 * ARM list endpoints page in one of two ways: a continuation token returned
 * in a response header, or a `nextLink` URL in the body. Both walkers return
 * the items of every page in order. A page that cannot be read ends the walk;
 * items gathered so far are kept and `complete` is false.
 */

import type { RestGetter } from "./http/types.js";
import { getField, readArray, readString } from "./shape.js";

export type PagedWalkResult = {
  items: unknown[];
  /** Number of GETs issued. */
  pages: number;
  /** False when a page failed or `maxPages` cut the walk short. */
  complete: boolean;
};

export type TokenWalkOptions = {
  /** Response header carrying the continuation value (matched case-insensitively). */
  headerName?: string;
  /** Query parameter the continuation value is sent back in. */
  queryParam?: string;
  /** Body field holding the page's items. */
  itemsKey?: string;
  /** Stop once the accumulated items are enough for the caller. */
  isSufficient?: (items: readonly unknown[]) => boolean;
  maxPages?: number;
};

export type LinkWalkOptions = {
  itemsKey?: string;
  isSufficient?: (items: readonly unknown[]) => boolean;
  maxPages?: number;
};

const DEFAULT_MAX_PAGES = 100;

/** Look a header up by name regardless of its casing. */
export function findHeader(headers: Record<string, string>, name: string): string | null {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return value.length > 0 ? value : null;
  }
  return null;
}

/** Append a query parameter, respecting an existing query string. */
export function withQueryParam(url: string, name: string, value: string): string {
  const separator = url.includes("?") ? "&" : "?";
  return `${url}${separator}${encodeURIComponent(name)}=${encodeURIComponent(value)}`;
}

function pageItems(body: unknown, itemsKey: string): unknown[] {
  return readArray(getField(body, itemsKey)) ?? [];
}

/**
 * Follow continuation tokens read from a response header.
 */
export async function walkContinuationToken(
  getter: RestGetter,
  url: string,
  options?: TokenWalkOptions,
): Promise<PagedWalkResult> {
  const headerName = options?.headerName ?? "x-ms-continuation";
  const queryParam = options?.queryParam ?? "$skiptoken";
  const itemsKey = options?.itemsKey ?? "value";
  const maxPages = options?.maxPages ?? DEFAULT_MAX_PAGES;

  const items: unknown[] = [];
  let pages = 0;
  let target = url;

  while (pages < maxPages) {
    const response = await getter.get(target);
    pages++;
    if (!response) return { items, pages, complete: false };

    items.push(...pageItems(response.body, itemsKey));

    const token = findHeader(response.headers, headerName);
    if (!token) return { items, pages, complete: true };
    if (options?.isSufficient?.(items)) return { items, pages, complete: true };

    target = withQueryParam(url, queryParam, token);
  }

  return { items, pages, complete: false };
}

/**
 * Follow the body's `nextLink` until it is absent.
 */
export async function walkNextLink(
  getter: RestGetter,
  url: string,
  options?: LinkWalkOptions,
): Promise<PagedWalkResult> {
  const itemsKey = options?.itemsKey ?? "value";
  const maxPages = options?.maxPages ?? DEFAULT_MAX_PAGES;

  const items: unknown[] = [];
  let pages = 0;
  let target: string | null = url;

  while (target && pages < maxPages) {
    const response = await getter.get(target);
    pages++;
    if (!response) return { items, pages, complete: false };

    items.push(...pageItems(response.body, itemsKey));

    target = readString(getField(response.body, "nextLink"));
    if (target && options?.isSufficient?.(items)) return { items, pages, complete: true };
  }

  return { items, pages, complete: target === null };
}
