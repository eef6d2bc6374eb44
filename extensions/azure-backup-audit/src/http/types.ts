/**
 * REST client types.
 */

export type RestResponse = {
  status: number;
  body: unknown;
  /** Response headers with lower-cased names. */
  headers: Record<string, string>;
};

/**
 * Anything that can perform an authenticated GET. `null` means the target
 * could not be read (terminal status or retries exhausted); callers treat it
 * as "unknown", never as empty.
 */
export interface RestGetter {
  get(target: string): Promise<RestResponse | null>;
}

export interface TokenProvider {
  getAccessToken(): Promise<string>;
}
