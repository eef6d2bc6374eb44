/**
 * Vault inventory types.
 */

import type { TokenCredential } from "@azure/identity";

/** Anything that hands out the SDK credential; usually `AzureCredentialsManager`. */
export interface CredentialSource {
  getCredential(): Promise<{ credential: TokenCredential }>;
}
