/**
 * Azure Backup Audit: Credentials Manager
 *
 * Resolves an Azure TokenCredential via @azure/identity and hands out bearer
 * tokens for the management plane. Token failures are the one error class
 * that aborts a scan.
 */

import type { TokenCredential } from "@azure/identity";
import type { CredentialMethod } from "../config.js";
import { AuthenticationError } from "../errors.js";
import { formatErrorMessage } from "../retry.js";

// =============================================================================
// Types
// =============================================================================

export type CredentialsManagerOptions = {
  credentialMethod?: CredentialMethod;
  tenantId?: string;
  /** Management endpoint whose `/.default` scope tokens are requested for. */
  managementEndpoint?: string;
};

export type CredentialResolutionResult = {
  credential: TokenCredential;
  method: CredentialMethod;
  tenantId?: string;
};

type CachedToken = { token: string; expiresOnTimestamp: number };

/** Refresh tokens this long before they expire. */
const TOKEN_REFRESH_MARGIN_MS = 120_000;

// =============================================================================
// Credentials Manager
// =============================================================================

export class AzureCredentialsManager {
  private options: Required<Omit<CredentialsManagerOptions, "tenantId">> & { tenantId?: string };
  private currentCredential: CredentialResolutionResult | null = null;
  private tokenCache = new Map<string, CachedToken>();

  constructor(options: CredentialsManagerOptions = {}) {
    this.options = {
      credentialMethod: options.credentialMethod ?? "default",
      tenantId: options.tenantId ?? process.env.AZURE_TENANT_ID,
      managementEndpoint: options.managementEndpoint ?? "https://management.azure.com",
    };
  }

  /**
   * Get an Azure TokenCredential, using the configured method.
   */
  async getCredential(): Promise<CredentialResolutionResult> {
    if (this.currentCredential) return this.currentCredential;

    const method = this.options.credentialMethod;
    const credential = await this.createCredential(method);
    this.currentCredential = { credential, method, tenantId: this.options.tenantId };
    return this.currentCredential;
  }

  /**
   * Bearer token for the management plane (or an explicit scope).
   * Throws `AuthenticationError` when no token can be obtained.
   */
  async getAccessToken(scope = `${this.options.managementEndpoint}/.default`): Promise<string> {
    const cached = this.tokenCache.get(scope);
    if (cached && cached.expiresOnTimestamp - TOKEN_REFRESH_MARGIN_MS > Date.now()) {
      return cached.token;
    }

    let accessToken: CachedToken | null;
    try {
      const { credential } = await this.getCredential();
      accessToken = await credential.getToken(scope);
    } catch (error) {
      throw new AuthenticationError(
        `Failed to acquire token for ${scope}: ${formatErrorMessage(error)}`,
        { cause: error },
      );
    }

    if (!accessToken) {
      throw new AuthenticationError(`Credential returned no token for ${scope}`);
    }

    this.tokenCache.set(scope, {
      token: accessToken.token,
      expiresOnTimestamp: accessToken.expiresOnTimestamp,
    });
    return accessToken.token;
  }

  clearCache(): void {
    this.tokenCache.clear();
    this.currentCredential = null;
  }

  /** Loads @azure/identity on first use. */
  private async createCredential(method: CredentialMethod): Promise<TokenCredential> {
    const identity = await import("@azure/identity");

    switch (method) {
      case "cli":
        return new identity.AzureCliCredential({ tenantId: this.options.tenantId });

      case "service-principal": {
        const tenantId = this.options.tenantId;
        const clientId = process.env.AZURE_CLIENT_ID;
        const clientSecret = process.env.AZURE_CLIENT_SECRET;

        if (!tenantId || !clientId || !clientSecret) {
          throw new AuthenticationError(
            "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
          );
        }

        return new identity.ClientSecretCredential(tenantId, clientId, clientSecret);
      }

      case "managed-identity": {
        const clientId = process.env.AZURE_CLIENT_ID;
        return clientId
          ? new identity.ManagedIdentityCredential({ clientId })
          : new identity.ManagedIdentityCredential();
      }

      case "default":
        return new identity.DefaultAzureCredential();
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCredentialsManager(
  options?: CredentialsManagerOptions,
): AzureCredentialsManager {
  return new AzureCredentialsManager(options);
}
