export { AzureCredentialsManager, createCredentialsManager } from "./manager.js";

export type { CredentialsManagerOptions, CredentialResolutionResult } from "./manager.js";
