export { AzureVaultInventory, toVaultRef } from "./manager.js";
export type { VaultInventoryOptions } from "./manager.js";
export { PolicyCache } from "./policies.js";
export type { CredentialSource } from "./types.js";
