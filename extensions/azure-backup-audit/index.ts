/**
 * Azure Backup Audit: package entry point.
 *
 * Backup posture, protected-resource coverage and RPO evaluation for Azure
 * Recovery Services and Data Protection vaults.
 */

export * from "./src/index.js";
