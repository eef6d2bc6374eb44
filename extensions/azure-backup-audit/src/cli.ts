#!/usr/bin/env node
/**
 * `backup-audit` command line.
 *
 *   backup-audit scan --subscriptions <ids> --inventory <file> [--config <file>] [--out <file>]
 *
 * Reads the inventory and optional config as JSON, runs one scan and writes
 * the result rows as JSON to `--out` or stdout.
 */

import { readFile, writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { Command } from "commander";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { AuditLogger, InventoryResource } from "./types.js";
import type { BackupAuditConfig } from "./config.js";
import type { AuditRunInput, AuditRunResult } from "./scanner/types.js";
import { resolveConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createBackupAuditScanner } from "./scanner/scanner.js";
import { formatErrorMessage } from "./retry.js";
import { createConsoleLogger } from "./logger.js";

/** Theme helpers for CLI output. */
const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
  success: (s: string) => `\x1b[32m${s}\x1b[0m`,
} as const;

export const inventorySchema = Type.Array(
  Type.Object({
    id: Type.String({ minLength: 1 }),
    name: Type.String(),
    resourceGroup: Type.String(),
    location: Type.String(),
    powerState: Type.Optional(Type.String()),
    type: Type.Optional(Type.String()),
    subscriptionId: Type.Optional(Type.String()),
  }),
);

export type CliDependencies = {
  readText: (path: string) => Promise<string>;
  writeText: (path: string, text: string) => Promise<void>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  runScan: (config: BackupAuditConfig, input: AuditRunInput, logger: AuditLogger) => Promise<AuditRunResult>;
};

const defaultDependencies: CliDependencies = {
  readText: (path) => readFile(path, "utf8"),
  writeText: (path, text) => writeFile(path, text, "utf8"),
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  runScan: (config, input, logger) => createBackupAuditScanner(config, { logger }).run(input),
};

export function parseSubscriptionList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function parseInventory(text: string): InventoryResource[] {
  const raw: unknown = JSON.parse(text);
  if (!Value.Check(inventorySchema, raw)) {
    const issues = [...Value.Errors(inventorySchema, raw)].map((e) => `inventory${e.path}: ${e.message}`);
    throw new ConfigError(issues);
  }
  return raw;
}

export function buildProgram(deps: Partial<CliDependencies> = {}): Command {
  const io: CliDependencies = { ...defaultDependencies, ...deps };
  const program = new Command("backup-audit").description("Backup cadence and RPO audit for Azure subscriptions");

  program
    .command("scan")
    .description("Scan subscriptions for backup posture, coverage and RPO")
    .requiredOption("--subscriptions <ids>", "Comma-separated subscription ids", parseSubscriptionList)
    .requiredOption("--inventory <file>", "JSON array of inventory resources")
    .option("--config <file>", "JSON config file")
    .option("--out <file>", "Write results here instead of stdout")
    .option("--verbose", "Log debug output")
    .action(async (options: { subscriptions: string[]; inventory: string; config?: string; out?: string; verbose?: boolean }) => {
      try {
        const rawConfig: unknown = options.config ? JSON.parse(await io.readText(options.config)) : {};
        const config = resolveConfig(rawConfig);
        if (options.verbose) config.diagnostics.verbose = true;
        const inventory = parseInventory(await io.readText(options.inventory));
        const logger = createConsoleLogger({ verbose: config.diagnostics.verbose });

        const result = await io.runScan(
          config,
          { subscriptions: options.subscriptions.map((subscriptionId) => ({ subscriptionId })), inventory },
          logger,
        );

        const json = JSON.stringify(result, null, 2);
        if (options.out) {
          await io.writeText(options.out, json);
          io.stderr(theme.success(`Wrote ${result.items.length} item row(s) and ${result.findings.length} finding(s) to ${options.out}`));
        } else {
          io.stdout(json);
        }
      } catch (error) {
        io.stderr(theme.error(`Backup audit failed: ${formatErrorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  return program;
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;
if (invokedDirectly) {
  await buildProgram().parseAsync(process.argv);
}
