/**
 * Configuration commands: validate, show, get, set.
 */

import type { Command } from "commander";
import { stringify as stringifyYaml } from "yaml";
import {
  CONFIG_PATH_ENV,
  getConfigValue,
  loadMeshConfig,
  setConfigValue,
  validateConfig,
} from "../../config/manager.js";
import { errorMessage } from "../../events/console.js";

/** The config file named by `--config`, falling back to `MESH_CONFIG`. */
export function configPathOf(program: Command): string | undefined {
  return program.opts<{ config?: string }>().config ?? process.env[CONFIG_PATH_ENV];
}

function requireConfigPath(program: Command): string | undefined {
  const path = configPathOf(program);
  if (!path) {
    console.error(`No config file given (use --config or ${CONFIG_PATH_ENV})`);
    process.exitCode = 1;
  }
  return path;
}

function formatValue(value: unknown): string {
  return typeof value === "object" && value !== null ? JSON.stringify(value, null, 2) : String(value);
}

/**
 * Register configuration management commands.
 */
export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Configuration management");

  config
    .command("validate")
    .description("Validate the config file against the schema")
    .action(async () => {
      const path = requireConfigPath(program);
      if (!path) return;

      const result = await validateConfig(path);
      if (result.valid) {
        console.log(`✅ ${path} is valid`);
        return;
      }
      console.log(`❌ ${path} has ${result.issues.length} issue(s):`);
      for (const issue of result.issues) {
        console.log(`  ${issue.path || "(root)"}: ${issue.message}`);
      }
      process.exitCode = 1;
    });

  config
    .command("show")
    .description("Print the effective config (defaults and overrides applied)")
    .action(async () => {
      try {
        const effective = await loadMeshConfig(configPathOf(program));
        console.log(stringifyYaml(effective, { lineWidth: 120 }).trimEnd());
      } catch (err) {
        console.error(errorMessage(err));
        process.exitCode = 1;
      }
    });

  config
    .command("get <key>")
    .description("Get config value (dot-notation)")
    .action(async (key: string) => {
      const path = requireConfigPath(program);
      if (!path) return;

      const value = await getConfigValue(path, key);
      if (value === undefined) {
        console.log(`Key '${key}' not found`);
        process.exitCode = 1;
      } else {
        console.log(formatValue(value));
      }
    });

  config
    .command("set <key> <value>")
    .description("Set config value (validates + atomic write)")
    .option("--dry-run", "Preview change without applying", false)
    .action(async (key: string, value: string, opts: { dryRun: boolean }) => {
      const path = requireConfigPath(program);
      if (!path) return;

      const result = await setConfigValue(path, key, value, opts.dryRun);
      if (result.issues.length > 0) {
        console.log("❌ Config change rejected:");
      } else if (opts.dryRun) {
        console.log(`[DRY RUN] Would update ${key}:`);
      } else {
        console.log(`✅ Config updated: ${key}`);
      }

      console.log(`  Old: ${formatValue(result.change.oldValue)}`);
      console.log(`  New: ${formatValue(result.change.newValue)}`);

      if (result.issues.length > 0) {
        console.log("\nIssues:");
        for (const issue of result.issues) {
          console.log(`  ${issue.path || "(root)"}: ${issue.message}`);
        }
        process.exitCode = 1;
      }
    });
}
