/**
 * Config manager — load, validate, read and update the mesh YAML config.
 *
 * Updates are validated against the full schema before anything is written,
 * and written atomically (temp file + rename).
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import writeFileAtomic from "write-file-atomic";
import { MeshConfig } from "../schemas/config.js";

/** Environment variable naming the config file. */
export const CONFIG_PATH_ENV = "MESH_CONFIG";
/** Environment variable overriding `dataDir`. */
export const DATA_DIR_ENV = "MESH_DATA_DIR";

export interface ConfigIssue {
  path: string;
  message: string;
}

export interface ConfigChange {
  key: string;
  oldValue: unknown;
  newValue: unknown;
}

type Env = Record<string, string | undefined>;

async function readRaw(configPath: string): Promise<unknown> {
  const content = await readFile(configPath, "utf-8");
  // An empty file parses to null; treat it as an empty config.
  return parseYaml(content) ?? {};
}

function toIssues(error: { issues: Array<{ path: Array<string | number>; message: string }> }): ConfigIssue[] {
  return error.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

/**
 * Load and validate a config file, applying environment overrides.
 * Without a path (and no `MESH_CONFIG`), returns the defaults.
 * Throws with every schema issue listed when the file is invalid.
 */
export async function loadMeshConfig(configPath?: string, env: Env = process.env): Promise<MeshConfig> {
  const path = configPath ?? env[CONFIG_PATH_ENV];
  const raw = path ? await readRaw(path) : {};

  const result = MeshConfig.safeParse(raw);
  if (!result.success) {
    const details = toIssues(result.error).map((i) => `  ${i.path || "(root)"}: ${i.message}`).join("\n");
    throw new Error(`Invalid mesh config${path ? ` at ${path}` : ""}:\n${details}`);
  }

  const dataDir = env[DATA_DIR_ENV];
  return dataDir ? { ...result.data, dataDir } : result.data;
}

/** Validate a config file without applying overrides. */
export async function validateConfig(configPath: string): Promise<{ valid: boolean; issues: ConfigIssue[] }> {
  const result = MeshConfig.safeParse(await readRaw(configPath));
  return result.success ? { valid: true, issues: [] } : { valid: false, issues: toIssues(result.error) };
}

/**
 * Read a value by dot path, e.g. `distributor.maxRequeues` or
 * `devices.gpu-box.performanceScore` (array entries resolve by index or `id`).
 */
export async function getConfigValue(configPath: string, key: string): Promise<unknown> {
  return resolveKeyPath(await readRaw(configPath), key);
}

/**
 * Set a value by dot path. The modified config must pass validation; when it
 * does not, nothing is written and the issues are returned.
 */
export async function setConfigValue(
  configPath: string,
  key: string,
  value: string,
  dryRun: boolean = false,
): Promise<{ change: ConfigChange; issues: ConfigIssue[] }> {
  const raw = await readRaw(configPath);
  if (!isRecord(raw)) {
    return {
      change: { key, oldValue: undefined, newValue: value },
      issues: [{ path: "", message: "Config root must be a mapping" }],
    };
  }

  const oldValue = resolveKeyPath(raw, key);
  const newValue = parseValue(value);
  setKeyPath(raw, key, newValue);

  const result = MeshConfig.safeParse(raw);
  if (!result.success) {
    return { change: { key, oldValue, newValue }, issues: toIssues(result.error) };
  }

  if (!dryRun) {
    await writeFileAtomic(configPath, stringifyYaml(raw, { lineWidth: 120 }), "utf-8");
  }
  return { change: { key, oldValue, newValue }, issues: [] };
}

// --- Helpers ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function findInArray(list: unknown[], part: string): unknown {
  const idx = Number(part);
  if (Number.isInteger(idx) && idx >= 0) return list[idx];
  return list.find((item) => isRecord(item) && item["id"] === part);
}

function resolveKeyPath(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (Array.isArray(current)) current = findInArray(current, part);
    else if (isRecord(current)) current = current[part];
    else return undefined;
  }
  return current;
}

function setKeyPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const last = parts.pop();
  if (last === undefined) return;

  let current: Record<string, unknown> | unknown[] = obj;
  for (const part of parts) {
    let next: unknown;
    if (Array.isArray(current)) {
      next = findInArray(current, part);
      if (!isRecord(next)) {
        // Unknown id: create the entry
        next = { id: part };
        current.push(next);
      }
    } else {
      next = current[part];
      if (!isRecord(next) && !Array.isArray(next)) {
        next = part === "devices" ? [] : {};
        current[part] = next;
      }
    }
    if (!isRecord(next) && !Array.isArray(next)) return;
    current = next;
  }

  if (Array.isArray(current)) {
    const idx = Number(last);
    if (Number.isInteger(idx) && idx >= 0) current[idx] = value;
  } else {
    current[last] = value;
  }
}

/** Parse a CLI string into the appropriate scalar type. */
function parseValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}
