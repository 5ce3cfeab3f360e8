// Config loader: reads ~/.config/package-snapshot/config.yaml (or
// $PACKAGE_SNAPSHOT_CONFIG) and deep-merges it over DEFAULT_CONFIG, so a file
// only needs the keys it changes. Nothing is written when the file is absent.
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { DEFAULT_CONFIG, SnapshotConfigSchema, type SnapshotConfig } from "./schema.js";
import { SnapshotError, SnapshotErrorCode, describeError } from "../shared/errors.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "package-snapshot", "config.yaml");

export interface ConfigResult {
  config: SnapshotConfig;
  configPath: string;
  /** False when defaults were used because no file exists. */
  fromFile: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  // fs errors can come from another realm, where instanceof Error is false.
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

/** Validate a parsed YAML document against the schema, merged over defaults. */
export function resolveConfig(document: unknown, configPath: string): SnapshotConfig {
  let overrides: Record<string, unknown> = {};
  if (isPlainObject(document)) {
    overrides = document;
  } else if (document !== null && document !== undefined) {
    throw new SnapshotError(SnapshotErrorCode.INVALID_CONFIG, `Config ${configPath} must be a mapping`, { configPath });
  }
  const merged = deepMerge(DEFAULT_CONFIG, overrides);
  const parsed = SnapshotConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new SnapshotError(SnapshotErrorCode.INVALID_CONFIG, `Invalid config ${configPath}: ${issues.join("; ")}`, {
      configPath,
      issues,
    });
  }
  return parsed.data;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env.PACKAGE_SNAPSHOT_CONFIG ?? DEFAULT_CONFIG_PATH;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    if (isMissingFile(err) && explicitPath === undefined) {
      logger.debug({ configPath }, "No config file found, using defaults");
      return { config: DEFAULT_CONFIG, configPath, fromFile: false };
    }
    throw new SnapshotError(SnapshotErrorCode.INVALID_CONFIG, `Cannot read config ${configPath}: ${describeError(err)}`, {
      configPath,
    });
  }

  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    throw new SnapshotError(SnapshotErrorCode.INVALID_CONFIG, `Cannot parse config ${configPath}: ${describeError(err)}`, {
      configPath,
    });
  }

  const config = resolveConfig(document, configPath);
  logger.debug({ configPath }, "Config loaded");
  return { config, configPath, fromFile: true };
}
