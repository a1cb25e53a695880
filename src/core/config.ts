import { resolve } from "node:path";
import { readFile, access } from "node:fs/promises";
import YAML from "yaml";
import type { OutputFormat, SlicerSettings } from "../types/index.ts";
import { ConfigError } from "../util/errors.ts";

const SETTINGS_FILENAME = ".config-slicer.yaml";

export const DEFAULT_SETTINGS: SlicerSettings = { version: 1 };

export function settingsPath(dir: string): string {
  return resolve(dir, SETTINGS_FILENAME);
}

/**
 * Read .config-slicer.yaml from `dir`. A missing file means default settings.
 */
export async function readSettings(dir: string): Promise<SlicerSettings> {
  const path = settingsPath(dir);
  const exists = await access(path).then(() => true, () => false);
  if (!exists) return { ...DEFAULT_SETTINGS };

  const text = await readFile(path, "utf-8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (e) {
    throw new ConfigError(`Invalid ${SETTINGS_FILENAME}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return validateSettings(parsed);
}

function optionalString(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid ${SETTINGS_FILENAME}: '${key}' must be a string`);
  }
  return value;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === "json" || value === "yaml";
}

/**
 * Check that a separator compiles and captures the qualifier and the attribute.
 */
export function validateSeparator(separator: string): void {
  let captures: number;
  try {
    // An alternation with the empty pattern always matches, exposing the group count.
    const match = new RegExp(`${separator}|`).exec("");
    captures = match ? match.length - 1 : 0;
  } catch (e) {
    throw new ConfigError(`Invalid separator '${separator}': ${e instanceof Error ? e.message : String(e)}`);
  }
  if (captures < 2) {
    throw new ConfigError(`Invalid separator '${separator}': needs two capture groups, found ${captures}`);
  }
}

/**
 * Validate parsed settings object.
 */
export function validateSettings(obj: unknown): SlicerSettings {
  if (obj === null || obj === undefined) return { ...DEFAULT_SETTINGS };
  if (typeof obj !== "object" || Array.isArray(obj)) {
    throw new ConfigError(`Invalid ${SETTINGS_FILENAME}: not an object`);
  }
  const settings = obj as Record<string, unknown>;

  if (settings.version !== undefined && settings.version !== 1) {
    throw new ConfigError(`Unsupported ${SETTINGS_FILENAME} version: ${String(settings.version)}`);
  }

  const prefix = optionalString(settings, "prefix");
  const separator = optionalString(settings, "separator");
  const join = optionalString(settings, "join");
  const format = optionalString(settings, "format");

  if (separator !== undefined) validateSeparator(separator);
  if (format !== undefined && !isOutputFormat(format)) {
    throw new ConfigError(`Invalid ${SETTINGS_FILENAME}: 'format' must be json or yaml`);
  }

  return {
    version: 1,
    ...(prefix !== undefined ? { prefix } : {}),
    ...(separator !== undefined ? { separator } : {}),
    ...(join !== undefined ? { join } : {}),
    ...(format !== undefined ? { format } : {}),
  };
}
