import YAML from "yaml";
import type { OutputFormat, SlicerOptions, SlicerSettings } from "../types/index.ts";
import { validateSeparator } from "../core/config.ts";
import { ConfigError } from "../util/errors.ts";

/** Options shared by the slice, merge and keys commands */
export interface PatternCliOptions {
  section?: string;
  prefix?: string;
  separator?: string;
}

export interface PluginCliOptions extends PatternCliOptions {
  plugin: string;
  package?: string;
  format?: string;
}

/**
 * Combine command-line flags with .config-slicer.yaml; flags win.
 */
export function patternOptions(
  opts: PatternCliOptions,
  settings: SlicerSettings,
): Pick<SlicerOptions, "prefix" | "separator"> {
  const separator = opts.separator ?? settings.separator;
  if (separator !== undefined) validateSeparator(separator);
  return {
    prefix: opts.prefix ?? settings.prefix,
    separator,
  };
}

export function outputFormat(opts: { format?: string }, settings: SlicerSettings): OutputFormat {
  const format = opts.format ?? settings.format ?? "json";
  if (format !== "json" && format !== "yaml") {
    throw new ConfigError(`Unknown output format '${format}' (expected json or yaml)`);
  }
  return format;
}

export function formatOutput(value: unknown, format: OutputFormat): string {
  return format === "yaml" ? YAML.stringify(value, { indent: 2 }) : JSON.stringify(value, null, 2);
}
