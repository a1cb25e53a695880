import type { ConfigRecord, PluginTriple } from "../types/index.ts";
import { readSettings } from "../core/config.ts";
import { loadParentConfig } from "../core/parent.ts";
import { Slicer } from "../core/slicer.ts";
import { log, output } from "../util/logger.ts";
import { formatOutput, outputFormat, patternOptions, type PluginCliOptions } from "./options.ts";

export interface MergeCliOptions extends PluginCliOptions {
  /** Base config for the plugin; its keys are used as is */
  into?: string;
  intoSection?: string;
}

/**
 * Merge a plugin's slice of `file` into a base config and print the result.
 */
export async function mergeCommand(file: string, opts: MergeCliOptions): Promise<void> {
  const settings = await readSettings(process.cwd());
  const format = outputFormat(opts, settings);
  const config = await loadParentConfig(file, opts.section);

  const base: ConfigRecord = opts.into ? { ...(await loadParentConfig(opts.into, opts.intoSection)) } : {};
  const slicer = new Slicer({ config, ...patternOptions(opts, settings) });

  const plugin: PluginTriple = [opts.plugin, opts.package ?? opts.plugin, base];
  const slice = slicer.slice(plugin);
  log.debug(`merging ${Object.keys(slice).join(", ") || "nothing"} into ${opts.plugin}`);

  slicer.merge(plugin, { slice, join: settings.join });
  output(formatOutput(base, format));
}
