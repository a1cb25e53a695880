import type { PluginTriple } from "../types/index.ts";
import { readSettings } from "../core/config.ts";
import { loadParentConfig } from "../core/parent.ts";
import { Slicer } from "../core/slicer.ts";
import { log, output } from "../util/logger.ts";
import { formatOutput, outputFormat, patternOptions, type PluginCliOptions } from "./options.ts";

/**
 * Print the slice of `file` that belongs to one plugin.
 */
export async function sliceCommand(file: string, opts: PluginCliOptions): Promise<void> {
  const settings = await readSettings(process.cwd());
  const format = outputFormat(opts, settings);
  const config = await loadParentConfig(file, opts.section);

  const slicer = new Slicer({ config, ...patternOptions(opts, settings) });
  log.debug(`pattern: ${slicer.separatorRegExp.source}`);

  const plugin: PluginTriple = [opts.plugin, opts.package ?? opts.plugin, {}];
  const slice = slicer.slice(plugin);

  const count = Object.keys(slice).length;
  if (count === 0) {
    log.warn(`No keys for ${opts.plugin} in ${file}`);
  } else {
    log.debug(`${count} attribute(s) for ${opts.plugin}`);
  }
  output(formatOutput(slice, format));
}
