import { Command } from "commander";
import { sliceCommand } from "./commands/slice.ts";
import { mergeCommand } from "./commands/merge.ts";
import { keysCommand } from "./commands/keys.ts";
import { log } from "./util/logger.ts";

const program = new Command();

program
  .name("config-slicer")
  .description("Extract embedded plugin configuration from a parent config file")
  .version("0.1.0")
  .option("-v, --verbose", "Print debug output")
  .hook("preAction", (thisCommand) => {
    log.verbose = Boolean(thisCommand.opts().verbose);
  });

/**
 * Helper: report an error and exit non-zero.
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (e) {
      log.error(e instanceof Error ? e.message : String(e));
      process.exit(1);
    }
  };
}

function withPattern(cmd: Command): Command {
  return cmd
    .option("-s, --section <name>", "Section (INI) or top-level object holding the embedded keys")
    .option("--prefix <regexp>", "Pattern matched before the plugin name, e.g. 'plug\\.'")
    .option("--separator <regexp>", "Pattern capturing the plugin name and the attribute");
}

function withPlugin(cmd: Command): Command {
  return withPattern(cmd)
    .requiredOption("-p, --plugin <name>", "Plugin name, e.g. '@Bundle/Plugin'")
    .option("--package <class>", "Plugin class or package name (default: the plugin name)")
    .option("-f, --format <format>", "Output format: json or yaml");
}

withPlugin(
  program
    .command("slice")
    .description("Print the config embedded for one plugin")
    .argument("<file>", "Parent config file (.ini, .json, .yaml, .toml)"),
).action(run(sliceCommand));

withPlugin(
  program
    .command("merge")
    .description("Merge the embedded config for one plugin into a base config")
    .argument("<file>", "Parent config file (.ini, .json, .yaml, .toml)")
    .option("--into <file>", "Base config for the plugin")
    .option("--into-section <name>", "Section of the base config file"),
).action(run(mergeCommand));

withPattern(
  program
    .command("keys")
    .description("Show how the keys of a parent config split into plugin and attribute")
    .argument("<file>", "Parent config file (.ini, .json, .yaml, .toml)"),
).action(run(keysCommand));

program.parseAsync().catch((e: unknown) => {
  log.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
