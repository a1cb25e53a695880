import chalk from "chalk";
import { readSettings } from "../core/config.ts";
import { KeyPattern } from "../core/key-pattern.ts";
import { loadParentConfig } from "../core/parent.ts";
import { log } from "../util/logger.ts";
import type { PatternCliOptions } from "./options.ts";
import { patternOptions } from "./options.ts";

/**
 * Show how each key of `file` splits into qualifier, attribute and subscript.
 */
export async function keysCommand(file: string, opts: PatternCliOptions): Promise<void> {
  const settings = await readSettings(process.cwd());
  const config = await loadParentConfig(file, opts.section);
  const pattern = new KeyPattern(patternOptions(opts, settings));

  const keys = Object.keys(config).sort();
  if (keys.length === 0) {
    log.warn(`No keys found in ${file}`);
    return;
  }

  const unmatched: string[] = [];

  console.log();
  console.log(chalk.bold("Embedded Keys"));
  console.log(chalk.dim("─".repeat(80)));
  console.log(chalk.dim(padRight("Qualifier", 32) + padRight("Attribute", 32) + "Subscript"));
  console.log(chalk.dim("─".repeat(80)));

  for (const key of keys) {
    const parsed = pattern.parse(key);
    if (!parsed) {
      unmatched.push(key);
      continue;
    }
    console.log(
      padRight(parsed.qualifier, 32) +
      padRight(parsed.attribute, 32) +
      (parsed.subscript ?? "-"),
    );
  }

  console.log(chalk.dim("─".repeat(80)));
  console.log(`${keys.length - unmatched.length} embedded, ${unmatched.length} other`);
  for (const key of unmatched) {
    log.dim(`  ${key}`);
  }
  console.log();
}

function padRight(str: string, len: number): string {
  return str.length >= len ? str.slice(0, len - 1) + " " : str + " ".repeat(len - str.length);
}
