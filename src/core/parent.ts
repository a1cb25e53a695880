import { resolve } from "node:path";
import { readFile } from "node:fs/promises";
import type { ParentConfig } from "../types/index.ts";
import { getParser } from "../parsers/index.ts";
import { ParserError } from "../util/errors.ts";

/**
 * Read a config file and flatten it (or one of its sections) into a parent config.
 */
export async function loadParentConfig(file: string, section?: string): Promise<ParentConfig> {
  const path = resolve(file);
  const parser = getParser(path);
  if (!parser) {
    throw new ParserError(`No parser for ${path} (expected .ini, .json, .yaml, .yml or .toml)`);
  }
  const content = await readFile(path, "utf-8");
  return parser.parse(content, section);
}
