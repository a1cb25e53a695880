import { extname } from "node:path";
import type { FileParser } from "../types/index.ts";
import { iniParser } from "./ini.ts";
import { jsonParser } from "./json.ts";
import { yamlParser } from "./yaml.ts";
import { tomlParser } from "./toml.ts";

const parsers: FileParser[] = [iniParser, jsonParser, yamlParser, tomlParser];

/**
 * Get the appropriate parser for a file path based on extension.
 */
export function getParser(filePath: string): FileParser | null {
  const ext = extname(filePath).toLowerCase();
  return parsers.find((p) => p.extensions.includes(ext)) ?? null;
}

export { iniParser, jsonParser, yamlParser, tomlParser };
