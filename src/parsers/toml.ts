import * as TOML from "smol-toml";
import type { FileParser, ParentConfig } from "../types/index.ts";
import { flatten, selectSection } from "../util/dotpath.ts";
import { ParserError } from "../util/errors.ts";

/**
 * Parser for TOML files with dot-path key support.
 * Quoted keys keep their dots: `"Plug.attr" = 1` stays a single key.
 */
export const tomlParser: FileParser = {
  extensions: [".toml"],

  parse(content: string, section?: string): ParentConfig {
    let doc: unknown;
    try {
      doc = TOML.parse(content);
    } catch (e) {
      throw new ParserError(`Invalid TOML: ${e instanceof Error ? e.message : String(e)}`);
    }
    const obj = selectSection(doc, section);
    return obj ? flatten(obj) : {};
  },
};
