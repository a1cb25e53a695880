import type { FileParser, ParentConfig } from "../types/index.ts";
import { flatten, selectSection } from "../util/dotpath.ts";
import { ParserError } from "../util/errors.ts";

/**
 * Parser for JSON files with dot-path key support.
 */
export const jsonParser: FileParser = {
  extensions: [".json"],

  parse(content: string, section?: string): ParentConfig {
    let doc: unknown;
    try {
      doc = JSON.parse(content);
    } catch (e) {
      throw new ParserError(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`);
    }
    const obj = selectSection(doc, section);
    return obj ? flatten(obj) : {};
  },
};
