import YAML from "yaml";
import type { FileParser, ParentConfig } from "../types/index.ts";
import { flatten, selectSection } from "../util/dotpath.ts";
import { ParserError } from "../util/errors.ts";

/**
 * Parser for YAML files with dot-path key support.
 */
export const yamlParser: FileParser = {
  extensions: [".yaml", ".yml"],

  parse(content: string, section?: string): ParentConfig {
    const doc = YAML.parseDocument(content);
    if (doc.errors.length > 0) {
      throw new ParserError(`Invalid YAML: ${doc.errors[0].message}`);
    }
    const obj = selectSection(doc.toJS(), section);
    return obj ? flatten(obj) : {};
  },
};
