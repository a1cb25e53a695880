import type { ConfigValue, FileParser, ParentConfig } from "../types/index.ts";
import { ParserError } from "../util/errors.ts";
import { setOwn } from "../util/dotpath.ts";

function stripQuotes(value: string): string {
  if ((value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
      (value.startsWith("'") && value.endsWith("'") && value.length >= 2)) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Parser for INI files with `[Section]` headers.
 * A key given more than once becomes an array in file order:
 *
 *   [@Bundle]
 *   Plug.exclude = a
 *   Plug.exclude = b   => { "Plug.exclude": ["a", "b"] }
 */
export const iniParser: FileParser = {
  extensions: [".ini"],

  parse(content: string, section?: string): ParentConfig {
    const result: Record<string, ConfigValue> = {};
    let current: string | undefined;

    content.split(/\r?\n/).forEach((line, index) => {
      const trimmed = line.trim();
      if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith(";")) return;

      const header = trimmed.match(/^\[(.*)\]$/);
      if (header) {
        current = header[1].trim();
        return;
      }
      if (current !== section) return;

      const eqIndex = trimmed.indexOf("=");
      if (eqIndex === -1) {
        throw new ParserError(`Line ${index + 1}: expected 'key = value', got '${trimmed}'`);
      }
      const key = trimmed.slice(0, eqIndex).trim();
      if (!key) {
        throw new ParserError(`Line ${index + 1}: missing key before '='`);
      }
      const value = stripQuotes(trimmed.slice(eqIndex + 1).trim());

      const existing = Object.hasOwn(result, key) ? result[key] : undefined;
      if (existing === undefined) setOwn(result, key, value);
      else if (Array.isArray(existing)) existing.push(value);
      else setOwn(result, key, [existing, value]);
    });

    return result;
  },
};
