import type { KeyPatternOptions, ParsedKey } from "../types/index.ts";

/** Plugin name and attribute split on the first dot: `Module::Name.attribute` */
export const DEFAULT_SEPARATOR = "(.+?)\\.(.+?)";

/**
 * Compiles `prefix + separator + optional [subscript]` into one anchored regexp.
 *
 * Examples with the default separator:
 *   "Module::Name.attribute"  => Module::Name / attribute
 *   "Class::Name.attr.ibute"  => Class::Name / attr.ibute
 *   "-Plugin.attr[0]"         => -Plugin / attr / [0]
 *
 * The prefix is spliced in verbatim. Capture groups inside a custom prefix
 * shift the qualifier and attribute groups, so a prefix should use `(?:...)`.
 */
export class KeyPattern {
  readonly prefix: string;
  readonly separator: string;
  readonly regexp: RegExp;

  constructor(options: KeyPatternOptions = {}) {
    const { prefix = "", separator = DEFAULT_SEPARATOR } = options;
    this.prefix = typeof prefix === "string" ? prefix : prefix.source;
    this.separator = separator;
    this.regexp = new RegExp(`^${this.prefix}${this.separator}(\\[.*?\\])?$`);
  }

  /**
   * Split a raw config key. Returns null when the key doesn't follow the
   * pattern, which callers treat as an unrelated key.
   */
  parse(key: string): ParsedKey | null {
    const match = this.regexp.exec(key);
    if (!match) return null;
    const [, qualifier, attribute, subscript] = match;
    if (qualifier === undefined || attribute === undefined) return null;
    return subscript === undefined ? { qualifier, attribute } : { qualifier, attribute, subscript };
  }
}
