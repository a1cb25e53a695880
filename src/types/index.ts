/** A single value from a flattened config file */
export type ConfigScalar = string | number | boolean;

export type ConfigValue = ConfigScalar | ConfigScalar[];

/**
 * Flat parent configuration, e.g. the body of an INI section:
 * `{ "Other::Plugin.setting": "new value", "Baz.quux[0]": "part 1" }`
 */
export type ParentConfig = Readonly<Record<string, ConfigValue>>;

/** Per-plugin subset of a parent config with array fragments reassembled */
export type Slice = Record<string, ConfigValue>;

/** A plain mapping that sliced values can be merged into */
export type ConfigRecord = Record<string, unknown>;

/**
 * Plugin bundle entry: `[name, class, config]`.
 * The third member is either a plain config mapping or an object to update.
 */
export type PluginTriple = readonly [name: string, className: string, config: object];

/** A live plugin object. Its class name is used as the package identifier. */
export interface PluginInstance {
  readonly pluginName: string;
}

export type PluginSpec = PluginTriple | PluginInstance;

/** Normalized plugin identity */
export interface PluginInfo {
  name: string;
  className: string;
  target: object;
}

/** Result of splitting a raw key with a KeyPattern */
export interface ParsedKey {
  qualifier: string;
  attribute: string;
  /** Raw bracket suffix such as `[0]` or `[]`; only used for sorting */
  subscript?: string;
}

/** Decides whether a key's qualifier belongs to a plugin name or class */
export type NameMatcher = (fragment: string, identifier: string) => boolean;

export interface KeyPatternOptions {
  /** Fragment matched before the qualifier (default: no prefix) */
  prefix?: string | RegExp;
  /** Fragment capturing the qualifier in group 1 and the attribute in group 2 */
  separator?: string;
}

export interface SlicerOptions extends KeyPatternOptions {
  /** The parent configuration containing embedded plugin keys */
  config: ParentConfig;
  matchName?: NameMatcher;
  matchPackage?: NameMatcher;
}

export interface MergeOptions {
  /** Precomputed slice; `slice()` is called when omitted */
  slice?: Slice;
  /** Join a new text value onto an existing one instead of overwriting */
  join?: string;
}

export type FieldShape = "scalar" | "sequence" | "text";

export interface FieldDescriptor {
  shape: FieldShape;
  writable: boolean;
}

/**
 * Field access used when merging into an object rather than a plain mapping.
 * `describeField` returns undefined for fields the target doesn't have.
 */
export interface MergeTarget {
  describeField(name: string): FieldDescriptor | undefined;
  getField(name: string): unknown;
  setField(name: string, value: unknown): void;
}

/** Parser interface for different file formats */
export interface FileParser {
  /** File extensions this parser handles */
  extensions: string[];
  /**
   * Parse a file into a flat parent config.
   * `section` selects one section (INI) or top-level object (JSON/YAML/TOML).
   */
  parse(content: string, section?: string): ParentConfig;
}

/** .config-slicer.yaml settings file schema */
export interface SlicerSettings {
  version: number;
  prefix?: string;
  separator?: string;
  join?: string;
  format?: OutputFormat;
}

export type OutputFormat = "json" | "yaml";
