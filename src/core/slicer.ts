import type {
  ConfigRecord,
  ConfigValue,
  MergeOptions,
  MergeTarget,
  NameMatcher,
  ParentConfig,
  PluginInfo,
  PluginSpec,
  Slice,
  SlicerOptions,
} from "../types/index.ts";
import { AttributeNotFoundError } from "../util/errors.ts";
import { setOwn } from "../util/dotpath.ts";
import { KeyPattern } from "./key-pattern.ts";
import { defaultMatchName, defaultMatchPackage } from "./matcher.ts";
import { pluginInfo } from "./plugin-info.ts";
import { isMergeTarget, toTarget } from "./target.ts";

function isPlainRecord(value: object): value is ConfigRecord {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Weak truthiness for previous values: "", "0", 0, NaN, false, null and
 * undefined count as unset. An empty array is still a value.
 */
export function isSet(value: unknown): boolean {
  if (value === "0") return false;
  return Boolean(value);
}

/**
 * Store `value` under `key`, building an array when `forceArray` is set, when
 * the existing value is an array or when the new value is one. A previous
 * scalar becomes the first element. Otherwise the value is overwritten.
 */
export function updateHash(hash: ConfigRecord, key: string, value: unknown, forceArray = false): void {
  const existing = Object.hasOwn(hash, key) ? hash[key] : undefined;

  if (forceArray || Array.isArray(existing) || Array.isArray(value)) {
    let list: unknown[];
    if (Array.isArray(existing)) list = existing;
    else if (Object.hasOwn(hash, key)) list = [existing];
    else list = [];

    if (Array.isArray(value)) list.push(...value);
    else list.push(value);
    setOwn(hash, key, list);
    return;
  }

  setOwn(hash, key, value);
}

/**
 * Extract embedded plugin config from a parent config.
 *
 *   [@MyBundle]
 *   bundle_option = value
 *   Other::Plugin.setting = new value
 *   Baz.quux[0] = part 1
 *   Baz.quux[1] = part 2
 *
 * The bundle hands its section to a Slicer and merges the slice for each
 * plugin it loads.
 */
export class Slicer {
  readonly config: ParentConfig;
  readonly keyPattern: KeyPattern;
  private readonly nameMatcher: NameMatcher;
  private readonly packageMatcher: NameMatcher;

  constructor(options: SlicerOptions) {
    this.config = options.config;
    this.keyPattern = new KeyPattern({ prefix: options.prefix, separator: options.separator });
    this.nameMatcher = options.matchName ?? defaultMatchName;
    this.packageMatcher = options.matchPackage ?? defaultMatchPackage;
  }

  get prefix(): string {
    return this.keyPattern.prefix;
  }

  get separator(): string {
    return this.keyPattern.separator;
  }

  /** Combined prefix, separator and trailing `[subscript]` */
  get separatorRegExp(): RegExp {
    return this.keyPattern.regexp;
  }

  matchName(fragment: string, name: string): boolean {
    return this.nameMatcher(fragment, name);
  }

  matchPackage(fragment: string, className: string): boolean {
    return this.packageMatcher(fragment, className);
  }

  pluginInfo(plugin: PluginSpec): PluginInfo {
    return pluginInfo(plugin);
  }

  /**
   * Config for one plugin, with the qualifier stripped from each key.
   *
   *   { "APlug.attr1": "value1", "APlug.second": "2nd", "OtherPlug.attr": "0" }
   *   => slice(["APlug", "Full::Package::APlug", {}])
   *   => { attr1: "value1", second: "2nd" }
   *
   * Keys are visited in string order, so `season[1.10]` lands before
   * `season[1.9]`. Subscripts only order fragments; they are not indexes.
   * The order is by UTF-16 code unit, so characters above U+FFFF can sort
   * differently from code-point order.
   */
  slice(plugin: PluginSpec): Slice {
    const { name, className } = this.pluginInfo(plugin);
    const slice: Slice = {};

    for (const key of Object.keys(this.config).sort()) {
      const parsed = this.keyPattern.parse(key);
      if (!parsed) continue;

      const { qualifier, attribute, subscript } = parsed;
      if (!this.matchName(qualifier, name) && !this.matchPackage(qualifier, className)) continue;

      updateHash(slice, attribute, this.config[key], subscript !== undefined);
    }
    return slice;
  }

  /**
   * Merge the plugin's slice into its config.
   *
   * Bundle entries have their config mapping updated; plugin objects have
   * their fields set. Arrays are appended to, scalars overwritten. A field
   * missing from an object aborts the merge with AttributeNotFoundError;
   * fields already updated keep their new values.
   *
   * Returns the plugin that was passed in.
   */
  merge<T extends PluginSpec>(plugin: T, options: MergeOptions = {}): T {
    const slice = options.slice ?? this.slice(plugin);
    const info = this.pluginInfo(plugin);

    if (!isMergeTarget(info.target) && isPlainRecord(info.target)) {
      for (const [key, value] of Object.entries(slice)) {
        updateHash(info.target, key, value);
      }
      return plugin;
    }

    const target = toTarget(info.target);
    for (const [key, value] of Object.entries(slice)) {
      this.mergeField(target, info, key, value, options.join);
    }
    return plugin;
  }

  private mergeField(
    target: MergeTarget,
    info: PluginInfo,
    key: string,
    value: ConfigValue,
    join: string | undefined,
  ): void {
    const field = target.describeField(key);
    if (!field || !field.writable) {
      throw new AttributeNotFoundError(info.name, info.className, key);
    }

    const previous = target.getField(key);
    if (!isSet(previous)) {
      if (Array.isArray(value)) target.setField(key, [...value]);
      else target.setField(key, field.shape === "sequence" ? [value] : value);
      return;
    }

    if (Array.isArray(previous)) {
      if (Array.isArray(value)) previous.push(...value);
      else previous.push(value);
      target.setField(key, previous);
    } else if (Array.isArray(value)) {
      target.setField(key, [previous, ...value]);
    } else if (field.shape === "text" && join) {
      target.setField(key, [previous, value].join(join));
    } else {
      target.setField(key, value);
    }
  }
}
