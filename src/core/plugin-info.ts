import type { PluginInfo, PluginInstance, PluginTriple } from "../types/index.ts";
import { UnrecognizedPluginSpecError } from "../util/errors.ts";

export function isPluginTriple(value: unknown): value is PluginTriple {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    typeof value[0] === "string" &&
    typeof value[1] === "string" &&
    typeof value[2] === "object" &&
    value[2] !== null
  );
}

export function isPluginInstance(value: unknown): value is PluginInstance {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "pluginName" in value &&
    typeof value.pluginName === "string"
  );
}

/**
 * Normalize a plugin into `{ name, className, target }`.
 *
 * - Bundle entries `["Name", "Package::Name", {...}]` are taken as they are.
 * - Instances exposing `pluginName` use their constructor name as the class
 *   and are themselves the merge target.
 */
export function pluginInfo(spec: unknown): PluginInfo {
  if (isPluginTriple(spec)) {
    const [name, className, target] = spec;
    return { name, className, target };
  }
  if (isPluginInstance(spec)) {
    return { name: spec.pluginName, className: spec.constructor.name, target: spec };
  }
  throw new UnrecognizedPluginSpecError(spec);
}
