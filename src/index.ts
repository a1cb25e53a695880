export { Slicer, updateHash, isSet } from "./core/slicer.ts";
export { KeyPattern, DEFAULT_SEPARATOR } from "./core/key-pattern.ts";
export { defaultMatchName, defaultMatchPackage, escapeRegExp } from "./core/matcher.ts";
export { pluginInfo, isPluginTriple, isPluginInstance } from "./core/plugin-info.ts";
export { reflectTarget, toTarget, isMergeTarget, inferShape, type FieldShapes } from "./core/target.ts";
export { loadParentConfig } from "./core/parent.ts";
export { getParser, iniParser, jsonParser, yamlParser, tomlParser } from "./parsers/index.ts";
export {
  SlicerError,
  UnrecognizedPluginSpecError,
  AttributeNotFoundError,
  ConfigError,
  ParserError,
} from "./util/errors.ts";
export type * from "./types/index.ts";
