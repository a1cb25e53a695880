import type { ConfigScalar, ConfigValue } from "../types/index.ts";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !(value instanceof Date);
}

function toScalar(value: unknown): ConfigScalar {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (value instanceof Date) return value.toISOString();
  if (value !== null && typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/** Store `value` as an own data property, so a `__proto__` key is kept as a key. */
export function setOwn(record: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(record, key, { value, writable: true, enumerable: true, configurable: true });
}

/**
 * Flatten a nested object into dot-path keys.
 * e.g. { Plug: { attr: 1, list: ["a", "b"] } } => { "Plug.attr": 1, "Plug.list": ["a", "b"] }
 * Arrays are kept as values; their elements are not flattened further.
 */
export function flatten(obj: Record<string, unknown>, prefix = ""): Record<string, ConfigValue> {
  const result: Record<string, ConfigValue> = {};
  for (const [key, value] of Object.entries(obj)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value)) {
      for (const [nested, flat] of Object.entries(flatten(value, path))) setOwn(result, nested, flat);
    } else if (Array.isArray(value)) {
      setOwn(result, path, value.map(toScalar));
    } else {
      setOwn(result, path, toScalar(value));
    }
  }
  return result;
}

/**
 * Pick a top-level object to flatten. Without a section the whole document is used.
 * Returns undefined when the section is missing or not an object.
 */
export function selectSection(doc: unknown, section?: string): Record<string, unknown> | undefined {
  if (!isRecord(doc)) return undefined;
  if (section === undefined) return doc;
  const selected = Object.hasOwn(doc, section) ? doc[section] : undefined;
  return isRecord(selected) ? selected : undefined;
}
