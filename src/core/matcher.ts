import type { NameMatcher } from "../types/index.ts";

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

/**
 * True when the plugin name equals the key fragment, ignoring any leading
 * "@Bundle/" prefixes on the plugin name.
 *
 *   defaultMatchName("Foo", "Foo")                // true
 *   defaultMatchName("Foo", "@Bar/Foo")           // true
 *   defaultMatchName("@Bar/Foo", "Foo")           // false
 *   defaultMatchName("@Bar/Foo", "@Baz/@Bar/Foo") // true
 *   defaultMatchName("@Bar/Foo", "@Baz/Foo")      // false
 *
 * A bundle prefix written in the key is required, but further bundle
 * prefixes may come before it.
 */
export const defaultMatchName: NameMatcher = (fragment, name) =>
  new RegExp(`^(?:@.+?/)*?${escapeRegExp(fragment)}$`).test(name);

export const defaultMatchPackage: NameMatcher = (fragment, className) => fragment === className;
