import { describe, test, expect } from "vitest";
import { flatten, selectSection, setOwn } from "./dotpath.ts";

describe("flatten", () => {
  test("flattens nested object", () => {
    expect(flatten({ a: { b: 1, c: 2 } })).toEqual({ "a.b": 1, "a.c": 2 });
  });

  test("keeps qualifier separators inside a key", () => {
    expect(flatten({ "Module::Name": { attr: "x" } })).toEqual({ "Module::Name.attr": "x" });
  });

  test("keeps scalar arrays as values", () => {
    expect(flatten({ Plug: { list: ["a", 2, true] } })).toEqual({ "Plug.list": ["a", 2, true] });
  });

  test("stringifies values that are not scalars", () => {
    const result = flatten({
      when: new Date("2024-01-02T03:04:05.000Z"),
      none: null,
      rows: [{ id: 1 }],
    });
    expect(result).toEqual({
      when: "2024-01-02T03:04:05.000Z",
      none: "null",
      rows: ['{"id":1}'],
    });
  });
});

describe("setOwn", () => {
  test("stores __proto__ as an own key", () => {
    const record: Record<string, unknown> = {};
    setOwn(record, "__proto__", ["x"]);
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype);
    expect(Object.keys(record)).toEqual(["__proto__"]);
  });

  test("flatten keeps __proto__ keys from parsed documents", () => {
    const flat = flatten(JSON.parse('{"Plug":{"__proto__":1},"__proto__":{"a":2}}'));
    expect(Object.getPrototypeOf(flat)).toBe(Object.prototype);
    expect(Object.keys(flat)).toEqual(["Plug.__proto__", "__proto__.a"]);
  });
});

describe("selectSection", () => {
  const doc = { "@Bundle": { "Plug.attr": "x" }, scalar: "y" };

  test("returns the whole document without a section", () => {
    expect(selectSection(doc)).toBe(doc);
  });

  test("returns the named object", () => {
    expect(selectSection(doc, "@Bundle")).toEqual({ "Plug.attr": "x" });
  });

  test("returns undefined for missing or scalar sections", () => {
    expect(selectSection(doc, "missing")).toBeUndefined();
    expect(selectSection(doc, "scalar")).toBeUndefined();
    expect(selectSection("text")).toBeUndefined();
  });
});
