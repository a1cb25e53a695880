import { describe, test, expect } from "vitest";
import { jsonParser } from "./json.ts";
import { ParserError } from "../util/errors.ts";

describe("jsonParser", () => {
  const sample = JSON.stringify({
    "@MyBundle": {
      "Module::Name": { attribute: "x", list: ["a", "b"] },
      "Baz.quux[0]": "part 1",
    },
    simple: "value",
  }, null, 2);

  test("parse flattens to dot-paths", () => {
    expect(jsonParser.parse(sample)).toEqual({
      "@MyBundle.Module::Name.attribute": "x",
      "@MyBundle.Module::Name.list": ["a", "b"],
      "@MyBundle.Baz.quux[0]": "part 1",
      simple: "value",
    });
  });

  test("parse flattens the selected section", () => {
    expect(jsonParser.parse(sample, "@MyBundle")).toEqual({
      "Module::Name.attribute": "x",
      "Module::Name.list": ["a", "b"],
      "Baz.quux[0]": "part 1",
    });
  });

  test("a scalar document yields no keys", () => {
    expect(jsonParser.parse("42")).toEqual({});
  });

  test("invalid JSON throws ParserError", () => {
    expect(() => jsonParser.parse("{ nope")).toThrow(ParserError);
  });
});
