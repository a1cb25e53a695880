import { describe, test, expect } from "vitest";
import { formatOutput, outputFormat, patternOptions } from "./options.ts";
import { ConfigError } from "../util/errors.ts";

describe("patternOptions", () => {
  test("flags win over settings", () => {
    expect(patternOptions({ prefix: "a\\." }, { version: 1, prefix: "b\\.", separator: "(.+?):(.+?)" })).toEqual({
      prefix: "a\\.",
      separator: "(.+?):(.+?)",
    });
  });

  test("validates the separator", () => {
    expect(() => patternOptions({ separator: "(.+)" }, { version: 1 })).toThrow(ConfigError);
  });
});

describe("outputFormat", () => {
  test("defaults to json", () => {
    expect(outputFormat({}, { version: 1 })).toBe("json");
    expect(outputFormat({}, { version: 1, format: "yaml" })).toBe("yaml");
  });

  test("rejects unknown formats", () => {
    expect(() => outputFormat({ format: "xml" }, { version: 1 })).toThrow("Unknown output format 'xml'");
  });
});

describe("formatOutput", () => {
  test("renders json and yaml", () => {
    const slice = { season: ["duck", "wabbit"], mode: "fast" };
    expect(formatOutput(slice, "json")).toBe('{\n  "season": [\n    "duck",\n    "wabbit"\n  ],\n  "mode": "fast"\n}');
    expect(formatOutput(slice, "yaml")).toBe("season:\n  - duck\n  - wabbit\nmode: fast\n");
  });
});
