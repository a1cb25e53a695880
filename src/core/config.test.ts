import { describe, test, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { readSettings, settingsPath, validateSeparator, validateSettings } from "./config.ts";
import { ConfigError } from "../util/errors.ts";

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "config-slicer-"));
}

describe("readSettings", () => {
  test("returns defaults when the file is missing", async () => {
    await expect(readSettings(tempDir())).resolves.toEqual({ version: 1 });
  });

  test("reads .config-slicer.yaml", async () => {
    const dir = tempDir();
    writeFileSync(settingsPath(dir), "version: 1\nprefix: 'plug\\.'\njoin: ', '\nformat: yaml\n");
    await expect(readSettings(dir)).resolves.toEqual({
      version: 1,
      prefix: "plug\\.",
      join: ", ",
      format: "yaml",
    });
  });

  test("reports YAML syntax errors as ConfigError", async () => {
    const dir = tempDir();
    writeFileSync(settingsPath(dir), "prefix: [unclosed\n");
    await expect(readSettings(dir)).rejects.toThrow(ConfigError);
  });
});

describe("validateSettings", () => {
  test("an empty document means defaults", () => {
    expect(validateSettings(null)).toEqual({ version: 1 });
  });

  test("rejects unsupported versions", () => {
    expect(() => validateSettings({ version: 2 })).toThrow("Unsupported .config-slicer.yaml version: 2");
  });

  test("rejects non-string options", () => {
    expect(() => validateSettings({ prefix: 3 })).toThrow("'prefix' must be a string");
  });

  test("rejects unknown formats", () => {
    expect(() => validateSettings({ format: "xml" })).toThrow("'format' must be json or yaml");
  });

  test("rejects lists", () => {
    expect(() => validateSettings(["a"])).toThrow("not an object");
  });

  test("keeps a valid separator", () => {
    expect(validateSettings({ separator: "(.+?):(.+?)" })).toEqual({ version: 1, separator: "(.+?):(.+?)" });
  });
});

describe("validateSeparator", () => {
  test("requires two capture groups", () => {
    expect(() => validateSeparator("(.+?)\\.(.+?)")).not.toThrow();
    expect(() => validateSeparator("(.+?)\\..+?")).toThrow("needs two capture groups, found 1");
  });

  test("rejects patterns that don't compile", () => {
    expect(() => validateSeparator("(.+?")).toThrow(ConfigError);
  });
});
