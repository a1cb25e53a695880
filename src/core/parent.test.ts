import { describe, test, expect } from "vitest";
import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadParentConfig } from "./parent.ts";
import { Slicer } from "./slicer.ts";
import { ParserError } from "../util/errors.ts";

function writeTemp(name: string, content: string): string {
  const path = join(mkdtempSync(join(tmpdir(), "config-slicer-")), name);
  writeFileSync(path, content);
  return path;
}

describe("loadParentConfig", () => {
  test("reads a section of an INI file", async () => {
    const path = writeTemp("dist.ini", "[@Bar]\nBaz.quux[1] = part 2\nBaz.quux[0] = part 1\n");
    await expect(loadParentConfig(path, "@Bar")).resolves.toEqual({
      "Baz.quux[1]": "part 2",
      "Baz.quux[0]": "part 1",
    });
  });

  test("feeds a slicer end to end", async () => {
    const path = writeTemp("bundle.yaml", '"@Bar":\n  Baz.quux[1]: part 2\n  Baz.quux[0]: part 1\n  Baz.mode: fast\n');
    const config = await loadParentConfig(path, "@Bar");
    expect(new Slicer({ config }).slice(["Baz", "Baz", {}])).toEqual({
      quux: ["part 1", "part 2"],
      mode: "fast",
    });
  });

  test("rejects unknown extensions", async () => {
    const path = writeTemp("bundle.conf", "a = b\n");
    await expect(loadParentConfig(path)).rejects.toThrow(ParserError);
  });
});
