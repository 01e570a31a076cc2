import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { appsFileSchema } from "../../shared/schemas";
import { JsonConfigFile } from "./json-config";
import { Logger } from "./logger";

const makeTempFile = (content?: string): { dir: string; file: string } => {
  const dir = mkdtempSync(join(tmpdir(), "nova-config-"));
  const file = join(dir, "apps.json");
  if (content !== undefined) {
    writeFileSync(file, content, "utf8");
  }
  return { dir, file };
};

describe("JsonConfigFile", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it("parses a valid file", () => {
    const temp = makeTempFile(JSON.stringify({ notepad: "C:/Windows/notepad.exe" }));
    dirs.push(temp.dir);

    const config = new JsonConfigFile(temp.file, appsFileSchema, new Logger());

    expect(config.read({})).toEqual({ notepad: "C:/Windows/notepad.exe" });
  });

  it("falls back to the default for missing, malformed and invalid files", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const malformed = makeTempFile("{ not json");
    const invalid = makeTempFile(JSON.stringify({ notepad: 42 }));
    dirs.push(malformed.dir, invalid.dir);

    const logger = new Logger();
    expect(new JsonConfigFile(join(malformed.dir, "missing.json"), appsFileSchema, logger).read({})).toEqual({});
    expect(new JsonConfigFile(malformed.file, appsFileSchema, logger).read({})).toEqual({});
    expect(new JsonConfigFile(invalid.file, appsFileSchema, logger).read({})).toEqual({});
    expect(warn).toHaveBeenCalledTimes(3);
  });
});
