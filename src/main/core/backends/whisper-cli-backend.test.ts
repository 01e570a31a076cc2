import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { AudioSegment } from "../../../shared/contracts";
import { Logger } from "../logger";
import { WhisperCliBackend } from "./whisper-cli-backend";

const audio: AudioSegment = { wav: Buffer.from("RIFF-test-clip"), sampleRateHertz: 16_000 };

const setupBinaries = (): { root: string; cliPath: string; modelPath: string } => {
  const root = mkdtempSync(join(tmpdir(), "nova-whisper-"));
  const cliPath = join(root, "whisper-cli");
  const modelPath = join(root, "ggml-base.en.bin");
  writeFileSync(cliPath, "");
  writeFileSync(modelPath, "");
  return { root, cliPath, modelPath };
};

const outputBaseFrom = (args: string[]): string => args[args.indexOf("-of") + 1] ?? "";

describe("WhisperCliBackend", () => {
  const roots: string[] = [];

  afterEach(() => {
    for (const root of roots.splice(0)) {
      rmSync(root, { recursive: true, force: true });
    }
  });

  it("is unavailable without a binary and model", async () => {
    const backend = new WhisperCliBackend({ timeoutMs: 1000, logger: new Logger() });

    expect(backend.isAvailable()).toBe(false);
    const result = await backend.transcribe(audio);
    expect(result.status).toBe("unavailable");
  });

  it("reads the transcript written next to the temp clip and removes temp files", async () => {
    const fixture = setupBinaries();
    roots.push(fixture.root);
    let seenBase = "";
    const run = vi.fn(async (_file: string, args: string[]) => {
      seenBase = outputBaseFrom(args);
      await writeFile(`${seenBase}.txt`, "  Hey Nova,\n what time is it?  \n", "utf8");
    });

    const backend = new WhisperCliBackend({
      cliPath: fixture.cliPath,
      modelPath: fixture.modelPath,
      timeoutMs: 1000,
      logger: new Logger(),
      run
    });

    const result = await backend.transcribe(audio);

    expect(result).toEqual({ status: "text", text: "Hey Nova, what time is it?", backend: "whisper.cpp-cli" });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run.mock.calls[0]?.[0]).toBe(fixture.cliPath);
    expect(existsSync(dirname(seenBase))).toBe(false);
  });

  it("reports blank audio markers as unintelligible", async () => {
    const fixture = setupBinaries();
    roots.push(fixture.root);
    const backend = new WhisperCliBackend({
      cliPath: fixture.cliPath,
      modelPath: fixture.modelPath,
      timeoutMs: 1000,
      logger: new Logger(),
      run: async (_file, args) => {
        await writeFile(`${outputBaseFrom(args)}.txt`, "[BLANK_AUDIO]\n", "utf8");
      }
    });

    expect(await backend.transcribe(audio)).toEqual({ status: "unintelligible", backend: "whisper.cpp-cli" });
  });

  it("absorbs process failures as an unavailable result", async () => {
    const fixture = setupBinaries();
    roots.push(fixture.root);
    const backend = new WhisperCliBackend({
      cliPath: fixture.cliPath,
      modelPath: fixture.modelPath,
      timeoutMs: 1000,
      logger: new Logger(),
      run: async () => {
        throw new Error("failed to load model");
      }
    });

    expect(await backend.transcribe(audio)).toEqual({
      status: "unavailable",
      backend: "whisper.cpp-cli",
      reason: "failed to load model"
    });
  });
});
