import { execFile } from "node:child_process";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { promisify } from "node:util";
import type { AudioSegment, TranscriptionBackend, TranscriptionResult } from "../../../shared/contracts";
import { getErrorMessage, Logger } from "../logger";

const execFileAsync = promisify(execFile);

type ExecFileRunner = (
  file: string,
  args: string[],
  options: { timeout: number; windowsHide: boolean }
) => Promise<unknown>;

interface WhisperCliBackendOptions {
  cliPath?: string;
  modelPath?: string;
  timeoutMs: number;
  logger: Logger;
  language?: string;
  run?: ExecFileRunner;
}

interface TempAudio {
  tempDir: string;
  audioPath: string;
  outputBasePath: string;
}

const normalizeText = (value: string): string => value.trim().replace(/\s+/g, " ");

/**
 * Offline transcription through a local whisper.cpp CLI binary and model file.
 */
export class WhisperCliBackend implements TranscriptionBackend {
  readonly name = "whisper.cpp-cli" as const;
  readonly kind = "offline" as const;
  private readonly cliPath?: string;
  private readonly modelPath?: string;
  private readonly timeoutMs: number;
  private readonly language: string;
  private readonly logger: Logger;
  private readonly run: ExecFileRunner;

  constructor(options: WhisperCliBackendOptions) {
    this.cliPath = options.cliPath;
    this.modelPath = options.modelPath;
    this.timeoutMs = options.timeoutMs;
    this.language = options.language ?? "en";
    this.logger = options.logger;
    this.run = options.run ?? ((file, args, execOptions) => execFileAsync(file, args, execOptions));
  }

  isAvailable(): boolean {
    return Boolean(
      this.cliPath && this.modelPath && existsSync(this.cliPath) && existsSync(this.modelPath)
    );
  }

  async transcribe(audio: AudioSegment): Promise<TranscriptionResult> {
    if (!this.cliPath || !this.modelPath || !this.isAvailable()) {
      return { status: "unavailable", backend: this.name, reason: "whisper.cpp binary or model missing" };
    }

    let tempAudio: TempAudio | undefined;

    try {
      tempAudio = await this.writeTempAudio(audio.wav);
      await this.run(
        this.cliPath,
        [
          "-m",
          this.modelPath,
          "-f",
          tempAudio.audioPath,
          "-l",
          this.language,
          "-nt",
          "-otxt",
          "-of",
          tempAudio.outputBasePath
        ],
        { timeout: this.timeoutMs, windowsHide: true }
      );

      const textPath = `${tempAudio.outputBasePath}.txt`;
      if (!existsSync(textPath)) {
        return { status: "unintelligible", backend: this.name };
      }

      const transcript = normalizeText(await readFile(textPath, "utf8"));
      if (!transcript || /^\[(blank_audio|silence|music)\]$/i.test(transcript)) {
        return { status: "unintelligible", backend: this.name };
      }

      return { status: "text", text: transcript, backend: this.name };
    } catch (error) {
      return { status: "unavailable", backend: this.name, reason: getErrorMessage(error) };
    } finally {
      if (tempAudio) {
        await this.disposeTempAudio(tempAudio);
      }
    }
  }

  private async writeTempAudio(wav: Buffer): Promise<TempAudio> {
    const tempDir = await mkdtemp(join(tmpdir(), "nova-voice-"));
    const audioPath = join(tempDir, "clip.wav");
    const outputBasePath = join(tempDir, "result");
    await writeFile(audioPath, wav);
    return { tempDir, audioPath, outputBasePath };
  }

  private async disposeTempAudio(tempAudio: TempAudio): Promise<void> {
    try {
      await rm(tempAudio.tempDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn("Unable to remove temporary voice files.", getErrorMessage(error));
    }
  }
}
