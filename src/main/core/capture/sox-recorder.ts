import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable } from "node:stream";
import type { AudioSource, CaptureBounds, CaptureResult } from "../../../shared/contracts";
import { getErrorMessage, Logger } from "../logger";

const SAMPLE_RATE = 16_000;
const BYTES_PER_SAMPLE = 2; // s16le mono
const WAV_HEADER_BYTES = 44;

export interface RecorderProcess {
  readonly stdout: Readable | null;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close", listener: (code: number | null) => void): unknown;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type RecorderSpawn = (file: string, args: string[], options: SpawnOptions) => RecorderProcess;

interface SoxRecorderOptions {
  logger: Logger;
  device?: string;
  spawn?: RecorderSpawn;
}

/**
 * `rec` arguments: raw 16 kHz mono PCM on stdout, leading silence dropped,
 * recording ends after a second of trailing silence or at the phrase limit.
 */
export const soxArgs = (phraseLimitMs: number): string[] => [
  "-q",
  "-c",
  "1",
  "-r",
  String(SAMPLE_RATE),
  "-b",
  "16",
  "-e",
  "signed-integer",
  "-t",
  "raw",
  "-",
  "silence",
  "1",
  "0.1",
  "1%",
  "1",
  "1.0",
  "1%",
  "trim",
  "0",
  String(phraseLimitMs / 1000)
];

export const pcmToWav = (pcm: Buffer, sampleRate = SAMPLE_RATE): Buffer => {
  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(1, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * BYTES_PER_SAMPLE, 28);
  header.writeUInt16LE(BYTES_PER_SAMPLE, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
};

/**
 * Microphone capture through SoX. Resolves with `silence` when nothing was
 * recorded by the listen timeout, and never later than listen timeout plus
 * phrase limit.
 */
export class SoxRecorder implements AudioSource {
  private readonly logger: Logger;
  private readonly device?: string;
  private readonly spawnRecorder: RecorderSpawn;
  private active: RecorderProcess | undefined;
  private unavailableReported = false;

  constructor(options: SoxRecorderOptions) {
    this.logger = options.logger;
    this.device = options.device;
    this.spawnRecorder = options.spawn ?? spawn;
  }

  listen(bounds: CaptureBounds): Promise<CaptureResult> {
    return new Promise<CaptureResult>((resolve) => {
      let child: RecorderProcess;
      try {
        child = this.spawnRecorder("rec", soxArgs(bounds.phraseLimitMs), {
          stdio: ["ignore", "pipe", "ignore"],
          env: this.device ? { ...process.env, AUDIODEV: this.device } : process.env,
          windowsHide: true
        });
      } catch (error) {
        this.reportUnavailable(getErrorMessage(error));
        resolve({ kind: "silence" });
        return;
      }

      this.active = child;
      const chunks: Buffer[] = [];
      let bytes = 0;
      let settled = false;

      const finish = (): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(startTimer);
        clearTimeout(hardStop);
        if (this.active === child) {
          this.active = undefined;
        }

        if (bytes === 0) {
          resolve({ kind: "silence" });
          return;
        }

        const pcm = Buffer.concat(chunks, bytes);
        resolve({
          kind: "audio",
          audio: {
            wav: pcmToWav(pcm),
            sampleRateHertz: SAMPLE_RATE,
            durationMs: Math.round((pcm.length / (SAMPLE_RATE * BYTES_PER_SAMPLE)) * 1000)
          }
        });
      };

      const stop = (): void => {
        child.kill("SIGTERM");
        finish();
      };

      const startTimer = setTimeout(() => {
        if (bytes === 0) {
          stop();
        }
      }, bounds.listenTimeoutMs);
      const hardStop = setTimeout(stop, bounds.listenTimeoutMs + bounds.phraseLimitMs);

      child.stdout?.on("data", (chunk: Buffer) => {
        chunks.push(chunk);
        bytes += chunk.length;
      });
      child.on("error", (error) => {
        this.reportUnavailable(error.message);
        finish();
      });
      child.on("close", () => finish());
    });
  }

  close(): void {
    this.active?.kill("SIGTERM");
    this.active = undefined;
  }

  private reportUnavailable(reason: string): void {
    if (this.unavailableReported) {
      return;
    }
    this.unavailableReported = true;
    this.logger.warn("Microphone capture unavailable. Install SoX or set NOVA_INPUT=console.", reason);
  }
}
