import { createInterface, type Interface } from "node:readline";
import type { AudioSource, CaptureBounds, CaptureResult } from "../../../shared/contracts";

interface ConsoleSourceOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  prompt?: string;
}

const toResult = (line: string): CaptureResult => {
  const text = line.trim();
  return text ? { kind: "text", text } : { kind: "silence" };
};

/**
 * Typed input in place of a microphone. Lines typed while no listen is pending
 * are queued; end of input closes the session.
 */
export class ConsoleSource implements AudioSource {
  private readonly reader: Interface;
  private readonly output?: NodeJS.WritableStream;
  private readonly prompt: string;
  private readonly queued: string[] = [];
  private waiter: ((line: string | null) => void) | undefined;
  private ended = false;
  private promptPending = true;

  constructor(options: ConsoleSourceOptions = {}) {
    this.output = options.output;
    this.prompt = options.prompt ?? "> ";
    this.reader = createInterface({ input: options.input ?? process.stdin, terminal: false });
    this.reader.on("line", (line) => this.deliver(line));
    this.reader.on("close", () => {
      this.ended = true;
      this.deliver(null);
    });
  }

  listen(bounds: CaptureBounds): Promise<CaptureResult> {
    const next = this.queued.shift();
    if (next !== undefined) {
      return Promise.resolve(toResult(next));
    }
    if (this.ended) {
      return Promise.resolve({ kind: "closed" });
    }

    if (this.promptPending) {
      this.output?.write(this.prompt);
      this.promptPending = false;
    }

    return new Promise<CaptureResult>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = undefined;
        resolve({ kind: "silence" });
      }, bounds.listenTimeoutMs);

      this.waiter = (line) => {
        clearTimeout(timer);
        this.waiter = undefined;
        this.promptPending = true;
        resolve(line === null ? { kind: "closed" } : toResult(line));
      };
    });
  }

  close(): void {
    this.reader.close();
  }

  private deliver(line: string | null): void {
    if (this.waiter) {
      this.waiter(line);
      return;
    }
    if (line !== null) {
      this.queued.push(line);
    }
  }
}
