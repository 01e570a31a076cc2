import type {
  AudioSource,
  CaptureBounds,
  CaptureResult,
  CycleReport,
  FallbackResult,
  Speaker,
  UrlOpener,
  Utterance
} from "../../shared/contracts";
import { buildSearchUrl, FallbackChain } from "./fallback-chain";
import { getErrorMessage, Logger } from "./logger";
import { normalize } from "./normalizer";
import { SkillRouter } from "./skill-router";
import { TranscriptionPipeline } from "./transcription-pipeline";
import { WakeWordGate } from "./wake-word-gate";

export const REPROMPT = "Yes?";
export const WEB_SEARCH_ANNOUNCEMENT = "Here is what I found on the web.";

interface AssistantSessionOptions {
  assistantName: string;
  source: AudioSource;
  pipeline: TranscriptionPipeline;
  gate: WakeWordGate;
  router: SkillRouter;
  fallback: FallbackChain;
  speaker: Speaker;
  urlOpener: UrlOpener;
  bounds: CaptureBounds;
  searchUrl: string;
  logger: Logger;
}

const EMPTY_UTTERANCE = (raw: CaptureResult): Utterance => ({ raw, transcribed: "", normalized: "" });

/**
 * The listen loop. One cycle is fully processed before the next capture starts,
 * and only the exit skill, end of input or `stop()` ends the loop.
 */
export class AssistantSession {
  private readonly options: AssistantSessionOptions;
  private readonly logger: Logger;
  private stopped = false;

  constructor(options: AssistantSessionOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Ends the loop after the cycle in flight. Never interrupts a cycle.
   */
  stop(): void {
    this.stopped = true;
  }

  async run(): Promise<void> {
    const name = this.options.assistantName;
    await this.speak(`${name.charAt(0).toUpperCase()}${name.slice(1)} online. Say hey ${name} followed by a command.`);

    while (!this.stopped) {
      try {
        const report = await this.runCycle();
        this.logger.debug("Cycle finished.", report);
      } catch (error) {
        this.logger.error("Dispatch cycle failed.", getErrorMessage(error));
      }
    }

    this.options.source.close?.();
  }

  async runCycle(): Promise<CycleReport> {
    const first = await this.hear();
    if (first.raw.kind === "closed") {
      return this.closed();
    }
    if (!first.normalized) {
      return { outcome: "silence", heard: "", command: "" };
    }

    this.logger.info(`Heard: ${first.normalized}`);
    if (!this.options.gate.heardWakeWord(first.normalized)) {
      return { outcome: "ignored", heard: first.normalized, command: "" };
    }

    const command = this.options.gate.extractCommand(first.normalized);
    if (command) {
      return this.dispatch(first.normalized, command);
    }

    await this.speak(REPROMPT);
    const followUp = await this.hear();
    if (followUp.raw.kind === "closed") {
      return this.closed();
    }

    const retried = this.options.gate.extractCommand(followUp.normalized);
    if (!retried) {
      return { outcome: "reprompt_empty", heard: followUp.normalized, command: "" };
    }
    this.logger.info(`Heard: ${followUp.normalized}`);
    return this.dispatch(followUp.normalized, retried);
  }

  private async dispatch(heard: string, command: string): Promise<CycleReport> {
    this.logger.info(`Command: ${command}`);
    const outcome = await this.options.router.dispatch(command);

    if (outcome.kind === "session_end") {
      this.stopped = true;
      return { outcome: "session_end", heard, command, skill: outcome.skill };
    }
    if (outcome.kind === "handled") {
      return { outcome: "handled", heard, command, skill: outcome.skill };
    }

    const fallback = await this.options.fallback.resolve(command);
    await this.present(fallback);
    return { outcome: "fallback", heard, command, fallback };
  }

  private async present(fallback: FallbackResult): Promise<void> {
    if (fallback.kind === "answer") {
      await this.speak(fallback.text);
      return;
    }

    const result = await this.options.urlOpener.open(buildSearchUrl(this.options.searchUrl, fallback.query));
    if (!result.ok) {
      this.logger.warn("Web search could not be opened.", result.message);
      await this.speak("Sorry, I couldn't open a web search for that.");
      return;
    }
    await this.speak(WEB_SEARCH_ANNOUNCEMENT);
  }

  private async hear(): Promise<Utterance> {
    let raw: CaptureResult;
    try {
      raw = await this.options.source.listen(this.options.bounds);
    } catch (error) {
      this.logger.warn("Capture failed.", getErrorMessage(error));
      return EMPTY_UTTERANCE({ kind: "silence" });
    }

    if (raw.kind === "text") {
      return { raw, transcribed: raw.text, normalized: normalize(raw.text) };
    }
    if (raw.kind !== "audio") {
      return EMPTY_UTTERANCE(raw);
    }

    const { text, attempts } = await this.options.pipeline.transcribeWithDetails(raw.audio);
    if (!text) {
      return EMPTY_UTTERANCE(raw);
    }
    const accepted = [...attempts].reverse().find((attempt) => attempt.status === "text");
    const transcribed = accepted?.status === "text" ? accepted.text : text;
    return { raw, transcribed, normalized: text };
  }

  private closed(): CycleReport {
    this.stopped = true;
    return { outcome: "closed", heard: "", command: "" };
  }

  private async speak(text: string): Promise<void> {
    try {
      await this.options.speaker.speak(text);
    } catch (error) {
      this.logger.warn("Speech output failed.", getErrorMessage(error));
    }
  }
}
