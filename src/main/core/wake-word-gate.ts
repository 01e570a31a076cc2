import { normalize } from "./normalizer";

const GREETING_PREFIXES = ["hey", "okay", "ok", "hi", "hello"];

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const buildWakePhrases = (assistantName: string): string[] => {
  const name = normalize(assistantName);
  if (!name) {
    return [];
  }
  return GREETING_PREFIXES.map((prefix) => `${prefix} ${name}`);
};

/**
 * Whole-word pattern for one phrase. Words may be separated by a comma or
 * stop as transcription backends often insert one ("hey, nova").
 */
const toPhrasePattern = (phrase: string): string => {
  const words = phrase.split(" ").filter(Boolean).map(escapeRegex);
  return `(?<![\\p{L}\\p{N}'-])${words.join("[,.!]?\\s+")}(?![\\p{L}\\p{N}'-])`;
};

/**
 * Decides whether an utterance is addressed to the assistant and isolates the
 * command payload that follows the wake phrase.
 */
export class WakeWordGate {
  private readonly phrases: string[];
  private readonly detector: RegExp;
  private readonly stripper: RegExp;

  constructor(phrases: string[]) {
    this.phrases = [...new Set(phrases.map((phrase) => normalize(phrase)).filter(Boolean))].sort(
      (a, b) => b.length - a.length
    );

    const alternatives = this.phrases.map(toPhrasePattern).join("|") || "(?!)";
    this.detector = new RegExp(`(?:${alternatives})`, "u");
    this.stripper = new RegExp(`(?:${alternatives})[,.!?]*`, "gu");
  }

  static forAssistant(assistantName: string): WakeWordGate {
    return new WakeWordGate(buildWakePhrases(assistantName));
  }

  getPhrases(): string[] {
    return [...this.phrases];
  }

  heardWakeWord(text: string): boolean {
    return this.detector.test(normalize(text));
  }

  /**
   * Removes every wake phrase occurrence. An empty result means the wake word
   * was heard without a command and the caller should ask once more.
   */
  extractCommand(text: string): string {
    const stripped = normalize(text).replace(this.stripper, " ");
    return normalize(stripped).replace(/^[,.!?\s-]+/, "");
  }
}
