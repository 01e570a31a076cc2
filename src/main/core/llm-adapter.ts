import { GoogleGenerativeAI } from "@google/generative-ai";
import type { GenerativeAnswerBackend } from "../../shared/contracts";
import { getErrorMessage, Logger } from "./logger";
import { clampTimeoutMs, withTimeout } from "./timeout";

export const buildSystemInstruction = (assistantName: string): string => {
  const name = assistantName.trim() || "nova";
  return (
    `You are ${name.charAt(0).toUpperCase()}${name.slice(1)}, a voice assistant. ` +
    "Answer in at most three short sentences of plain text suitable for speech. " +
    "Do not use markdown, lists or emoji."
  );
};

export interface AnswerModel {
  generate(prompt: string): Promise<string>;
}

interface GeminiAnswerAdapterOptions {
  assistantName: string;
  apiKey?: string;
  model: string;
  timeoutMs: number;
  logger: Logger;
  answerModel?: AnswerModel;
}

const createGeminiModel = (
  apiKey: string,
  model: string,
  timeoutMs: number,
  systemInstruction: string
): AnswerModel => {
  const client = new GoogleGenerativeAI(apiKey);
  const generative = client.getGenerativeModel(
    { model, systemInstruction },
    { timeout: timeoutMs }
  );

  return {
    generate: async (prompt) => {
      const result = await generative.generateContent(prompt);
      return result.response.text();
    }
  };
};

const cleanForSpeech = (value: string): string =>
  value
    .replace(/[*_`#>]+/g, "")
    .replace(/\s+/g, " ")
    .trim();

/**
 * Generative answer backend on the Gemini API. Every failure mode (no key, request
 * error, timeout, empty text) collapses to `null`.
 */
export class GeminiAnswerAdapter implements GenerativeAnswerBackend {
  private readonly systemInstruction: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private answerModel: AnswerModel | null;

  constructor(options: GeminiAnswerAdapterOptions) {
    this.systemInstruction = buildSystemInstruction(options.assistantName);
    this.apiKey = options.apiKey?.trim() || undefined;
    this.model = options.model.trim() || "gemini-1.5-flash";
    this.timeoutMs = clampTimeoutMs(options.timeoutMs, 6000);
    this.logger = options.logger;
    this.answerModel = options.answerModel ?? null;
  }

  isAvailable(): boolean {
    return Boolean(this.answerModel || this.apiKey);
  }

  async answer(prompt: string): Promise<string | null> {
    const question = prompt.trim();
    if (!question) {
      return null;
    }

    const model = this.resolveModel();
    if (!model) {
      return null;
    }

    try {
      const text = await withTimeout(() => model.generate(question), this.timeoutMs, "Generative answer");
      const spoken = cleanForSpeech(text);
      return spoken || null;
    } catch (error) {
      this.logger.warn("Generative answer unavailable.", getErrorMessage(error));
      return null;
    }
  }

  private resolveModel(): AnswerModel | null {
    if (this.answerModel) {
      return this.answerModel;
    }
    if (!this.apiKey) {
      return null;
    }
    this.answerModel = createGeminiModel(this.apiKey, this.model, this.timeoutMs, this.systemInstruction);
    return this.answerModel;
  }
}
