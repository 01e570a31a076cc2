import type { ActionResult, Translator } from "../../../shared/contracts";
import { translationResponseSchema } from "../../../shared/schemas";
import { Logger } from "../logger";
import { fetchJson } from "./http-json";

const ENDPOINT = "https://api.mymemory.translated.net/get";

const LANGUAGE_CODES: Record<string, string> = {
  arabic: "ar",
  chinese: "zh-CN",
  dutch: "nl",
  english: "en",
  french: "fr",
  german: "de",
  hindi: "hi",
  italian: "it",
  japanese: "ja",
  korean: "ko",
  polish: "pl",
  portuguese: "pt",
  russian: "ru",
  spanish: "es",
  swedish: "sv",
  turkish: "tr"
};

export const resolveLanguageCode = (language: string): string | null =>
  LANGUAGE_CODES[language.trim().toLowerCase()] ?? null;

export class MyMemoryTranslator implements Translator {
  constructor(
    private readonly timeoutMs: number,
    private readonly logger: Logger,
    private readonly sourceLanguage = "en"
  ) {}

  async translate(text: string, language: string): Promise<ActionResult> {
    const phrase = text.trim();
    const target = resolveLanguageCode(language);
    if (!phrase) {
      return { ok: false, message: "What should I translate?" };
    }
    if (!target) {
      return { ok: false, message: `Sorry, I can't translate into ${language.trim()} yet.` };
    }

    const url = `${ENDPOINT}?q=${encodeURIComponent(phrase)}&langpair=${this.sourceLanguage}|${target}`;
    const result = await fetchJson(url, translationResponseSchema, this.timeoutMs);

    if (!result.ok) {
      this.logger.warn("Translation failed.", { target, reason: result.reason });
      return { ok: false, message: "Sorry, the translation service is not responding." };
    }

    const translated = result.data.responseData.translatedText.trim();
    if (!translated) {
      return { ok: false, message: "Sorry, I couldn't translate that." };
    }
    return { ok: true, message: `In ${language.trim()}, that is: ${translated}` };
  }
}
