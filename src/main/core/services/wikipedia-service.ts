import type { ActionResult, EncyclopediaLookup } from "../../../shared/contracts";
import { wikipediaSummarySchema } from "../../../shared/schemas";
import { Logger } from "../logger";
import { fetchJson } from "./http-json";

const ENDPOINT = "https://en.wikipedia.org/api/rest_v1/page/summary/";

export const firstSentences = (text: string, count: number): string => {
  const sentences = text.replace(/\s+/g, " ").trim().match(/\S.*?[.!?]+(?=\s|$)/g);
  if (!sentences) {
    return text.trim();
  }
  return sentences.slice(0, count).join(" ");
};

export class WikipediaService implements EncyclopediaLookup {
  constructor(
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {}

  async summarize(topic: string): Promise<ActionResult> {
    const subject = topic.trim();
    if (!subject) {
      return { ok: false, message: "What should I look up on Wikipedia?" };
    }

    const title = encodeURIComponent(subject.replace(/\s+/g, "_"));
    const result = await fetchJson(`${ENDPOINT}${title}`, wikipediaSummarySchema, this.timeoutMs);

    if (!result.ok) {
      this.logger.warn("Wikipedia lookup failed.", { topic: subject, reason: result.reason });
      return { ok: false, message: `Sorry, I couldn't find ${subject} on Wikipedia.` };
    }

    const summary = firstSentences(result.data.extract, 2);
    if (!summary) {
      return { ok: false, message: `Sorry, Wikipedia has no summary for ${subject}.` };
    }
    return { ok: true, message: `According to Wikipedia, ${summary}` };
  }
}
