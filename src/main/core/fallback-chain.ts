import type { FallbackResult, GenerativeAnswerBackend } from "../../shared/contracts";
import { getErrorMessage, Logger } from "./logger";

/**
 * Last resort for commands no skill claimed: a generative answer when one can be
 * produced, otherwise a web search for the command text.
 */
export class FallbackChain {
  constructor(
    private readonly generative: GenerativeAnswerBackend | null,
    private readonly logger: Logger
  ) {}

  async resolve(command: string): Promise<FallbackResult> {
    const query = command.trim();
    const answer = await this.tryAnswer(query);
    if (answer) {
      return { kind: "answer", text: answer };
    }
    return { kind: "web_search", query };
  }

  private async tryAnswer(query: string): Promise<string | null> {
    if (!query || !this.generative) {
      return null;
    }

    try {
      if (!this.generative.isAvailable()) {
        return null;
      }
      const answer = await this.generative.answer(query);
      return answer?.trim() || null;
    } catch (error) {
      this.logger.warn("Generative answer failed; falling back to web search.", getErrorMessage(error));
      return null;
    }
  }
}

export const buildSearchUrl = (searchUrl: string, query: string): string =>
  `${searchUrl}${encodeURIComponent(query)}`;
