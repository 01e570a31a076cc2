import { describe, expect, it, vi } from "vitest";
import type { GenerativeAnswerBackend } from "../../shared/contracts";
import { buildSearchUrl, FallbackChain } from "./fallback-chain";
import { Logger } from "./logger";

const makeBackend = (
  answer: (prompt: string) => Promise<string | null>,
  available = true
): GenerativeAnswerBackend => ({
  isAvailable: () => available,
  answer
});

describe("FallbackChain", () => {
  it("returns the generative answer when one is produced", async () => {
    const chain = new FallbackChain(makeBackend(async () => "The moon is about 384,400 km away."), new Logger());

    expect(await chain.resolve("how far is the moon")).toEqual({
      kind: "answer",
      text: "The moon is about 384,400 km away."
    });
  });

  it("directs a web search when no generative backend is configured", async () => {
    const chain = new FallbackChain(null, new Logger());

    expect(await chain.resolve("play the violin")).toEqual({ kind: "web_search", query: "play the violin" });
  });

  it("skips an unavailable backend without calling it", async () => {
    const answer = vi.fn(async () => "unused");
    const chain = new FallbackChain(makeBackend(answer, false), new Logger());

    expect(await chain.resolve("play the violin")).toEqual({ kind: "web_search", query: "play the violin" });
    expect(answer).not.toHaveBeenCalled();
  });

  it("degrades thrown errors and blank answers to a web search", async () => {
    const throwing = new FallbackChain(
      makeBackend(async () => {
        throw new Error("network down");
      }),
      new Logger()
    );
    const blank = new FallbackChain(makeBackend(async () => "  "), new Logger());

    expect(await throwing.resolve("best pizza nearby")).toEqual({ kind: "web_search", query: "best pizza nearby" });
    expect(await blank.resolve("best pizza nearby")).toEqual({ kind: "web_search", query: "best pizza nearby" });
  });

  it("encodes the query into the search URL", () => {
    expect(buildSearchUrl("https://www.google.com/search?q=", "what's new & cool")).toBe(
      "https://www.google.com/search?q=what's%20new%20%26%20cool"
    );
  });
});
