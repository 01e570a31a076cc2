import { describe, expect, it } from "vitest";
import { normalize } from "./normalizer";

const ALLOWED = /^[\p{L}\p{N} ?!.,'-]*$/u;

describe("normalize", () => {
  it("lowercases and keeps sentence punctuation", () => {
    expect(normalize("Hey Nova, What's The Time?")).toBe("hey nova, what's the time?");
  });

  it("drops characters outside the allowed set", () => {
    expect(normalize("open *youtube* (please) #now")).toBe("open youtube please now");
  });

  it("collapses tabs, newlines and repeated spaces", () => {
    expect(normalize("  play\tthe \n\n violin   ")).toBe("play the violin");
  });

  it("closes gaps left by removed symbols", () => {
    expect(normalize("rock & roll")).toBe("rock roll");
  });

  it("keeps non-latin letters and digits", () => {
    expect(normalize("Müller Straße 12")).toBe("müller straße 12");
  });

  it("degrades unparseable input to an empty string", () => {
    expect(normalize("@@@ ### $$$")).toBe("");
    expect(normalize("")).toBe("");
  });

  it("is idempotent and never emits characters outside the allowed set", () => {
    const samples = [
      "Hey NOVA!!! what's up???",
      "İstanbul weather",
      "ÉCOLE -- élève's <b>notes</b>",
      "tab\tseparated\r\nlines",
      "emoji 🎻 violin",
      "  ..., leading punctuation"
    ];

    for (const sample of samples) {
      const once = normalize(sample);
      expect(normalize(once)).toBe(once);
      expect(once).toMatch(ALLOWED);
      expect(once).toBe(once.trim());
    }
  });
});
