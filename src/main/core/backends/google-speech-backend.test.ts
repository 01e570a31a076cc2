import { describe, expect, it, vi } from "vitest";
import type { AudioSegment } from "../../../shared/contracts";
import { GoogleSpeechBackend, pickTranscript, type SpeechRecognizer } from "./google-speech-backend";

const audio: AudioSegment = { wav: Buffer.from("wav-bytes"), sampleRateHertz: 16_000 };

describe("GoogleSpeechBackend", () => {
  it("is unavailable without an API key", async () => {
    const backend = new GoogleSpeechBackend({ languageCode: "en-US", timeoutMs: 1000 });

    expect(backend.isAvailable()).toBe(false);
    expect(await backend.transcribe(audio)).toEqual({
      status: "unavailable",
      backend: "google-speech",
      reason: "Speech API key is not configured."
    });
  });

  it("joins the top alternative of each result", async () => {
    const recognize = vi.fn(async () => ({
      results: [
        { alternatives: [{ transcript: "Hey Nova " }, { transcript: "hay nova" }] },
        { alternatives: [{ transcript: " open YouTube" }] }
      ]
    }));
    const backend = new GoogleSpeechBackend({
      languageCode: "en-US",
      timeoutMs: 1000,
      recognizer: { recognize }
    });

    expect(await backend.transcribe(audio)).toEqual({
      status: "text",
      text: "Hey Nova open YouTube",
      backend: "google-speech"
    });
    expect(recognize).toHaveBeenCalledWith(
      expect.objectContaining({ audio: { content: Buffer.from("wav-bytes").toString("base64") } })
    );
  });

  it("reports an empty response as unintelligible", async () => {
    const recognizer: SpeechRecognizer = { recognize: async () => ({ results: [] }) };
    const backend = new GoogleSpeechBackend({ languageCode: "en-US", timeoutMs: 1000, recognizer });

    expect(await backend.transcribe(audio)).toEqual({ status: "unintelligible", backend: "google-speech" });
  });

  it("degrades request failures to unavailable", async () => {
    const recognizer: SpeechRecognizer = {
      recognize: async () => {
        throw new Error("getaddrinfo ENOTFOUND speech.googleapis.com");
      }
    };
    const backend = new GoogleSpeechBackend({ languageCode: "en-US", timeoutMs: 1000, recognizer });

    const result = await backend.transcribe(audio);
    expect(result.status).toBe("unavailable");
  });

  it("bounds a hanging request by the configured timeout", async () => {
    const recognizer: SpeechRecognizer = { recognize: () => new Promise(() => undefined) };
    const backend = new GoogleSpeechBackend({ languageCode: "en-US", timeoutMs: 20, recognizer });

    expect(await backend.transcribe(audio)).toEqual({
      status: "unavailable",
      backend: "google-speech",
      reason: "Online transcription timed out after 20 ms."
    });
  });

  it("ignores results without alternatives", () => {
    expect(pickTranscript({ results: [{ alternatives: [] }, {}] })).toBe("");
  });
});
