import { SpeechClient, protos } from "@google-cloud/speech";
import type { AudioSegment, TranscriptionBackend, TranscriptionResult } from "../../../shared/contracts";
import { getErrorMessage } from "../logger";
import { withTimeout } from "../timeout";

type RecognizeRequest = protos.google.cloud.speech.v1.IRecognizeRequest;
type RecognizeResponse = protos.google.cloud.speech.v1.IRecognizeResponse;

export interface SpeechRecognizer {
  recognize(request: RecognizeRequest): Promise<RecognizeResponse>;
}

interface GoogleSpeechBackendOptions {
  apiKey?: string;
  languageCode: string;
  timeoutMs: number;
  recognizer?: SpeechRecognizer;
}

const createRecognizer = (apiKey: string): SpeechRecognizer => {
  const client = new SpeechClient({ apiKey });
  return {
    recognize: async (request) => {
      const [response] = await client.recognize(request);
      return response;
    }
  };
};

export const pickTranscript = (response: RecognizeResponse): string =>
  (response.results ?? [])
    .map((result) => result.alternatives?.[0]?.transcript ?? "")
    .map((text) => text.trim())
    .filter(Boolean)
    .join(" ");

/**
 * Online transcription through Google Cloud Speech-to-Text. Only used when the
 * offline backend yields nothing.
 */
export class GoogleSpeechBackend implements TranscriptionBackend {
  readonly name = "google-speech" as const;
  readonly kind = "online" as const;
  private readonly languageCode: string;
  private readonly timeoutMs: number;
  private recognizer: SpeechRecognizer | null;
  private readonly apiKey?: string;

  constructor(options: GoogleSpeechBackendOptions) {
    this.apiKey = options.apiKey;
    this.languageCode = options.languageCode;
    this.timeoutMs = options.timeoutMs;
    this.recognizer = options.recognizer ?? null;
  }

  isAvailable(): boolean {
    return Boolean(this.recognizer || this.apiKey);
  }

  async transcribe(audio: AudioSegment): Promise<TranscriptionResult> {
    let recognizer: SpeechRecognizer;
    try {
      recognizer = this.getRecognizer();
    } catch (error) {
      return { status: "unavailable", backend: this.name, reason: getErrorMessage(error) };
    }

    try {
      const response = await withTimeout(
        () =>
          recognizer.recognize({
            config: {
              encoding: protos.google.cloud.speech.v1.RecognitionConfig.AudioEncoding.LINEAR16,
              sampleRateHertz: audio.sampleRateHertz,
              languageCode: this.languageCode,
              enableAutomaticPunctuation: true
            },
            audio: { content: audio.wav.toString("base64") }
          }),
        this.timeoutMs,
        "Online transcription"
      );

      const transcript = pickTranscript(response);
      if (!transcript) {
        return { status: "unintelligible", backend: this.name };
      }
      return { status: "text", text: transcript, backend: this.name };
    } catch (error) {
      return { status: "unavailable", backend: this.name, reason: getErrorMessage(error) };
    }
  }

  private getRecognizer(): SpeechRecognizer {
    if (this.recognizer) {
      return this.recognizer;
    }
    if (!this.apiKey) {
      throw new Error("Speech API key is not configured.");
    }
    this.recognizer = createRecognizer(this.apiKey);
    return this.recognizer;
  }
}
