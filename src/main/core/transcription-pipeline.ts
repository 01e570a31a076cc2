import type {
  AudioSegment,
  TranscriptionBackend,
  TranscriptionResult
} from "../../shared/contracts";
import { getErrorMessage, Logger } from "./logger";
import { normalize } from "./normalizer";

interface TranscriptionPipelineOptions {
  offline?: TranscriptionBackend;
  online?: TranscriptionBackend;
  logger: Logger;
}

export interface TranscriptionAttempt {
  text: string;
  attempts: TranscriptionResult[];
}

/**
 * Offline-first speech-to-text. Backend faults never reach the caller; an empty
 * string means nothing usable was understood.
 */
export class TranscriptionPipeline {
  private readonly backends: TranscriptionBackend[];
  private readonly logger: Logger;

  constructor(options: TranscriptionPipelineOptions) {
    this.backends = [options.offline, options.online].filter(
      (backend): backend is TranscriptionBackend => Boolean(backend)
    );
    this.logger = options.logger;
  }

  hasBackends(): boolean {
    return this.backends.some((backend) => this.safeIsAvailable(backend));
  }

  async transcribe(audio: AudioSegment): Promise<string> {
    const { text } = await this.transcribeWithDetails(audio);
    return text;
  }

  async transcribeWithDetails(audio: AudioSegment): Promise<TranscriptionAttempt> {
    const attempts: TranscriptionResult[] = [];

    if (audio.wav.length === 0) {
      return { text: "", attempts };
    }

    for (const backend of this.backends) {
      if (!this.safeIsAvailable(backend)) {
        continue;
      }

      const result = await this.attempt(backend, audio);
      attempts.push(result);

      if (result.status === "text") {
        const text = normalize(result.text);
        if (text) {
          this.logger.debug(`Transcribed with ${result.backend}.`, text);
          return { text, attempts };
        }
        continue;
      }

      if (result.status === "unavailable") {
        this.logger.warn(`Transcription backend ${result.backend} unavailable.`, result.reason);
      } else {
        this.logger.debug(`Transcription backend ${result.backend} could not understand the audio.`);
      }
    }

    return { text: "", attempts };
  }

  private async attempt(backend: TranscriptionBackend, audio: AudioSegment): Promise<TranscriptionResult> {
    try {
      return await backend.transcribe(audio);
    } catch (error) {
      return { status: "unavailable", backend: backend.name, reason: getErrorMessage(error) };
    }
  }

  private safeIsAvailable(backend: TranscriptionBackend): boolean {
    try {
      return backend.isAvailable();
    } catch {
      return false;
    }
  }
}
