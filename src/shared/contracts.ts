export type InputMode = "microphone" | "console";

export type BackendKind = "offline" | "online";

export type TranscriptionBackendName = "whisper.cpp-cli" | "google-speech";

/**
 * Pre-bounded audio segment handed over by a capture collaborator.
 * Audio is 16 kHz mono 16-bit PCM in a WAV container.
 */
export interface AudioSegment {
  wav: Buffer;
  sampleRateHertz: number;
  durationMs?: number;
}

export interface CaptureBounds {
  listenTimeoutMs: number;
  phraseLimitMs: number;
}

export type CaptureResult =
  | { kind: "audio"; audio: AudioSegment }
  | { kind: "text"; text: string }
  | { kind: "silence" }
  | { kind: "closed" };

export interface AudioSource {
  listen(bounds: CaptureBounds): Promise<CaptureResult>;
  close?(): void;
}

export type TranscriptionResult =
  | { status: "text"; text: string; backend: TranscriptionBackendName }
  | { status: "unintelligible"; backend: TranscriptionBackendName }
  | { status: "unavailable"; backend: TranscriptionBackendName; reason: string };

export interface TranscriptionBackend {
  readonly name: TranscriptionBackendName;
  readonly kind: BackendKind;
  isAvailable(): boolean;
  transcribe(audio: AudioSegment): Promise<TranscriptionResult>;
}

/**
 * One dispatch cycle's view of what was heard. Each form is derived from the
 * previous one; an empty transcription always yields an empty normalized form.
 */
export interface Utterance {
  readonly raw: CaptureResult;
  readonly transcribed: string;
  readonly normalized: string;
}

export interface ActionResult {
  ok: boolean;
  message: string;
  data?: unknown;
}

export interface Speaker {
  speak(text: string): Promise<void>;
}

export interface UrlOpener {
  open(url: string): Promise<ActionResult>;
}

export interface AppLauncher {
  has(name: string): boolean;
  names(): string[];
  launch(name: string): Promise<ActionResult>;
}

export interface WeatherLookup {
  describe(city: string): Promise<ActionResult>;
}

export interface Translator {
  translate(text: string, language: string): Promise<ActionResult>;
}

export interface EncyclopediaLookup {
  summarize(topic: string): Promise<ActionResult>;
}

export interface GenerativeAnswerBackend {
  isAvailable(): boolean;
  answer(prompt: string): Promise<string | null>;
}

export interface SkillContext {
  speak: (text: string) => Promise<void>;
  openUrl: (url: string) => Promise<ActionResult>;
  now: () => Date;
  /**
   * Re-enters routing for a derived command. Used by shortcuts.
   */
  dispatch: (command: string) => Promise<SkillOutcome>;
}

export interface SkillMatch {
  /** Command remainder the action works on, e.g. the city for weather. */
  args: string;
  groups: string[];
}

export interface Skill {
  readonly name: string;
  readonly endsSession?: boolean;
  match(command: string): SkillMatch | null;
  run(match: SkillMatch, context: SkillContext): Promise<void>;
}

export type SkillOutcome =
  | { kind: "handled"; skill: string; failed: boolean }
  | { kind: "session_end"; skill: string }
  | { kind: "unclaimed" };

export type FallbackResult =
  | { kind: "answer"; text: string }
  | { kind: "web_search"; query: string };

export type CycleOutcomeKind =
  | "silence"
  | "ignored"
  | "reprompt_empty"
  | "handled"
  | "fallback"
  | "session_end"
  | "closed";

export interface CycleReport {
  outcome: CycleOutcomeKind;
  heard: string;
  command: string;
  skill?: string;
  fallback?: FallbackResult;
}

export interface ShortcutDefinition {
  name: string;
  trigger: string;
  action: string;
  passThroughArgs: boolean;
  enabled: boolean;
}

export interface AppEntry {
  name: string;
  path: string;
}

export interface BackendCapabilities {
  offlineTranscription: boolean;
  onlineTranscription: boolean;
  generativeAnswers: boolean;
  weather: boolean;
}

export interface AssistantConfig {
  assistantName: string;
  inputMode: InputMode;
  micDevice?: string;
  listenTimeoutMs: number;
  phraseLimitMs: number;
  networkTimeoutMs: number;
  whisperCliPath?: string;
  whisperModelPath?: string;
  speechApiKey?: string;
  speechLanguage: string;
  geminiApiKey?: string;
  geminiModel: string;
  weatherApiKey?: string;
  appsFile?: string;
  shortcutsFile?: string;
  searchUrl: string;
  ttsEnabled: boolean;
  debug: boolean;
  capabilities: BackendCapabilities;
}
