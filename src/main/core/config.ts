import type { AssistantConfig, BackendCapabilities, InputMode } from "../../shared/contracts";
import { clampTimeoutMs } from "./timeout";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export const DEFAULT_SEARCH_URL = "https://www.google.com/search?q=";

const normalizeText = (value: string): string => value.trim().replace(/\s+/g, " ");

export const parseEnvBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (typeof value !== "string") {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return fallback;
};

const toOptional = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const toInputMode = (value: string | undefined): InputMode =>
  value?.trim().toLowerCase() === "console" ? "console" : "microphone";

const toSearchUrl = (value: string | undefined): string => {
  const candidate = toOptional(value);
  return candidate && /^https?:\/\//i.test(candidate) ? candidate : DEFAULT_SEARCH_URL;
};

/**
 * Reads the environment once into a frozen configuration. Missing optional
 * values disable the matching backend or skill instead of failing.
 */
export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): Readonly<AssistantConfig> => {
  const whisperCliPath = toOptional(env.NOVA_WHISPER_CPP);
  const whisperModelPath = toOptional(env.NOVA_WHISPER_MODEL);
  const speechApiKey = toOptional(env.NOVA_SPEECH_API_KEY);
  const geminiApiKey = toOptional(env.GEMINI_API_KEY);
  const weatherApiKey = toOptional(env.OPENWEATHER_API_KEY);

  const capabilities: BackendCapabilities = Object.freeze({
    offlineTranscription: Boolean(whisperCliPath && whisperModelPath),
    onlineTranscription: Boolean(speechApiKey),
    generativeAnswers: Boolean(geminiApiKey),
    weather: Boolean(weatherApiKey)
  });

  return Object.freeze({
    assistantName: normalizeText(env.NOVA_NAME ?? "").toLowerCase() || "nova",
    inputMode: toInputMode(env.NOVA_INPUT),
    micDevice: toOptional(env.NOVA_MIC_DEVICE),
    listenTimeoutMs: clampTimeoutMs(toOptional(env.NOVA_LISTEN_TIMEOUT_MS) ?? 5000, 5000, 1000, 60_000),
    phraseLimitMs: clampTimeoutMs(toOptional(env.NOVA_PHRASE_LIMIT_MS) ?? 8000, 8000, 1000, 60_000),
    networkTimeoutMs: clampTimeoutMs(toOptional(env.NOVA_NETWORK_TIMEOUT_MS) ?? 6000, 6000),
    whisperCliPath,
    whisperModelPath,
    speechApiKey,
    speechLanguage: toOptional(env.NOVA_SPEECH_LANGUAGE) ?? "en-US",
    geminiApiKey,
    geminiModel: toOptional(env.NOVA_GEMINI_MODEL) ?? "gemini-1.5-flash",
    weatherApiKey,
    appsFile: toOptional(env.NOVA_APPS_FILE),
    shortcutsFile: toOptional(env.NOVA_SHORTCUTS_FILE),
    searchUrl: toSearchUrl(env.NOVA_SEARCH_URL),
    ttsEnabled: parseEnvBoolean(env.NOVA_TTS, true),
    debug: parseEnvBoolean(env.NOVA_DEBUG, false),
    capabilities
  });
};
