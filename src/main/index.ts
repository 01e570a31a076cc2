#!/usr/bin/env node
import "dotenv/config";
import type { AudioSource } from "../shared/contracts";
import { AssistantSession } from "./core/assistant-session";
import { GoogleSpeechBackend } from "./core/backends/google-speech-backend";
import { WhisperCliBackend } from "./core/backends/whisper-cli-backend";
import { ConsoleSource } from "./core/capture/console-source";
import { SoxRecorder } from "./core/capture/sox-recorder";
import { resolveConfig } from "./core/config";
import { FallbackChain } from "./core/fallback-chain";
import { GeminiAnswerAdapter } from "./core/llm-adapter";
import { getErrorMessage, Logger } from "./core/logger";
import { LocalAppLauncher } from "./core/services/app-launcher";
import { SystemSpeaker } from "./core/services/speaker";
import { MyMemoryTranslator } from "./core/services/translation-service";
import { SystemUrlOpener } from "./core/services/url-opener";
import { OpenWeatherService } from "./core/services/weather-service";
import { WikipediaService } from "./core/services/wikipedia-service";
import { ShortcutService } from "./core/shortcut-service";
import { buildBuiltinSkills } from "./core/skills/builtin-skills";
import { createSkillContextFactory, SkillRouter } from "./core/skill-router";
import { TranscriptionPipeline } from "./core/transcription-pipeline";
import { WakeWordGate } from "./core/wake-word-gate";

const main = async (): Promise<void> => {
  const config = resolveConfig();
  const logger = new Logger(config.debug);
  const { capabilities } = config;

  logger.info("Starting assistant.", {
    name: config.assistantName,
    input: config.inputMode,
    capabilities
  });

  const speaker = new SystemSpeaker({ enabled: config.ttsEnabled, logger, assistantName: config.assistantName });
  const urlOpener = new SystemUrlOpener(logger);

  const pipeline = new TranscriptionPipeline({
    offline: capabilities.offlineTranscription
      ? new WhisperCliBackend({
          cliPath: config.whisperCliPath,
          modelPath: config.whisperModelPath,
          timeoutMs: config.phraseLimitMs + config.networkTimeoutMs,
          language: config.speechLanguage.split("-")[0],
          logger
        })
      : undefined,
    online: capabilities.onlineTranscription
      ? new GoogleSpeechBackend({
          apiKey: config.speechApiKey,
          languageCode: config.speechLanguage,
          timeoutMs: config.networkTimeoutMs
        })
      : undefined,
    logger
  });

  const source: AudioSource =
    config.inputMode === "console"
      ? new ConsoleSource({ output: process.stdout })
      : new SoxRecorder({ logger, device: config.micDevice });

  if (config.inputMode === "microphone" && !pipeline.hasBackends()) {
    logger.warn("No transcription backend is configured; spoken commands cannot be understood.");
  }

  const router = new SkillRouter({
    skills: buildBuiltinSkills({
      assistantName: config.assistantName,
      searchUrl: config.searchUrl,
      shortcuts: ShortcutService.fromFile(config.shortcutsFile, logger),
      apps: LocalAppLauncher.fromFile(config.appsFile, logger),
      translator: new MyMemoryTranslator(config.networkTimeoutMs, logger),
      encyclopedia: new WikipediaService(config.networkTimeoutMs, logger),
      weather:
        capabilities.weather && config.weatherApiKey
          ? new OpenWeatherService(config.weatherApiKey, config.networkTimeoutMs, logger)
          : undefined
    }),
    createContext: createSkillContextFactory({ speaker, urlOpener }),
    actionTimeoutMs: config.networkTimeoutMs * 2,
    logger
  });
  logger.debug("Registered skills.", router.listSkills());

  const generative = capabilities.generativeAnswers
    ? new GeminiAnswerAdapter({
        assistantName: config.assistantName,
        apiKey: config.geminiApiKey,
        model: config.geminiModel,
        timeoutMs: config.networkTimeoutMs,
        logger
      })
    : null;

  const session = new AssistantSession({
    assistantName: config.assistantName,
    source,
    pipeline,
    gate: WakeWordGate.forAssistant(config.assistantName),
    router,
    fallback: new FallbackChain(generative, logger),
    speaker,
    urlOpener,
    bounds: { listenTimeoutMs: config.listenTimeoutMs, phraseLimitMs: config.phraseLimitMs },
    searchUrl: config.searchUrl,
    logger
  });

  process.on("SIGINT", () => {
    if (session.isStopped()) {
      process.exit(130);
    }
    logger.info("Interrupt received; stopping after the current command. Press Ctrl+C again to quit now.");
    session.stop();
  });

  await session.run();
  logger.info("Assistant stopped.");
};

main().catch((error: unknown) => {
  console.error("[nova] Fatal error.", getErrorMessage(error));
  process.exitCode = 1;
});
