import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Speaker } from "../../../shared/contracts";
import { getErrorMessage, Logger } from "../logger";

const execFileAsync = promisify(execFile);

const SPEAK_TIMEOUT_MS = 30_000;

export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeout: number; windowsHide: boolean }
) => Promise<unknown>;

interface SpeechCommand {
  file: string;
  args: string[];
}

export const speechCommandsFor = (platform: NodeJS.Platform, text: string): SpeechCommand[] => {
  if (platform === "darwin") {
    return [{ file: "say", args: [text] }];
  }

  if (platform === "win32") {
    const safeText = text.replace(/'/g, "''");
    return [
      {
        file: "powershell",
        args: [
          "-NoProfile",
          "-ExecutionPolicy",
          "Bypass",
          "-Command",
          `$ErrorActionPreference='Stop'; Add-Type -AssemblyName System.Speech; ` +
            `$s=New-Object System.Speech.Synthesis.SpeechSynthesizer; $s.Rate=0; $s.Speak('${safeText}');`
        ]
      },
      {
        file: "powershell",
        args: [
          "-NoProfile",
          "-ExecutionPolicy",
          "Bypass",
          "-Command",
          `$ErrorActionPreference='Stop'; $v=New-Object -ComObject SAPI.SpVoice; $v.Rate=0; [void]$v.Speak('${safeText}');`
        ]
      }
    ];
  }

  return [
    { file: "espeak", args: [text] },
    { file: "spd-say", args: ["--wait", text] }
  ];
};

interface SystemSpeakerOptions {
  enabled: boolean;
  logger: Logger;
  assistantName: string;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
}

/**
 * Speaks through the platform's speech synthesizer and echoes every line to the
 * console. Resolves once the line has been delivered or every synthesizer failed.
 */
export class SystemSpeaker implements Speaker {
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private readonly label: string;
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;
  private unavailableReported = false;

  constructor(options: SystemSpeakerOptions) {
    this.enabled = options.enabled;
    this.logger = options.logger;
    this.label = options.assistantName.charAt(0).toUpperCase() + options.assistantName.slice(1);
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? ((file, args, execOptions) => execFileAsync(file, args, execOptions));
  }

  async speak(text: string): Promise<void> {
    const line = text.trim();
    if (!line) {
      return;
    }

    this.logger.info(`${this.label}: ${line}`);

    if (!this.enabled) {
      return;
    }

    const failures: string[] = [];
    for (const command of speechCommandsFor(this.platform, line)) {
      try {
        await this.run(command.file, command.args, { timeout: SPEAK_TIMEOUT_MS, windowsHide: true });
        return;
      } catch (error) {
        failures.push(`${command.file}: ${getErrorMessage(error)}`);
      }
    }

    if (!this.unavailableReported) {
      this.unavailableReported = true;
      this.logger.warn("Speech synthesis unavailable; continuing with console output only.", failures);
    }
  }
}
