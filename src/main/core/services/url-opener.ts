import { spawn, type SpawnOptions } from "node:child_process";
import type { ActionResult, UrlOpener } from "../../../shared/contracts";
import { getErrorMessage, Logger } from "../logger";

export type DetachedSpawn = (file: string, args: string[], options: SpawnOptions) => { unref(): void; on(event: "error", listener: (error: Error) => void): unknown };

interface LaunchSpec {
  file: string;
  args: string[];
}

export const openerFor = (platform: NodeJS.Platform, target: string): LaunchSpec => {
  if (platform === "win32") {
    return { file: "cmd", args: ["/c", "start", "", target] };
  }
  if (platform === "darwin") {
    return { file: "open", args: [target] };
  }
  return { file: "xdg-open", args: [target] };
};

/**
 * Hands http(s) URLs to the desktop's default browser.
 */
export class SystemUrlOpener implements UrlOpener {
  private readonly platform: NodeJS.Platform;
  private readonly spawnDetached: DetachedSpawn;

  constructor(
    private readonly logger: Logger,
    options: { platform?: NodeJS.Platform; spawn?: DetachedSpawn } = {}
  ) {
    this.platform = options.platform ?? process.platform;
    this.spawnDetached = options.spawn ?? spawn;
  }

  async open(rawUrl: string): Promise<ActionResult> {
    let parsed: URL;

    try {
      parsed = new URL(rawUrl);
    } catch {
      return { ok: false, message: "Invalid URL." };
    }

    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { ok: false, message: "Only http/https URLs are allowed." };
    }

    const url = parsed.toString();
    const launch = openerFor(this.platform, url);

    try {
      const child = this.spawnDetached(launch.file, launch.args, {
        detached: true,
        stdio: "ignore",
        windowsHide: true
      });
      child.on("error", (error) => {
        this.logger.warn("Browser launch failed.", { url, error: error.message });
      });
      child.unref();
      return { ok: true, message: `Opening ${url}` };
    } catch (error) {
      this.logger.warn("Browser launch failed.", { url, error: getErrorMessage(error) });
      return { ok: false, message: "Unable to open the browser." };
    }
  }
}
