import { existsSync } from "node:fs";
import { spawn } from "node:child_process";
import type { ActionResult, AppEntry, AppLauncher } from "../../../shared/contracts";
import { appsFileSchema } from "../../../shared/schemas";
import { JsonConfigFile } from "../json-config";
import { getErrorMessage, Logger } from "../logger";
import type { DetachedSpawn } from "./url-opener";

const normalizeName = (value: string): string => value.trim().replace(/\s+/g, " ").toLowerCase();

/**
 * Launches local applications from a configured name → executable map. A name
 * whose path does not exist is a normal "unavailable" state.
 */
export class LocalAppLauncher implements AppLauncher {
  private readonly entries: Map<string, AppEntry>;
  private readonly spawnDetached: DetachedSpawn;
  private readonly pathExists: (path: string) => boolean;

  constructor(
    entries: AppEntry[],
    private readonly logger: Logger,
    options: { spawn?: DetachedSpawn; exists?: (path: string) => boolean } = {}
  ) {
    this.entries = new Map(entries.map((entry) => [normalizeName(entry.name), entry]));
    this.spawnDetached = options.spawn ?? spawn;
    this.pathExists = options.exists ?? existsSync;
  }

  static fromFile(filePath: string | undefined, logger: Logger): LocalAppLauncher {
    if (!filePath) {
      return new LocalAppLauncher([], logger);
    }
    const catalog = new JsonConfigFile(filePath, appsFileSchema, logger).read({});
    return new LocalAppLauncher(
      Object.entries(catalog).map(([name, path]) => ({ name, path })),
      logger
    );
  }

  has(name: string): boolean {
    return this.entries.has(normalizeName(name));
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  async launch(name: string): Promise<ActionResult> {
    const key = normalizeName(name);
    const entry = this.entries.get(key);
    if (!entry) {
      return { ok: false, message: `I don't know an application called ${key}.` };
    }

    if (!this.pathExists(entry.path)) {
      return { ok: false, message: `${key} is not available on this machine.` };
    }

    try {
      const child = this.spawnDetached(entry.path, [], {
        detached: true,
        stdio: "ignore",
        windowsHide: true
      });
      child.on("error", (error) => {
        this.logger.warn("Application launch failed.", { app: key, error: error.message });
      });
      child.unref();
      return { ok: true, message: `Opening ${key}.` };
    } catch (error) {
      this.logger.warn("Application launch failed.", { app: key, error: getErrorMessage(error) });
      return { ok: false, message: `Sorry, I couldn't open ${key}.` };
    }
  }
}
