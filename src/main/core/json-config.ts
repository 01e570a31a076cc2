import { existsSync, readFileSync } from "node:fs";
import type { ZodType, ZodTypeDef } from "zod";
import { getErrorMessage, Logger } from "./logger";

/**
 * Read-only JSON configuration file validated against a schema. Missing or
 * malformed files yield the default value and a warning.
 */
export class JsonConfigFile<T> {
  constructor(
    private readonly filePath: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
    private readonly logger: Logger
  ) {}

  read(defaultValue: T): T {
    if (!existsSync(this.filePath)) {
      this.logger.warn(`Config file not found: ${this.filePath}`);
      return defaultValue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf8"));
    } catch (error) {
      this.logger.warn(`Config file unreadable: ${this.filePath}`, getErrorMessage(error));
      return defaultValue;
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(
        `Config file invalid: ${this.filePath}`,
        parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      );
      return defaultValue;
    }
    return parsed.data;
  }
}
