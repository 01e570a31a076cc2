import type { ZodType, ZodTypeDef } from "zod";
import { withTimeout } from "../timeout";

export type HttpJsonResult<T> = { ok: true; data: T } | { ok: false; status?: number; reason: string };

/**
 * Bounded GET returning schema-validated JSON. Never throws.
 */
export const fetchJson = async <T>(
  url: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  timeoutMs: number
): Promise<HttpJsonResult<T>> => {
  try {
    const response = await withTimeout(
      (signal) => fetch(url, { headers: { Accept: "application/json" }, signal }),
      timeoutMs,
      "HTTP request"
    );

    if (!response.ok) {
      return { ok: false, status: response.status, reason: `HTTP ${response.status}` };
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      return { ok: false, status: response.status, reason: "Unexpected response shape." };
    }
    return { ok: true, data: parsed.data };
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
};
