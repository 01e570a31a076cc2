export class TimeoutError extends Error {
  constructor(label: string, readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs} ms.`);
    this.name = "TimeoutError";
  }
}

export const clampTimeoutMs = (value: unknown, fallback: number, min = 500, max = 30_000): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, Math.round(parsed)));
};

/**
 * Races an operation against a timer. The operation receives an AbortSignal
 * that fires when the bound elapses so fetch-style callers can cancel the request.
 */
export const withTimeout = async <T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label = "Operation"
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
};
