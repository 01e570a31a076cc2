const PREFIX = "[nova]";

export class Logger {
  constructor(private readonly verbose = false) {}

  debug(message: string, data?: unknown): void {
    if (!this.verbose) {
      return;
    }
    if (data === undefined) {
      console.debug(`${PREFIX} ${message}`);
      return;
    }
    console.debug(`${PREFIX} ${message}`, data);
  }

  info(message: string, data?: unknown): void {
    if (data === undefined) {
      console.log(`${PREFIX} ${message}`);
      return;
    }
    console.log(`${PREFIX} ${message}`, data);
  }

  warn(message: string, data?: unknown): void {
    if (data === undefined) {
      console.warn(`${PREFIX} ${message}`);
      return;
    }
    console.warn(`${PREFIX} ${message}`, data);
  }

  error(message: string, data?: unknown): void {
    if (data === undefined) {
      console.error(`${PREFIX} ${message}`);
      return;
    }
    console.error(`${PREFIX} ${message}`, data);
  }
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
