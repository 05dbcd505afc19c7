import type { Logger } from "../interfaces/logger.js";

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
}

/** Default logger for breakers, buses and registries created without one. */
export const noopLogger: Logger = new NoopLogger();
