/**
 * Logging contract used by core services.
 * Satisfied by infrastructure/logging/Logger and its child loggers.
 */
export interface ILogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
