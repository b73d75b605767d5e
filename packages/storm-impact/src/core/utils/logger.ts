/**
 * Structured logging utility for the impact engine
 *
 * Services accept a `PipelineLogger` so callers decide where output goes.
 * The CLI supplies its structured logger; tests use `silentLogger`.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

/**
 * Logging surface accepted by every service
 */
export interface PipelineLogger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;
}

/**
 * Logger that discards everything
 */
export const silentLogger: PipelineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
