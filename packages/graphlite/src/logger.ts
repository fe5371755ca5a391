/**
 * Logging
 */

import pino, { type DestinationStream, type Logger } from "pino"

export type { Logger }

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent"

export interface LoggerOptions {
  /** Logger name (default: 'graphlite') */
  name?: string
  /** Log level (default: 'warn') */
  level?: LogLevel
}

/**
 * Create a structured JSON logger.
 */
export function createLogger(options: LoggerOptions = {}, destination?: DestinationStream): Logger {
  const config = {
    name: options.name ?? "graphlite",
    level: options.level ?? "warn",
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  }
  return destination ? pino(config, destination) : pino(config)
}
