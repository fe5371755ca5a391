/**
 * Graph Configuration
 */

import { z } from "zod"
import type { Logger, LogLevel } from "./logger"
import { parseInput } from "./schemas"

/**
 * Configuration for a graph database.
 */
export interface GraphConfig {
  /** Whether relationships are directional (default: false) */
  directed?: boolean
  /** Backing file; omitted or ':memory:' keeps the graph in memory only */
  path?: string
  /** Level of the default logger (default: 'warn') */
  logLevel?: LogLevel
  /** Logger to use instead of the default one */
  logger?: Logger
}

export const graphConfigSchema = z
  .object({
    directed: z.boolean().default(false),
    path: z.string().min(1).optional(),
    logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("warn"),
    logger: z.custom<Logger>(
      (value) =>
        typeof value === "object" &&
        value !== null &&
        "child" in value &&
        typeof value.child === "function",
      { message: "Expected a pino-compatible logger" },
    ).optional(),
  })
  .strict()

export type ResolvedGraphConfig = z.output<typeof graphConfigSchema>

/**
 * Validate a configuration and apply defaults.
 *
 * @throws ValidationError when the configuration is invalid
 */
export function resolveConfig(config: GraphConfig = {}): ResolvedGraphConfig {
  return parseInput(graphConfigSchema, config, "graph config")
}
