/**
 * Graph File I/O
 *
 * Whole-file reads and atomic whole-file writes (temp file, then rename).
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs"
import { dirname } from "node:path"
import { PersistenceError } from "../errors"
import { decodeGraph, type GraphData, type GraphDocument } from "./codec"

/** Path value selecting memory-only mode. */
export const MEMORY_PATH = ":memory:"

export function isMemoryPath(path: string | undefined): path is undefined | typeof MEMORY_PATH {
  return path === undefined || path === MEMORY_PATH
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Read and decode a graph file.
 *
 * @returns undefined when the file does not exist
 * @throws PersistenceError when the file is unreadable or malformed
 */
export function loadGraphFile(path: string): GraphData | undefined {
  if (!existsSync(path)) return undefined

  let text: string
  try {
    text = readFileSync(path, "utf8")
  } catch (error) {
    throw new PersistenceError(`Cannot read graph file ${path}`, path, asError(error))
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error) {
    throw new PersistenceError(`Graph file ${path} is not valid JSON`, path, asError(error))
  }

  return decodeGraph(parsed, path)
}

/**
 * Write a graph document, replacing the file atomically.
 *
 * @throws PersistenceError when the file cannot be written
 */
export function saveGraphFile(path: string, document: GraphDocument): void {
  const temp = `${path}.${process.pid}.tmp`
  try {
    mkdirSync(dirname(path), { recursive: true })
    writeFileSync(temp, JSON.stringify(document, null, 2), "utf8")
    renameSync(temp, path)
  } catch (error) {
    rmSync(temp, { force: true })
    throw new PersistenceError(`Cannot write graph file ${path}`, path, asError(error))
  }
}
