/**
 * Custom Error Classes
 */

import type { NodeId } from "../store/types"

/**
 * Machine-readable error kind, for callers that branch on failures.
 */
export type ErrorCode = "REFERENCE" | "NOT_FOUND" | "VALIDATION" | "PERSISTENCE"

/**
 * Base error for all graph store errors.
 */
export class GraphError extends Error {
  public override readonly cause?: Error

  constructor(
    message: string,
    public readonly code: ErrorCode,
    cause?: Error,
  ) {
    super(message)
    this.name = "GraphError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Reference error.
 * Thrown when a relationship names an endpoint node that does not exist.
 */
export class NodeReferenceError extends GraphError {
  constructor(
    public readonly source: NodeId,
    public readonly target: NodeId,
    public readonly missing: NodeId[],
  ) {
    super(
      `Relationship ${formatId(source)} -> ${formatId(target)} references missing node(s): ${missing
        .map(formatId)
        .join(", ")}`,
      "REFERENCE",
    )
    this.name = "NodeReferenceError"
  }
}

/**
 * Not found error.
 * Thrown when a get/update targets a node or relationship that does not exist.
 */
export class NotFoundError extends GraphError {
  constructor(
    public readonly entity: "node" | "relationship",
    public readonly key: NodeId | [NodeId, NodeId],
  ) {
    const details = Array.isArray(key)
      ? `${formatId(key[0])} -> ${formatId(key[1])}`
      : formatId(key)
    super(`${entity === "node" ? "Node" : "Relationship"} not found: ${details}`, "NOT_FOUND")
    this.name = "NotFoundError"
  }
}

/**
 * Validation error.
 * Thrown for malformed conditions, directions, identifiers or configuration.
 */
export class ValidationError extends GraphError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly received?: unknown,
  ) {
    super(message, "VALIDATION")
    this.name = "ValidationError"
  }
}

/**
 * Persistence error.
 * Thrown when the backing file cannot be read, written or decoded.
 */
export class PersistenceError extends GraphError {
  constructor(
    message: string,
    public readonly path?: string,
    cause?: Error,
  ) {
    super(message, "PERSISTENCE", cause)
    this.name = "PersistenceError"
  }
}

/**
 * Narrow an unknown value to a GraphError, optionally of a given kind.
 */
export function isGraphError(value: unknown, code?: ErrorCode): value is GraphError {
  return value instanceof GraphError && (code === undefined || value.code === code)
}

function formatId(id: NodeId): string {
  return typeof id === "string" ? `'${id}'` : String(id)
}
