/**
 * Input Schemas
 *
 * Zod schemas for every value that crosses the public API or the file boundary.
 */

import { z } from "zod"
import { ValidationError } from "./errors"
import type { AttributeValue, NodeId } from "./store/types"

// =============================================================================
// VALUES
// =============================================================================

export const nodeIdSchema: z.ZodType<NodeId> = z.union([z.string(), z.number().finite()])

export const attributeValueSchema: z.ZodType<AttributeValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(attributeValueSchema),
    z.record(attributeValueSchema),
  ]),
)

export const attributesSchema = z.record(attributeValueSchema)

export const labelsSchema = z.array(z.string())

export const relationshipTypeSchema = z.string().nullable()

// =============================================================================
// QUERY OPTIONS
// =============================================================================

export const directionSchema = z.enum(["out", "in", "any"])

export const logicSchema = z.enum(["and", "or", "not"])

export const comparisonOperatorSchema = z.enum(["eq", "ne", "gt", "gte", "lt", "lte"])

export const fieldsSchema = z.array(z.string()).optional()

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Parse a value, converting zod failures into a ValidationError.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  field: string,
): z.output<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new ValidationError(`Invalid ${field}: ${formatIssues(result.error)}`, field, value)
  }
  return result.data
}

/**
 * Render zod issues as a single line, prefixing each with its path.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ")
}
