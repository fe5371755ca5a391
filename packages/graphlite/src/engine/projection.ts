/**
 * Field Projection
 */

import type { AttributeValue } from "../store/types"

export type ResolvedField = { found: true; value: AttributeValue } | { found: false }

/**
 * Resolve a field: the exact key first, then a dotted path through nested objects.
 */
export function resolveField(
  record: Readonly<Record<string, AttributeValue>>,
  field: string,
): ResolvedField {
  if (Object.prototype.hasOwnProperty.call(record, field)) {
    const value = record[field]
    if (value !== undefined) return { found: true, value }
  }
  if (!field.includes(".")) return { found: false }

  let current: AttributeValue = record
  for (const segment of field.split(".")) {
    if (typeof current !== "object" || current === null || Array.isArray(current)) {
      return { found: false }
    }
    if (!Object.prototype.hasOwnProperty.call(current, segment)) return { found: false }
    const next: AttributeValue | undefined = current[segment]
    if (next === undefined) return { found: false }
    current = next
  }
  return { found: true, value: current }
}

/**
 * Restrict a record to the requested fields. Without fields the whole record
 * is returned; absent fields are omitted.
 */
export function project(
  record: Readonly<Record<string, AttributeValue>>,
  fields?: readonly string[],
): Record<string, AttributeValue> {
  if (!fields || fields.length === 0) return { ...record }

  const result: Record<string, AttributeValue> = {}
  for (const field of fields) {
    const resolved = resolveField(record, field)
    if (resolved.found) {
      result[field] = resolved.value
    }
  }
  return result
}
