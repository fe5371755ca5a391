/**
 * Condition Evaluation
 *
 * Field predicates combined under a logic mode. Evaluation is pure; the
 * only order-dependent step is the final negation of `not`.
 */

import { isDeepStrictEqual } from "node:util"
import { ValidationError } from "../errors"
import { comparisonOperatorSchema, logicSchema, parseInput } from "../schemas"
import type { AttributeValue, Attributes } from "../store/types"
import { resolveField } from "./projection"

export type ComparisonOperator = "eq" | "ne" | "gt" | "gte" | "lt" | "lte"

export type LogicMode = "and" | "or" | "not"

/**
 * Operator map: every listed comparison must hold.
 */
export type ComparisonMap = Partial<Record<ComparisonOperator, AttributeValue>>

/**
 * A literal (equality) or an operator map. Any plain object is read as an
 * operator map; compare against a nested object with `{ eq: {...} }`.
 */
export type Predicate = string | number | boolean | null | AttributeValue[] | ComparisonMap

/**
 * Field predicates plus an optional logic mode under the reserved `_logic` key.
 *
 * @example
 * ```typescript
 * const adultsOrAlice: Condition = { _logic: "or", name: "Alice", age: { gte: 18 } }
 * ```
 */
export interface Condition {
  _logic?: LogicMode
  [field: string]: Predicate | undefined
}

/**
 * A condition after validation.
 */
export interface CompiledCondition {
  logic: LogicMode
  predicates: CompiledPredicate[]
}

interface CompiledPredicate {
  field: string
  comparisons: Array<{ operator: ComparisonOperator; operand: AttributeValue }>
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Replace `-0` with `0` throughout a value. Stored values never hold `-0`
 * (they pass through JSON), so equality must not tell the two apart.
 */
function normalizeZero(value: AttributeValue): AttributeValue {
  if (typeof value === "number") return Object.is(value, -0) ? 0 : value
  if (Array.isArray(value)) return value.map(normalizeZero)
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, nested]): [string, AttributeValue] => [
        key,
        normalizeZero(nested),
      ]),
    )
  }
  return value
}

/**
 * Validate a condition and normalize it into per-field comparison lists.
 *
 * @throws ValidationError for unknown operators, empty operator maps, missing operands or an unknown `_logic`
 */
export function compileCondition(condition: Condition = {}): CompiledCondition {
  if (!isPlainObject(condition)) {
    throw new ValidationError("Condition must be an object", "condition", condition)
  }
  const logic = parseInput(logicSchema, condition._logic ?? "and", "_logic")
  const predicates: CompiledPredicate[] = []

  for (const [field, predicate] of Object.entries(condition)) {
    if (field === "_logic" || predicate === undefined) continue

    if (!isPlainObject(predicate)) {
      predicates.push({
        field,
        comparisons: [{ operator: "eq", operand: normalizeZero(predicate) }],
      })
      continue
    }

    const entries = Object.entries(predicate)
    if (entries.length === 0) {
      throw new ValidationError(`Empty operator map for field "${field}"`, field, predicate)
    }
    const comparisons = entries.map(([operator, operand]) => {
      if (operand === undefined) {
        throw new ValidationError(
          `Missing operand for "${operator}" on field "${field}"`,
          field,
          predicate,
        )
      }
      return {
        operator: parseInput(comparisonOperatorSchema, operator, `operator for field "${field}"`),
        operand: normalizeZero(operand),
      }
    })
    predicates.push({ field, comparisons })
  }

  return { logic, predicates }
}

/**
 * Evaluate a compiled condition against an attribute mapping.
 */
export function matchesCompiled(attributes: Attributes, compiled: CompiledCondition): boolean {
  const results = compiled.predicates.map((predicate) => evaluatePredicate(attributes, predicate))

  switch (compiled.logic) {
    case "and":
      return results.every(Boolean)
    case "or":
      return results.some(Boolean)
    case "not":
      // Negation of the conjunction, not of each predicate.
      return !results.every(Boolean)
  }
}

/**
 * Validate and evaluate a condition against an attribute mapping.
 */
export function evaluateCondition(attributes: Attributes, condition: Condition = {}): boolean {
  return matchesCompiled(attributes, compileCondition(condition))
}

function evaluatePredicate(attributes: Attributes, predicate: CompiledPredicate): boolean {
  const resolved = resolveField(attributes, predicate.field)
  // Absent fields fail every comparison, `ne` included.
  if (!resolved.found) return false
  return predicate.comparisons.every(({ operator, operand }) =>
    evaluateComparison(resolved.value, operator, operand),
  )
}

/**
 * Compare an attribute value with an operand. Ordering holds only between two
 * numbers or two strings.
 */
export function evaluateComparison(
  value: AttributeValue,
  operator: ComparisonOperator,
  operand: AttributeValue,
): boolean {
  switch (operator) {
    case "eq":
      return isDeepStrictEqual(normalizeZero(value), normalizeZero(operand))
    case "ne":
      return !isDeepStrictEqual(normalizeZero(value), normalizeZero(operand))
    case "gt":
      return compareOrdered(value, operand, (order) => order > 0)
    case "gte":
      return compareOrdered(value, operand, (order) => order >= 0)
    case "lt":
      return compareOrdered(value, operand, (order) => order < 0)
    case "lte":
      return compareOrdered(value, operand, (order) => order <= 0)
  }
}

function compareOrdered(
  value: AttributeValue,
  operand: AttributeValue,
  accept: (order: number) => boolean,
): boolean {
  if (typeof value === "number" && typeof operand === "number") {
    return accept(value - operand)
  }
  if (typeof value === "string" && typeof operand === "string") {
    return accept(value < operand ? -1 : value > operand ? 1 : 0)
  }
  return false
}
