/**
 * Path Matcher
 *
 * Enumerates multi-hop paths by expanding a frontier of partial paths one
 * pattern step at a time. A partial path with no passing neighbor for a step
 * is dropped; nothing is marked visited, so nodes and relationships may repeat.
 * Every returned path owns its records; no two paths share an object.
 */

import { z } from "zod"
import { ValidationError } from "../errors"
import { directionSchema, parseInput } from "../schemas"
import type { GraphStore } from "../store"
import { clone } from "../store/clone"
import type { Direction, StoredNode, StoredRelationship } from "../store/types"
import { compileCondition, matchesCompiled, type CompiledCondition, type Condition } from "./conditions"

/**
 * One traversal hop.
 */
export interface PatternStep {
  /**
   * Relationship type filter. Omitted matches every relationship, `null`
   * matches only untyped ones, a string matches that type exactly.
   */
  relType?: string | null
  /** Label the next node must carry */
  label?: string
  /** Condition the next node must satisfy */
  node?: Condition
}

/**
 * Path query: a start condition followed by an ordered list of hops.
 */
export interface PatternQuery {
  /** Label every start node must carry */
  startLabel?: string
  start?: Condition
  pattern?: PatternStep[]
  /** Ignored on undirected graphs (default: "out") */
  direction?: Direction
}

/**
 * A matched path: `nodes.length === relationships.length + 1`.
 */
export interface MatchedPath {
  nodes: StoredNode[]
  relationships: StoredRelationship[]
}

interface CompiledStep {
  relType: string | null | undefined
  label: string | undefined
  node: CompiledCondition
}

const labelFilterSchema = z.string().optional()

const patternStepSchema = z
  .object({
    relType: z.string().nullable().optional(),
    label: z.string().optional(),
    node: z.record(z.unknown()).optional(),
  })
  .strict()

export class PathMatcher {
  constructor(private readonly store: GraphStore) {}

  /**
   * Enumerate every path matching the query.
   *
   * @throws ValidationError for malformed conditions, steps or direction
   */
  match(query: PatternQuery): MatchedPath[] {
    const start = compileCondition(query.start)
    const direction = parseInput(directionSchema, query.direction ?? "out", "direction")
    const startLabel = parseInput(labelFilterSchema, query.startLabel, "startLabel")
    const steps = this.compileSteps(query.pattern ?? [])

    const results: MatchedPath[] = []
    for (const node of this.store.nodes(startLabel)) {
      if (!matchesCompiled(node.attributes, start)) continue
      const paths = this.expand({ nodes: [node], relationships: [] }, steps, direction)
      results.push(...paths.map(clone))
    }
    return results
  }

  private compileSteps(pattern: PatternStep[]): CompiledStep[] {
    if (!Array.isArray(pattern)) {
      throw new ValidationError("Pattern must be an array of steps", "pattern", pattern)
    }
    return pattern.map((step, index) => {
      parseInput(patternStepSchema, step, `pattern step ${index}`)
      return { relType: step.relType, label: step.label, node: compileCondition(step.node) }
    })
  }

  /**
   * Expand one start path through every step, pruning eagerly.
   */
  private expand(
    initial: MatchedPath,
    steps: CompiledStep[],
    direction: Direction,
  ): MatchedPath[] {
    let frontier: MatchedPath[] = [initial]

    for (const step of steps) {
      const next: MatchedPath[] = []
      for (const path of frontier) {
        const tail = path.nodes[path.nodes.length - 1]
        if (!tail) continue

        for (const { relationship, neighbor } of this.store.incident(tail.id, direction)) {
          if (!matchesType(relationship, step.relType)) continue
          const node = this.store.getNode(neighbor)
          if (step.label !== undefined && !node.labels.includes(step.label)) continue
          if (!matchesCompiled(node.attributes, step.node)) continue
          next.push({
            nodes: [...path.nodes, node],
            relationships: [...path.relationships, relationship],
          })
        }
      }
      frontier = next
      if (frontier.length === 0) break
    }

    return frontier
  }
}

function matchesType(relationship: StoredRelationship, relType: string | null | undefined): boolean {
  if (relType === undefined) return true
  return relationship.type === relType
}
