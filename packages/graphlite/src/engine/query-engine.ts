/**
 * Query Engine
 *
 * Declarative reads over the GraphStore: condition filtering, pattern
 * matching and the projections applied to their results.
 */

import { fieldsSchema, parseInput } from "../schemas"
import type { GraphStore } from "../store"
import type { NodeId } from "../store/types"
import { compileCondition, matchesCompiled, type Condition } from "./conditions"
import { PathMatcher, type MatchedPath, type PatternQuery } from "./path-matcher"
import { project } from "./projection"
import {
  nodeToPathElement,
  nodeToRecord,
  relationshipToPathElement,
  relationshipToRecord,
  type EntityRecord,
  type StructuredPath,
} from "./records"

export interface FindNodesOptions {
  /** Only nodes carrying this label */
  label?: string
  where?: Condition
  fields?: string[]
}

export interface FindRelationshipsOptions {
  /** Only relationships of this type; `null` for untyped */
  type?: string | null
  where?: Condition
  fields?: string[]
}

export interface PathProjection {
  /** Fields kept on every node */
  nodeFields?: string[]
  /** Fields kept on every relationship */
  relationshipFields?: string[]
}

/**
 * Nodes and relationships of one path, rendered in parallel.
 */
export interface FullPath {
  nodes: EntityRecord[]
  relationships: EntityRecord[]
}

/**
 * Query engine configuration.
 */
export interface QueryEngineConfig {
  /** Called after every query with its name and result count */
  onQuery?: (operation: string, resultCount: number) => void
}

/**
 * Query engine that evaluates conditions and patterns against a store.
 */
export class QueryEngine {
  private readonly matcher: PathMatcher

  constructor(
    private readonly store: GraphStore,
    private readonly config: QueryEngineConfig = {},
  ) {
    this.matcher = new PathMatcher(store)
  }

  // ===========================================================================
  // FIND
  // ===========================================================================

  /**
   * Nodes satisfying a condition, flattened and projected.
   */
  findNodes(options: FindNodesOptions = {}): EntityRecord[] {
    const condition = compileCondition(options.where)
    const fields = parseInput(fieldsSchema, options.fields, "fields")

    const results = this.store
      .nodes(options.label)
      .filter((node) => matchesCompiled(node.attributes, condition))
      .map((node) => project(nodeToRecord(node), fields))
    return this.report("findNodes", results)
  }

  /**
   * Relationships satisfying a condition, flattened and projected.
   */
  findRelationships(options: FindRelationshipsOptions = {}): EntityRecord[] {
    const condition = compileCondition(options.where)
    const fields = parseInput(fieldsSchema, options.fields, "fields")

    const results = this.store
      .relationships(options.type)
      .filter((relationship) => matchesCompiled(relationship.attributes, condition))
      .map((relationship) => project(relationshipToRecord(relationship), fields))
    return this.report("findRelationships", results)
  }

  // ===========================================================================
  // PATTERNS
  // ===========================================================================

  /**
   * Matched paths as raw stored records.
   */
  matchPaths(query: PatternQuery): MatchedPath[] {
    return this.report("matchPaths", this.matcher.match(query))
  }

  /**
   * Matched paths as node sequences, optionally projected.
   */
  matchPattern(query: PatternQuery, fields?: string[]): EntityRecord[][] {
    const validFields = parseInput(fieldsSchema, fields, "fields")
    const results = this.matcher
      .match(query)
      .map((path) => path.nodes.map((node) => project(nodeToRecord(node), validFields)))
    return this.report("matchPattern", results)
  }

  /**
   * Matched paths as node ID sequences.
   */
  matchPatternIds(query: PatternQuery): NodeId[][] {
    const results = this.matcher.match(query).map((path) => path.nodes.map((node) => node.id))
    return this.report("matchPatternIds", results)
  }

  /**
   * Matched paths as parallel node and relationship sequences.
   */
  matchFullPath(query: PatternQuery, projection: PathProjection = {}): FullPath[] {
    const nodeFields = parseInput(fieldsSchema, projection.nodeFields, "nodeFields")
    const relationshipFields = parseInput(
      fieldsSchema,
      projection.relationshipFields,
      "relationshipFields",
    )
    const results = this.matcher.match(query).map((path) => ({
      nodes: path.nodes.map((node) => project(nodeToRecord(node), nodeFields)),
      relationships: path.relationships.map((relationship) =>
        project(relationshipToRecord(relationship), relationshipFields),
      ),
    }))
    return this.report("matchFullPath", results)
  }

  /**
   * Matched paths as alternating node/relationship lists. Projections apply
   * to `properties`; identity, labels and type are always kept.
   */
  matchStructuredPath(query: PatternQuery, projection: PathProjection = {}): StructuredPath[] {
    const nodeFields = parseInput(fieldsSchema, projection.nodeFields, "nodeFields")
    const relationshipFields = parseInput(
      fieldsSchema,
      projection.relationshipFields,
      "relationshipFields",
    )
    const results = this.matcher.match(query).map((path) => {
      const elements: StructuredPath = []
      path.nodes.forEach((node, index) => {
        const relationship = index > 0 ? path.relationships[index - 1] : undefined
        if (relationship) {
          elements.push(relationshipToPathElement(relationship, relationshipFields))
        }
        elements.push(nodeToPathElement(node, nodeFields))
      })
      return elements
    })
    return this.report("matchStructuredPath", results)
  }

  private report<T>(operation: string, results: T[]): T[] {
    this.config.onQuery?.(operation, results.length)
    return results
  }
}
