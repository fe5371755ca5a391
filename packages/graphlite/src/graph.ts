/**
 * Graph Database
 *
 * Main entry point. Wires the store, the query engine and file persistence
 * together: every mutation is validated, applied, then written to the
 * backing file before returning.
 */

import { resolveConfig, type GraphConfig } from "./config"
import { PersistenceError, isGraphError } from "./errors"
import {
  QueryEngine,
  type FindNodesOptions,
  type FindRelationshipsOptions,
  type FullPath,
  type EntityRecord,
  type MatchedPath,
  type PathProjection,
  type PatternQuery,
  type StructuredPath,
} from "./engine"
import { createLogger, type Logger } from "./logger"
import {
  encodeGraph,
  isMemoryPath,
  loadGraphFile,
  saveGraphFile,
  type GraphDocument,
  type GraphData,
} from "./persistence"
import { GraphStore } from "./store"
import type {
  Attributes,
  Direction,
  NodeId,
  StoreStats,
  StoredNode,
  StoredRelationship,
} from "./store/types"

/**
 * Embedded graph database backed by an optional JSON file.
 */
export class GraphDatabase {
  /** Default backing file, undefined in memory-only mode */
  readonly path: string | undefined

  private readonly store: GraphStore
  private readonly engine: QueryEngine
  private readonly logger: Logger

  constructor(config: GraphConfig = {}) {
    const resolved = resolveConfig(config)
    this.path = isMemoryPath(resolved.path) ? undefined : resolved.path
    this.logger = (resolved.logger ?? createLogger({ level: resolved.logLevel })).child({
      component: "graph",
    })
    this.store = new GraphStore({ directed: resolved.directed })
    this.engine = new QueryEngine(this.store, {
      onQuery: (operation, resultCount) => this.logger.debug({ operation, resultCount }, "query"),
    })

    if (this.path !== undefined) {
      this.reload()
    }
  }

  get directed(): boolean {
    return this.store.directed
  }

  get memoryOnly(): boolean {
    return this.path === undefined
  }

  // ===========================================================================
  // NODES
  // ===========================================================================

  /** Create a node, or replace an existing node's labels and attributes. */
  addNode(id: NodeId, labels?: string[], attributes?: Attributes): void {
    this.mutate("addNode", () => this.store.addNode(id, labels, attributes))
  }

  /** Create a node, or merge labels and attributes into an existing one. */
  setNode(id: NodeId, labels?: string[], attributes?: Attributes): void {
    this.mutate("setNode", () => this.store.setNode(id, labels, attributes))
  }

  /** Merge-patch an existing node's attributes; throws NotFoundError if absent. */
  updateNode(id: NodeId, attributes: Attributes): void {
    this.mutate("updateNode", () => this.store.updateNode(id, attributes))
  }

  /** Remove a node and its relationships; returns false when it was absent. */
  removeNode(id: NodeId): boolean {
    return this.mutate("removeNode", () => this.store.removeNode(id))
  }

  getNode(id: NodeId): StoredNode {
    return this.store.getNode(id)
  }

  hasNode(id: NodeId): boolean {
    return this.store.hasNode(id)
  }

  nodes(label?: string): StoredNode[] {
    return this.store.nodes(label)
  }

  // ===========================================================================
  // RELATIONSHIPS
  // ===========================================================================

  /** Create or replace the relationship between two existing nodes. */
  addRelationship(
    source: NodeId,
    target: NodeId,
    type?: string | null,
    attributes?: Attributes,
  ): void {
    this.mutate("addRelationship", () =>
      this.store.addRelationship(source, target, type ?? null, attributes),
    )
  }

  /** Create a relationship, or merge attributes into the existing one. */
  setRelationship(
    source: NodeId,
    target: NodeId,
    type?: string | null,
    attributes?: Attributes,
  ): void {
    this.mutate("setRelationship", () =>
      this.store.setRelationship(source, target, type, attributes),
    )
  }

  /** Merge-patch an existing relationship's attributes; throws NotFoundError if absent. */
  updateRelationship(source: NodeId, target: NodeId, attributes: Attributes): void {
    this.mutate("updateRelationship", () =>
      this.store.updateRelationship(source, target, attributes),
    )
  }

  /** Remove a relationship; returns false when it was absent. */
  removeRelationship(source: NodeId, target: NodeId): boolean {
    return this.mutate("removeRelationship", () => this.store.removeRelationship(source, target))
  }

  getRelationship(source: NodeId, target: NodeId): StoredRelationship {
    return this.store.getRelationship(source, target)
  }

  hasRelationship(source: NodeId, target: NodeId): boolean {
    return this.store.hasRelationship(source, target)
  }

  relationships(type?: string | null): StoredRelationship[] {
    return this.store.relationships(type)
  }

  // ===========================================================================
  // TOPOLOGY
  // ===========================================================================

  neighbors(id: NodeId, direction?: Direction): NodeId[] {
    return this.store.neighbors(id, direction)
  }

  degree(id: NodeId, direction?: Direction): number {
    return this.store.degree(id, direction)
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  findNodes(options?: FindNodesOptions): EntityRecord[] {
    return this.engine.findNodes(options)
  }

  findRelationships(options?: FindRelationshipsOptions): EntityRecord[] {
    return this.engine.findRelationships(options)
  }

  matchPaths(query: PatternQuery): MatchedPath[] {
    return this.engine.matchPaths(query)
  }

  matchPattern(query: PatternQuery, fields?: string[]): EntityRecord[][] {
    return this.engine.matchPattern(query, fields)
  }

  matchPatternIds(query: PatternQuery): NodeId[][] {
    return this.engine.matchPatternIds(query)
  }

  matchFullPath(query: PatternQuery, projection?: PathProjection): FullPath[] {
    return this.engine.matchFullPath(query, projection)
  }

  matchStructuredPath(query: PatternQuery, projection?: PathProjection): StructuredPath[] {
    return this.engine.matchStructuredPath(query, projection)
  }

  // ===========================================================================
  // PERSISTENCE
  // ===========================================================================

  /**
   * Write the graph to a file. The default path is used when none is given
   * and stays unchanged when one is.
   *
   * @throws PersistenceError in memory-only mode without a path, or on write failure
   */
  save(path?: string): void {
    const target = path ?? this.path
    if (target === undefined || isMemoryPath(target)) {
      throw new PersistenceError("No file to save to: the graph is memory-only")
    }
    const document = this.toJSON()
    saveGraphFile(target, document)
    this.logger.info(
      { path: target, nodes: document.nodes.length, relationships: document.relationships.length },
      "graph saved",
    )
  }

  /**
   * Replace the in-memory graph with the contents of the default file. A
   * missing file leaves the graph empty.
   *
   * @throws PersistenceError when the file is unreadable or malformed
   */
  reload(): void {
    if (this.path === undefined) {
      throw new PersistenceError("No file to reload from: the graph is memory-only")
    }
    const data = loadGraphFile(this.path)
    if (!data) {
      this.store.clear()
      this.logger.info({ path: this.path }, "graph file absent, starting empty")
      return
    }
    this.loadData(data, this.path)
    this.logger.info({ path: this.path, ...this.store.stats() }, "graph loaded")
  }

  /** The persisted document, without any I/O. */
  toJSON(): GraphDocument {
    return encodeGraph(this.store)
  }

  /** Remove every node and relationship. */
  clear(): void {
    this.mutate("clear", () => this.store.clear())
  }

  stats(): StoreStats {
    return this.store.stats()
  }

  private loadData(data: GraphData, path: string): void {
    try {
      this.store.load(data)
    } catch (error) {
      if (isGraphError(error) && error.code !== "PERSISTENCE") {
        throw new PersistenceError(`Invalid graph file ${path}: ${error.message}`, path, error)
      }
      throw error
    }
  }

  /**
   * Apply a mutation and persist it. A failed write restores the previous state.
   */
  private mutate<T>(operation: string, apply: () => T): T {
    if (this.path === undefined) {
      const result = apply()
      this.logger.debug({ operation }, "mutation")
      return result
    }

    const snapshot = this.store.snapshot()
    const result = apply()
    try {
      saveGraphFile(this.path, this.toJSON())
    } catch (error) {
      this.store.restore(snapshot)
      this.logger.error({ operation, path: this.path, err: error }, "write failed, mutation rolled back")
      throw error
    }
    this.logger.debug({ operation, path: this.path }, "mutation persisted")
    return result
  }
}

/**
 * Create a graph database.
 *
 * @example
 * ```typescript
 * const graph = createGraph({ directed: true, path: "./social.json" })
 * graph.addNode("alice", ["Person"], { name: "Alice", age: 30 })
 * graph.addNode("bob", ["Person"], { name: "Bob", age: 25 })
 * graph.addRelationship("alice", "bob", "FRIEND_OF", { since: 2010 })
 *
 * graph.matchFullPath({
 *   start: { name: "Alice" },
 *   pattern: [{ relType: "FRIEND_OF", node: { name: "Bob" } }],
 * })
 * ```
 */
export function createGraph(config?: GraphConfig): GraphDatabase {
  return new GraphDatabase(config)
}
