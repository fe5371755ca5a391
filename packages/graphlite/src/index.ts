/**
 * graphlite
 *
 * Embedded graph store for scripts and small tools: labeled nodes, typed
 * relationships, condition filtering, multi-hop pattern matching and
 * JSON-file persistence.
 *
 * @example
 * ```typescript
 * import { createGraph } from 'graphlite'
 *
 * const graph = createGraph({ path: './people.json' })
 *
 * graph.addNode('a', ['Person'], { name: 'Alice', age: 30 })
 * graph.addNode('b', ['Person'], { name: 'Bob', age: 25 })
 * graph.addRelationship('a', 'b', 'FRIEND_OF', { since: 2010 })
 *
 * // Alice by name, or anyone over 35
 * graph.findNodes({ label: 'Person', where: { _logic: 'or', name: 'Alice', age: { gt: 35 } } })
 *
 * // Friends of Alice named Bob
 * graph.matchFullPath({
 *   start: { name: 'Alice' },
 *   pattern: [{ relType: 'FRIEND_OF', node: { name: 'Bob' } }],
 * })
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MAIN API
// =============================================================================

export { GraphDatabase, createGraph } from "./graph"
export { resolveConfig, graphConfigSchema } from "./config"
export type { GraphConfig, ResolvedGraphConfig } from "./config"

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphError,
  NodeReferenceError,
  NotFoundError,
  ValidationError,
  PersistenceError,
  isGraphError,
} from "./errors"
export type { ErrorCode } from "./errors"

// =============================================================================
// STORE
// =============================================================================

export { GraphStore, directedPolicy, undirectedPolicy, traversalPolicy } from "./store"
export type {
  NodeId,
  AttributeValue,
  Attributes,
  Direction,
  StoredNode,
  StoredRelationship,
  StoreStats,
  TraversalPolicy,
} from "./store"

// =============================================================================
// ENGINE
// =============================================================================

export {
  QueryEngine,
  PathMatcher,
  compileCondition,
  evaluateCondition,
  project,
  isPathNode,
} from "./engine"
export type {
  Condition,
  ComparisonMap,
  ComparisonOperator,
  LogicMode,
  Predicate,
  PatternQuery,
  PatternStep,
  MatchedPath,
  FindNodesOptions,
  FindRelationshipsOptions,
  PathProjection,
  FullPath,
  EntityRecord,
  PathNode,
  PathRelationship,
  StructuredPath,
} from "./engine"

// =============================================================================
// PERSISTENCE
// =============================================================================

export { encodeGraph, decodeGraph, loadGraphFile, saveGraphFile, MEMORY_PATH } from "./persistence"
export type { GraphDocument, GraphData } from "./persistence"

// =============================================================================
// LOGGING
// =============================================================================

export { createLogger } from "./logger"
export type { Logger, LogLevel, LoggerOptions } from "./logger"
