/**
 * Graph Store Types
 *
 * Core data structures for the embedded graph store.
 */

/**
 * Caller-supplied node identifier. Identity is exact: `1` and `"1"` differ.
 */
export type NodeId = string | number

/**
 * Any JSON-compatible attribute value.
 */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[]
  | { [key: string]: AttributeValue }

/**
 * Open attribute mapping of a node or relationship.
 */
export type Attributes = Record<string, AttributeValue>

/**
 * Traversal direction relative to the current node.
 */
export type Direction = "out" | "in" | "any"

/**
 * Stored node with labels and attributes.
 */
export interface StoredNode {
  /** Unique identifier, immutable once created */
  id: NodeId
  /** Labels in first-seen order, without duplicates */
  labels: string[]
  /** Node attributes (excluding id and labels) */
  attributes: Attributes
}

/**
 * Stored relationship, identified by its endpoints.
 */
export interface StoredRelationship {
  /** Source node ID */
  source: NodeId
  /** Target node ID */
  target: NodeId
  /** Relationship type, null when untyped */
  type: string | null
  /** Relationship attributes (excluding source, target and type) */
  attributes: Attributes
}

/**
 * A relationship reached from a given node, with the node on its other end.
 */
export interface IncidentRelationship {
  relationship: StoredRelationship
  neighbor: NodeId
}

/**
 * Store snapshot for rollback support.
 */
export interface StoreSnapshot {
  nodes: Map<NodeId, StoredNode>
  relationships: Map<string, StoredRelationship>
  outEdges: Map<NodeId, Set<string>>
  inEdges: Map<NodeId, Set<string>>
}

/**
 * Store statistics.
 */
export interface StoreStats {
  nodes: number
  relationships: number
  labels: number
  relationshipTypes: number
}
