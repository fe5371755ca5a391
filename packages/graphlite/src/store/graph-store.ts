/**
 * Graph Store
 *
 * Sole owner of nodes, relationships and the adjacency between them.
 * Provides CRUD operations, topology reads and snapshot/restore.
 */

import { NodeReferenceError, NotFoundError, ValidationError } from "../errors"
import {
  attributesSchema,
  directionSchema,
  labelsSchema,
  nodeIdSchema,
  parseInput,
  relationshipTypeSchema,
} from "../schemas"
import { clone } from "./clone"
import { traversalPolicy, type TraversalPolicy } from "./traversal-policy"
import type {
  Attributes,
  Direction,
  IncidentRelationship,
  NodeId,
  StoreSnapshot,
  StoreStats,
  StoredNode,
  StoredRelationship,
} from "./types"

/** Keys exported alongside node attributes. */
export const RESERVED_NODE_KEYS = ["id", "labels"] as const

/** Keys exported alongside relationship attributes. */
export const RESERVED_RELATIONSHIP_KEYS = ["source", "target", "type"] as const

function uniqueLabels(labels: string[]): string[] {
  return Array.from(new Set(labels))
}

function checkReserved(attributes: Attributes, reserved: readonly string[], entity: string): void {
  for (const key of reserved) {
    if (key in attributes) {
      throw new ValidationError(
        `Attribute "${key}" is reserved on ${entity}s`,
        key,
        attributes[key],
      )
    }
  }
}

/**
 * In-memory graph store with support for:
 * - Node/relationship CRUD with add (replace), set (merge) and update (patch) semantics
 * - Adjacency lists for fast traversal
 * - Label-based node lookup
 * - Type-based relationship lookup
 * - Snapshot/restore for rolling back a failed call
 */
export class GraphStore {
  readonly policy: TraversalPolicy

  /** All nodes by ID */
  private nodeMap = new Map<NodeId, StoredNode>()

  /** All relationships by endpoint key */
  private relationshipMap = new Map<string, StoredRelationship>()

  /** Relationships where the node is the source: nodeId -> Set<key> */
  private outEdges = new Map<NodeId, Set<string>>()

  /** Relationships where the node is the target: nodeId -> Set<key> */
  private inEdges = new Map<NodeId, Set<string>>()

  /** Nodes by label: label -> Set<nodeId> */
  private nodesByLabel = new Map<string, Set<NodeId>>()

  /** Typed relationships by type: type -> Set<key> */
  private relationshipsByType = new Map<string, Set<string>>()

  constructor(options: { directed?: boolean } = {}) {
    this.policy = traversalPolicy(options.directed ?? false)
  }

  get directed(): boolean {
    return this.policy.directed
  }

  // ===========================================================================
  // NODE OPERATIONS
  // ===========================================================================

  /**
   * Create a node, or replace the labels and attributes of an existing one.
   */
  addNode(id: NodeId, labels: string[] = [], attributes: Attributes = {}): void {
    const node = this.validateNode(id, labels, attributes)
    this.writeNode(node)
  }

  /**
   * Create a node, or merge labels and attributes into an existing one.
   */
  setNode(id: NodeId, labels: string[] = [], attributes: Attributes = {}): void {
    const input = this.validateNode(id, labels, attributes)
    const existing = this.nodeMap.get(input.id)
    if (!existing) {
      this.writeNode(input)
      return
    }
    this.writeNode({
      id: existing.id,
      labels: uniqueLabels([...existing.labels, ...input.labels]),
      attributes: { ...existing.attributes, ...input.attributes },
    })
  }

  /**
   * Merge-patch a node's attributes.
   *
   * @throws NotFoundError when the node does not exist
   */
  updateNode(id: NodeId, attributes: Attributes): void {
    const patch = parseInput(attributesSchema, attributes, "attributes")
    checkReserved(patch, RESERVED_NODE_KEYS, "node")
    const node = this.nodeMap.get(id)
    if (!node) {
      throw new NotFoundError("node", id)
    }
    node.attributes = { ...node.attributes, ...clone(patch) }
  }

  /**
   * Get a node by ID.
   *
   * @throws NotFoundError when the node does not exist
   */
  getNode(id: NodeId): StoredNode {
    const node = this.nodeMap.get(id)
    if (!node) {
      throw new NotFoundError("node", id)
    }
    return clone(node)
  }

  /**
   * Check if a node exists.
   */
  hasNode(id: NodeId): boolean {
    return this.nodeMap.has(id)
  }

  /**
   * Delete a node and all its relationships. Absent nodes are a no-op.
   *
   * @returns whether a node was removed
   */
  removeNode(id: NodeId): boolean {
    const node = this.nodeMap.get(id)
    if (!node) return false

    const incident = new Set([...(this.outEdges.get(id) ?? []), ...(this.inEdges.get(id) ?? [])])
    for (const key of incident) {
      this.deleteRelationshipByKey(key)
    }

    for (const label of node.labels) {
      this.unindexLabel(label, id)
    }
    this.outEdges.delete(id)
    this.inEdges.delete(id)
    this.nodeMap.delete(id)
    return true
  }

  /**
   * Get all nodes, optionally restricted to a label.
   */
  nodes(label?: string): StoredNode[] {
    if (label === undefined) {
      return Array.from(this.nodeMap.values()).map(clone)
    }
    const ids = this.nodesByLabel.get(label)
    if (!ids) return []
    return Array.from(ids)
      .map((id) => this.nodeMap.get(id))
      .filter((n): n is StoredNode => n !== undefined)
      .map(clone)
  }

  // ===========================================================================
  // RELATIONSHIP OPERATIONS
  // ===========================================================================

  /**
   * Create a relationship, or replace the existing one between the same endpoints.
   *
   * @throws NodeReferenceError when either endpoint is missing
   */
  addRelationship(
    source: NodeId,
    target: NodeId,
    type: string | null = null,
    attributes: Attributes = {},
  ): void {
    const relationship = this.validateRelationship(source, target, type, attributes)
    this.writeRelationship(relationship)
  }

  /**
   * Create a relationship, or merge attributes into the existing one.
   * A given type replaces the stored type; an omitted type keeps it.
   *
   * @throws NodeReferenceError when either endpoint is missing
   */
  setRelationship(
    source: NodeId,
    target: NodeId,
    type?: string | null,
    attributes: Attributes = {},
  ): void {
    const input = this.validateRelationship(source, target, type ?? null, attributes)
    const existing = this.relationshipMap.get(this.policy.relationshipKey(source, target))
    if (!existing) {
      this.writeRelationship(input)
      return
    }
    this.writeRelationship({
      source: input.source,
      target: input.target,
      type: type === undefined ? existing.type : input.type,
      attributes: { ...existing.attributes, ...input.attributes },
    })
  }

  /**
   * Merge-patch a relationship's attributes.
   *
   * @throws NotFoundError when the relationship does not exist
   */
  updateRelationship(source: NodeId, target: NodeId, attributes: Attributes): void {
    const patch = parseInput(attributesSchema, attributes, "attributes")
    checkReserved(patch, RESERVED_RELATIONSHIP_KEYS, "relationship")
    const relationship = this.relationshipMap.get(this.policy.relationshipKey(source, target))
    if (!relationship) {
      throw new NotFoundError("relationship", [source, target])
    }
    relationship.attributes = { ...relationship.attributes, ...clone(patch) }
  }

  /**
   * Get the relationship between two nodes.
   *
   * @throws NotFoundError when the relationship does not exist
   */
  getRelationship(source: NodeId, target: NodeId): StoredRelationship {
    const relationship = this.relationshipMap.get(this.policy.relationshipKey(source, target))
    if (!relationship) {
      throw new NotFoundError("relationship", [source, target])
    }
    return clone(relationship)
  }

  /**
   * Check if a relationship exists between two nodes.
   */
  hasRelationship(source: NodeId, target: NodeId): boolean {
    return this.relationshipMap.has(this.policy.relationshipKey(source, target))
  }

  /**
   * Delete the relationship between two nodes. Absent relationships are a no-op.
   *
   * @returns whether a relationship was removed
   */
  removeRelationship(source: NodeId, target: NodeId): boolean {
    return this.deleteRelationshipByKey(this.policy.relationshipKey(source, target))
  }

  /**
   * Get all relationships, optionally restricted to a type (`null` for untyped).
   */
  relationships(type?: string | null): StoredRelationship[] {
    if (type === undefined) {
      return Array.from(this.relationshipMap.values()).map(clone)
    }
    if (type === null) {
      return Array.from(this.relationshipMap.values())
        .filter((r) => r.type === null)
        .map(clone)
    }
    const keys = this.relationshipsByType.get(type)
    if (!keys) return []
    return Array.from(keys)
      .map((key) => this.relationshipMap.get(key))
      .filter((r): r is StoredRelationship => r !== undefined)
      .map(clone)
  }

  // ===========================================================================
  // TOPOLOGY
  // ===========================================================================

  /**
   * Relationships touching a node in the given direction, each with the node on
   * the other end. A self-loop read from both sides is reported once.
   */
  incident(id: NodeId, direction: Direction = "any"): IncidentRelationship[] {
    const { outgoing, incoming } = this.policy.sides(direction)
    const seen = new Set<string>()
    const results: IncidentRelationship[] = []

    const collect = (keys: Set<string> | undefined, end: "source" | "target"): void => {
      for (const key of keys ?? []) {
        if (seen.has(key)) continue
        const relationship = this.relationshipMap.get(key)
        if (!relationship) continue
        seen.add(key)
        results.push({ relationship: clone(relationship), neighbor: relationship[end] })
      }
    }

    if (outgoing) collect(this.outEdges.get(id), "target")
    if (incoming) collect(this.inEdges.get(id), "source")
    return results
  }

  /**
   * Adjacent node IDs. Directed graphs follow outgoing relationships unless
   * told otherwise; undirected graphs ignore the direction.
   *
   * @throws NotFoundError when the node does not exist
   */
  neighbors(id: NodeId, direction: Direction = "out"): NodeId[] {
    this.requireNode(id)
    const resolved = parseInput(directionSchema, direction, "direction")
    return Array.from(new Set(this.incident(id, resolved).map((r) => r.neighbor)))
  }

  /**
   * Number of incident relationships. A self-loop counts once.
   *
   * @throws NotFoundError when the node does not exist
   */
  degree(id: NodeId, direction: Direction = "any"): number {
    this.requireNode(id)
    const resolved = parseInput(directionSchema, direction, "direction")
    return this.incident(id, resolved).length
  }

  // ===========================================================================
  // SNAPSHOTS
  // ===========================================================================

  /**
   * Capture the current state so a failed call can be undone.
   */
  snapshot(): StoreSnapshot {
    return {
      nodes: new Map(Array.from(this.nodeMap.entries()).map(([k, v]) => [k, clone(v)])),
      relationships: new Map(
        Array.from(this.relationshipMap.entries()).map(([k, v]) => [k, clone(v)]),
      ),
      outEdges: new Map(Array.from(this.outEdges.entries()).map(([k, v]) => [k, new Set(v)])),
      inEdges: new Map(Array.from(this.inEdges.entries()).map(([k, v]) => [k, new Set(v)])),
    }
  }

  /**
   * Restore a previously captured state.
   */
  restore(snapshot: StoreSnapshot): void {
    this.nodeMap = snapshot.nodes
    this.relationshipMap = snapshot.relationships
    this.outEdges = snapshot.outEdges
    this.inEdges = snapshot.inEdges
    this.rebuildLabelIndex()
    this.rebuildTypeIndex()
  }

  private rebuildLabelIndex(): void {
    this.nodesByLabel.clear()
    for (const node of this.nodeMap.values()) {
      for (const label of node.labels) {
        this.indexLabel(label, node.id)
      }
    }
  }

  private rebuildTypeIndex(): void {
    this.relationshipsByType.clear()
    for (const [key, relationship] of this.relationshipMap) {
      if (relationship.type !== null) {
        this.indexType(relationship.type, key)
      }
    }
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Clear all data.
   */
  clear(): void {
    this.nodeMap.clear()
    this.relationshipMap.clear()
    this.outEdges.clear()
    this.inEdges.clear()
    this.nodesByLabel.clear()
    this.relationshipsByType.clear()
  }

  /**
   * Replace all data with the given records.
   *
   * @throws NodeReferenceError when a relationship references a missing node
   */
  load(data: { nodes: StoredNode[]; relationships: StoredRelationship[] }): void {
    const previous = this.snapshot()
    this.clear()
    try {
      for (const node of data.nodes) {
        this.addNode(node.id, node.labels, node.attributes)
      }
      for (const relationship of data.relationships) {
        this.addRelationship(
          relationship.source,
          relationship.target,
          relationship.type,
          relationship.attributes,
        )
      }
    } catch (error) {
      this.restore(previous)
      throw error
    }
  }

  /**
   * Get store statistics.
   */
  stats(): StoreStats {
    return {
      nodes: this.nodeMap.size,
      relationships: this.relationshipMap.size,
      labels: this.nodesByLabel.size,
      relationshipTypes: this.relationshipsByType.size,
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private requireNode(id: NodeId): StoredNode {
    const node = this.nodeMap.get(id)
    if (!node) {
      throw new NotFoundError("node", id)
    }
    return node
  }

  private validateNode(id: NodeId, labels: string[], attributes: Attributes): StoredNode {
    const validId = parseInput(nodeIdSchema, id, "node id")
    const validLabels = parseInput(labelsSchema, labels, "labels")
    const validAttributes = parseInput(attributesSchema, attributes, "attributes")
    checkReserved(validAttributes, RESERVED_NODE_KEYS, "node")
    return { id: validId, labels: uniqueLabels(validLabels), attributes: clone(validAttributes) }
  }

  private validateRelationship(
    source: NodeId,
    target: NodeId,
    type: string | null,
    attributes: Attributes,
  ): StoredRelationship {
    const validSource = parseInput(nodeIdSchema, source, "source")
    const validTarget = parseInput(nodeIdSchema, target, "target")
    const validType = parseInput(relationshipTypeSchema, type, "relationship type")
    const validAttributes = parseInput(attributesSchema, attributes, "attributes")
    checkReserved(validAttributes, RESERVED_RELATIONSHIP_KEYS, "relationship")

    const missing = [validSource, validTarget].filter((id) => !this.nodeMap.has(id))
    if (missing.length > 0) {
      throw new NodeReferenceError(validSource, validTarget, Array.from(new Set(missing)))
    }
    return {
      source: validSource,
      target: validTarget,
      type: validType,
      attributes: clone(validAttributes),
    }
  }

  private writeNode(node: StoredNode): void {
    const existing = this.nodeMap.get(node.id)
    if (existing) {
      for (const label of existing.labels) {
        this.unindexLabel(label, node.id)
      }
    } else {
      this.outEdges.set(node.id, new Set())
      this.inEdges.set(node.id, new Set())
    }
    this.nodeMap.set(node.id, node)
    for (const label of node.labels) {
      this.indexLabel(label, node.id)
    }
  }

  private writeRelationship(relationship: StoredRelationship): void {
    const key = this.policy.relationshipKey(relationship.source, relationship.target)
    // An undirected overwrite may flip the stored orientation.
    this.deleteRelationshipByKey(key)

    this.relationshipMap.set(key, relationship)
    this.outEdges.get(relationship.source)?.add(key)
    this.inEdges.get(relationship.target)?.add(key)
    if (relationship.type !== null) {
      this.indexType(relationship.type, key)
    }
  }

  private deleteRelationshipByKey(key: string): boolean {
    const relationship = this.relationshipMap.get(key)
    if (!relationship) return false

    if (relationship.type !== null) {
      const keys = this.relationshipsByType.get(relationship.type)
      keys?.delete(key)
      if (keys?.size === 0) this.relationshipsByType.delete(relationship.type)
    }
    this.outEdges.get(relationship.source)?.delete(key)
    this.inEdges.get(relationship.target)?.delete(key)
    this.relationshipMap.delete(key)
    return true
  }

  private indexLabel(label: string, id: NodeId): void {
    let ids = this.nodesByLabel.get(label)
    if (!ids) {
      ids = new Set()
      this.nodesByLabel.set(label, ids)
    }
    ids.add(id)
  }

  private unindexLabel(label: string, id: NodeId): void {
    const ids = this.nodesByLabel.get(label)
    ids?.delete(id)
    if (ids?.size === 0) this.nodesByLabel.delete(label)
  }

  private indexType(type: string, key: string): void {
    let keys = this.relationshipsByType.get(type)
    if (!keys) {
      keys = new Set()
      this.relationshipsByType.set(type, keys)
    }
    keys.add(key)
  }
}
