/**
 * Result Records
 *
 * Flattened and structured renderings of stored entities.
 */

import type { AttributeValue, NodeId, StoredNode, StoredRelationship } from "../store/types"
import { project } from "./projection"

/**
 * A node or relationship flattened into a single mapping.
 */
export type EntityRecord = Record<string, AttributeValue>

/**
 * Node element of a structured path.
 */
export interface PathNode {
  id: NodeId
  labels: string[]
  properties: EntityRecord
}

/**
 * Relationship element of a structured path.
 */
export interface PathRelationship {
  source: NodeId
  target: NodeId
  type: string | null
  properties: EntityRecord
}

/**
 * Alternating node/relationship sequence, starting and ending with a node.
 */
export type StructuredPath = Array<PathNode | PathRelationship>

/**
 * `{ id, labels, ...attributes }`
 */
export function nodeToRecord(node: StoredNode): EntityRecord {
  return { ...node.attributes, id: node.id, labels: [...node.labels] }
}

/**
 * `{ source, target, type, ...attributes }`
 */
export function relationshipToRecord(relationship: StoredRelationship): EntityRecord {
  return {
    ...relationship.attributes,
    source: relationship.source,
    target: relationship.target,
    type: relationship.type,
  }
}

export function nodeToPathElement(node: StoredNode, fields?: readonly string[]): PathNode {
  return { id: node.id, labels: [...node.labels], properties: project(node.attributes, fields) }
}

export function relationshipToPathElement(
  relationship: StoredRelationship,
  fields?: readonly string[],
): PathRelationship {
  return {
    source: relationship.source,
    target: relationship.target,
    type: relationship.type,
    properties: project(relationship.attributes, fields),
  }
}

export function isPathNode(element: PathNode | PathRelationship): element is PathNode {
  return "id" in element
}
