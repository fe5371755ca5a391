/**
 * Persistence Codec
 *
 * Converts the store to and from the JSON document written to disk:
 *
 * ```json
 * {
 *   "nodes": [{ "id": "a", "labels": ["Person"], "name": "Alice" }],
 *   "relationships": [{ "source": "a", "target": "b", "type": "KNOWS", "since": 2010 }]
 * }
 * ```
 */

import { z } from "zod"
import { PersistenceError } from "../errors"
import { attributeValueSchema, formatIssues, nodeIdSchema } from "../schemas"
import type { GraphStore } from "../store"
import type { AttributeValue, NodeId, StoredNode, StoredRelationship } from "../store/types"

export const nodeDocumentSchema = z
  .object({
    id: nodeIdSchema,
    labels: z.array(z.string()).default([]),
  })
  .catchall(attributeValueSchema)

export const relationshipDocumentSchema = z
  .object({
    source: nodeIdSchema,
    target: nodeIdSchema,
    type: z.string().nullable().default(null),
  })
  .catchall(attributeValueSchema)

export const graphDocumentSchema = z.object({
  nodes: z.array(nodeDocumentSchema),
  relationships: z.array(relationshipDocumentSchema),
})

export interface NodeDocument {
  id: NodeId
  labels: string[]
  [attribute: string]: AttributeValue
}

export interface RelationshipDocument {
  source: NodeId
  target: NodeId
  type: string | null
  [attribute: string]: AttributeValue
}

/**
 * Persisted graph document.
 */
export interface GraphDocument {
  nodes: NodeDocument[]
  relationships: RelationshipDocument[]
}

/**
 * Decoded document contents, ready to load into a store.
 */
export interface GraphData {
  nodes: StoredNode[]
  relationships: StoredRelationship[]
}

/**
 * Serialize the whole store.
 */
export function encodeGraph(store: GraphStore): GraphDocument {
  return {
    nodes: store.nodes().map((node) => ({ ...node.attributes, id: node.id, labels: node.labels })),
    relationships: store.relationships().map((relationship) => ({
      ...relationship.attributes,
      source: relationship.source,
      target: relationship.target,
      type: relationship.type,
    })),
  }
}

/**
 * Validate a parsed document and split reserved keys from attributes.
 *
 * @throws PersistenceError when the document does not have the expected shape
 */
export function decodeGraph(document: unknown, path?: string): GraphData {
  const result = graphDocumentSchema.safeParse(document)
  if (!result.success) {
    throw new PersistenceError(
      `Malformed graph document${path ? ` at ${path}` : ""}: ${formatIssues(result.error)}`,
      path,
    )
  }

  return {
    nodes: result.data.nodes.map(({ id, labels, ...attributes }) => ({ id, labels, attributes })),
    relationships: result.data.relationships.map(({ source, target, type, ...attributes }) => ({
      source,
      target,
      type,
      attributes,
    })),
  }
}
