export { GraphStore, RESERVED_NODE_KEYS, RESERVED_RELATIONSHIP_KEYS } from "./graph-store"
export { directedPolicy, undirectedPolicy, traversalPolicy } from "./traversal-policy"
export type { TraversalPolicy } from "./traversal-policy"
export type {
  NodeId,
  AttributeValue,
  Attributes,
  Direction,
  StoredNode,
  StoredRelationship,
  IncidentRelationship,
  StoreSnapshot,
  StoreStats,
} from "./types"
