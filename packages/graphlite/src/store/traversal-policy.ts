/**
 * Traversal Policies
 *
 * Direction semantics of a graph, chosen once at construction and consulted
 * by the store (keys, neighbors, degree) and by the path matcher.
 */

import type { Direction, NodeId } from "./types"

/**
 * Direction policy of a graph.
 */
export interface TraversalPolicy {
  readonly directed: boolean
  /**
   * Key identifying the relationship between two endpoints.
   */
  relationshipKey(source: NodeId, target: NodeId): string
  /**
   * Which adjacency sides to read for a requested direction.
   */
  sides(direction: Direction): { outgoing: boolean; incoming: boolean }
}

function endpointKey(id: NodeId): string {
  return JSON.stringify(id)
}

/**
 * Directed graphs: `(a, b)` and `(b, a)` are distinct, and direction is honoured.
 */
export const directedPolicy: TraversalPolicy = {
  directed: true,
  relationshipKey(source, target) {
    return `${endpointKey(source)}->${endpointKey(target)}`
  },
  sides(direction) {
    return {
      outgoing: direction === "out" || direction === "any",
      incoming: direction === "in" || direction === "any",
    }
  },
}

/**
 * Undirected graphs: both orientations share one key, and every direction reads both sides.
 */
export const undirectedPolicy: TraversalPolicy = {
  directed: false,
  relationshipKey(source, target) {
    const a = endpointKey(source)
    const b = endpointKey(target)
    return a <= b ? `${a}--${b}` : `${b}--${a}`
  },
  sides() {
    return { outgoing: true, incoming: true }
  },
}

export function traversalPolicy(directed: boolean): TraversalPolicy {
  return directed ? directedPolicy : undirectedPolicy
}
