export { QueryEngine } from "./query-engine"
export type {
  QueryEngineConfig,
  FindNodesOptions,
  FindRelationshipsOptions,
  PathProjection,
  FullPath,
} from "./query-engine"
export { PathMatcher } from "./path-matcher"
export type { PatternQuery, PatternStep, MatchedPath } from "./path-matcher"
export { compileCondition, evaluateCondition, evaluateComparison, matchesCompiled } from "./conditions"
export type {
  Condition,
  CompiledCondition,
  ComparisonMap,
  ComparisonOperator,
  LogicMode,
  Predicate,
} from "./conditions"
export { project, resolveField } from "./projection"
export type { ResolvedField } from "./projection"
export { nodeToRecord, relationshipToRecord, isPathNode } from "./records"
export type { EntityRecord, PathNode, PathRelationship, StructuredPath } from "./records"
