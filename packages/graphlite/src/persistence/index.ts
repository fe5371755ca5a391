export {
  encodeGraph,
  decodeGraph,
  graphDocumentSchema,
  nodeDocumentSchema,
  relationshipDocumentSchema,
} from "./codec"
export type { GraphDocument, GraphData, NodeDocument, RelationshipDocument } from "./codec"
export { loadGraphFile, saveGraphFile, isMemoryPath, MEMORY_PATH } from "./file"
