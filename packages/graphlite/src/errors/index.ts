/**
 * Errors Module
 */

export {
  GraphError,
  NodeReferenceError,
  NotFoundError,
  ValidationError,
  PersistenceError,
  isGraphError,
} from "./errors"
export type { ErrorCode } from "./errors"
