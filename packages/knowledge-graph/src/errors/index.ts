/**
 * Errors Module
 */

export {
  KnowledgeGraphError,
  ValidationError,
  NotFoundError,
  PersistenceError,
  GraphClosedError,
  toError,
} from "./errors"
export type { ErrorKind, RecordKind } from "./errors"
