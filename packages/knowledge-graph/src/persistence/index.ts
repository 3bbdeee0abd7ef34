export type { PersistenceGateway } from "./gateway"
export { JsonFileGateway } from "./json-file-gateway"
export { MemoryGateway } from "./memory-gateway"
export {
  graphDocumentSchema,
  toDocument,
  fromDocument,
  parseDocument,
  serializeDocument,
  DOCUMENT_FORMAT,
  DOCUMENT_VERSION,
} from "./document"
export type { GraphDocument } from "./document"
