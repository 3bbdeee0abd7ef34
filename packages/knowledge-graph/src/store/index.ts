export { GraphStore, CatalogTable } from "./graph-store"
export { IdGenerator, initialCounters } from "./id-generator"
export type { IdCounters } from "./id-generator"
export type { GraphData, TransactionSnapshot, CatalogRecord, StoreSizes } from "./types"
