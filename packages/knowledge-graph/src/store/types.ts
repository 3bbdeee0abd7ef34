/**
 * Knowledge Graph Store Types
 */

import type { Entity, Relationship, Pattern, StyleConvention } from "../model"
import type { IdCounters } from "./id-generator"

/**
 * Full graph contents. Every collection is in creation order.
 */
export interface GraphData {
  counters: IdCounters
  entities: Entity[]
  relationships: Relationship[]
  patterns: Pattern[]
  styleConventions: StyleConvention[]
}

/**
 * Transaction snapshot for rollback support.
 */
export interface TransactionSnapshot {
  data: GraphData
}

/**
 * Records keyed by (name, language): patterns and style conventions.
 */
export interface CatalogRecord {
  id: string
  name: string
  language?: string
}

/**
 * Store sizes, used for debug logging.
 */
export interface StoreSizes {
  entities: number
  relationships: number
  patterns: number
  styleConventions: number
}
