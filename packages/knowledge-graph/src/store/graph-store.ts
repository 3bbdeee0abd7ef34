/**
 * Knowledge Graph Store
 *
 * Primary record maps plus every secondary index. Each mutating method
 * updates the record and all of its index entries before returning, so
 * a reader never sees one without the other.
 */

import type { Entity, Relationship, Pattern, StyleConvention, RecordType } from "../model"
import { IdGenerator } from "./id-generator"
import type { GraphData, TransactionSnapshot, CatalogRecord, StoreSizes } from "./types"

/**
 * Deep clone a value (JSON-safe).
 */
function clone<T>(value: T): T {
  if (value === null || value === undefined) return value
  return JSON.parse(JSON.stringify(value)) as T
}

function addToIndex(index: Map<string, Set<string>>, key: string | undefined, id: string): void {
  if (key === undefined) return
  let ids = index.get(key)
  if (!ids) {
    ids = new Set()
    index.set(key, ids)
  }
  ids.add(id)
}

function removeFromIndex(index: Map<string, Set<string>>, key: string | undefined, id: string): void {
  if (key === undefined) return
  const ids = index.get(key)
  if (!ids) return
  ids.delete(id)
  if (ids.size === 0) index.delete(key)
}

function catalogKey(name: string, language: string | undefined): string {
  return JSON.stringify([name, language ?? null])
}

function relationshipKey(fromEntity: string, toEntity: string, relationshipType: string): string {
  return JSON.stringify([fromEntity, toEntity, relationshipType])
}

// =============================================================================
// CATALOG TABLE
// =============================================================================

/**
 * Records unique per (name, language), with a by-language multimap.
 * A record without a language is its own bucket.
 */
export class CatalogTable<T extends CatalogRecord> {
  private records = new Map<string, T>()
  private idsByKey = new Map<string, string>()
  private idsByLanguage = new Map<string, Set<string>>()

  constructor(private readonly label: string) {}

  get size(): number {
    return this.records.size
  }

  find(name: string, language: string | undefined): T | undefined {
    const id = this.idsByKey.get(catalogKey(name, language))
    const record = id ? this.records.get(id) : undefined
    return record ? clone(record) : undefined
  }

  insert(record: T): void {
    const key = catalogKey(record.name, record.language)
    if (this.records.has(record.id)) {
      throw new Error(`${this.label} already exists: ${record.id}`)
    }
    if (this.idsByKey.has(key)) {
      throw new Error(`Duplicate ${this.label}: ${record.name} (${record.language ?? "no language"})`)
    }

    this.records.set(record.id, clone(record))
    this.idsByKey.set(key, record.id)
    addToIndex(this.idsByLanguage, record.language, record.id)
  }

  /**
   * Replace a record in place. Its (name, language) key cannot change.
   */
  replace(record: T): void {
    const existing = this.records.get(record.id)
    if (!existing) {
      throw new Error(`${this.label} not found: ${record.id}`)
    }
    if (catalogKey(existing.name, existing.language) !== catalogKey(record.name, record.language)) {
      throw new Error(`Cannot change the key of ${this.label} ${record.id}`)
    }
    this.records.set(record.id, clone(record))
  }

  /**
   * Exact-match filter, in creation order.
   */
  filter(name?: string, language?: string): T[] {
    if (name !== undefined && language !== undefined) {
      const record = this.find(name, language)
      return record ? [record] : []
    }

    let candidates: Iterable<T>
    if (language !== undefined) {
      const ids = this.idsByLanguage.get(language) ?? new Set<string>()
      candidates = Array.from(ids)
        .map((id) => this.records.get(id))
        .filter((r): r is T => r !== undefined)
    } else {
      candidates = this.records.values()
    }

    const results: T[] = []
    for (const record of candidates) {
      if (name === undefined || record.name === name) {
        results.push(clone(record))
      }
    }
    return results
  }

  all(): T[] {
    return Array.from(this.records.values()).map(clone)
  }

  clear(): void {
    this.records.clear()
    this.idsByKey.clear()
    this.idsByLanguage.clear()
  }
}

// =============================================================================
// GRAPH STORE
// =============================================================================

/**
 * In-memory knowledge graph store with support for:
 * - Entity lookup by name, type and language
 * - Relationship lookup by triple, type and endpoint (both directions)
 * - Pattern / style convention lookup by (name, language) and language
 * - Transaction support with rollback
 */
export class GraphStore {
  /** Allocates ids; counters travel with snapshots */
  private readonly ids = new IdGenerator()

  /** All entities by ID */
  private entities = new Map<string, Entity>()

  /** Entity name -> ID (unique) */
  private entityIdsByName = new Map<string, string>()

  /** Entity type -> Set<ID> */
  private entityIdsByType = new Map<string, Set<string>>()

  /** Entity language -> Set<ID> */
  private entityIdsByLanguage = new Map<string, Set<string>>()

  /** All relationships by ID */
  private relationships = new Map<string, Relationship>()

  /** (from, to, type) -> ID (unique) */
  private relationshipIdsByKey = new Map<string, string>()

  /** Relationship type -> Set<ID> */
  private relationshipIdsByType = new Map<string, Set<string>>()

  /** fromEntity name -> Set<ID> */
  private outgoing = new Map<string, Set<string>>()

  /** toEntity name -> Set<ID> */
  private incoming = new Map<string, Set<string>>()

  readonly patterns = new CatalogTable<Pattern>("pattern")

  readonly styleConventions = new CatalogTable<StyleConvention>("style convention")

  /** Transaction state */
  private transactionSnapshot: TransactionSnapshot | null = null

  nextId(kind: RecordType): string {
    return this.ids.next(kind)
  }

  // ===========================================================================
  // ENTITIES
  // ===========================================================================

  getEntity(name: string): Entity | undefined {
    const id = this.entityIdsByName.get(name)
    const entity = id ? this.entities.get(id) : undefined
    return entity ? clone(entity) : undefined
  }

  hasEntity(name: string): boolean {
    return this.entityIdsByName.has(name)
  }

  insertEntity(entity: Entity): void {
    if (this.entities.has(entity.id)) {
      throw new Error(`Entity already exists: ${entity.id}`)
    }
    if (this.entityIdsByName.has(entity.name)) {
      throw new Error(`Duplicate entity name: ${entity.name}`)
    }

    this.entities.set(entity.id, clone(entity))
    this.entityIdsByName.set(entity.name, entity.id)
    addToIndex(this.entityIdsByType, entity.entityType, entity.id)
    addToIndex(this.entityIdsByLanguage, entity.language, entity.id)
  }

  /**
   * Replace an entity in place, moving it between type/language index
   * buckets when those fields changed. The name cannot change.
   */
  replaceEntity(entity: Entity): void {
    const existing = this.entities.get(entity.id)
    if (!existing) {
      throw new Error(`Entity not found: ${entity.id}`)
    }
    if (existing.name !== entity.name) {
      throw new Error(`Cannot rename entity ${entity.id}`)
    }

    if (existing.entityType !== entity.entityType) {
      removeFromIndex(this.entityIdsByType, existing.entityType, entity.id)
      addToIndex(this.entityIdsByType, entity.entityType, entity.id)
    }
    if (existing.language !== entity.language) {
      removeFromIndex(this.entityIdsByLanguage, existing.language, entity.id)
      addToIndex(this.entityIdsByLanguage, entity.language, entity.id)
    }

    this.entities.set(entity.id, clone(entity))
  }

  /**
   * Entities matching every given index filter. Without filters, all of them.
   * The intersection starts from the smallest candidate set.
   */
  findEntities(filter: { entityType?: string; language?: string } = {}): Entity[] {
    const candidateSets: Set<string>[] = []
    if (filter.entityType !== undefined) {
      candidateSets.push(this.entityIdsByType.get(filter.entityType) ?? new Set())
    }
    if (filter.language !== undefined) {
      candidateSets.push(this.entityIdsByLanguage.get(filter.language) ?? new Set())
    }

    if (candidateSets.length === 0) {
      return Array.from(this.entities.values()).map(clone)
    }

    candidateSets.sort((a, b) => a.size - b.size)
    const [smallest, ...others] = candidateSets
    const results: Entity[] = []
    for (const id of smallest ?? []) {
      if (!others.every((ids) => ids.has(id))) continue
      const entity = this.entities.get(id)
      if (entity) results.push(clone(entity))
    }
    return results
  }

  // ===========================================================================
  // RELATIONSHIPS
  // ===========================================================================

  findRelationship(fromEntity: string, toEntity: string, relationshipType: string): Relationship | undefined {
    const id = this.relationshipIdsByKey.get(relationshipKey(fromEntity, toEntity, relationshipType))
    const relationship = id ? this.relationships.get(id) : undefined
    return relationship ? clone(relationship) : undefined
  }

  insertRelationship(relationship: Relationship): void {
    const key = relationshipKey(relationship.fromEntity, relationship.toEntity, relationship.relationshipType)
    if (this.relationships.has(relationship.id)) {
      throw new Error(`Relationship already exists: ${relationship.id}`)
    }
    if (this.relationshipIdsByKey.has(key)) {
      throw new Error(
        `Duplicate relationship: ${relationship.fromEntity} -${relationship.relationshipType}-> ${relationship.toEntity}`,
      )
    }

    this.relationships.set(relationship.id, clone(relationship))
    this.relationshipIdsByKey.set(key, relationship.id)
    addToIndex(this.relationshipIdsByType, relationship.relationshipType, relationship.id)
    addToIndex(this.outgoing, relationship.fromEntity, relationship.id)
    addToIndex(this.incoming, relationship.toEntity, relationship.id)
  }

  /**
   * Replace a relationship in place. Its triple cannot change.
   */
  replaceRelationship(relationship: Relationship): void {
    const existing = this.relationships.get(relationship.id)
    if (!existing) {
      throw new Error(`Relationship not found: ${relationship.id}`)
    }
    const before = relationshipKey(existing.fromEntity, existing.toEntity, existing.relationshipType)
    const after = relationshipKey(relationship.fromEntity, relationship.toEntity, relationship.relationshipType)
    if (before !== after) {
      throw new Error(`Cannot change the endpoints or type of relationship ${relationship.id}`)
    }
    this.relationships.set(relationship.id, clone(relationship))
  }

  /**
   * Relationships whose fromEntity is the given name.
   */
  getOutgoing(entityName: string): Relationship[] {
    return this.collectRelationships(this.outgoing.get(entityName))
  }

  /**
   * Relationships whose toEntity is the given name.
   */
  getIncoming(entityName: string): Relationship[] {
    return this.collectRelationships(this.incoming.get(entityName))
  }

  getRelationshipsByType(relationshipType: string): Relationship[] {
    return this.collectRelationships(this.relationshipIdsByType.get(relationshipType))
  }

  getAllRelationships(): Relationship[] {
    return Array.from(this.relationships.values()).map(clone)
  }

  private collectRelationships(ids: Set<string> | undefined): Relationship[] {
    if (!ids) return []
    return Array.from(ids)
      .map((id) => this.relationships.get(id))
      .filter((r): r is Relationship => r !== undefined)
      .map(clone)
  }

  // ===========================================================================
  // TRANSACTIONS
  // ===========================================================================

  /**
   * Begin a transaction.
   */
  beginTransaction(): void {
    if (this.transactionSnapshot) {
      throw new Error("Transaction already in progress")
    }
    this.transactionSnapshot = { data: this.export() }
  }

  /**
   * Commit the current transaction.
   */
  commit(): void {
    if (!this.transactionSnapshot) {
      throw new Error("No transaction in progress")
    }
    this.transactionSnapshot = null
  }

  /**
   * Rollback the current transaction, restoring records, indexes and id counters.
   */
  rollback(): void {
    if (!this.transactionSnapshot) {
      throw new Error("No transaction in progress")
    }
    const { data } = this.transactionSnapshot
    this.transactionSnapshot = null
    this.import(data)
  }

  /**
   * Check if in a transaction.
   */
  inTransaction(): boolean {
    return this.transactionSnapshot !== null
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Clear all records and indexes and reset the id counters.
   */
  clear(): void {
    this.entities.clear()
    this.entityIdsByName.clear()
    this.entityIdsByType.clear()
    this.entityIdsByLanguage.clear()
    this.relationships.clear()
    this.relationshipIdsByKey.clear()
    this.relationshipIdsByType.clear()
    this.outgoing.clear()
    this.incoming.clear()
    this.patterns.clear()
    this.styleConventions.clear()
    this.ids.reset()
  }

  sizes(): StoreSizes {
    return {
      entities: this.entities.size,
      relationships: this.relationships.size,
      patterns: this.patterns.size,
      styleConventions: this.styleConventions.size,
    }
  }

  /**
   * Export store data for serialization.
   */
  export(): GraphData {
    return {
      counters: this.ids.snapshot(),
      entities: Array.from(this.entities.values()).map(clone),
      relationships: this.getAllRelationships(),
      patterns: this.patterns.all(),
      styleConventions: this.styleConventions.all(),
    }
  }

  /**
   * Replace the store contents with exported data, rebuilding every index.
   * @throws Error when the data violates a uniqueness key
   */
  import(data: GraphData): void {
    this.clear()
    for (const entity of data.entities) {
      this.insertEntity(entity)
    }
    for (const relationship of data.relationships) {
      this.insertRelationship(relationship)
    }
    for (const pattern of data.patterns) {
      this.patterns.insert(pattern)
    }
    for (const convention of data.styleConventions) {
      this.styleConventions.insert(convention)
    }
    this.ids.restore(data.counters)
  }
}
