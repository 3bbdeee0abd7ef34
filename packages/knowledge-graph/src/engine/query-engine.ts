/**
 * Query Engine
 *
 * Read-only evaluation of filters against the store indexes.
 * Never touches persistence.
 */

import { resolve } from "node:path"
import type { GraphStore } from "../store"
import type {
  Entity,
  Relationship,
  Pattern,
  StyleConvention,
  RecordBase,
  DirectedRelationship,
  EntityDetails,
  KnowledgeStatistics,
  ProjectUnderstanding,
  Metadata,
  NormalizedEntityQuery,
  NormalizedPatternQuery,
  NormalizedStyleConventionQuery,
} from "../model"
import { NotFoundError } from "../errors"
import { NamePattern } from "./name-pattern"

/** Metadata key associating a record with a project directory. */
export const PROJECT_PATH_KEY = "project_path"

/**
 * Numeric part of a generated id (`entity_12` -> 12).
 */
function idSequence(id: string): number {
  const value = Number(id.slice(id.lastIndexOf("_") + 1))
  return Number.isFinite(value) ? value : 0
}

/**
 * createdAt ascending, ties broken by allocation order.
 */
export function compareByCreation(a: RecordBase, b: RecordBase): number {
  if (a.createdAt < b.createdAt) return -1
  if (a.createdAt > b.createdAt) return 1
  return idSequence(a.id) - idSequence(b.id)
}

/**
 * Occurrences per key. Keys are free-form, so counting happens in a Map
 * and never reads inherited members such as `constructor`.
 */
function countBy<T>(items: readonly T[], key: (item: T) => string | undefined): Record<string, number> {
  const counts = new Map<string, number>()
  for (const item of items) {
    const value = key(item)
    if (value !== undefined) counts.set(value, (counts.get(value) ?? 0) + 1)
  }
  return Object.fromEntries(counts)
}

function projectPathOf(metadata: Metadata): string | undefined {
  const value = metadata[PROJECT_PATH_KEY]
  return typeof value === "string" && value.trim() !== "" ? resolve(value) : undefined
}

export class QueryEngine {
  constructor(private readonly store: GraphStore) {}

  // ===========================================================================
  // ENTITIES
  // ===========================================================================

  /**
   * Entities matching every supplied filter, oldest first.
   */
  queryEntities(query: NormalizedEntityQuery): Entity[] {
    const pattern = query.namePattern !== undefined ? NamePattern.compile(query.namePattern) : undefined

    let results = this.store.findEntities({ entityType: query.entityType, language: query.language })
    if (pattern) {
      results = results.filter((entity) => pattern.matches(entity.name))
    }
    results.sort(compareByCreation)

    return query.limit !== undefined ? results.slice(0, query.limit) : results
  }

  /**
   * An entity with every relationship touching it, split by direction.
   * @throws NotFoundError if the name is unregistered
   */
  getEntityDetails(entityName: string): EntityDetails {
    const entity = this.store.getEntity(entityName)
    if (!entity) {
      throw new NotFoundError("entity", entityName)
    }

    const outgoing = this.store
      .getOutgoing(entity.name)
      .sort(compareByCreation)
      .map((relationship) => this.annotate(relationship, "outgoing"))
    const incoming = this.store
      .getIncoming(entity.name)
      .sort(compareByCreation)
      .map((relationship) => this.annotate(relationship, "incoming"))

    return { entity, outgoing, incoming }
  }

  /**
   * Resolve the far endpoint lazily; dangling references resolve to null.
   */
  private annotate(relationship: Relationship, direction: DirectedRelationship["direction"]): DirectedRelationship {
    const counterpartName = direction === "outgoing" ? relationship.toEntity : relationship.fromEntity
    return {
      direction,
      relationship,
      counterpart: this.store.getEntity(counterpartName) ?? null,
    }
  }

  // ===========================================================================
  // CATALOGS
  // ===========================================================================

  queryPatterns(query: NormalizedPatternQuery): Pattern[] {
    return this.store.patterns.filter(query.patternName, query.language).sort(compareByCreation)
  }

  queryStyleConventions(query: NormalizedStyleConventionQuery): StyleConvention[] {
    return this.store.styleConventions.filter(query.conventionName, query.language).sort(compareByCreation)
  }

  // ===========================================================================
  // AGGREGATES
  // ===========================================================================

  /**
   * Aggregate counts over the whole graph, computed on demand.
   */
  getStatistics(): KnowledgeStatistics {
    const entities = this.store.findEntities()
    const relationships = this.store.getAllRelationships()
    const patterns = this.store.patterns.all()
    const conventions = this.store.styleConventions.all()

    let observations = 0
    for (const entity of entities) observations += entity.observations.length

    let examples = 0
    for (const pattern of patterns) {
      if (pattern.example !== undefined) examples += 1
    }
    for (const convention of conventions) examples += convention.examples.length

    return {
      entities: {
        total: entities.length,
        byType: countBy(entities, (entity) => entity.entityType),
        byLanguage: countBy(entities, (entity) => entity.language),
      },
      relationships: {
        total: relationships.length,
        byType: countBy(relationships, (relationship) => relationship.relationshipType),
      },
      patterns: { total: patterns.length, byLanguage: countBy(patterns, (pattern) => pattern.language) },
      styleConventions: {
        total: conventions.length,
        byLanguage: countBy(conventions, (convention) => convention.language),
      },
      observations,
      examples,
    }
  }

  /**
   * Everything recorded for a project, matched on metadata.project_path.
   * @throws NotFoundError when no entity belongs to the project
   */
  getProjectUnderstanding(projectPath: string): ProjectUnderstanding {
    const root = resolve(projectPath)
    const belongs = (record: RecordBase): boolean => projectPathOf(record.metadata) === root

    const entities = this.store.findEntities().filter(belongs).sort(compareByCreation)
    if (entities.length === 0) {
      throw new NotFoundError("project", root)
    }

    const names = new Set(entities.map((entity) => entity.name))
    const relationships = this.store
      .getAllRelationships()
      .filter((relationship) => names.has(relationship.fromEntity) || names.has(relationship.toEntity))
      .sort(compareByCreation)

    const related = new Map<string, Entity>()
    for (const relationship of relationships) {
      for (const name of [relationship.fromEntity, relationship.toEntity]) {
        if (names.has(name) || related.has(name)) continue
        const entity = this.store.getEntity(name)
        if (entity) related.set(name, entity)
      }
    }

    return {
      projectPath: root,
      entities,
      relationships,
      patterns: this.store.patterns.all().filter(belongs).sort(compareByCreation),
      styleConventions: this.store.styleConventions.all().filter(belongs).sort(compareByCreation),
      relatedEntities: Array.from(related.values()).sort(compareByCreation),
      entityTypeCounts: countBy(entities, (entity) => entity.entityType),
    }
  }
}
