/**
 * Merge Engine
 *
 * Decides for every write whether to create a record or merge into the
 * one sharing its uniqueness key, and combines the fields.
 *
 * Merge rules:
 * - a non-empty incoming value replaces the stored one, an empty or
 *   omitted value never erases it
 * - observations and examples append; an entry equal to the current last
 *   entry is skipped, and a batch that is already the stored tail is not
 *   appended again
 * - metadata merges key-by-key, incoming keys win
 */

import type { GraphStore } from "../store"
import type {
  Entity,
  Relationship,
  Pattern,
  StyleConvention,
  RegistrationResult,
  NormalizedEntityInput,
  NormalizedRelationshipInput,
  NormalizedPatternInput,
  NormalizedStyleConventionInput,
} from "../model"
import { mergeMetadata } from "../model"
import { NotFoundError } from "../errors"
import type { Clock } from "./clock"

function endsWith(list: string[], tail: string[]): boolean {
  if (tail.length > list.length) return false
  const offset = list.length - tail.length
  return tail.every((entry, i) => list[offset + i] === entry)
}

/**
 * Append notes, skipping any entry equal to the one right before it.
 */
export function appendNotes(existing: string[], incoming: string[]): string[] {
  if (incoming.length === 0) return existing
  if (existing.length > 0 && endsWith(existing, incoming)) return existing

  const result = [...existing]
  for (const note of incoming) {
    if (result[result.length - 1] === note) continue
    result.push(note)
  }
  return result
}

/**
 * Incoming text when it has content, otherwise the stored value.
 */
function preferNonEmpty(current: string, incoming: string): string {
  return incoming.trim() === "" ? current : incoming
}

export class MergeEngine {
  constructor(
    private readonly store: GraphStore,
    private readonly clock: Clock,
  ) {}

  // ===========================================================================
  // ENTITIES
  // ===========================================================================

  registerEntity(input: NormalizedEntityInput): RegistrationResult {
    const now = this.clock.isoNow()
    const existing = this.store.getEntity(input.name)

    if (!existing) {
      const entity: Entity = {
        id: this.store.nextId("entity"),
        name: input.name,
        entityType: input.entityType,
        summary: input.summary,
        signature: input.signature,
        language: input.language,
        observations: appendNotes([], input.observations),
        metadata: input.metadata ?? {},
        createdAt: now,
        updatedAt: now,
      }
      this.store.insertEntity(entity)
      return { id: entity.id, created: true }
    }

    const merged: Entity = {
      ...existing,
      entityType: preferNonEmpty(existing.entityType, input.entityType),
      summary: preferNonEmpty(existing.summary, input.summary),
      signature: input.signature ?? existing.signature,
      language: input.language ?? existing.language,
      observations: appendNotes(existing.observations, input.observations),
      metadata: mergeMetadata(existing.metadata, input.metadata),
      updatedAt: now,
    }
    this.store.replaceEntity(merged)
    return { id: existing.id, created: false }
  }

  /**
   * Append one observation to an existing entity.
   * @throws NotFoundError if no entity has that name
   */
  addEntityObservation(entityName: string, observation: string): Entity {
    const existing = this.store.getEntity(entityName)
    if (!existing) {
      throw new NotFoundError("entity", entityName)
    }

    const updated: Entity = {
      ...existing,
      observations: appendNotes(existing.observations, [observation]),
      updatedAt: this.clock.isoNow(),
    }
    this.store.replaceEntity(updated)
    return updated
  }

  // ===========================================================================
  // RELATIONSHIPS
  // ===========================================================================

  registerRelationship(input: NormalizedRelationshipInput): RegistrationResult {
    const now = this.clock.isoNow()
    const existing = this.store.findRelationship(input.fromEntity, input.toEntity, input.relationshipType)

    if (!existing) {
      const relationship: Relationship = {
        id: this.store.nextId("relationship"),
        fromEntity: input.fromEntity,
        toEntity: input.toEntity,
        relationshipType: input.relationshipType,
        metadata: input.metadata ?? {},
        createdAt: now,
        updatedAt: now,
      }
      this.store.insertRelationship(relationship)
      return { id: relationship.id, created: true }
    }

    this.store.replaceRelationship({
      ...existing,
      metadata: mergeMetadata(existing.metadata, input.metadata),
      updatedAt: now,
    })
    return { id: existing.id, created: false }
  }

  // ===========================================================================
  // PATTERNS & STYLE CONVENTIONS
  // ===========================================================================

  registerPattern(input: NormalizedPatternInput): RegistrationResult {
    const now = this.clock.isoNow()
    const existing = this.store.patterns.find(input.name, input.language)

    if (!existing) {
      const pattern: Pattern = {
        id: this.store.nextId("pattern"),
        name: input.name,
        description: input.description,
        language: input.language,
        example: input.example,
        metadata: input.metadata ?? {},
        createdAt: now,
        updatedAt: now,
      }
      this.store.patterns.insert(pattern)
      return { id: pattern.id, created: true }
    }

    this.store.patterns.replace({
      ...existing,
      description: preferNonEmpty(existing.description, input.description),
      example: input.example ?? existing.example,
      metadata: mergeMetadata(existing.metadata, input.metadata),
      updatedAt: now,
    })
    return { id: existing.id, created: false }
  }

  registerStyleConvention(input: NormalizedStyleConventionInput): RegistrationResult {
    const now = this.clock.isoNow()
    const existing = this.store.styleConventions.find(input.name, input.language)

    if (!existing) {
      const convention: StyleConvention = {
        id: this.store.nextId("styleConvention"),
        name: input.name,
        description: input.description,
        language: input.language,
        examples: appendNotes([], input.examples),
        metadata: input.metadata ?? {},
        createdAt: now,
        updatedAt: now,
      }
      this.store.styleConventions.insert(convention)
      return { id: convention.id, created: true }
    }

    this.store.styleConventions.replace({
      ...existing,
      description: preferNonEmpty(existing.description, input.description),
      examples: appendNotes(existing.examples, input.examples),
      metadata: mergeMetadata(existing.metadata, input.metadata),
      updatedAt: now,
    })
    return { id: existing.id, created: false }
  }
}
