/**
 * Record Model
 *
 * The four record kinds stored in the knowledge graph and the
 * structured metadata values attached to each of them.
 */

// =============================================================================
// METADATA
// =============================================================================

/**
 * A structured metadata value: a scalar, an ordered sequence
 * or a nested mapping of further values.
 */
export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue }

/**
 * Metadata mapping attached to every record. Keys are unique.
 */
export type Metadata = { [key: string]: MetadataValue }

// =============================================================================
// RECORDS
// =============================================================================

/**
 * Fields shared by every record.
 */
export interface RecordBase {
  /** Generator-assigned identifier, never reused while the record lives */
  id: string
  /** ISO timestamp set once on creation */
  createdAt: string
  /** ISO timestamp set on every mutation */
  updatedAt: string
  metadata: Metadata
}

/**
 * A named code construct (class, function, module, ...).
 */
export interface Entity extends RecordBase {
  /** Unique within the graph, case-sensitive */
  name: string
  entityType: string
  summary: string
  signature?: string
  language?: string
  /** Append-only notes */
  observations: string[]
}

/**
 * A directed, typed edge between two entity names.
 * Endpoints may name entities that were never registered.
 */
export interface Relationship extends RecordBase {
  fromEntity: string
  toEntity: string
  relationshipType: string
}

/**
 * A reusable code-design idiom, unique per (name, language).
 */
export interface Pattern extends RecordBase {
  name: string
  description: string
  language?: string
  example?: string
}

/**
 * A formatting or style rule, unique per (name, language).
 */
export interface StyleConvention extends RecordBase {
  name: string
  description: string
  language?: string
  examples: string[]
}

/**
 * Kinds of records the identifier generator allocates ids for.
 */
export type RecordType = "entity" | "relationship" | "pattern" | "styleConvention"

// =============================================================================
// OPERATION RESULTS
// =============================================================================

/**
 * Outcome of a create-or-merge registration.
 */
export interface RegistrationResult {
  id: string
  /** true when a new record was created, false when merged into an existing one */
  created: boolean
}

export type RelationshipDirection = "outgoing" | "incoming"

/**
 * A relationship seen from one of its endpoints.
 */
export interface DirectedRelationship {
  direction: RelationshipDirection
  relationship: Relationship
  /** The entity at the other end, or null when the reference is dangling */
  counterpart: Entity | null
}

export interface EntityDetails {
  entity: Entity
  outgoing: DirectedRelationship[]
  incoming: DirectedRelationship[]
}

export interface KnowledgeStatistics {
  entities: {
    total: number
    byType: Record<string, number>
    byLanguage: Record<string, number>
  }
  relationships: {
    total: number
    byType: Record<string, number>
  }
  patterns: {
    total: number
    byLanguage: Record<string, number>
  }
  styleConventions: {
    total: number
    byLanguage: Record<string, number>
  }
  /** Sum of all entity observations */
  observations: number
  /** Style convention examples plus patterns that carry an example */
  examples: number
}

/**
 * Everything recorded about one project, keyed by metadata.project_path.
 */
export interface ProjectUnderstanding {
  /** Absolute, normalized project path */
  projectPath: string
  entities: Entity[]
  relationships: Relationship[]
  patterns: Pattern[]
  styleConventions: StyleConvention[]
  /** Registered entities outside the project that its relationships reach */
  relatedEntities: Entity[]
  entityTypeCounts: Record<string, number>
}
