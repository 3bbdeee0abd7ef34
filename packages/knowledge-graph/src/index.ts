/**
 * Code Knowledge Graph
 *
 * Persistent store for facts an analyzer discovers about a codebase:
 * entities, relationships, patterns and style conventions. Writes
 * create or merge, reads filter through indexes, and every mutation
 * is saved before it is acknowledged.
 *
 * @example
 * ```typescript
 * import { openKnowledgeGraph, JsonFileGateway } from '@codememo/knowledge-graph';
 *
 * const graph = await openKnowledgeGraph({
 *   gateway: new JsonFileGateway('/var/lib/codememo/knowledge.json'),
 * });
 *
 * await graph.registerEntity({ name: 'UserService', entityType: 'class', summary: 'Loads users' });
 * await graph.registerEntity({ name: 'UserService', entityType: '', summary: '', observations: ['Caches by id'] });
 * await graph.registerRelationship({ fromEntity: 'UserService', toEntity: 'Database', relationshipType: 'uses' });
 *
 * const classes = await graph.queryEntities({ entityType: 'class', namePattern: 'Service$' });
 * const details = await graph.getEntityDetails('UserService');
 *
 * await graph.close();
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MAIN API
// =============================================================================

export { KnowledgeGraph, openKnowledgeGraph } from "./graph"
export type { KnowledgeGraphConfig, LoadFailurePolicy } from "./graph"

// =============================================================================
// MODEL
// =============================================================================

export type {
  Metadata,
  MetadataValue,
  RecordBase,
  Entity,
  Relationship,
  Pattern,
  StyleConvention,
  RecordType,
  RegistrationResult,
  RelationshipDirection,
  DirectedRelationship,
  EntityDetails,
  KnowledgeStatistics,
  ProjectUnderstanding,
  EntityInput,
  RelationshipInput,
  PatternInput,
  StyleConventionInput,
  EntityQuery,
  PatternQuery,
  StyleConventionQuery,
} from "./model"
export { toMetadata, mergeMetadata } from "./model"

// =============================================================================
// ERRORS
// =============================================================================

export {
  KnowledgeGraphError,
  ValidationError,
  NotFoundError,
  PersistenceError,
  GraphClosedError,
} from "./errors"
export type { ErrorKind, RecordKind } from "./errors"

// =============================================================================
// PERSISTENCE
// =============================================================================

export { JsonFileGateway, MemoryGateway, DOCUMENT_FORMAT, DOCUMENT_VERSION } from "./persistence"
export type { PersistenceGateway, GraphDocument } from "./persistence"

// =============================================================================
// ENGINE (for advanced use cases)
// =============================================================================

export { NamePattern, MAX_NAME_PATTERN_LENGTH, MAX_QUANTIFIERS, PROJECT_PATH_KEY, systemClock } from "./engine"
export type { Clock } from "./engine"

// =============================================================================
// LOGGING
// =============================================================================

export { Logger, silentLogger, LOG_LEVELS } from "./logging"
export type { LogLevel, LogSink, LoggerOptions } from "./logging"
