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
} from "./types"
export { toMetadata, mergeMetadata, MetadataConversionError } from "./metadata"
export {
  metadataSchema,
  storedMetadataSchema,
  entityInputSchema,
  relationshipInputSchema,
  patternInputSchema,
  styleConventionInputSchema,
  observationInputSchema,
  entityQuerySchema,
  patternQuerySchema,
  styleConventionQuerySchema,
  entityNameSchema,
  projectPathSchema,
} from "./schemas"
export type {
  EntityInput,
  RelationshipInput,
  PatternInput,
  StyleConventionInput,
  EntityQuery,
  PatternQuery,
  StyleConventionQuery,
  NormalizedEntityInput,
  NormalizedRelationshipInput,
  NormalizedPatternInput,
  NormalizedStyleConventionInput,
  NormalizedEntityQuery,
  NormalizedPatternQuery,
  NormalizedStyleConventionQuery,
} from "./schemas"
export { parseInput } from "./validation"
