/**
 * Input Schemas
 *
 * Zod definitions for every operation input. Parsing normalizes
 * names, optional tags and notes (trimmed, empty treated as absent)
 * and converts metadata into the structured value union.
 */

import { z } from "zod"
import { MetadataConversionError, toMetadata } from "./metadata"
import type { Metadata } from "./types"

// =============================================================================
// FIELD SCHEMAS
// =============================================================================

/** Trimmed, must not be empty. */
const requiredName = z.string().trim().min(1, "must not be empty")

/** Trimmed; null, undefined and blank all mean "not supplied". */
const optionalTag = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim()
    return trimmed ? trimmed : undefined
  })

/** Free text kept verbatim. */
const text = z.string()

/** A single note (observation or example): trimmed, must not be empty. */
const note = z.string().trim().min(1, "must not be empty")

/** Notes trimmed like `note`; blank entries are dropped. */
const noteList = z
  .array(z.string())
  .nullish()
  .transform((value) => (value ?? []).map((entry) => entry.trim()).filter((entry) => entry !== ""))

export const metadataSchema = z
  .unknown()
  .optional()
  .transform((value, ctx): Metadata | undefined => {
    if (value === undefined || value === null) return undefined
    try {
      return toMetadata(value)
    } catch (error) {
      if (error instanceof MetadataConversionError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message })
        return z.NEVER
      }
      throw error
    }
  })

/** Metadata as stored on a record: always present. */
export const storedMetadataSchema = metadataSchema.transform((value): Metadata => value ?? {})

// =============================================================================
// REGISTRATION INPUTS
// =============================================================================

export const entityInputSchema = z.object({
  name: requiredName,
  entityType: z.string().trim(),
  summary: text,
  signature: optionalTag,
  language: optionalTag,
  observations: noteList,
  metadata: metadataSchema,
})

export const relationshipInputSchema = z.object({
  fromEntity: requiredName,
  toEntity: requiredName,
  relationshipType: requiredName,
  metadata: metadataSchema,
})

export const patternInputSchema = z.object({
  name: requiredName,
  description: text,
  language: optionalTag,
  example: optionalTag,
  metadata: metadataSchema,
})

export const styleConventionInputSchema = z.object({
  name: requiredName,
  description: text,
  language: optionalTag,
  examples: noteList,
  metadata: metadataSchema,
})

export const observationInputSchema = z.object({
  entityName: requiredName,
  observation: note,
})

// =============================================================================
// QUERY INPUTS
// =============================================================================

export const entityQuerySchema = z
  .object({
    entityType: optionalTag,
    language: optionalTag,
    namePattern: z.string().nullish().transform((value) => (value ? value : undefined)),
    limit: z
      .number()
      .int("must be an integer")
      .positive("must be a positive integer")
      .nullish()
      .transform((value) => value ?? undefined),
  })
  .default({})

export const patternQuerySchema = z
  .object({
    language: optionalTag,
    patternName: optionalTag,
  })
  .default({})

export const styleConventionQuerySchema = z
  .object({
    language: optionalTag,
    conventionName: optionalTag,
  })
  .default({})

export const entityNameSchema = requiredName

export const projectPathSchema = z.string().trim().min(1, "must not be empty")

// =============================================================================
// INFERRED TYPES
// =============================================================================

/** What callers pass in. */
export type EntityInput = z.input<typeof entityInputSchema>
export type RelationshipInput = z.input<typeof relationshipInputSchema>
export type PatternInput = z.input<typeof patternInputSchema>
export type StyleConventionInput = z.input<typeof styleConventionInputSchema>
export type EntityQuery = z.input<typeof entityQuerySchema>
export type PatternQuery = z.input<typeof patternQuerySchema>
export type StyleConventionQuery = z.input<typeof styleConventionQuerySchema>

/** What the merge and query engines receive after parsing. */
export type NormalizedEntityInput = z.output<typeof entityInputSchema>
export type NormalizedRelationshipInput = z.output<typeof relationshipInputSchema>
export type NormalizedPatternInput = z.output<typeof patternInputSchema>
export type NormalizedStyleConventionInput = z.output<typeof styleConventionInputSchema>
export type NormalizedEntityQuery = z.output<typeof entityQuerySchema>
export type NormalizedPatternQuery = z.output<typeof patternQuerySchema>
export type NormalizedStyleConventionQuery = z.output<typeof styleConventionQuerySchema>
