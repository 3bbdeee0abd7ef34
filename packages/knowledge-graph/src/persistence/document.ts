/**
 * Persisted Graph Document
 *
 * One self-describing JSON document holds every record collection and
 * the id counters. Loading validates it and never trusts its counters
 * to be ahead of the ids it contains.
 */

import { z } from "zod"
import { storedMetadataSchema } from "../model"
import type { RecordType } from "../model"
import type { GraphData, IdCounters } from "../store"
import { PersistenceError } from "../errors"

export const DOCUMENT_FORMAT = "codememo.knowledge-graph"
export const DOCUMENT_VERSION = 1

// =============================================================================
// SCHEMA
// =============================================================================

const recordBase = {
  id: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
  metadata: storedMetadataSchema,
}

const entitySchema = z.object({
  ...recordBase,
  name: z.string().min(1),
  entityType: z.string(),
  summary: z.string(),
  signature: z.string().optional(),
  language: z.string().optional(),
  observations: z.array(z.string()),
})

const relationshipSchema = z.object({
  ...recordBase,
  fromEntity: z.string().min(1),
  toEntity: z.string().min(1),
  relationshipType: z.string().min(1),
})

const patternSchema = z.object({
  ...recordBase,
  name: z.string().min(1),
  description: z.string(),
  language: z.string().optional(),
  example: z.string().optional(),
})

const styleConventionSchema = z.object({
  ...recordBase,
  name: z.string().min(1),
  description: z.string(),
  language: z.string().optional(),
  examples: z.array(z.string()),
})

const counter = z.number().int().nonnegative()

export const graphDocumentSchema = z.object({
  format: z.literal(DOCUMENT_FORMAT),
  version: z.literal(DOCUMENT_VERSION),
  savedAt: z.string(),
  counters: z.object({
    entity: counter,
    relationship: counter,
    pattern: counter,
    styleConvention: counter,
  }),
  entities: z.array(entitySchema),
  relationships: z.array(relationshipSchema),
  patterns: z.array(patternSchema),
  styleConventions: z.array(styleConventionSchema),
})

export type GraphDocument = z.output<typeof graphDocumentSchema>

// =============================================================================
// CONVERSION
// =============================================================================

export function toDocument(data: GraphData, savedAt: string): GraphDocument {
  return {
    format: DOCUMENT_FORMAT,
    version: DOCUMENT_VERSION,
    savedAt,
    counters: data.counters,
    entities: data.entities,
    relationships: data.relationships,
    patterns: data.patterns,
    styleConventions: data.styleConventions,
  }
}

const RECORD_TYPES: readonly RecordType[] = ["entity", "relationship", "pattern", "styleConvention"]

function highestSequence(ids: string[]): number {
  let highest = 0
  for (const id of ids) {
    const value = Number(id.slice(id.lastIndexOf("_") + 1))
    if (Number.isInteger(value) && value > highest) highest = value
  }
  return highest
}

export function fromDocument(document: GraphDocument): GraphData {
  const idsByKind: Record<RecordType, string[]> = {
    entity: document.entities.map((r) => r.id),
    relationship: document.relationships.map((r) => r.id),
    pattern: document.patterns.map((r) => r.id),
    styleConvention: document.styleConventions.map((r) => r.id),
  }

  const counters: IdCounters = { ...document.counters }
  for (const kind of RECORD_TYPES) {
    counters[kind] = Math.max(counters[kind], highestSequence(idsByKind[kind]))
  }

  return {
    counters,
    entities: document.entities,
    relationships: document.relationships,
    patterns: document.patterns,
    styleConventions: document.styleConventions,
  }
}

/**
 * Parse and validate serialized document text.
 * @throws PersistenceError when the text is not a valid graph document
 */
export function parseDocument(text: string, location: string): GraphDocument {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (error) {
    throw new PersistenceError(
      `Knowledge graph at ${location} is not valid JSON`,
      "load",
      location,
      error instanceof Error ? error : undefined,
    )
  }

  const result = graphDocumentSchema.safeParse(raw)
  if (!result.success) {
    const issue = result.error.errors[0]
    const where = issue?.path.length ? ` at ${issue.path.join(".")}` : ""
    throw new PersistenceError(
      `Knowledge graph at ${location} is not a valid document${where}: ${issue?.message ?? "unknown problem"}`,
      "load",
      location,
    )
  }
  return result.data
}

export function serializeDocument(document: GraphDocument): string {
  return JSON.stringify(document, null, 2)
}
