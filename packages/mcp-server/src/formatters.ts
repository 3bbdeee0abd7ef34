/**
 * Tool Output Formatters
 *
 * Plain-text renderings of graph results. Each output is a list of
 * sections separated by a blank line; empty sections are left out.
 */

import type {
  DirectedRelationship,
  Entity,
  EntityDetails,
  KnowledgeStatistics,
  MetadataValue,
  Pattern,
  ProjectUnderstanding,
  RegistrationResult,
  StyleConvention,
} from "@codememo/knowledge-graph"

/** Observations shown per entity in query listings */
export const LISTED_OBSERVATIONS = 3
/** Key components shown in a project summary */
export const KEY_COMPONENT_LIMIT = 10
/** Entities shown in a project summary */
export const SUMMARY_ENTITY_LIMIT = 30
/** Entity types listed as key components */
export const KEY_COMPONENT_TYPES: ReadonlySet<string> = new Set(["module", "class", "interface"])

type Section = string[]

function render(sections: Section[]): string {
  return sections
    .filter((section) => section.length > 0)
    .map((section) => section.join("\n"))
    .join("\n\n")
}

function plural(count: number, singular: string, pluralForm: string): string {
  return `${count} ${count === 1 ? singular : pluralForm}`
}

function byName(a: { name: string }, b: { name: string }): number {
  if (a.name < b.name) return -1
  if (a.name > b.name) return 1
  return 0
}

function countSection(title: string, counts: Record<string, number>): Section {
  const entries = Object.entries(counts).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
  if (entries.length === 0) return []
  return [`${title}:`, ...entries.map(([key, count]) => `- ${key}: ${count}`)]
}

function formatMetadataValue(value: MetadataValue): string {
  return typeof value === "string" ? value : JSON.stringify(value)
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1)
}

// =============================================================================
// REGISTRATION
// =============================================================================

/**
 * `Entity 'Foo' registered with ID: entity_1` or
 * `Entity 'Foo' merged into existing ID: entity_1`.
 */
export function formatRegistration(label: string, name: string, result: RegistrationResult): string {
  const outcome = result.created ? "registered with ID" : "merged into existing ID"
  return `${label} '${name}' ${outcome}: ${result.id}`
}

export function relationshipName(fromEntity: string, relationshipType: string, toEntity: string): string {
  return `${fromEntity} -${relationshipType}-> ${toEntity}`
}

// =============================================================================
// ENTITIES
// =============================================================================

function entityHeader(entity: Entity): string[] {
  const lines = [`Type: ${entity.entityType}`]
  if (entity.language) lines.push(`Language: ${entity.language}`)
  if (entity.signature) lines.push(`Signature: ${entity.signature}`)
  lines.push(`Summary: ${entity.summary}`)
  return lines
}

function listedEntity(entity: Entity): Section {
  const lines = [`Name: ${entity.name}`, ...entityHeader(entity)]
  if (entity.observations.length > 0) {
    lines.push("Observations:")
    for (const observation of entity.observations.slice(0, LISTED_OBSERVATIONS)) {
      lines.push(`- ${observation}`)
    }
    const hidden = entity.observations.length - LISTED_OBSERVATIONS
    if (hidden > 0) {
      lines.push(`... and ${plural(hidden, "more observation", "more observations")}`)
    }
  }
  return lines
}

export function formatEntityList(entities: Entity[]): string {
  if (entities.length === 0) {
    return "No entities found matching the query criteria"
  }
  return render([[`Found ${plural(entities.length, "entity", "entities")}:`], ...entities.map(listedEntity)])
}

function counterpartLabel(link: DirectedRelationship): string {
  const name = link.direction === "outgoing" ? link.relationship.toEntity : link.relationship.fromEntity
  return link.counterpart ? `${name} (${link.counterpart.entityType})` : `${name} (not registered)`
}

export function formatEntityDetails(details: EntityDetails): string {
  const { entity, outgoing, incoming } = details

  const observations: Section =
    entity.observations.length > 0 ? ["Observations:", ...entity.observations.map((o) => `- ${o}`)] : []

  const relationships: Section = []
  if (outgoing.length > 0 || incoming.length > 0) {
    relationships.push("Relationships:")
    if (outgoing.length > 0) {
      relationships.push("Outgoing:")
      for (const link of outgoing) {
        relationships.push(`- ${link.relationship.relationshipType} -> ${counterpartLabel(link)}`)
      }
    }
    if (incoming.length > 0) {
      relationships.push("Incoming:")
      for (const link of incoming) {
        relationships.push(`- ${counterpartLabel(link)} ${link.relationship.relationshipType} -> this`)
      }
    }
  }

  const metadataEntries = Object.entries(entity.metadata)
  const metadata: Section =
    metadataEntries.length > 0
      ? ["Metadata:", ...metadataEntries.map(([key, value]) => `- ${key}: ${formatMetadataValue(value)}`)]
      : []

  return render([[`Entity: ${entity.name}`, ...entityHeader(entity)], observations, relationships, metadata])
}

// =============================================================================
// PATTERNS & STYLE CONVENTIONS
// =============================================================================

function fenced(code: string): string[] {
  return ["```", code, "```"]
}

export function formatPatternList(patterns: Pattern[]): string {
  if (patterns.length === 0) {
    return "No patterns found matching the query criteria"
  }

  const blocks = patterns.map((pattern): Section => {
    const lines = [`Name: ${pattern.name}`]
    if (pattern.language) lines.push(`Language: ${pattern.language}`)
    lines.push(`Description: ${pattern.description}`)
    if (pattern.example) lines.push("Example:", ...fenced(pattern.example))
    return lines
  })
  return render([[`Found ${plural(patterns.length, "pattern", "patterns")}:`], ...blocks])
}

export function formatStyleConventionList(conventions: StyleConvention[]): string {
  if (conventions.length === 0) {
    return "No style conventions found matching the query criteria"
  }

  const blocks = conventions.map((convention): Section => {
    const lines = [`Name: ${convention.name}`]
    if (convention.language) lines.push(`Language: ${convention.language}`)
    lines.push(`Description: ${convention.description}`)
    if (convention.examples.length > 0) {
      lines.push("Examples:")
      convention.examples.forEach((example, i) => {
        lines.push(`Example ${i + 1}:`, ...fenced(example))
      })
    }
    return lines
  })
  return render([[`Found ${plural(conventions.length, "style convention", "style conventions")}:`], ...blocks])
}

// =============================================================================
// STATISTICS
// =============================================================================

export function formatStatistics(stats: KnowledgeStatistics): string {
  return render([
    ["Knowledge Graph Statistics:"],
    [
      `Total Entities: ${stats.entities.total}`,
      `Total Relationships: ${stats.relationships.total}`,
      `Total Patterns: ${stats.patterns.total}`,
      `Total Style Conventions: ${stats.styleConventions.total}`,
      `Total Observations: ${stats.observations}`,
      `Total Examples: ${stats.examples}`,
    ],
    countSection("Entities by Type", stats.entities.byType),
    countSection("Entities by Language", stats.entities.byLanguage),
    countSection("Relationships by Type", stats.relationships.byType),
    countSection("Patterns by Language", stats.patterns.byLanguage),
    countSection("Style Conventions by Language", stats.styleConventions.byLanguage),
  ])
}

// =============================================================================
// PROJECT VIEWS
// =============================================================================

function projectHeader(understanding: ProjectUnderstanding): Section[] {
  return [
    [`Project Understanding for: ${understanding.projectPath}`],
    [`Total Entities: ${understanding.entities.length}`, `Total Relationships: ${understanding.relationships.length}`],
  ]
}

function limitedList(entities: Entity[], limit: number, remainderLabel: string): string[] {
  const lines = entities.slice(0, limit).map((entity) => `- ${entity.name} (${entity.entityType}): ${entity.summary}`)
  if (entities.length > limit) {
    lines.push(`... and ${entities.length - limit} more ${remainderLabel}`)
  }
  return lines
}

/**
 * Overview of a project: counts, key components and an entity index.
 */
export function formatProjectSummary(understanding: ProjectUnderstanding): string {
  const sorted = [...understanding.entities].sort(byName)
  const keyComponents = sorted.filter((entity) => KEY_COMPONENT_TYPES.has(entity.entityType))

  return render([
    ...projectHeader(understanding),
    countSection("Entities by Type", understanding.entityTypeCounts),
    keyComponents.length > 0
      ? ["Key Components:", ...limitedList(keyComponents, KEY_COMPONENT_LIMIT, "key components")]
      : [],
    ["All Entities:", ...limitedList(sorted, SUMMARY_ENTITY_LIMIT, "entities")],
  ])
}

export interface ProjectDumpOptions {
  includeObservations: boolean
}

/**
 * Every project entity grouped by type, with outgoing relationships.
 */
export function formatProjectDump(understanding: ProjectUnderstanding, options: ProjectDumpOptions): string {
  const known = new Map<string, Entity>()
  for (const entity of [...understanding.entities, ...understanding.relatedEntities]) {
    known.set(entity.name, entity)
  }

  const byType = new Map<string, Entity[]>()
  for (const entity of understanding.entities) {
    const group = byType.get(entity.entityType) ?? []
    group.push(entity)
    byType.set(entity.entityType, group)
  }

  const sections: Section[] = [...projectHeader(understanding)]
  const types = Array.from(byType.keys()).sort()

  for (const entityType of types) {
    const group = (byType.get(entityType) ?? []).sort(byName)
    const lines = [`${capitalize(entityType || "untyped")} Entities (${group.length}):`]

    group.forEach((entity, index) => {
      if (index > 0) lines.push("")
      lines.push(`- ${entity.name}`, `  Summary: ${entity.summary}`)
      if (entity.signature) lines.push(`  Signature: ${entity.signature}`)
      if (entity.language) lines.push(`  Language: ${entity.language}`)
      if (options.includeObservations && entity.observations.length > 0) {
        lines.push("  Observations:", ...entity.observations.map((o) => `    - ${o}`))
      }

      const outgoing = understanding.relationships.filter((r) => r.fromEntity === entity.name)
      if (outgoing.length > 0) {
        lines.push("  Relations:")
        for (const relationship of outgoing) {
          const target = known.get(relationship.toEntity)
          const suffix = target ? target.entityType : "not registered"
          lines.push(`    - ${relationship.relationshipType} -> ${relationship.toEntity} (${suffix})`)
        }
      }
    })
    sections.push(lines)
  }

  if (understanding.patterns.length > 0) {
    sections.push([
      `Patterns (${understanding.patterns.length}):`,
      ...understanding.patterns.map((p) => `- ${p.name}: ${p.description}`),
    ])
  }
  if (understanding.styleConventions.length > 0) {
    sections.push([
      `Style Conventions (${understanding.styleConventions.length}):`,
      ...understanding.styleConventions.map((c) => `- ${c.name}: ${c.description}`),
    ])
  }

  return render(sections)
}
