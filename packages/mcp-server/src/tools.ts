/**
 * Knowledge Tools
 *
 * Registers one MCP tool per graph operation. Tool parameters are
 * snake_case; the graph re-validates everything it receives, so the
 * shapes here stay loose and graph errors are reported as
 * `${kind}: ${message}` error results.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import { z } from "zod"
import { KnowledgeGraphError, type KnowledgeGraph, type Logger } from "@codememo/knowledge-graph"
import {
  formatEntityDetails,
  formatEntityList,
  formatPatternList,
  formatProjectDump,
  formatProjectSummary,
  formatRegistration,
  formatStatistics,
  formatStyleConventionList,
  relationshipName,
} from "./formatters"

/** Applied when query_entities is called without a limit */
export const DEFAULT_QUERY_LIMIT = 10

export const TOOL_NAMES = [
  "register_entity",
  "register_relationship",
  "register_pattern",
  "register_style_convention",
  "add_entity_observation",
  "query_entities",
  "get_entity_details",
  "query_patterns",
  "query_style_conventions",
  "get_knowledge_statistics",
  "clear_knowledge",
  "load_project_understanding",
  "dump_project_understanding",
] as const

export type ToolName = (typeof TOOL_NAMES)[number]

const metadataParam = z
  .record(z.unknown())
  .optional()
  .describe("Structured metadata (strings, numbers, booleans, null, lists and nested objects)")

function textResult(text: string): CallToolResult {
  return { content: [{ type: "text" as const, text }] }
}

function errorResult(text: string): CallToolResult {
  return { content: [{ type: "text" as const, text }], isError: true }
}

export function registerKnowledgeTools(server: McpServer, graph: KnowledgeGraph, logger: Logger): void {
  const log = logger.child("tools")

  /**
   * Run a tool body, turning graph errors into error results.
   * Anything else is logged and rethrown to the SDK.
   */
  const run = async (tool: ToolName, body: () => Promise<string>): Promise<CallToolResult> => {
    log.debug(`${tool} called`)
    try {
      return textResult(await body())
    } catch (error) {
      if (error instanceof KnowledgeGraphError) {
        log.warn(`${tool} failed: ${error.kind}: ${error.message}`)
        return errorResult(`${error.kind}: ${error.message}`)
      }
      log.error(`${tool} failed unexpectedly`, error)
      throw error
    }
  }

  // ===========================================================================
  // REGISTRATION
  // ===========================================================================

  server.tool(
    "register_entity",
    "Register a code entity (class, function, module, ...). Registering an existing name merges into it.",
    {
      name: z.string().describe("Entity name, unique in the graph"),
      entity_type: z.string().describe("Kind of entity, e.g. class, function, module"),
      summary: z.string().describe("Short description of what the entity does"),
      signature: z.string().nullish().describe("Declaration or call signature"),
      language: z.string().nullish().describe("Programming language"),
      observations: z.array(z.string()).optional().describe("Notes about the entity"),
      metadata: metadataParam,
    },
    async ({ name, entity_type, summary, signature, language, observations, metadata }) =>
      run("register_entity", async () => {
        const result = await graph.registerEntity({
          name,
          entityType: entity_type,
          summary,
          signature,
          language,
          observations,
          metadata,
        })
        return formatRegistration("Entity", name.trim(), result)
      }),
  )

  server.tool(
    "register_relationship",
    "Register a directed relationship between two entity names. Endpoints need not be registered.",
    {
      from_entity: z.string().describe("Source entity name"),
      to_entity: z.string().describe("Target entity name"),
      relationship_type: z.string().describe("Relationship type, e.g. calls, imports, extends"),
      metadata: metadataParam,
    },
    async ({ from_entity, to_entity, relationship_type, metadata }) =>
      run("register_relationship", async () => {
        const result = await graph.registerRelationship({
          fromEntity: from_entity,
          toEntity: to_entity,
          relationshipType: relationship_type,
          metadata,
        })
        const name = relationshipName(from_entity.trim(), relationship_type.trim(), to_entity.trim())
        return formatRegistration("Relationship", name, result)
      }),
  )

  server.tool(
    "register_pattern",
    "Register a code pattern. Patterns are unique per name and language.",
    {
      name: z.string().describe("Pattern name"),
      description: z.string().describe("What the pattern is and when it is used"),
      language: z.string().nullish().describe("Programming language"),
      example: z.string().nullish().describe("Example code"),
      metadata: metadataParam,
    },
    async ({ name, description, language, example, metadata }) =>
      run("register_pattern", async () => {
        const result = await graph.registerPattern({ name, description, language, example, metadata })
        return formatRegistration("Pattern", name.trim(), result)
      }),
  )

  server.tool(
    "register_style_convention",
    "Register a style convention. Conventions are unique per name and language.",
    {
      name: z.string().describe("Convention name"),
      description: z.string().describe("What the convention requires"),
      language: z.string().nullish().describe("Programming language"),
      examples: z.array(z.string()).optional().describe("Example code following the convention"),
      metadata: metadataParam,
    },
    async ({ name, description, language, examples, metadata }) =>
      run("register_style_convention", async () => {
        const result = await graph.registerStyleConvention({ name, description, language, examples, metadata })
        return formatRegistration("Style convention", name.trim(), result)
      }),
  )

  server.tool(
    "add_entity_observation",
    "Add an observation to an existing entity.",
    {
      entity_name: z.string().describe("Name of a registered entity"),
      observation: z.string().describe("Observation to append"),
    },
    async ({ entity_name, observation }) =>
      run("add_entity_observation", async () => {
        const entity = await graph.addEntityObservation(entity_name, observation)
        return `Observation added to entity '${entity.name}'`
      }),
  )

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  server.tool(
    "query_entities",
    "Find entities by type, language and name pattern, oldest first.",
    {
      entity_type: z.string().optional().describe("Exact entity type"),
      language: z.string().optional().describe("Exact language"),
      name_pattern: z
        .string()
        .optional()
        .describe("Regular expression searched in entity names (case-sensitive, no backreferences)"),
      limit: z.number().optional().describe(`Maximum results (default ${DEFAULT_QUERY_LIMIT})`),
    },
    async ({ entity_type, language, name_pattern, limit }) =>
      run("query_entities", async () => {
        const entities = await graph.queryEntities({
          entityType: entity_type,
          language,
          namePattern: name_pattern,
          limit: limit ?? DEFAULT_QUERY_LIMIT,
        })
        return formatEntityList(entities)
      }),
  )

  server.tool(
    "get_entity_details",
    "Get an entity with its observations, metadata and relationships in both directions.",
    {
      entity_name: z.string().describe("Entity name"),
    },
    async ({ entity_name }) =>
      run("get_entity_details", async () => formatEntityDetails(await graph.getEntityDetails(entity_name))),
  )

  server.tool(
    "query_patterns",
    "Find patterns by exact name and language.",
    {
      language: z.string().optional().describe("Exact language"),
      pattern_name: z.string().optional().describe("Exact pattern name"),
    },
    async ({ language, pattern_name }) =>
      run("query_patterns", async () =>
        formatPatternList(await graph.queryPatterns({ language, patternName: pattern_name })),
      ),
  )

  server.tool(
    "query_style_conventions",
    "Find style conventions by exact name and language.",
    {
      language: z.string().optional().describe("Exact language"),
      convention_name: z.string().optional().describe("Exact convention name"),
    },
    async ({ language, convention_name }) =>
      run("query_style_conventions", async () =>
        formatStyleConventionList(
          await graph.queryStyleConventions({ language, conventionName: convention_name }),
        ),
      ),
  )

  server.tool("get_knowledge_statistics", "Count the records in the knowledge graph.", async () =>
    run("get_knowledge_statistics", async () => formatStatistics(await graph.getKnowledgeStatistics())),
  )

  server.tool("clear_knowledge", "Delete every record in the knowledge graph. Cannot be undone.", async () =>
    run("clear_knowledge", async () => {
      await graph.clearKnowledge()
      return "Knowledge graph cleared successfully"
    }),
  )

  // ===========================================================================
  // PROJECT VIEWS
  // ===========================================================================

  server.tool(
    "load_project_understanding",
    "Summarize what is recorded for a project (records whose metadata.project_path is the project directory).",
    {
      project_path: z.string().describe("Project directory"),
    },
    async ({ project_path }) =>
      run("load_project_understanding", async () =>
        formatProjectSummary(await graph.getProjectUnderstanding(project_path)),
      ),
  )

  server.tool(
    "dump_project_understanding",
    "List every entity recorded for a project grouped by type, with relationships, patterns and conventions.",
    {
      project_path: z.string().describe("Project directory"),
      include_observations: z.boolean().optional().describe("Include entity observations (default false)"),
    },
    async ({ project_path, include_observations }) =>
      run("dump_project_understanding", async () => {
        const understanding = await graph.getProjectUnderstanding(project_path)
        return formatProjectDump(understanding, { includeObservations: include_observations ?? false })
      }),
  )
}
