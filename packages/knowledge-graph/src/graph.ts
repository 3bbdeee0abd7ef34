/**
 * Knowledge Graph
 *
 * Owned graph object with an explicit lifecycle:
 * open (load from the gateway) -> mutate + persist -> close.
 *
 * Every mutation runs under the exclusive lock inside a store
 * transaction. The complete document is saved before the transaction
 * commits; if anything fails the store, its indexes and the id counters
 * are rolled back, so memory never runs ahead of the durable copy.
 */

import {
  parseInput,
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
} from "./model"
import type {
  Entity,
  Pattern,
  StyleConvention,
  RegistrationResult,
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
import { GraphStore } from "./store"
import { MergeEngine, QueryEngine, systemClock, type Clock } from "./engine"
import { MemoryGateway, toDocument, fromDocument, type PersistenceGateway } from "./persistence"
import { ReadWriteLock } from "./concurrency"
import { Logger } from "./logging"
import { GraphClosedError, KnowledgeGraphError, PersistenceError, toError } from "./errors"

/**
 * What to do when the stored document cannot be loaded.
 * - fail: `open` rejects with the PersistenceError
 * - start-empty: log a warning and start with an empty graph
 */
export type LoadFailurePolicy = "fail" | "start-empty"

/**
 * Configuration for a knowledge graph.
 */
export interface KnowledgeGraphConfig {
  /** Durable store (defaults to an in-memory gateway) */
  gateway?: PersistenceGateway
  /** Timestamp source (defaults to the system clock) */
  clock?: Clock
  logger?: Logger
  /** Behavior when loading fails (default: fail) */
  onLoadFailure?: LoadFailurePolicy
}

export class KnowledgeGraph {
  private readonly store = new GraphStore()
  private readonly lock = new ReadWriteLock()
  private readonly merge: MergeEngine
  private readonly query: QueryEngine
  private closed = false

  private constructor(
    private readonly gateway: PersistenceGateway,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {
    this.merge = new MergeEngine(this.store, clock)
    this.query = new QueryEngine(this.store)
  }

  /**
   * Create a graph and load its stored state.
   * @throws PersistenceError if loading fails and the policy is "fail"
   */
  static async open(config: KnowledgeGraphConfig = {}): Promise<KnowledgeGraph> {
    const graph = new KnowledgeGraph(
      config.gateway ?? new MemoryGateway(),
      config.clock ?? systemClock,
      (config.logger ?? new Logger()).child("graph"),
    )
    await graph.load(config.onLoadFailure ?? "fail")
    return graph
  }

  /** Where the graph is persisted */
  get location(): string {
    return this.gateway.location
  }

  get isClosed(): boolean {
    return this.closed
  }

  // ===========================================================================
  // WRITES
  // ===========================================================================

  async registerEntity(input: EntityInput): Promise<RegistrationResult> {
    const parsed = parseInput(entityInputSchema, input, "entity")
    return this.mutate("registerEntity", () => this.merge.registerEntity(parsed))
  }

  async registerRelationship(input: RelationshipInput): Promise<RegistrationResult> {
    const parsed = parseInput(relationshipInputSchema, input, "relationship")
    return this.mutate("registerRelationship", () => this.merge.registerRelationship(parsed))
  }

  async registerPattern(input: PatternInput): Promise<RegistrationResult> {
    const parsed = parseInput(patternInputSchema, input, "pattern")
    return this.mutate("registerPattern", () => this.merge.registerPattern(parsed))
  }

  async registerStyleConvention(input: StyleConventionInput): Promise<RegistrationResult> {
    const parsed = parseInput(styleConventionInputSchema, input, "style convention")
    return this.mutate("registerStyleConvention", () => this.merge.registerStyleConvention(parsed))
  }

  /**
   * Append an observation to an existing entity. Never creates one.
   * @throws NotFoundError if the entity is not registered
   */
  async addEntityObservation(entityName: string, observation: string): Promise<Entity> {
    const parsed = parseInput(observationInputSchema, { entityName, observation }, "observation")
    return this.mutate("addEntityObservation", () =>
      this.merge.addEntityObservation(parsed.entityName, parsed.observation),
    )
  }

  /**
   * Remove every record and reset the id counters. Irreversible.
   */
  async clearKnowledge(): Promise<void> {
    return this.mutate("clearKnowledge", () => this.store.clear())
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  async queryEntities(query?: EntityQuery): Promise<Entity[]> {
    const parsed = parseInput(entityQuerySchema, query, "entity query")
    return this.read(() => this.query.queryEntities(parsed))
  }

  /**
   * @throws NotFoundError if the entity is not registered
   */
  async getEntityDetails(entityName: string): Promise<EntityDetails> {
    const name = parseInput(entityNameSchema, entityName, "entity name")
    return this.read(() => this.query.getEntityDetails(name))
  }

  async queryPatterns(query?: PatternQuery): Promise<Pattern[]> {
    const parsed = parseInput(patternQuerySchema, query, "pattern query")
    return this.read(() => this.query.queryPatterns(parsed))
  }

  async queryStyleConventions(query?: StyleConventionQuery): Promise<StyleConvention[]> {
    const parsed = parseInput(styleConventionQuerySchema, query, "style convention query")
    return this.read(() => this.query.queryStyleConventions(parsed))
  }

  async getKnowledgeStatistics(): Promise<KnowledgeStatistics> {
    return this.read(() => this.query.getStatistics())
  }

  /**
   * @throws NotFoundError when nothing is recorded for the project
   */
  async getProjectUnderstanding(projectPath: string): Promise<ProjectUnderstanding> {
    const path = parseInput(projectPathSchema, projectPath, "project path")
    return this.read(() => this.query.getProjectUnderstanding(path))
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Wait for in-flight operations, then refuse new ones.
   */
  async close(): Promise<void> {
    await this.lock.write(() => {
      if (this.closed) return
      this.closed = true
      this.logger.info(`Closed knowledge graph at ${this.gateway.location}`)
    })
  }

  private async load(policy: LoadFailurePolicy): Promise<void> {
    try {
      const document = await this.gateway.load()
      if (!document) {
        this.logger.info(`No stored knowledge graph at ${this.gateway.location}, starting fresh`)
        return
      }
      this.store.import(fromDocument(document))
      this.logger.info(`Loaded knowledge graph from ${this.gateway.location}`, this.store.sizes())
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError(
              `Cannot load knowledge graph from ${this.gateway.location}: ${toError(error).message}`,
              "load",
              this.gateway.location,
              toError(error),
            )

      if (policy === "fail") {
        this.logger.error(failure.message)
        throw failure
      }

      this.store.clear()
      this.logger.warn(
        `STARTING WITH AN EMPTY KNOWLEDGE GRAPH: ${failure.message}. ` +
          `The stored document will be replaced on the next write.`,
      )
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new GraphClosedError()
    }
  }

  private read<T>(task: () => T): Promise<T> {
    return this.lock.read(() => {
      this.assertOpen()
      return task()
    })
  }

  private mutate<T>(operation: string, apply: () => T): Promise<T> {
    return this.lock.write(async () => {
      this.assertOpen()
      this.store.beginTransaction()

      let result: T
      try {
        result = apply()
        await this.persist()
      } catch (error) {
        this.store.rollback()
        this.logRollback(operation, error)
        throw error
      }

      this.store.commit()
      this.logger.debug(`${operation} committed`, this.store.sizes())
      return result
    })
  }

  private async persist(): Promise<void> {
    const document = toDocument(this.store.export(), this.clock.isoNow())
    try {
      await this.gateway.save(document)
    } catch (error) {
      if (error instanceof PersistenceError) throw error
      const cause = toError(error)
      throw new PersistenceError(
        `Cannot save knowledge graph to ${this.gateway.location}: ${cause.message}`,
        "save",
        this.gateway.location,
        cause,
      )
    }
  }

  private logRollback(operation: string, error: unknown): void {
    if (error instanceof PersistenceError || !(error instanceof KnowledgeGraphError)) {
      this.logger.error(`${operation} rolled back`, error)
    } else {
      this.logger.debug(`${operation} rejected: ${error.message}`)
    }
  }
}

/**
 * Open a knowledge graph.
 */
export function openKnowledgeGraph(config: KnowledgeGraphConfig = {}): Promise<KnowledgeGraph> {
  return KnowledgeGraph.open(config)
}
