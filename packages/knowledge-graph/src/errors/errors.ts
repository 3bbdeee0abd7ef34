/**
 * Custom Error Classes
 */

/**
 * Taxonomy kind reported to callers alongside every failure.
 */
export type ErrorKind =
  | "ValidationError"
  | "NotFoundError"
  | "PersistenceError"
  | "GraphClosedError"
  | "KnowledgeGraphError"

/**
 * Base error for all knowledge graph failures.
 */
export class KnowledgeGraphError extends Error {
  public override readonly cause?: Error
  public readonly kind: ErrorKind = "KnowledgeGraphError"

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "KnowledgeGraphError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Validation error.
 * Thrown when an input is malformed. The graph is left untouched.
 */
export class ValidationError extends KnowledgeGraphError {
  public override readonly kind = "ValidationError"

  constructor(
    message: string,
    public readonly field?: string,
    public readonly received?: unknown,
  ) {
    super(message)
    this.name = "ValidationError"
  }
}

/**
 * Record kinds that can be looked up by name.
 */
export type RecordKind = "entity" | "relationship" | "pattern" | "styleConvention" | "project"

const RECORD_LABELS: Record<RecordKind, string> = {
  entity: "Entity",
  relationship: "Relationship",
  pattern: "Pattern",
  styleConvention: "Style convention",
  project: "Project",
}

/**
 * Not found error.
 * Thrown when a lookup by name fails.
 */
export class NotFoundError extends KnowledgeGraphError {
  public override readonly kind = "NotFoundError"

  constructor(
    public readonly recordKind: RecordKind,
    public readonly key: string,
  ) {
    super(`${RECORD_LABELS[recordKind]} '${key}' not found`)
    this.name = "NotFoundError"
  }
}

/**
 * Persistence error.
 * Thrown when the durable store cannot be read or written.
 */
export class PersistenceError extends KnowledgeGraphError {
  public override readonly kind = "PersistenceError"

  constructor(
    message: string,
    public readonly operation: "load" | "save",
    public readonly location?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "PersistenceError"
  }
}

/**
 * Thrown by operations issued after the graph was closed.
 */
export class GraphClosedError extends KnowledgeGraphError {
  public override readonly kind = "GraphClosedError"

  constructor() {
    super("Knowledge graph is closed")
    this.name = "GraphClosedError"
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
