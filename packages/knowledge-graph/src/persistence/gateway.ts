/**
 * Persistence Gateway
 *
 * Durable home of the graph document. The graph calls `save` after
 * every mutation with the complete document and `load` once on open.
 */

import type { GraphDocument } from "./document"

export interface PersistenceGateway {
  /** Human-readable location, used in log lines and errors */
  readonly location: string
  /**
   * Read the stored document.
   * @returns null when nothing has been stored yet
   * @throws PersistenceError when the store exists but cannot be read
   */
  load(): Promise<GraphDocument | null>
  /**
   * Replace the stored document. Must not resolve before the write is durable.
   * @throws PersistenceError when the write fails
   */
  save(document: GraphDocument): Promise<void>
}
