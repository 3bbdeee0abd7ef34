/**
 * In-Memory Gateway
 *
 * Keeps the serialized document in a string. Reopening a graph on the
 * same gateway goes through the same parse path as a file on disk.
 */

import { parseDocument, serializeDocument, type GraphDocument } from "./document"
import type { PersistenceGateway } from "./gateway"

export class MemoryGateway implements PersistenceGateway {
  readonly location = "memory"
  private text: string | null
  private saveCount = 0

  constructor(initialText: string | null = null) {
    this.text = initialText
  }

  async load(): Promise<GraphDocument | null> {
    return this.text === null ? null : parseDocument(this.text, this.location)
  }

  async save(document: GraphDocument): Promise<void> {
    this.text = serializeDocument(document)
    this.saveCount++
  }

  /** Serialized document, or null before the first save */
  contents(): string | null {
    return this.text
  }

  /** Number of completed saves */
  get saves(): number {
    return this.saveCount
  }
}
