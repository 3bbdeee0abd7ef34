/**
 * JSON File Gateway
 *
 * Stores the graph as one JSON file. Writes go to a temporary sibling,
 * are flushed to disk and then renamed over the target, so a crash
 * mid-write leaves the previous document intact.
 */

import { mkdir, open, readFile, rename, rm } from "node:fs/promises"
import { dirname } from "node:path"
import { PersistenceError, toError } from "../errors"
import { parseDocument, serializeDocument, type GraphDocument } from "./document"
import type { PersistenceGateway } from "./gateway"

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT"
}

export class JsonFileGateway implements PersistenceGateway {
  constructor(readonly location: string) {}

  async load(): Promise<GraphDocument | null> {
    let text: string
    try {
      text = await readFile(this.location, "utf-8")
    } catch (error) {
      if (isMissingFile(error)) return null
      const cause = toError(error)
      throw new PersistenceError(
        `Cannot read knowledge graph at ${this.location}: ${cause.message}`,
        "load",
        this.location,
        cause,
      )
    }
    return parseDocument(text, this.location)
  }

  async save(document: GraphDocument): Promise<void> {
    const temporary = `${this.location}.${process.pid}.tmp`
    try {
      await mkdir(dirname(this.location), { recursive: true })
      const handle = await open(temporary, "w")
      try {
        await handle.writeFile(serializeDocument(document), "utf-8")
        await handle.sync()
      } finally {
        await handle.close()
      }
      await rename(temporary, this.location)
    } catch (error) {
      await rm(temporary, { force: true })
      const cause = toError(error)
      throw new PersistenceError(
        `Cannot write knowledge graph to ${this.location}: ${cause.message}`,
        "save",
        this.location,
        cause,
      )
    }
  }
}
