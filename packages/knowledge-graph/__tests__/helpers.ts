import { Logger, MemoryGateway, openKnowledgeGraph, type Clock, type GraphDocument, type KnowledgeGraph, type PersistenceGateway } from "../src"

/**
 * Clock advancing one second per reading, starting at 2026-01-01.
 */
export function createTestClock(): Clock {
  let tick = 0
  return {
    isoNow: () => new Date(Date.UTC(2026, 0, 1) + tick++ * 1000).toISOString(),
  }
}

/**
 * Logger that keeps its lines instead of printing them.
 */
export function createCapturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = []
  const logger = new Logger({ level: "debug", sink: (line) => lines.push(line) })
  return { logger, lines }
}

/**
 * Memory gateway whose next save can be made to fail.
 */
export class FlakyGateway extends MemoryGateway {
  failNextSave = false

  override async save(document: GraphDocument): Promise<void> {
    if (this.failNextSave) {
      this.failNextSave = false
      throw new Error("disk full")
    }
    return super.save(document)
  }
}

export function openTestGraph(gateway: PersistenceGateway = new MemoryGateway()): Promise<KnowledgeGraph> {
  return openKnowledgeGraph({ gateway, clock: createTestClock(), logger: new Logger({ level: "silent" }) })
}
