import { describe, it, expect } from "vitest"
import { Logger } from "../src"

function capture(level: "debug" | "info" | "warn" | "error" | "silent", scope?: string) {
  const entries: Array<{ line: string; detail: unknown }> = []
  const logger = new Logger({ level, scope, sink: (line, detail) => entries.push({ line, detail }) })
  return { logger, entries }
}

describe("Logger", () => {
  it("should format level, time and scope", () => {
    const { logger, entries } = capture("info", "graph")

    logger.info("Loaded")

    expect(entries[0]?.line).toMatch(/^\[INFO\] \d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[graph\] - Loaded$/)
  })

  it("should drop lines below the minimum level", () => {
    const { logger, entries } = capture("warn")

    logger.debug("a")
    logger.info("b")
    logger.warn("c")
    logger.error("d")

    expect(entries.map((e) => e.line.slice(0, 7))).toEqual(["[WARN] ", "[ERROR]"])
  })

  it("should write nothing when silent", () => {
    const { logger, entries } = capture("silent")

    logger.error("boom")

    expect(entries).toEqual([])
  })

  it("should nest child scopes and share the sink", () => {
    const { logger, entries } = capture("debug", "server")

    logger.child("tools").debug("called", { tool: "query_entities" })

    expect(entries[0]?.line).toContain("[server:tools] - called")
    expect(entries[0]?.detail).toEqual({ tool: "query_entities" })
  })
})
