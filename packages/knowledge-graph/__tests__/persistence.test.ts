import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { mkdtemp, mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { DOCUMENT_FORMAT, DOCUMENT_VERSION, JsonFileGateway, MemoryGateway, PersistenceError } from "../src"
import { fromDocument, parseDocument } from "../src/persistence"
import { openTestGraph } from "./helpers"

function documentText(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    format: DOCUMENT_FORMAT,
    version: DOCUMENT_VERSION,
    savedAt: "2026-01-01T00:00:00.000Z",
    counters: { entity: 0, relationship: 0, pattern: 0, styleConvention: 0 },
    entities: [],
    relationships: [],
    patterns: [],
    styleConventions: [],
    ...overrides,
  })
}

const storedEntity = {
  id: "entity_5",
  name: "Loader",
  entityType: "class",
  summary: "Reads files",
  observations: [],
  metadata: {},
  createdAt: "2026-01-01T00:00:00.000Z",
  updatedAt: "2026-01-01T00:00:00.000Z",
}

// =============================================================================
// DOCUMENT
// =============================================================================

describe("graph document", () => {
  it("should raise counters to the highest stored id", () => {
    const document = parseDocument(documentText({ entities: [storedEntity] }), "test")

    expect(fromDocument(document).counters).toEqual({ entity: 5, relationship: 0, pattern: 0, styleConvention: 0 })
  })

  it("should keep counters that are already ahead", () => {
    const document = parseDocument(
      documentText({ entities: [storedEntity], counters: { entity: 9, relationship: 2, pattern: 0, styleConvention: 0 } }),
      "test",
    )

    expect(fromDocument(document).counters.entity).toBe(9)
  })

  it("should default missing metadata to an empty mapping", () => {
    const { metadata: _metadata, ...withoutMetadata } = storedEntity
    const document = parseDocument(documentText({ entities: [withoutMetadata] }), "test")

    expect(document.entities[0]?.metadata).toEqual({})
  })

  it("should reject documents of another format", () => {
    expect(() => parseDocument(documentText({ format: "other" }), "test")).toThrow(
      "Knowledge graph at test is not a valid document at format",
    )
  })

  it("should reject another version", () => {
    expect(() => parseDocument(documentText({ version: 2 }), "test")).toThrow(PersistenceError)
  })
})

describe("MemoryGateway", () => {
  it("should load nothing before the first save", async () => {
    expect(await new MemoryGateway().load()).toBeNull()
  })

  it("should start from the given text", async () => {
    const gateway = new MemoryGateway(documentText({ entities: [storedEntity] }))
    const graph = await openTestGraph(gateway)

    expect((await graph.getEntityDetails("Loader")).entity.id).toBe("entity_5")
    expect(await graph.registerEntity({ name: "Writer", entityType: "class", summary: "" })).toEqual({
      id: "entity_6",
      created: true,
    })
  })
})

// =============================================================================
// JSON FILE GATEWAY
// =============================================================================

describe("JsonFileGateway", () => {
  let directory: string

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "codememo-"))
  })

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true })
  })

  it("should load nothing when the file does not exist", async () => {
    const gateway = new JsonFileGateway(join(directory, "knowledge.json"))

    expect(await gateway.load()).toBeNull()
  })

  it("should create missing directories and leave no temporary file", async () => {
    const folder = join(directory, "nested", "data")
    const location = join(folder, "knowledge.json")
    const graph = await openTestGraph(new JsonFileGateway(location))

    await graph.registerEntity({ name: "A", entityType: "class", summary: "First" })

    expect(await readdir(folder)).toEqual(["knowledge.json"])
    const stored: unknown = JSON.parse(await readFile(location, "utf-8"))
    expect(stored).toMatchObject({
      format: "codememo.knowledge-graph",
      version: 1,
      counters: { entity: 1, relationship: 0, pattern: 0, styleConvention: 0 },
      entities: [{ id: "entity_1", name: "A", summary: "First" }],
    })
  })

  it("should survive a restart", async () => {
    const location = join(directory, "knowledge.json")
    const first = await openTestGraph(new JsonFileGateway(location))
    await first.registerEntity({ name: "A", entityType: "class", summary: "" })
    await first.registerPattern({ name: "Singleton", description: "One", language: "python" })
    await first.close()

    const second = await openTestGraph(new JsonFileGateway(location))

    expect((await second.queryEntities()).map((e) => e.name)).toEqual(["A"])
    expect(await second.registerPattern({ name: "Singleton", description: "", language: "python" })).toEqual({
      id: "pattern_1",
      created: false,
    })
  })

  it("should report an invalid file", async () => {
    const location = join(directory, "knowledge.json")
    await writeFile(location, "[]", "utf-8")

    await expect(new JsonFileGateway(location).load()).rejects.toThrow(
      `Knowledge graph at ${location} is not a valid document`,
    )
  })

  it("should replace the previous document completely", async () => {
    const location = join(directory, "knowledge.json")
    const gateway = new JsonFileGateway(location)
    await gateway.save(parseDocument(documentText({ entities: [storedEntity] }), location))

    await gateway.save(parseDocument(documentText(), location))

    expect(await readdir(directory)).toEqual(["knowledge.json"])
    expect((await gateway.load())?.entities).toEqual([])
  })

  it("should remove the temporary file when the write cannot complete", async () => {
    const location = join(directory, "folder")
    await mkdir(join(location, "inner"), { recursive: true })

    const save = new JsonFileGateway(location).save(parseDocument(documentText(), location))

    await expect(save).rejects.toThrow(`Cannot write knowledge graph to ${location}`)
    expect(await readdir(directory)).toEqual(["folder"])
  })

  it("should report a location that cannot be read", async () => {
    const location = join(directory, "folder")
    await mkdir(location)

    const load = new JsonFileGateway(location).load()

    await expect(load).rejects.toBeInstanceOf(PersistenceError)
    await expect(load).rejects.toThrow(`Cannot read knowledge graph at ${location}`)
  })
})
