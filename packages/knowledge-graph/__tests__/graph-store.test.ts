import { describe, it, expect, beforeEach } from "vitest"
import { GraphStore } from "../src/store"
import type { Entity } from "../src"

function entity(id: string, name: string, entityType: string, language?: string): Entity {
  return {
    id,
    name,
    entityType,
    summary: "",
    language,
    observations: [],
    metadata: {},
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
  }
}

describe("GraphStore", () => {
  let store: GraphStore

  beforeEach(() => {
    store = new GraphStore()
  })

  describe("ids", () => {
    it("should count each record kind separately", () => {
      expect(store.nextId("entity")).toBe("entity_1")
      expect(store.nextId("entity")).toBe("entity_2")
      expect(store.nextId("relationship")).toBe("relationship_1")
      expect(store.nextId("styleConvention")).toBe("convention_1")
    })
  })

  describe("entity indexes", () => {
    it("should move an entity between buckets on replace", () => {
      store.insertEntity(entity("entity_1", "A", "class", "python"))

      store.replaceEntity(entity("entity_1", "A", "function", "go"))

      expect(store.findEntities({ entityType: "class" })).toEqual([])
      expect(store.findEntities({ language: "python" })).toEqual([])
      expect(store.findEntities({ entityType: "function", language: "go" }).map((e) => e.id)).toEqual(["entity_1"])
    })

    it("should refuse a duplicate name", () => {
      store.insertEntity(entity("entity_1", "A", "class"))

      expect(() => store.insertEntity(entity("entity_2", "A", "class"))).toThrow("Duplicate entity name: A")
    })

    it("should refuse a rename", () => {
      store.insertEntity(entity("entity_1", "A", "class"))

      expect(() => store.replaceEntity(entity("entity_1", "B", "class"))).toThrow("Cannot rename entity entity_1")
    })

    it("should hand out copies", () => {
      store.insertEntity(entity("entity_1", "A", "class"))

      const copy = store.getEntity("A")
      copy?.observations.push("changed")

      expect(store.getEntity("A")?.observations).toEqual([])
    })
  })

  describe("relationship indexes", () => {
    it("should index both endpoints and the type", () => {
      store.insertRelationship({
        id: "relationship_1",
        fromEntity: "A",
        toEntity: "B",
        relationshipType: "calls",
        metadata: {},
        createdAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
      })

      expect(store.getOutgoing("A").map((r) => r.id)).toEqual(["relationship_1"])
      expect(store.getIncoming("B").map((r) => r.id)).toEqual(["relationship_1"])
      expect(store.getIncoming("A")).toEqual([])
      expect(store.getRelationshipsByType("calls")).toHaveLength(1)
      expect(store.findRelationship("A", "B", "calls")?.id).toBe("relationship_1")
      expect(store.findRelationship("B", "A", "calls")).toBeUndefined()
    })
  })

  describe("transactions", () => {
    it("should restore records, indexes and counters on rollback", () => {
      store.insertEntity(entity(store.nextId("entity"), "A", "class", "python"))

      store.beginTransaction()
      store.insertEntity(entity(store.nextId("entity"), "B", "class", "python"))
      store.replaceEntity(entity("entity_1", "A", "module", "python"))
      store.rollback()

      expect(store.inTransaction()).toBe(false)
      expect(store.findEntities({ entityType: "class" }).map((e) => e.name)).toEqual(["A"])
      expect(store.hasEntity("B")).toBe(false)
      expect(store.nextId("entity")).toBe("entity_2")
    })

    it("should refuse nested transactions", () => {
      store.beginTransaction()

      expect(() => store.beginTransaction()).toThrow("Transaction already in progress")
    })

    it("should keep changes on commit", () => {
      store.beginTransaction()
      store.insertEntity(entity(store.nextId("entity"), "A", "class"))
      store.commit()

      expect(store.sizes()).toEqual({ entities: 1, relationships: 0, patterns: 0, styleConventions: 0 })
    })
  })

  describe("clear", () => {
    it("should empty every table and reset ids", () => {
      store.insertEntity(entity(store.nextId("entity"), "A", "class"))
      store.patterns.insert({
        id: store.nextId("pattern"),
        name: "Singleton",
        description: "",
        metadata: {},
        createdAt: "2026-01-01T00:00:00.000Z",
        updatedAt: "2026-01-01T00:00:00.000Z",
      })

      store.clear()

      expect(store.sizes()).toEqual({ entities: 0, relationships: 0, patterns: 0, styleConventions: 0 })
      expect(store.nextId("pattern")).toBe("pattern_1")
    })
  })
})
