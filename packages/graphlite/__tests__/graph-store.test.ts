import { describe, it, expect, beforeEach } from "vitest"
import { GraphStore, NodeReferenceError, NotFoundError, ValidationError, isGraphError } from "../src"

describe("GraphStore", () => {
  let store: GraphStore

  beforeEach(() => {
    store = new GraphStore({ directed: true })
  })

  // ===========================================================================
  // NODES
  // ===========================================================================

  describe("nodes", () => {
    it("should add and get a node", () => {
      store.addNode("a", ["Person"], { name: "Alice", age: 30 })

      expect(store.getNode("a")).toEqual({
        id: "a",
        labels: ["Person"],
        attributes: { name: "Alice", age: 30 },
      })
    })

    it("should deduplicate labels in first-seen order", () => {
      store.addNode("a", ["Person", "Admin", "Person"])
      expect(store.getNode("a").labels).toEqual(["Person", "Admin"])
    })

    it("should replace labels and attributes on a repeated add", () => {
      store.addNode("a", ["Person"], { name: "Alice", age: 30 })
      store.addNode("a", ["Robot"], { name: "Alice 2" })

      expect(store.getNode("a")).toEqual({
        id: "a",
        labels: ["Robot"],
        attributes: { name: "Alice 2" },
      })
      expect(store.nodes("Person")).toEqual([])
    })

    it("should leave the same state when an identical node is added twice", () => {
      store.addNode("a", ["Person"], { name: "Alice" })
      const once = { nodes: store.nodes(), stats: store.stats() }
      store.addNode("a", ["Person"], { name: "Alice" })

      expect(store.nodes()).toEqual(once.nodes)
      expect(store.stats()).toEqual(once.stats)
    })

    it("should merge labels and attributes with setNode", () => {
      store.addNode("a", ["Person"], { name: "Alice", age: 30 })
      store.setNode("a", ["Admin"], { age: 31 })

      expect(store.getNode("a")).toEqual({
        id: "a",
        labels: ["Person", "Admin"],
        attributes: { name: "Alice", age: 31 },
      })
    })

    it("should create a missing node with setNode", () => {
      store.setNode("z", [], { x: 1 })
      expect(store.hasNode("z")).toBe(true)
    })

    it("should merge-patch attributes with updateNode", () => {
      store.addNode("a", ["Person"], { name: "Alice", age: 30 })
      store.updateNode("a", { age: 31, city: "Paris" })

      expect(store.getNode("a").attributes).toEqual({ name: "Alice", age: 31, city: "Paris" })
      expect(store.getNode("a").labels).toEqual(["Person"])
    })

    it("should throw NotFoundError when updating a missing node", () => {
      expect(() => store.updateNode("ghost", { x: 1 })).toThrow(NotFoundError)
      expect(store.hasNode("ghost")).toBe(false)
    })

    it("should throw NotFoundError when getting a missing node", () => {
      expect(() => store.getNode("ghost")).toThrow("Node not found: 'ghost'")
    })

    it("should keep numeric and string ids distinct", () => {
      store.addNode(1, [], { kind: "number" })
      store.addNode("1", [], { kind: "string" })

      expect(store.stats().nodes).toBe(2)
      expect(store.getNode(1).attributes.kind).toBe("number")
    })

    it("should return detached copies", () => {
      store.addNode("a", ["Person"], { tags: ["x"] })
      const node = store.getNode("a")
      node.labels.push("Mutated")
      node.attributes.tags = ["y"]

      expect(store.getNode("a")).toEqual({ id: "a", labels: ["Person"], attributes: { tags: ["x"] } })
    })

    it("should reject reserved attribute names without changing the store", () => {
      store.addNode("a", [], { name: "Alice" })

      expect(() => store.addNode("a", [], { labels: "oops" })).toThrow(ValidationError)
      expect(() => store.updateNode("a", { id: "b" })).toThrow(ValidationError)
      expect(store.getNode("a").attributes).toEqual({ name: "Alice" })
    })

    it("should reject values that are not JSON-compatible", () => {
      expect(() => store.addNode("a", [], { n: Number.NaN })).toThrow(ValidationError)
      expect(store.hasNode("a")).toBe(false)
    })

    it("should list nodes by label", () => {
      store.addNode("a", ["Person"])
      store.addNode("b", ["Person", "Admin"])
      store.addNode("c", ["Admin"])

      expect(store.nodes("Person").map((n) => n.id)).toEqual(["a", "b"])
      expect(store.nodes("Admin").map((n) => n.id)).toEqual(["b", "c"])
      expect(store.nodes("Missing")).toEqual([])
    })
  })

  // ===========================================================================
  // RELATIONSHIPS
  // ===========================================================================

  describe("relationships", () => {
    beforeEach(() => {
      store.addNode("a")
      store.addNode("b")
      store.addNode("c")
    })

    it("should add and get a relationship", () => {
      store.addRelationship("a", "b", "KNOWS", { since: 2010 })

      expect(store.getRelationship("a", "b")).toEqual({
        source: "a",
        target: "b",
        type: "KNOWS",
        attributes: { since: 2010 },
      })
    })

    it("should default to an untyped relationship", () => {
      store.addRelationship("a", "b")
      expect(store.getRelationship("a", "b").type).toBeNull()
    })

    it("should fail with NodeReferenceError for a missing endpoint", () => {
      store.addRelationship("a", "b", "KNOWS")

      let caught: unknown
      try {
        store.addRelationship("a", "ghost", "KNOWS")
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(NodeReferenceError)
      expect(isGraphError(caught, "REFERENCE")).toBe(true)
      expect(caught instanceof NodeReferenceError && caught.missing).toEqual(["ghost"])
      expect(store.relationships()).toHaveLength(1)
      expect(() => store.addRelationship("x", "y")).toThrow(NodeReferenceError)
      expect(store.relationships()).toHaveLength(1)
    })

    it("should overwrite the relationship between the same endpoints", () => {
      store.addRelationship("a", "b", "KNOWS", { since: 2010 })
      store.addRelationship("a", "b", "LIKES", { weight: 2 })

      expect(store.relationships()).toEqual([
        { source: "a", target: "b", type: "LIKES", attributes: { weight: 2 } },
      ])
      expect(store.relationships("KNOWS")).toEqual([])
    })

    it("should keep both orientations in a directed graph", () => {
      store.addRelationship("a", "b", "KNOWS")
      store.addRelationship("b", "a", "KNOWS")
      expect(store.stats().relationships).toBe(2)
    })

    it("should merge with setRelationship and keep the type when omitted", () => {
      store.addRelationship("a", "b", "KNOWS", { since: 2010 })
      store.setRelationship("a", "b", undefined, { weight: 3 })

      expect(store.getRelationship("a", "b")).toEqual({
        source: "a",
        target: "b",
        type: "KNOWS",
        attributes: { since: 2010, weight: 3 },
      })

      store.setRelationship("a", "b", null)
      expect(store.getRelationship("a", "b").type).toBeNull()
    })

    it("should merge-patch with updateRelationship", () => {
      store.addRelationship("a", "b", "KNOWS", { since: 2010 })
      store.updateRelationship("a", "b", { since: 2012 })

      expect(store.getRelationship("a", "b").attributes).toEqual({ since: 2012 })
      expect(() => store.updateRelationship("b", "a", { since: 1 })).toThrow(NotFoundError)
    })

    it("should remove relationships idempotently", () => {
      store.addRelationship("a", "b")

      expect(store.removeRelationship("a", "b")).toBe(true)
      expect(store.removeRelationship("a", "b")).toBe(false)
      expect(store.hasRelationship("a", "b")).toBe(false)
    })

    it("should list untyped relationships with a null type filter", () => {
      store.addRelationship("a", "b", "KNOWS")
      store.addRelationship("b", "c")

      expect(store.relationships(null).map((r) => r.target)).toEqual(["c"])
      expect(store.relationships("KNOWS").map((r) => r.target)).toEqual(["b"])
    })
  })

  // ===========================================================================
  // REMOVAL CASCADE
  // ===========================================================================

  describe("removeNode", () => {
    it("should remove every incident relationship", () => {
      store.addNode("a")
      store.addNode("b")
      store.addNode("c")
      store.addRelationship("a", "b", "X")
      store.addRelationship("c", "a", "Y")
      store.addRelationship("a", "a", "SELF")
      store.addRelationship("b", "c", "Z")

      expect(store.removeNode("a")).toBe(true)

      expect(store.hasNode("a")).toBe(false)
      expect(store.relationships()).toEqual([
        { source: "b", target: "c", type: "Z", attributes: {} },
      ])
      expect(store.degree("b")).toBe(1)
      expect(store.degree("c")).toBe(1)
    })

    it("should be a no-op for a missing node", () => {
      expect(store.removeNode("ghost")).toBe(false)
    })
  })

  // ===========================================================================
  // TOPOLOGY
  // ===========================================================================

  describe("directed topology", () => {
    beforeEach(() => {
      store.addNode("a")
      store.addNode("b")
      store.addNode("c")
      store.addRelationship("a", "b")
      store.addRelationship("c", "a")
      store.addRelationship("a", "c")
    })

    it("should follow outgoing relationships by default", () => {
      expect(store.neighbors("a")).toEqual(["b", "c"])
    })

    it("should honour in and any", () => {
      expect(store.neighbors("a", "in")).toEqual(["c"])
      expect(store.neighbors("a", "any")).toEqual(["b", "c"])
    })

    it("should count degree per direction", () => {
      expect(store.degree("a")).toBe(3)
      expect(store.degree("a", "out")).toBe(2)
      expect(store.degree("a", "in")).toBe(1)
    })

    it("should count a self-loop once", () => {
      store.addRelationship("b", "b")
      expect(store.degree("b")).toBe(2)
      expect(store.neighbors("b", "any")).toEqual(["b", "a"])
    })

    it("should reject an unknown direction", () => {
      expect(() => store.neighbors("a", "sideways" as never)).toThrow(ValidationError)
    })

    it("should throw NotFoundError for a missing node", () => {
      expect(() => store.neighbors("ghost")).toThrow(NotFoundError)
      expect(() => store.degree("ghost")).toThrow(NotFoundError)
    })
  })

  describe("undirected topology", () => {
    beforeEach(() => {
      store = new GraphStore()
      store.addNode("a")
      store.addNode("b")
      store.addNode("c")
    })

    it("should treat both orientations as one relationship", () => {
      store.addRelationship("a", "b", "KNOWS", { since: 2010 })
      store.addRelationship("b", "a", "KNOWS", { since: 2020 })

      expect(store.stats().relationships).toBe(1)
      expect(store.getRelationship("a", "b")).toEqual({
        source: "b",
        target: "a",
        type: "KNOWS",
        attributes: { since: 2020 },
      })
      expect(store.hasRelationship("a", "b")).toBe(true)
    })

    it("should ignore direction for neighbors and degree", () => {
      store.addRelationship("a", "b")
      store.addRelationship("c", "a")

      expect(store.neighbors("a")).toEqual(["b", "c"])
      expect(store.neighbors("a", "in")).toEqual(["b", "c"])
      expect(store.neighbors("b")).toEqual(["a"])
      expect(store.degree("a", "out")).toBe(2)
    })

    it("should remove a relationship given either orientation", () => {
      store.addRelationship("a", "b")
      expect(store.removeRelationship("b", "a")).toBe(true)
      expect(store.degree("a")).toBe(0)
    })
  })

  // ===========================================================================
  // SNAPSHOTS
  // ===========================================================================

  describe("snapshot/restore", () => {
    it("should restore data and indexes", () => {
      store.addNode("a", ["Person"])
      store.addNode("b", ["Person"])
      store.addRelationship("a", "b", "KNOWS")
      const snapshot = store.snapshot()

      store.removeNode("a")
      store.addNode("c", ["Robot"])
      store.restore(snapshot)

      expect(store.nodes("Person").map((n) => n.id)).toEqual(["a", "b"])
      expect(store.nodes("Robot")).toEqual([])
      expect(store.relationships("KNOWS")).toHaveLength(1)
      expect(store.neighbors("a")).toEqual(["b"])
    })

    it("should leave the store untouched when a load fails", () => {
      store.addNode("keep")

      expect(() =>
        store.load({
          nodes: [{ id: "a", labels: [], attributes: {} }],
          relationships: [{ source: "a", target: "ghost", type: null, attributes: {} }],
        }),
      ).toThrow(NodeReferenceError)
      expect(store.nodes().map((n) => n.id)).toEqual(["keep"])
    })
  })

  it("should report stats", () => {
    store.addNode("a", ["Person", "Admin"])
    store.addNode("b", ["Person"])
    store.addRelationship("a", "b", "KNOWS")
    store.addRelationship("b", "a")

    expect(store.stats()).toEqual({ nodes: 2, relationships: 2, labels: 2, relationshipTypes: 1 })

    store.clear()
    expect(store.stats()).toEqual({ nodes: 0, relationships: 0, labels: 0, relationshipTypes: 0 })
  })
})
