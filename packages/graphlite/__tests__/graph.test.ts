import { describe, it, expect, beforeEach } from "vitest"
import {
  GraphError,
  NodeReferenceError,
  NotFoundError,
  ValidationError,
  createGraph,
  createLogger,
  isGraphError,
  type GraphDatabase,
} from "../src"

// =============================================================================
// SCENARIO
// =============================================================================

describe("createGraph", () => {
  let graph: GraphDatabase

  beforeEach(() => {
    graph = createGraph({ directed: true, logLevel: "silent" })
    graph.addNode("A", ["Person"], { name: "Alice", age: 30 })
    graph.addNode("B", ["Person"], { name: "Bob", age: 25 })
    graph.addRelationship("A", "B", "FRIEND_OF", { since: 2010 })
  })

  it("should default to an undirected memory-only graph", () => {
    const fresh = createGraph({ logLevel: "silent" })
    expect(fresh.directed).toBe(false)
    expect(fresh.memoryOnly).toBe(true)
  })

  it("should find people by name or age", () => {
    const people = graph.findNodes({
      label: "Person",
      where: { _logic: "or", name: "Alice", age: { gt: 35 } },
    })

    expect(people).toEqual([{ id: "A", labels: ["Person"], name: "Alice", age: 30 }])
  })

  it("should match the friendship path", () => {
    const paths = graph.matchFullPath({
      start: { name: "Alice" },
      pattern: [{ relType: "FRIEND_OF", node: { name: "Bob" } }],
    })

    expect(paths).toEqual([
      {
        nodes: [
          { id: "A", labels: ["Person"], name: "Alice", age: 30 },
          { id: "B", labels: ["Person"], name: "Bob", age: 25 },
        ],
        relationships: [{ source: "A", target: "B", type: "FRIEND_OF", since: 2010 }],
      },
    ])
  })

  it("should expose raw matched paths", () => {
    const [path] = graph.matchPaths({ start: { name: "Alice" }, pattern: [{}] })
    expect(path?.nodes.map((n) => n.id)).toEqual(["A", "B"])
    expect(path?.relationships.map((r) => r.type)).toEqual(["FRIEND_OF"])
  })

  it("should render structured paths", () => {
    expect(
      graph.matchStructuredPath(
        { start: { name: "Alice" }, pattern: [{ relType: "FRIEND_OF" }] },
        { nodeFields: ["name"], relationshipFields: ["since"] },
      ),
    ).toEqual([
      [
        { id: "A", labels: ["Person"], properties: { name: "Alice" } },
        { source: "A", target: "B", type: "FRIEND_OF", properties: { since: 2010 } },
        { id: "B", labels: ["Person"], properties: { name: "Bob" } },
      ],
    ])
  })

  it("should remove a node with its relationships", () => {
    graph.removeNode("B")

    expect(graph.relationships()).toEqual([])
    expect(graph.degree("A")).toBe(0)
    expect(graph.matchPatternIds({ start: {}, pattern: [{}] })).toEqual([])
  })

  it("should keep upsert and update distinct", () => {
    graph.setNode("C", ["Person"], { name: "Carol" })
    graph.setRelationship("A", "C", "FRIEND_OF")
    graph.updateRelationship("A", "C", { since: 2020 })

    expect(graph.neighbors("A")).toEqual(["B", "C"])
    expect(graph.getRelationship("A", "C").attributes).toEqual({ since: 2020 })
    expect(() => graph.updateNode("D", { name: "Dan" })).toThrow(NotFoundError)
    expect(graph.hasNode("D")).toBe(false)
    expect(graph.hasRelationship("C", "A")).toBe(false)
  })

  it("should clear everything", () => {
    graph.clear()
    expect(graph.stats()).toEqual({ nodes: 0, relationships: 0, labels: 0, relationshipTypes: 0 })
  })

  it("should return the persisted document without I/O", () => {
    expect(graph.toJSON()).toEqual({
      nodes: [
        { id: "A", labels: ["Person"], name: "Alice", age: 30 },
        { id: "B", labels: ["Person"], name: "Bob", age: 25 },
      ],
      relationships: [{ source: "A", target: "B", type: "FRIEND_OF", since: 2010 }],
    })
  })
})

// =============================================================================
// ERRORS
// =============================================================================

describe("errors", () => {
  const graph = createGraph({ logLevel: "silent" })
  graph.addNode("a")

  const codeOf = (fn: () => unknown): string | undefined => {
    try {
      fn()
    } catch (error) {
      return isGraphError(error) ? error.code : "unexpected"
    }
    return undefined
  }

  it("should carry a distinguishable code", () => {
    expect(codeOf(() => graph.addRelationship("a", "ghost"))).toBe("REFERENCE")
    expect(codeOf(() => graph.getNode("ghost"))).toBe("NOT_FOUND")
    expect(codeOf(() => graph.findNodes({ where: { a: { like: "x" } as never } }))).toBe("VALIDATION")
    expect(codeOf(() => graph.getNode("a"))).toBeUndefined()
  })

  it("should form a class hierarchy", () => {
    const error = new NodeReferenceError("a", 2, [2])

    expect(error).toBeInstanceOf(GraphError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe("NodeReferenceError")
    expect(error.message).toBe("Relationship 'a' -> 2 references missing node(s): 2")
    expect(new NotFoundError("relationship", ["a", "b"]).message).toBe(
      "Relationship not found: 'a' -> 'b'",
    )
  })
})

// =============================================================================
// CONFIGURATION & LOGGING
// =============================================================================

describe("configuration", () => {
  it("should reject unknown options", () => {
    expect(() => createGraph({ direction: true } as never)).toThrow(ValidationError)
  })

  it("should reject an invalid log level", () => {
    expect(() => createGraph({ logLevel: "loud" as never })).toThrow(/logLevel/)
  })

  it("should log through an injected logger", () => {
    const lines: string[] = []
    const logger = createLogger({ level: "debug" }, { write: (line: string) => lines.push(line) })

    const graph = createGraph({ logger })
    graph.addNode("a")
    graph.findNodes()

    const records = lines.map((line) => JSON.parse(line) as Record<string, unknown>)
    expect(records.map((r) => [r.msg, r.operation])).toEqual([
      ["mutation", "addNode"],
      ["query", "findNodes"],
    ])
    expect(records[1]).toMatchObject({ name: "graphlite", component: "graph", resultCount: 1 })
  })
})
