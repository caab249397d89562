import { describe, it, expect } from "vitest";
import { unwrap } from "@graph-compare/core";
import { Canonicalizer } from "../src/Canonicalizer.js";
import { canonicalize } from "../src/equality.js";
import { NodeNotFoundError } from "../src/errors.js";
import { formatPropertyValue } from "../src/format.js";
import type { Graph, RelationshipEntry } from "../src/model.js";
import { ABC_CANONICAL, EdgeListGraph, abcGraph, memoryGraph, rel } from "./fixtures/graphs.js";

function canonical<Id>(graph: Graph<Id>): string {
  return unwrap(canonicalize(graph));
}

describe("canonicalize", () => {
  it("renders the worked example", () => {
    expect(canonical(abcGraph())).toBe(ABC_CANONICAL);
  });

  it("renders the empty graph as the empty string", () => {
    expect(canonical(memoryGraph([]))).toBe("");
  });

  it("renders an isolated node", () => {
    expect(canonical(memoryGraph([{ id: "n", labels: ["A"] }]))).toBe("(:A ) => out:  in: ");
  });

  it("renders untyped relationships between bare nodes", () => {
    const graph = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "b")]);
    expect(canonical(graph)).toBe("( ) => out:  in: ()<-[: ]-( )\n( ) => out: ()-[: ]->( ) in: ");
  });

  it("puts a self-loop once in each bucket of its node", () => {
    const graph = memoryGraph([{ id: "a" }], [rel("a", "a", "LOOP")]);
    expect(canonical(graph)).toBe("( ) => out: ()-[:LOOP ]->( ) in: ()<-[:LOOP ]-( )");
  });

  it("keeps parallel relationships with identical renderings", () => {
    const graph = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "b", "R"), rel("a", "b", "R")]);
    expect(canonical(graph)).toBe(
      "( ) => out:  in: ()<-[:R ]-( ), ()<-[:R ]-( )\n( ) => out: ()-[:R ]->( ), ()-[:R ]->( ) in: "
    );
  });

  it("is deterministic", () => {
    const graph = abcGraph();
    expect(canonical(graph)).toBe(canonical(graph));
  });

  it("does not change the graph", () => {
    const graph = abcGraph();
    canonical(graph);
    expect(graph.stats()).toEqual({ nodes: 3, relationships: 3 });
    expect(Array.from(graph.nodes())).toEqual(["a", "b", "c"]);
  });

  it("canonicalizes other implementations the same way", () => {
    const graph = new EdgeListGraph(
      [
        { labels: ["C"], properties: [["boz", 84], ["baz", 19]] },
        { labels: ["B"], properties: [["bar", 84]] },
        { labels: ["A"], properties: [["a", 13], ["c", 42], ["b", 37]] },
      ],
      [
        { from: 1, to: 0, type: "REL", properties: [["a", 23]] },
        { from: 2, to: 1, type: "REL", properties: [["b", 37], ["a", 13], ["c", 42]] },
        { from: 1, to: 2, type: "REL", properties: [["c", 12]] },
      ]
    );
    expect(canonical(graph)).toBe(ABC_CANONICAL);
  });

  describe("invariance", () => {
    it("ignores node ids", () => {
      const renamed = memoryGraph(
        [
          { id: "x", labels: ["A"], properties: { a: 13, b: 37, c: 42 } },
          { id: "y", labels: ["B"], properties: { bar: 84 } },
          { id: "z", labels: ["C"], properties: { baz: 19, boz: 84 } },
        ],
        [
          rel("x", "y", "REL", { a: 13, b: 37, c: 42 }),
          rel("y", "x", "REL", { c: 12 }),
          rel("y", "z", "REL", { a: 23 }),
        ]
      );
      expect(canonical(renamed)).toBe(ABC_CANONICAL);
    });

    it("ignores node, label and property order", () => {
      const g1 = memoryGraph(
        [
          { id: "a", labels: ["Y", "X"], properties: { q: 1, p: "two" } },
          { id: "b", labels: ["Z"] },
        ],
        [rel("a", "b", "T", { w: 1, v: 2 })]
      );
      const g2 = memoryGraph(
        [
          { id: "b", labels: ["Z"] },
          { id: "a", labels: ["X", "Y", "X"], properties: { p: "two", q: 1 } },
        ],
        [rel("a", "b", "T", { v: 2, w: 1 })]
      );
      expect(canonical(g1)).toBe(canonical(g2));
    });

    it("ignores the order of parallel relationships", () => {
      const g1 = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "b", undefined, { w: 1 }), rel("a", "b", undefined, { w: 2 })]);
      const g2 = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "b", undefined, { w: 2 }), rel("a", "b", undefined, { w: 1 })]);
      expect(canonical(g1)).toBe(canonical(g2));
    });

    it("ignores the order of a loop and another relationship", () => {
      const g1 = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "a", undefined, { w: 1 }), rel("a", "b", undefined, { w: 2 })]);
      const g2 = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "b", undefined, { w: 2 }), rel("a", "a", undefined, { w: 1 })]);
      expect(canonical(g1)).toBe(canonical(g2));
    });

    it("matches a cycle with rotated properties", () => {
      const cycle = (va: number, vb: number, vc: number) =>
        memoryGraph(
          [
            { id: "a", properties: { v: va } },
            { id: "b", properties: { v: vb } },
            { id: "c", properties: { v: vc } },
          ],
          [rel("a", "b"), rel("b", "c"), rel("c", "a")]
        );
      expect(canonical(cycle(1, 2, 3))).toBe(canonical(cycle(2, 3, 1)));
    });
  });

  describe("sensitivity", () => {
    const base = () =>
      memoryGraph(
        [
          { id: "a", labels: ["A"], properties: { k: 1 } },
          { id: "b", labels: ["B"] },
        ],
        [rel("a", "b", "T", { w: 1 })]
      );

    it("tells a path from a loop", () => {
      const path = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "b")]);
      const loop = memoryGraph([{ id: "a" }], [rel("a", "a")]);
      expect(canonical(path)).not.toBe(canonical(loop));
    });

    it("sees a changed label", () => {
      const changed = memoryGraph(
        [
          { id: "a", labels: ["A"], properties: { k: 1 } },
          { id: "b", labels: ["C"] },
        ],
        [rel("a", "b", "T", { w: 1 })]
      );
      expect(canonical(changed)).not.toBe(canonical(base()));
    });

    it("sees a changed property value type", () => {
      const changed = memoryGraph(
        [
          { id: "a", labels: ["A"], properties: { k: "1" } },
          { id: "b", labels: ["B"] },
        ],
        [rel("a", "b", "T", { w: 1 })]
      );
      expect(canonical(changed)).not.toBe(canonical(base()));
    });

    it("sees a changed relationship type and properties", () => {
      const nodes = [
        { id: "a", labels: ["A"], properties: { k: 1 } },
        { id: "b", labels: ["B"] },
      ];
      expect(canonical(memoryGraph(nodes, [rel("a", "b", "U", { w: 1 })]))).not.toBe(canonical(base()));
      expect(canonical(memoryGraph(nodes, [rel("a", "b", "T", { w: 2 })]))).not.toBe(canonical(base()));
    });

    it("sees a reversed relationship", () => {
      const reversed = memoryGraph(
        [
          { id: "a", labels: ["A"], properties: { k: 1 } },
          { id: "b", labels: ["B"] },
        ],
        [rel("b", "a", "T", { w: 1 })]
      );
      expect(canonical(reversed)).not.toBe(canonical(base()));
    });

    it("counts parallel relationships", () => {
      const once = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "b", "R")]);
      const twice = memoryGraph([{ id: "a" }, { id: "b" }], [rel("a", "b", "R"), rel("a", "b", "R")]);
      expect(canonical(once)).not.toBe(canonical(twice));
    });

    it("tells a complete graph from one with a redirected edge", () => {
      const nodes = [
        { id: "a", properties: { v: 1 } },
        { id: "b", properties: { v: 2 } },
        { id: "c", properties: { v: 3 } },
      ];
      const complete = memoryGraph(nodes, [
        rel("a", "b"), rel("a", "c"), rel("b", "a"), rel("b", "c"), rel("c", "a"), rel("c", "b"),
      ]);
      const redirected = memoryGraph(nodes, [
        rel("a", "b"), rel("a", "b"), rel("b", "a"), rel("b", "c"), rel("c", "a"), rel("c", "b"),
      ]);
      expect(canonical(complete)).not.toBe(canonical(redirected));
    });

    it("tells a homogeneous complete graph from one with a redirected edge", () => {
      const nodes = [
        { id: "a", properties: { v: 1 } },
        { id: "b", properties: { v: 1 } },
        { id: "c", properties: { v: 1 } },
      ];
      const complete = memoryGraph(nodes, [
        rel("a", "b"), rel("a", "c"), rel("b", "a"), rel("b", "c"), rel("c", "a"), rel("c", "b"),
      ]);
      const redirected = memoryGraph(nodes, [
        rel("a", "b"), rel("a", "b"), rel("b", "a"), rel("b", "c"), rel("c", "a"), rel("c", "b"),
      ]);
      expect(canonical(complete)).not.toBe(canonical(redirected));
    });
  });

  describe("missing nodes", () => {
    it("reports a missing target", () => {
      const graph = memoryGraph([{ id: "a" }], [rel("a", "ghost")]);
      const result = canonicalize(graph);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(NodeNotFoundError);
        expect(result.error.nodeId).toBe("ghost");
        expect(result.error.message).toBe("Node not found: ghost");
      }
    });

    it("reports a missing source", () => {
      const graph = memoryGraph([{ id: "a" }], [rel("ghost", "a")]);
      const result = canonicalize(graph);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.nodeId).toBe("ghost");
      }
    });

    it("reports a missing target in another implementation", () => {
      const graph = new EdgeListGraph([{ labels: [], properties: [] }], [{ from: 0, to: 7 }]);
      const result = canonicalize(graph);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.nodeId).toBe(7);
      }
    });

    it("returns a NodeNotFoundError thrown by the implementation", () => {
      const inconsistent: Graph<string> = {
        nodes: () => ["a"],
        nodeLabels: (id) => {
          throw new NodeNotFoundError(id);
        },
        nodeProperties: () => [],
        outgoingRelationships: (): RelationshipEntry<string>[] => [],
        incomingRelationships: (): RelationshipEntry<string>[] => [],
      };
      const result = canonicalize(inconsistent);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Node not found: a");
      }
    });

    it("lets other exceptions through", () => {
      const broken: Graph<string> = {
        nodes: () => ["a"],
        nodeLabels: () => {
          throw new RangeError("backing store closed");
        },
        nodeProperties: () => [],
        outgoingRelationships: (): RelationshipEntry<string>[] => [],
        incomingRelationships: (): RelationshipEntry<string>[] => [],
      };
      expect(() => canonicalize(broken)).toThrow(RangeError);
    });
  });
});

describe("Canonicalizer", () => {
  it("renders values with its own formatter", () => {
    const canonicalizer = new Canonicalizer<Date>((date) => date.toISOString().slice(0, 10));
    const graph = new EdgeListGraph<Date>(
      [
        { labels: ["Event"], properties: [["at", new Date(Date.UTC(2024, 4, 1))]] },
        { labels: ["Event"], properties: [["at", new Date(Date.UTC(2024, 4, 2))]] },
      ],
      [{ from: 0, to: 1, type: "BEFORE" }]
    );
    expect(unwrap(canonicalizer.canonicalize(graph))).toBe(
      [
        "(:Event { at: 2024-05-01 }) => out: ()-[:BEFORE ]->(:Event { at: 2024-05-02 }) in: ",
        "(:Event { at: 2024-05-02 }) => out:  in: ()<-[:BEFORE ]-(:Event { at: 2024-05-01 })",
      ].join("\n")
    );
  });

  it("returns sorted records", () => {
    const records = unwrap(new Canonicalizer(formatPropertyValue).records(abcGraph()));
    expect(records).toEqual(ABC_CANONICAL.split("\n"));
  });
});
