import { describe, expect, it } from "vitest";
import type { GraphEdgeInput, LayeredNodeInput } from "../../../src/types.js";
import { emptyDocument, resolveLayoutEngineConfig } from "../../../src/layout/defaults.js";
import { computeLayeredLayout, layoutLayered, relayoutDiagram } from "../../../src/layout/layered.js";
import { addConnector } from "../../../src/model/document.js";
import { box, documentWith, isOnGrid } from "../../helpers/documents.js";

const config = resolveLayoutEngineConfig();

function nodesFor(...keys: string[]): LayeredNodeInput[] {
  return keys.map((key) => ({ key, label: key, width: 120, height: 60 }));
}

function edges(...pairs: Array<[string, string]>): GraphEdgeInput[] {
  return pairs.map(([source, target]) => ({ source, target }));
}

describe("computeLayeredLayout", () => {
  it("places a fan-out below its root, centred", () => {
    const result = computeLayeredLayout(
      nodesFor("A", "B", "C", "D"),
      edges(["A", "B"], ["A", "C"], ["A", "D"]),
      config,
    );

    expect(result.maxRank).toBe(1);
    expect(result.placements.get("A")).toEqual({ key: "A", rank: 0, order: 0, x: 230, y: 80, width: 120, height: 60 });
    expect(result.placements.get("B")).toMatchObject({ rank: 1, order: 0, x: 50, y: 240 });
    expect(result.placements.get("C")).toMatchObject({ rank: 1, order: 1, x: 230, y: 240 });
    expect(result.placements.get("D")).toMatchObject({ rank: 1, order: 2, x: 410, y: 240 });
    expect(result.overlapConverged).toBe(true);
  });

  it("ranks a diamond by longest path", () => {
    const result = computeLayeredLayout(
      nodesFor("A", "B", "C", "D"),
      edges(["A", "B"], ["A", "C"], ["B", "D"], ["C", "D"]),
      config,
    );

    expect(result.placements.get("A")?.rank).toBe(0);
    expect(result.placements.get("B")?.rank).toBe(1);
    expect(result.placements.get("C")?.rank).toBe(1);
    expect(result.placements.get("D")?.rank).toBe(2);
    expect(result.placements.get("D")).toMatchObject({ x: 140, y: 400 });
  });

  it("breaks a cycle by reversing one edge and bridges the long edge with a virtual node", () => {
    const result = computeLayeredLayout(nodesFor("A", "B", "C"), edges(["A", "B"], ["B", "C"], ["C", "A"]), config);

    expect(result.backEdgeCount).toBe(1);
    expect(result.virtualNodeCount).toBe(1);
    expect(result.placements.get("A")?.rank).toBe(0);
    expect(result.placements.get("B")?.rank).toBe(1);
    expect(result.placements.get("C")?.rank).toBe(2);
    expect(result.placements.size).toBe(3);
  });

  it("ignores self-loops and edges naming unknown nodes", () => {
    const result = computeLayeredLayout(nodesFor("A", "B"), edges(["A", "A"], ["A", "B"], ["A", "Z"]), config);

    expect(result.backEdgeCount).toBe(0);
    expect(result.placements.size).toBe(2);
    expect(result.placements.get("B")).toMatchObject({ rank: 1, x: 50, y: 240 });
  });

  it("returns an empty result for an empty graph", () => {
    const result = computeLayeredLayout([], [], config);
    expect(result.placements.size).toBe(0);
    expect(result.maxRank).toBe(0);
  });

  it("equalizes widths within a rank when laid out left to right", () => {
    const inputs: LayeredNodeInput[] = [
      { key: "A", label: "A", width: 120, height: 60 },
      { key: "B", label: "B", width: 120, height: 60 },
      { key: "L", label: "Longer label node", width: 156, height: 60 },
    ];
    const result = computeLayeredLayout(inputs, edges(["A", "B"], ["A", "L"]), config, "LR");

    expect(result.placements.get("A")).toMatchObject({ x: 50, y: 140, width: 120 });
    expect(result.placements.get("B")).toMatchObject({ x: 270, y: 80, width: 156 });
    expect(result.placements.get("L")).toMatchObject({ x: 270, y: 200, width: 156 });
  });

  it("equalizes heights within a rank when laid out top to bottom", () => {
    const inputs: LayeredNodeInput[] = [
      { key: "A", label: "A", width: 120, height: 60 },
      { key: "B", label: "B", width: 120, height: 60 },
      { key: "C", label: "C", width: 120, height: 90 },
    ];
    const result = computeLayeredLayout(inputs, edges(["A", "B"], ["A", "C"]), config);

    expect(result.placements.get("B")?.height).toBe(90);
    expect(result.placements.get("C")?.height).toBe(90);
    expect(result.placements.get("A")?.height).toBe(60);
  });

  it("stacks ranks upward for bottom-to-top layouts", () => {
    const result = computeLayeredLayout(
      nodesFor("A", "B", "C", "D"),
      edges(["A", "B"], ["A", "C"], ["A", "D"]),
      config,
      "BT",
    );

    expect(result.placements.get("A")).toMatchObject({ x: 230, y: 240 });
    expect(result.placements.get("B")).toMatchObject({ x: 50, y: 80 });
  });

  it("puts every forward edge target on a later rank and every node on the grid", () => {
    const graph = edges(
      ["s", "a"],
      ["s", "b"],
      ["a", "c"],
      ["b", "c"],
      ["c", "d"],
      ["a", "d"],
      ["s", "e"],
      ["e", "d"],
    );
    const result = computeLayeredLayout(nodesFor("s", "a", "b", "c", "d", "e"), graph, config);

    for (const edge of graph) {
      const from = result.placements.get(edge.source);
      const to = result.placements.get(edge.target);
      expect(from && to && to.rank > from.rank).toBe(true);
    }
    for (const placement of result.placements.values()) {
      expect(isOnGrid(placement.x)).toBe(true);
      expect(isOnGrid(placement.y)).toBe(true);
    }
  });

  it("ranks the reversed edges of a graph with several cycles consistently", () => {
    const graph = edges(
      ["a", "b"],
      ["b", "c"],
      ["c", "a"],
      ["c", "d"],
      ["d", "e"],
      ["e", "c"],
      ["e", "a"],
      ["b", "e"],
      ["d", "b"],
      ["f", "f"],
      ["a", "b"],
    );
    const result = computeLayeredLayout(nodesFor("a", "b", "c", "d", "e", "f"), graph, config);

    let backward = 0;
    let spanned = 0;
    for (const edge of graph) {
      if (edge.source === edge.target) {
        continue;
      }
      const from = result.placements.get(edge.source)?.rank ?? -1;
      const to = result.placements.get(edge.target)?.rank ?? -1;
      expect(Math.abs(to - from)).toBeGreaterThanOrEqual(1);
      if (to < from) {
        backward += 1;
      }
      spanned += Math.abs(to - from) - 1;
    }
    expect(result.backEdgeCount).toBe(4);
    expect(backward).toBe(result.backEdgeCount);
    expect(result.virtualNodeCount).toBe(spanned);
    expect(result.virtualNodeCount).toBe(8);
  });
});

describe("layoutLayered", () => {
  it("adds one node per label and one connector per edge", () => {
    const doc = emptyDocument();
    const labelToId = layoutLayered(doc, [
      { source: "A", target: "B", label: "first" },
      { source: "A", target: "C" },
      { source: "A", target: "D" },
    ]);

    expect(labelToId).toEqual({ A: "2", B: "3", C: "4", D: "5" });
    expect(doc.nodes.map((node) => [node.label, node.x, node.y])).toEqual([
      ["A", 230, 80],
      ["B", 50, 240],
      ["C", 230, 240],
      ["D", 410, 240],
    ]);
    expect(doc.connectors.map((connector) => [connector.sourceId, connector.targetId, connector.label])).toEqual([
      ["2", "3", "first"],
      ["2", "4", ""],
      ["2", "5", ""],
    ]);
    expect(doc.connectors.every((connector) => connector.waypoints.length === 0)).toBe(true);
  });

  it("applies per-label node styles and the edge style", () => {
    const doc = emptyDocument();
    const labelToId = layoutLayered(doc, [{ source: "A", target: "B" }], {
      nodeStyles: { B: "shape=cylinder;" },
      edgeStyle: "endArrow=none;",
      config: { routeEdges: false },
    });

    expect(doc.nodes.find((node) => node.id === labelToId.B)?.style).toBe("shape=cylinder;");
    expect(doc.connectors[0].style).toBe("endArrow=none;");
  });
});

describe("relayoutDiagram", () => {
  it("places unconnected nodes on a square-ish grid", () => {
    const { doc, ids } = documentWith({
      A: box(500, 500, 120, 60),
      B: box(0, 0, 120, 60),
      C: box(30, 30, 120, 60),
      D: box(90, 90, 120, 60),
    });

    const moved = relayoutDiagram(doc);
    expect(moved).toEqual({
      [ids.A]: { x: 50, y: 80 },
      [ids.B]: { x: 230, y: 80 },
      [ids.C]: { x: 50, y: 240 },
      [ids.D]: { x: 230, y: 240 },
    });
  });

  it("makes a grid override the document grid", () => {
    const { doc, ids } = documentWith({
      A: box(500, 500, 120, 60),
      B: box(0, 0, 120, 60),
      C: box(30, 30, 120, 60),
      D: box(90, 90, 120, 60),
    });

    const moved = relayoutDiagram(doc, { config: { gridSize: 25 } });
    expect(doc.gridSize).toBe(25);
    expect(moved).toEqual({
      [ids.A]: { x: 50, y: 75 },
      [ids.B]: { x: 225, y: 75 },
      [ids.C]: { x: 50, y: 250 },
      [ids.D]: { x: 225, y: 250 },
    });
  });

  it("lays out top-level nodes along their connectors", () => {
    const { doc, ids } = documentWith({ A: box(400, 400, 120, 60), B: box(0, 0, 120, 60) });
    addConnector(doc, { sourceId: ids.A, targetId: ids.B });

    relayoutDiagram(doc, { config: { routeEdges: false } });
    expect(doc.nodes.map((node) => [node.x, node.y])).toEqual([
      [50, 80],
      [50, 240],
    ]);
  });
});
