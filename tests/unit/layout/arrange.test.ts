import { describe, expect, it } from "vitest";
import type { BoundingBox } from "../../../src/types.js";
import {
  applyPortDistribution,
  arrangeColumn,
  arrangeGrid,
  arrangeRow,
  arrangeTree,
  chooseBestPorts,
  connectChain,
  distributeEvenly,
  distributePortsForBatch,
} from "../../../src/layout/arrange.js";
import { emptyDocument } from "../../../src/layout/defaults.js";
import { addConnector } from "../../../src/model/document.js";
import { box, documentWith } from "../../helpers/documents.js";

function positions(doc: ReturnType<typeof emptyDocument>): Array<[string, number, number]> {
  return doc.nodes.map((node) => [node.label, node.x, node.y]);
}

describe("simple arrangements", () => {
  it("places a row left to right", () => {
    const doc = emptyDocument();
    expect(arrangeRow(doc, ["A", "B", "C"])).toEqual(["2", "3", "4"]);
    expect(positions(doc)).toEqual([
      ["A", 50, 50],
      ["B", 230, 50],
      ["C", 410, 50],
    ]);
  });

  it("places a column top to bottom at a given x", () => {
    const doc = emptyDocument();
    arrangeColumn(doc, ["A", "B", "C"], { x: 204 });
    expect(positions(doc)).toEqual([
      ["A", 200, 50],
      ["B", 200, 170],
      ["C", 200, 290],
    ]);
  });

  it("wraps a grid after the given number of columns", () => {
    const doc = emptyDocument();
    arrangeGrid(doc, ["A", "B", "C", "D", "E"], 2);
    expect(positions(doc)).toEqual([
      ["A", 50, 50],
      ["B", 230, 50],
      ["C", 50, 170],
      ["D", 230, 170],
      ["E", 50, 290],
    ]);
  });

  it("lays out a tree level by level, centring narrow levels", () => {
    const doc = emptyDocument();
    const labelToId = arrangeTree(doc, { root: ["a", "b"], a: ["c"] }, "root");

    expect(Object.keys(labelToId).sort()).toEqual(["a", "b", "c", "root"]);
    expect(positions(doc)).toEqual([
      ["root", 140, 50],
      ["a", 50, 170],
      ["b", 230, 170],
      ["c", 140, 290],
    ]);
    expect(doc.connectors).toHaveLength(3);
  });

  it("chains nodes with optional labels", () => {
    const doc = emptyDocument();
    const ids = arrangeRow(doc, ["A", "B", "C"]);
    connectChain(doc, ids, { labels: ["next"] });

    expect(doc.connectors.map((connector) => [connector.sourceId, connector.targetId, connector.label])).toEqual([
      ["2", "3", "next"],
      ["3", "4", ""],
    ]);
  });
});

describe("chooseBestPorts", () => {
  const source = box(0, 0, 100, 50);

  it("uses side ports for clearly horizontal connections", () => {
    expect(chooseBestPorts(source, box(300, 0, 100, 50))).toEqual({
      exit: { x: 1, y: 0.5 },
      entry: { x: 0, y: 0.5 },
    });
  });

  it("uses top and bottom ports for clearly vertical connections", () => {
    expect(chooseBestPorts(source, box(0, -300, 100, 50))).toEqual({
      exit: { x: 0.5, y: 0 },
      entry: { x: 0.5, y: 1 },
    });
  });

  it("prefers vertical ports for diagonal connections", () => {
    expect(chooseBestPorts(source, box(200, 200, 100, 50)).exit).toEqual({ x: 0.5, y: 1 });
  });

  it("honours a forced mode", () => {
    expect(chooseBestPorts(source, box(-50, 300, 100, 50), "horizontal")).toEqual({
      exit: { x: 0, y: 0.5 },
      entry: { x: 1, y: 0.5 },
    });
  });
});

describe("distributePortsForBatch", () => {
  it("spreads connections leaving the same side, ordered by target position", () => {
    const bounds = new Map<string, BoundingBox>([
      ["src", box(0, 100, 120, 60)],
      ["low", box(400, 200, 120, 60)],
      ["top", box(400, 0, 120, 60)],
      ["mid", box(400, 100, 120, 60)],
    ]);
    const ports = distributePortsForBatch(
      [
        { sourceId: "src", targetId: "low" },
        { sourceId: "src", targetId: "top" },
        { sourceId: "src", targetId: "mid" },
      ],
      bounds,
    );

    expect(ports.map((port) => port.exit.x)).toEqual([1, 1, 1]);
    expect(ports[0].exit.y).toBeCloseTo(0.85);
    expect(ports[1].exit.y).toBeCloseTo(0.15);
    expect(ports[2].exit.y).toBeCloseTo(0.5);
    for (const port of ports) {
      expect(port.entry).toEqual({ x: 0, y: 0.5 });
    }
  });

  it("returns nothing for an empty batch", () => {
    expect(distributePortsForBatch([], new Map())).toEqual([]);
  });

  it("writes anchors onto document connectors", () => {
    const { doc, ids } = documentWith({ A: box(0, 0, 100, 50), B: box(0, 300, 100, 50) });
    addConnector(doc, { sourceId: ids.A, targetId: ids.B });

    expect(applyPortDistribution(doc)).toBe(1);
    expect(doc.connectors[0].exitPort).toEqual({ x: 0.5, y: 1 });
    expect(doc.connectors[0].entryPort).toEqual({ x: 0.5, y: 0 });
  });
});

describe("distributeEvenly", () => {
  it("splits the free space into equal gaps", () => {
    expect(distributeEvenly([20, 20, 20], 0, 100)).toEqual([0, 40, 80]);
  });

  it("keeps a minimum gap when space runs out", () => {
    expect(distributeEvenly([50, 50], 0, 60)).toEqual([0, 60]);
  });

  it("handles one or no items", () => {
    expect(distributeEvenly([30], 5, 100)).toEqual([5]);
    expect(distributeEvenly([], 0, 100)).toEqual([]);
  });
});
