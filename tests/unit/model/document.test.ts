import { describe, expect, it } from "vitest";
import { emptyDocument } from "../../../src/layout/defaults.js";
import {
  absoluteBounds,
  addConnector,
  addNode,
  ancestorIds,
  collectNodeBounds,
  nextCellId,
  nodeIndex,
} from "../../../src/model/document.js";

describe("document", () => {
  it("hands out ids that are not already taken", () => {
    const doc = emptyDocument();
    addNode(doc, { id: "3", label: "taken", x: 0, y: 0, width: 10, height: 10 });

    expect(nextCellId(doc)).toBe("2");
    expect(nextCellId(doc)).toBe("4");
  });

  it("resolves absolute bounds through nested containers", () => {
    const doc = emptyDocument();
    const outer = addNode(doc, { label: "outer", x: 100, y: 50, width: 400, height: 300, container: true });
    const inner = addNode(doc, { label: "inner", x: 20, y: 30, width: 200, height: 100, parentId: outer, container: true });
    const leaf = addNode(doc, { label: "leaf", x: 5, y: 5, width: 40, height: 20, parentId: inner });

    expect(absoluteBounds(doc, leaf)).toEqual({ x: 125, y: 85, width: 40, height: 20 });
    expect(collectNodeBounds(doc).get(inner)).toEqual({ x: 120, y: 80, width: 200, height: 100 });
    expect([...ancestorIds(leaf, nodeIndex(doc))]).toEqual([inner, outer]);
  });

  it("stops walking a malformed parent cycle", () => {
    const doc = emptyDocument();
    addNode(doc, { id: "a", label: "a", x: 10, y: 10, width: 10, height: 10, parentId: "b" });
    addNode(doc, { id: "b", label: "b", x: 20, y: 20, width: 10, height: 10, parentId: "a" });

    expect(absoluteBounds(doc, "a")).toEqual({ x: 30, y: 30, width: 10, height: 10 });
    expect([...ancestorIds("a", nodeIndex(doc))]).toEqual(["b"]);
  });

  it("copies connector waypoints", () => {
    const doc = emptyDocument();
    const waypoints = [{ x: 10, y: 20 }];
    addConnector(doc, { sourceId: "a", targetId: "b", waypoints });
    waypoints[0].x = 99;

    expect(doc.connectors[0].waypoints).toEqual([{ x: 10, y: 20 }]);
  });
});
