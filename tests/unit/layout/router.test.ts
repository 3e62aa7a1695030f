import { describe, expect, it } from "vitest";
import type { BoundingBox, Point } from "../../../src/types.js";
import { emptyDocument } from "../../../src/layout/defaults.js";
import { boxCenter, expandBox, segmentEntersBox } from "../../../src/layout/geometry.js";
import { fallbackRoute, routeDiagramConnectors, routeOrthogonal, simplifyPath } from "../../../src/layout/router.js";
import { addConnector, addNode } from "../../../src/model/document.js";
import { box, documentWith } from "../../helpers/documents.js";

const source = box(-20, 80, 40, 40);
const target = box(380, 80, 40, 40);
const obstacle = box(180, 80, 100, 100);

function fullPath(from: BoundingBox, waypoints: Point[], to: BoundingBox): Point[] {
  return [boxCenter(from), ...waypoints, boxCenter(to)];
}

describe("routeOrthogonal", () => {
  it("returns no waypoints when the centre line is clear", () => {
    expect(routeOrthogonal(source, target, [], 15, 10)).toEqual([]);
    expect(routeOrthogonal(source, target, [box(180, 300, 50, 50)], 15, 10)).toEqual([]);
  });

  it("detours over an obstacle sitting on the centre line", () => {
    const waypoints = routeOrthogonal(source, target, [obstacle], 15, 10);
    expect(waypoints).toEqual([
      { x: 160, y: 100 },
      { x: 160, y: 60 },
      { x: 400, y: 60 },
    ]);
  });

  it("keeps every segment axis-aligned and outside the padded obstacle", () => {
    const path = fullPath(source, routeOrthogonal(source, target, [obstacle], 15, 10), target);
    const padded = expandBox(obstacle, 15);
    for (let i = 0; i < path.length - 1; i += 1) {
      const a = path[i];
      const b = path[i + 1];
      expect(a.x === b.x || a.y === b.y).toBe(true);
      expect(segmentEntersBox(a, b, padded)).toBe(false);
    }
  });

  it("keeps clear of every padded obstacle when several block the way", () => {
    const scenarios: Array<[BoundingBox, BoundingBox, BoundingBox[]]> = [
      [
        box(0, 180, 40, 40),
        box(600, 180, 40, 40),
        [box(120, 100, 60, 200), box(280, 0, 60, 240), box(280, 300, 60, 140), box(440, 140, 60, 200)],
      ],
      [box(0, 0, 40, 40), box(400, 400, 40, 40), [box(100, -100, 40, 300), box(200, 200, 300, 40), box(300, 60, 40, 100)]],
      [
        box(200, 200, 40, 40),
        box(200, -200, 40, 40),
        [box(100, 60, 240, 40), box(100, -100, 100, 40), box(240, -100, 100, 40), box(160, -20, 120, 20)],
      ],
    ];

    for (const [from, to, obstacles] of scenarios) {
      const waypoints = routeOrthogonal(from, to, obstacles, 15, 10);
      expect(waypoints.length).toBeGreaterThan(0);
      const path = fullPath(from, waypoints, to);
      for (let i = 0; i < path.length - 1; i += 1) {
        const a = path[i];
        const b = path[i + 1];
        expect(a.x === b.x || a.y === b.y).toBe(true);
        for (const obstacleBox of obstacles) {
          expect(segmentEntersBox(a, b, expandBox(obstacleBox, 15))).toBe(false);
        }
      }
    }
  });

  it("routes around a wide obstacle between vertically stacked nodes", () => {
    expect(routeOrthogonal(box(0, 0, 40, 40), box(0, 400, 40, 40), [box(-50, 180, 200, 40)], 15, 10)).toEqual([
      { x: 20, y: 160 },
      { x: -70, y: 160 },
      { x: -70, y: 420 },
    ]);
  });

  it("falls back to a wide detour when the search budget is exhausted", () => {
    expect(routeOrthogonal(source, target, [obstacle], 15, 10, { maxExpansions: 0 })).toEqual([
      { x: 0, y: 50 },
      { x: 400, y: 50 },
    ]);
  });
});

describe("fallbackRoute", () => {
  it("goes above or below for horizontal-dominant connections", () => {
    expect(fallbackRoute(box(0, 0, 40, 40), box(400, 0, 40, 40), [box(180, -50, 40, 200)], 15, 10)).toEqual([
      { x: 20, y: -80 },
      { x: 420, y: -80 },
    ]);
  });

  it("goes left or right for vertical-dominant connections", () => {
    expect(fallbackRoute(box(0, 0, 40, 40), box(0, 400, 40, 40), [box(-50, 180, 200, 40)], 15, 10)).toEqual([
      { x: -80, y: 20 },
      { x: -80, y: 420 },
    ]);
  });
});

describe("simplifyPath", () => {
  it("keeps only the corners", () => {
    expect(
      simplifyPath([
        { x: 0, y: 0 },
        { x: 10, y: 0 },
        { x: 20, y: 0 },
        { x: 20, y: 10 },
      ]),
    ).toEqual([{ x: 20, y: 0 }]);
  });

  it("returns nothing for a bare segment", () => {
    expect(
      simplifyPath([
        { x: 0, y: 0 },
        { x: 10, y: 0 },
      ]),
    ).toEqual([]);
  });
});

describe("routeDiagramConnectors", () => {
  it("routes connectors around the other nodes of the document", () => {
    const { doc, ids } = documentWith({ S: source, O: obstacle, T: target });
    addConnector(doc, { sourceId: ids.S, targetId: ids.T });

    expect(routeDiagramConnectors(doc, 15)).toBe(1);
    expect(doc.connectors[0].waypoints).toEqual([
      { x: 160, y: 100 },
      { x: 160, y: 60 },
      { x: 400, y: 60 },
    ]);
  });

  it("does not treat the container of an endpoint as an obstacle", () => {
    const doc = emptyDocument();
    const group = addNode(doc, { label: "G", x: 0, y: 0, width: 400, height: 300, container: true });
    const a = addNode(doc, { label: "A", x: 20, y: 20, width: 40, height: 40, parentId: group });
    const b = addNode(doc, { label: "B", x: 320, y: 220, width: 40, height: 40, parentId: group });
    addConnector(doc, { sourceId: a, targetId: b });

    routeDiagramConnectors(doc);
    expect(doc.connectors[0].waypoints).toEqual([]);
  });

  it("skips connectors whose endpoints are missing", () => {
    const { doc, ids } = documentWith({ A: box(0, 0, 40, 40) });
    addConnector(doc, { sourceId: ids.A, targetId: "missing" });

    expect(routeDiagramConnectors(doc)).toBe(0);
  });
});
