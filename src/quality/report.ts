import type { BoundingBox, DiagramDocument, Point } from "../types.js";
import { ancestorIds, collectNodeBounds, nodeIndex } from "../model/document.js";
import { boxCenter, boxesIntersect, segmentEntersBox } from "../layout/geometry.js";

interface SegmentRef {
  connectorId: string;
  sourceId: string;
  targetId: string;
  a: Point;
  b: Point;
}

export interface LayoutMetrics {
  nodeOverlapCount: number;
  nodeOverlapArea: number;
  edgeCrossings: number;
  edgeThroughNodeCount: number;
  totalEdgeBends: number;
  diagonalSegmentCount: number;
  offGridCount: number;
}

export interface LayoutEvaluation {
  penalty: number;
  score: number;
  metrics: LayoutMetrics;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function orientation(a: Point, b: Point, c: Point): number {
  return (b.x - a.x) * (c.y - a.y) - (b.y - a.y) * (c.x - a.x);
}

function segmentsCross(first: SegmentRef, second: SegmentRef): boolean {
  const o1 = orientation(first.a, first.b, second.a);
  const o2 = orientation(first.a, first.b, second.b);
  const o3 = orientation(second.a, second.b, first.a);
  const o4 = orientation(second.a, second.b, first.b);
  const eps = 1e-6;
  if (Math.abs(o1) < eps || Math.abs(o2) < eps || Math.abs(o3) < eps || Math.abs(o4) < eps) {
    return false;
  }
  return (o1 > 0) !== (o2 > 0) && (o3 > 0) !== (o4 > 0);
}

function overlapArea(a: BoundingBox, b: BoundingBox): number {
  const ox = Math.max(0, Math.min(a.x + a.width, b.x + b.width) - Math.max(a.x, b.x));
  const oy = Math.max(0, Math.min(a.y + a.height, b.y + b.height) - Math.max(a.y, b.y));
  return ox * oy;
}

function onGrid(value: number, gridSize: number): boolean {
  if (!(gridSize > 0)) {
    return true;
  }
  const remainder = Math.abs(value % gridSize);
  return remainder < 1e-6 || gridSize - remainder < 1e-6;
}

function collectSegments(doc: DiagramDocument, bounds: Map<string, BoundingBox>): SegmentRef[] {
  const segments: SegmentRef[] = [];
  for (const connector of doc.connectors) {
    const source = bounds.get(connector.sourceId);
    const target = bounds.get(connector.targetId);
    if (!source || !target) {
      continue;
    }
    const points = [boxCenter(source), ...connector.waypoints, boxCenter(target)];
    for (let i = 0; i < points.length - 1; i += 1) {
      if (Math.hypot(points[i + 1].x - points[i].x, points[i + 1].y - points[i].y) < 1e-3) {
        continue;
      }
      segments.push({
        connectorId: connector.id,
        sourceId: connector.sourceId,
        targetId: connector.targetId,
        a: points[i],
        b: points[i + 1],
      });
    }
  }
  return segments;
}

/**
 * Scores a document: overlapping nodes, crossing connectors, connectors passing
 * through unrelated nodes, bends, diagonal segments and off-grid coordinates.
 */
export function evaluateLayout(doc: DiagramDocument): LayoutEvaluation {
  const nodes = nodeIndex(doc);
  const bounds = collectNodeBounds(doc);
  const ids = [...bounds.keys()];

  let nodeOverlapCount = 0;
  let nodeOverlapArea = 0;
  for (let i = 0; i < ids.length; i += 1) {
    const ancestors = ancestorIds(ids[i], nodes);
    for (let j = i + 1; j < ids.length; j += 1) {
      if (ancestors.has(ids[j]) || ancestorIds(ids[j], nodes).has(ids[i])) {
        continue;
      }
      const a = bounds.get(ids[i]);
      const b = bounds.get(ids[j]);
      if (!a || !b || !boxesIntersect(a, b)) {
        continue;
      }
      nodeOverlapCount += 1;
      nodeOverlapArea += overlapArea(a, b);
    }
  }

  const segments = collectSegments(doc, bounds);

  let edgeCrossings = 0;
  for (let i = 0; i < segments.length; i += 1) {
    for (let j = i + 1; j < segments.length; j += 1) {
      const a = segments[i];
      const b = segments[j];
      if (
        a.connectorId === b.connectorId ||
        a.sourceId === b.sourceId ||
        a.sourceId === b.targetId ||
        a.targetId === b.sourceId ||
        a.targetId === b.targetId
      ) {
        continue;
      }
      if (segmentsCross(a, b)) {
        edgeCrossings += 1;
      }
    }
  }

  let edgeThroughNodeCount = 0;
  let diagonalSegmentCount = 0;
  for (const segment of segments) {
    if (segment.a.x !== segment.b.x && segment.a.y !== segment.b.y) {
      diagonalSegmentCount += 1;
    }
    const skip = new Set<string>([
      segment.sourceId,
      segment.targetId,
      ...ancestorIds(segment.sourceId, nodes),
      ...ancestorIds(segment.targetId, nodes),
    ]);
    for (const [id, box] of bounds) {
      if (!skip.has(id) && segmentEntersBox(segment.a, segment.b, box)) {
        edgeThroughNodeCount += 1;
        break;
      }
    }
  }

  let totalEdgeBends = 0;
  let offGridCount = 0;
  for (const connector of doc.connectors) {
    totalEdgeBends += connector.waypoints.length;
    for (const point of connector.waypoints) {
      if (!onGrid(point.x, doc.gridSize) || !onGrid(point.y, doc.gridSize)) {
        offGridCount += 1;
      }
    }
  }
  for (const node of doc.nodes) {
    if (!onGrid(node.x, doc.gridSize) || !onGrid(node.y, doc.gridSize)) {
      offGridCount += 1;
    }
  }

  const metrics: LayoutMetrics = {
    nodeOverlapCount,
    nodeOverlapArea,
    edgeCrossings,
    edgeThroughNodeCount,
    totalEdgeBends,
    diagonalSegmentCount,
    offGridCount,
  };

  const penalty =
    metrics.nodeOverlapArea * 8.8 +
    metrics.edgeCrossings * 1300 +
    metrics.edgeThroughNodeCount * 520 +
    metrics.totalEdgeBends * 20 +
    metrics.diagonalSegmentCount * 60 +
    metrics.offGridCount * 40;

  const score = clamp(100 - Math.log10(1 + penalty) * 18, 0, 100);
  return {
    penalty,
    score,
    metrics,
  };
}
