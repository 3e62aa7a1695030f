import type { BoundingBox, DiagramConnector, DiagramDocument, DiagramNode, LayoutDirection, Point } from "../types.js";
import { collectNodeBounds, isTopLevel, nodeIndex } from "../model/document.js";
import { boxCenter, boxesIntersect, snapToGrid, snapUpToGrid, unionBounds } from "./geometry.js";

const DEFAULT_LABEL_OFFSET: Point = { x: 0, y: -10 };
const LABEL_OFFSETS: Point[] = [
  { x: 0, y: -20 },
  { x: 0, y: 20 },
  { x: 20, y: 0 },
  { x: -20, y: 0 },
  { x: 15, y: -15 },
  { x: -15, y: -15 },
  { x: 15, y: 15 },
  { x: -15, y: 15 },
];
const LABEL_CHAR_WIDTH = 7;
const LABEL_MIN_WIDTH = 30;
const LABEL_HEIGHT = 16;
const MIN_ROW_SHIFT = 5;

function topLevelNodes(doc: DiagramDocument): DiagramNode[] {
  const nodes = nodeIndex(doc);
  return doc.nodes.filter((node) => isTopLevel(node, nodes));
}

/**
 * Sorts by `key` and starts a new group whenever the gap to the previous value
 * exceeds `threshold`.
 */
function groupByProximity<T>(items: T[], key: (item: T) => number, threshold: number): T[][] {
  const sorted = [...items].sort((a, b) => key(a) - key(b));
  const groups: T[][] = [];
  let current: T[] = [];
  let last = 0;

  for (const item of sorted) {
    const value = key(item);
    if (current.length === 0 || Math.abs(value - last) <= threshold) {
      current.push(item);
    } else {
      groups.push(current);
      current = [item];
    }
    last = value;
  }
  if (current.length > 0) {
    groups.push(current);
  }
  return groups;
}

function centerX(node: DiagramNode): number {
  return node.x + node.width / 2;
}

function centerY(node: DiagramNode): number {
  return node.y + node.height / 2;
}

export function alignRankBaselines(doc: DiagramDocument, threshold = 20): number {
  const nodes = topLevelNodes(doc);
  if (nodes.length < 2) {
    return 0;
  }

  let adjusted = 0;
  for (const row of groupByProximity(nodes, centerY, threshold)) {
    if (row.length < 2) {
      continue;
    }
    const average = row.reduce((sum, node) => sum + centerY(node), 0) / row.length;
    for (const node of row) {
      const y = snapToGrid(average - node.height / 2, doc.gridSize);
      if (Math.abs(node.y - y) > 1) {
        node.y = y;
        adjusted += 1;
      }
    }
  }
  return adjusted;
}

export function alignColumnCenters(doc: DiagramDocument, threshold = 20): number {
  const nodes = topLevelNodes(doc);
  if (nodes.length < 2) {
    return 0;
  }

  let adjusted = 0;
  for (const column of groupByProximity(nodes, centerX, threshold)) {
    if (column.length < 2) {
      continue;
    }
    const average = column.reduce((sum, node) => sum + centerX(node), 0) / column.length;
    for (const node of column) {
      const x = snapToGrid(average - node.width / 2, doc.gridSize);
      if (Math.abs(node.x - x) > 1) {
        node.x = x;
        adjusted += 1;
      }
    }
  }
  return adjusted;
}

/**
 * Rows (TB/BT) share their tallest height; columns (LR/RL) share their widest width.
 */
export function equalizeConnectedSizes(doc: DiagramDocument, direction: LayoutDirection = "TB", threshold = 20): number {
  const nodes = topLevelNodes(doc);
  if (nodes.length < 2) {
    return 0;
  }
  const vertical = direction === "TB" || direction === "BT";

  let adjusted = 0;
  for (const group of groupByProximity(nodes, vertical ? centerY : centerX, threshold)) {
    if (group.length < 2) {
      continue;
    }
    if (vertical) {
      const height = Math.max(...group.map((node) => node.height));
      for (const node of group) {
        if (node.height < height) {
          node.height = height;
          adjusted += 1;
        }
      }
    } else {
      const width = Math.max(...group.map((node) => node.width));
      for (const node of group) {
        if (node.width < width) {
          node.width = width;
          adjusted += 1;
        }
      }
    }
  }
  return adjusted;
}

/**
 * Closes vertical gaps between rows and horizontal gaps inside each row down to
 * `margin`, then realigns rows and columns.
 */
export function compactDiagram(doc: DiagramDocument, margin = 40): number {
  const nodes = topLevelNodes(doc);
  if (nodes.length < 2) {
    return 0;
  }

  const rows = groupByProximity(nodes, (node) => node.y, 20);
  let moved = 0;
  let cursorY = Math.min(...nodes.map((node) => node.y));

  for (const row of rows) {
    const top = Math.min(...row.map((node) => node.y));
    const bottom = Math.max(...row.map((node) => node.y + node.height));
    const shift = cursorY - top;
    if (Math.abs(shift) > MIN_ROW_SHIFT) {
      for (const node of row) {
        node.y = snapToGrid(node.y + shift, doc.gridSize);
        moved += 1;
      }
    }
    cursorY += bottom - top + margin;
  }

  for (const row of rows) {
    if (row.length < 2) {
      continue;
    }
    const ordered = [...row].sort((a, b) => a.x - b.x);
    let cursorX = ordered[0].x;
    for (const node of ordered) {
      if (Math.abs(cursorX - node.x) > MIN_ROW_SHIFT) {
        node.x = snapToGrid(cursorX, doc.gridSize);
        moved += 1;
      }
      cursorX = node.x + node.width + margin;
    }
  }

  moved += alignRankBaselines(doc, 20);
  moved += alignColumnCenters(doc, 20);
  return moved;
}

function translateContent(doc: DiagramDocument, nodes: DiagramNode[], shiftX: number, shiftY: number): number {
  for (const node of nodes) {
    node.x = snapToGrid(node.x + shiftX, doc.gridSize);
    node.y = snapToGrid(node.y + shiftY, doc.gridSize);
  }
  for (const connector of doc.connectors) {
    connector.waypoints = connector.waypoints.map((point) => ({
      x: snapToGrid(point.x + shiftX, doc.gridSize),
      y: snapToGrid(point.y + shiftY, doc.gridSize),
    }));
  }
  return nodes.length;
}

/**
 * Shifts top-level content, and the connector waypoints with it, so the content box
 * sits in the middle of the page and at least `margin` from its top-left corner.
 */
export function centerDiagramOnPage(doc: DiagramDocument, margin = 50): number {
  const nodes = topLevelNodes(doc);
  const content = unionBounds(nodes);
  if (!content) {
    return 0;
  }

  const hasPage = doc.pageWidth > 0 && doc.pageHeight > 0;
  const targetX = hasPage ? Math.max(margin, (doc.pageWidth - content.width) / 2) : margin;
  const targetY = hasPage ? Math.max(margin, (doc.pageHeight - content.height) / 2) : margin;
  const shiftX = snapToGrid(targetX - content.x, doc.gridSize);
  const shiftY = snapToGrid(targetY - content.y, doc.gridSize);
  if (Math.abs(shiftX) < 5 && Math.abs(shiftY) < 5) {
    return 0;
  }
  return translateContent(doc, nodes, shiftX, shiftY);
}

export function ensurePageMargins(doc: DiagramDocument, margin = 40): number {
  const nodes = topLevelNodes(doc);
  const content = unionBounds(nodes);
  if (!content) {
    return 0;
  }

  const shiftX = snapUpToGrid(Math.max(0, margin - content.x), doc.gridSize);
  const shiftY = snapUpToGrid(Math.max(0, margin - content.y), doc.gridSize);
  if (shiftX < 1 && shiftY < 1) {
    return 0;
  }
  return translateContent(doc, nodes, shiftX, shiftY);
}

/**
 * Point halfway along a polyline, measured by length.
 */
export function pathMidpoint(points: Point[]): Point | undefined {
  if (points.length === 0) {
    return undefined;
  }
  const lengths: number[] = [];
  let total = 0;
  for (let i = 0; i < points.length - 1; i += 1) {
    const length = Math.hypot(points[i + 1].x - points[i].x, points[i + 1].y - points[i].y);
    lengths.push(length);
    total += length;
  }
  if (total <= 0) {
    return { ...points[0] };
  }

  const target = total / 2;
  let walked = 0;
  for (let i = 0; i < lengths.length; i += 1) {
    const segment = lengths[i];
    if (segment <= 0 || walked + segment < target) {
      walked += segment;
      continue;
    }
    const t = (target - walked) / segment;
    return {
      x: points[i].x + (points[i + 1].x - points[i].x) * t,
      y: points[i].y + (points[i + 1].y - points[i].y) * t,
    };
  }
  return { ...points[points.length - 1] };
}

function labelBox(anchor: Point, offset: Point, label: string): BoundingBox {
  const width = Math.max(label.length * LABEL_CHAR_WIDTH, LABEL_MIN_WIDTH);
  return {
    x: anchor.x + offset.x - width / 2,
    y: anchor.y + offset.y - LABEL_HEIGHT / 2,
    width,
    height: LABEL_HEIGHT,
  };
}

function countCollisions(box: BoundingBox, shapes: BoundingBox[], margin: number): number {
  return shapes.filter((shape) => boxesIntersect(box, shape, margin)).length;
}

function connectorPath(connector: DiagramConnector, bounds: Map<string, BoundingBox>): Point[] | undefined {
  const source = bounds.get(connector.sourceId);
  const target = bounds.get(connector.targetId);
  if (!source || !target) {
    return undefined;
  }
  return [boxCenter(source), ...connector.waypoints, boxCenter(target)];
}

/**
 * Moves labels that collide with a node to the candidate offset with the fewest
 * collisions. Returns the number of labels whose offset changed.
 */
export function positionEdgeLabels(doc: DiagramDocument, margin = 8): number {
  const bounds = collectNodeBounds(doc);
  const shapes = [...bounds.values()];
  let count = 0;

  for (const connector of doc.connectors) {
    if (!connector.label) {
      continue;
    }
    const path = connectorPath(connector, bounds);
    const anchor = path ? pathMidpoint(path) : undefined;
    if (!anchor) {
      continue;
    }

    const current = connector.labelOffset ?? DEFAULT_LABEL_OFFSET;
    if (countCollisions(labelBox(anchor, current, connector.label), shapes, margin) === 0) {
      continue;
    }

    let best = current;
    let fewest = Number.POSITIVE_INFINITY;
    for (const offset of LABEL_OFFSETS) {
      const collisions = countCollisions(labelBox(anchor, offset, connector.label), shapes, margin);
      if (collisions < fewest) {
        fewest = collisions;
        best = offset;
      }
      if (collisions === 0) {
        break;
      }
    }

    if (best.x !== current.x || best.y !== current.y) {
      connector.labelOffset = { ...best };
      count += 1;
    }
  }

  return count;
}
