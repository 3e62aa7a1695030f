import type { BoundingBox, DiagramDocument, DiagramNode } from "../types.js";
import { ancestorIds, collectNodeBounds, nodeIndex } from "../model/document.js";
import { boxesIntersect, snapToGrid, snapUpToGrid } from "./geometry.js";

export interface OverlapResolution {
  iterations: number;
  pushes: number;
  converged: boolean;
}

export interface OverlapOptions {
  margin: number;
  maxIterations: number;
  gridSize: number;
}

type MutableBox = BoundingBox;

function axisOverlap(aStart: number, aSize: number, bStart: number, bSize: number, margin: number): number {
  return Math.min(aStart + aSize, bStart + bSize) - Math.max(aStart, bStart) + margin;
}

function pushDistance(overlap: number, gridSize: number): number {
  const push = overlap / 2 + 1;
  return gridSize > 0 ? snapUpToGrid(push, gridSize) : push;
}

/**
 * Push apart every pair whose margin-padded boxes intersect. Boxes are snapped to the
 * grid first and every push is a whole number of grid cells, so a pass that moves
 * nothing leaves a grid-aligned, overlap-free arrangement.
 */
export function resolveNodeOverlaps(boxes: MutableBox[], options: OverlapOptions): OverlapResolution {
  const { margin, maxIterations, gridSize } = options;

  for (const box of boxes) {
    box.x = snapToGrid(box.x, gridSize);
    box.y = snapToGrid(box.y, gridSize);
  }

  if (boxes.length < 2) {
    return { iterations: 0, pushes: 0, converged: true };
  }

  let pushes = 0;
  for (let iteration = 0; iteration < maxIterations; iteration += 1) {
    let moved = false;

    for (let i = 0; i < boxes.length; i += 1) {
      for (let j = i + 1; j < boxes.length; j += 1) {
        const a = boxes[i];
        const b = boxes[j];
        const overlapX = axisOverlap(a.x, a.width, b.x, b.width, margin);
        const overlapY = axisOverlap(a.y, a.height, b.y, b.height, margin);
        if (overlapX <= 0 || overlapY <= 0) {
          continue;
        }

        if (overlapX <= overlapY) {
          const push = pushDistance(overlapX, gridSize);
          if (a.x + a.width / 2 <= b.x + b.width / 2) {
            a.x -= push;
            b.x += push;
          } else {
            a.x += push;
            b.x -= push;
          }
        } else {
          const push = pushDistance(overlapY, gridSize);
          if (a.y + a.height / 2 <= b.y + b.height / 2) {
            a.y -= push;
            b.y += push;
          } else {
            a.y += push;
            b.y -= push;
          }
        }
        moved = true;
        pushes += 1;
      }
    }

    if (!moved) {
      return { iterations: iteration + 1, pushes, converged: true };
    }
  }

  return { iterations: maxIterations, pushes, converged: false };
}

export function findOverlappingNodes(doc: DiagramDocument, margin = 5): Array<[string, string]> {
  const nodes = nodeIndex(doc);
  const bounds = collectNodeBounds(doc);
  const ids = [...bounds.keys()];
  const overlaps: Array<[string, string]> = [];

  for (let i = 0; i < ids.length; i += 1) {
    const ancestorsOfA = ancestorIds(ids[i], nodes);
    for (let j = i + 1; j < ids.length; j += 1) {
      if (ancestorsOfA.has(ids[j]) || ancestorIds(ids[j], nodes).has(ids[i])) {
        continue;
      }
      const a = bounds.get(ids[i]);
      const b = bounds.get(ids[j]);
      if (a && b && boxesIntersect(a, b, margin)) {
        overlaps.push([ids[i], ids[j]]);
      }
    }
  }

  return overlaps;
}

/**
 * Resolve overlaps among siblings of every container level. Siblings share a
 * coordinate frame, so their stored positions are pushed directly.
 */
export function resolveDiagramOverlaps(doc: DiagramDocument, margin = 20, maxIterations = 50): number {
  const nodes = nodeIndex(doc);
  const siblingGroups = new Map<string, DiagramNode[]>();
  for (const node of doc.nodes) {
    const key = node.parentId && nodes.has(node.parentId) ? node.parentId : "";
    const group = siblingGroups.get(key) ?? [];
    group.push(node);
    siblingGroups.set(key, group);
  }

  let pushes = 0;
  for (const group of siblingGroups.values()) {
    if (group.length < 2) {
      continue;
    }
    const result = resolveNodeOverlaps(group, {
      margin,
      maxIterations,
      gridSize: doc.gridSize,
    });
    pushes += result.pushes;
  }
  return pushes;
}
