import type { BoundingBox, Point } from "../types.js";

const PARAMETRIC_EPSILON = 1e-9;

export function snapToGrid(value: number, gridSize: number): number {
  if (!(gridSize > 0)) {
    return value;
  }
  const snapped = Math.round(value / gridSize) * gridSize;
  // normalise -0
  return snapped === 0 ? 0 : snapped;
}

export function snapDownToGrid(value: number, gridSize: number): number {
  if (!(gridSize > 0)) {
    return value;
  }
  const snapped = Math.floor(value / gridSize) * gridSize;
  return snapped === 0 ? 0 : snapped;
}

export function snapUpToGrid(value: number, gridSize: number): number {
  if (!(gridSize > 0)) {
    return value;
  }
  const snapped = Math.ceil(value / gridSize) * gridSize;
  return snapped === 0 ? 0 : snapped;
}

export function snapPoint(point: Point, gridSize: number): Point {
  return {
    x: snapToGrid(point.x, gridSize),
    y: snapToGrid(point.y, gridSize),
  };
}

export function boxRight(box: BoundingBox): number {
  return box.x + box.width;
}

export function boxBottom(box: BoundingBox): number {
  return box.y + box.height;
}

export function boxCenter(box: BoundingBox): Point {
  return {
    x: box.x + box.width / 2,
    y: box.y + box.height / 2,
  };
}

export function expandBox(box: BoundingBox, margin: number): BoundingBox {
  return {
    x: box.x - margin,
    y: box.y - margin,
    width: box.width + margin * 2,
    height: box.height + margin * 2,
  };
}

export function boxesIntersect(a: BoundingBox, b: BoundingBox, margin = 0): boolean {
  return !(
    boxRight(a) + margin <= b.x ||
    boxRight(b) + margin <= a.x ||
    boxBottom(a) + margin <= b.y ||
    boxBottom(b) + margin <= a.y
  );
}

export function pointStrictlyInside(box: BoundingBox, point: Point): boolean {
  return box.x < point.x && point.x < boxRight(box) && box.y < point.y && point.y < boxBottom(box);
}

/**
 * Liang-Barsky clipping test. Touching the rectangle's boundary counts as a hit.
 */
export function lineIntersectsBox(a: Point, b: Point, box: BoundingBox): boolean {
  const dx = b.x - a.x;
  const dy = b.y - a.y;
  const clips: Array<[number, number]> = [
    [-dx, a.x - box.x],
    [dx, boxRight(box) - a.x],
    [-dy, a.y - box.y],
    [dy, boxBottom(box) - a.y],
  ];

  let t0 = 0;
  let t1 = 1;
  for (const [p, q] of clips) {
    if (Math.abs(p) < PARAMETRIC_EPSILON) {
      if (q < 0) {
        return false;
      }
      continue;
    }
    const t = q / p;
    if (p < 0) {
      t0 = Math.max(t0, t);
    } else {
      t1 = Math.min(t1, t);
    }
  }
  return t0 <= t1;
}

/**
 * True when the segment enters the open interior of the box. Segments that run
 * along an edge or only touch a corner do not count.
 */
export function segmentEntersBox(a: Point, b: Point, box: BoundingBox): boolean {
  const right = boxRight(box);
  const bottom = boxBottom(box);

  if (a.x === b.x) {
    const minY = Math.min(a.y, b.y);
    const maxY = Math.max(a.y, b.y);
    return box.x < a.x && a.x < right && maxY > box.y && minY < bottom;
  }
  if (a.y === b.y) {
    const minX = Math.min(a.x, b.x);
    const maxX = Math.max(a.x, b.x);
    return box.y < a.y && a.y < bottom && maxX > box.x && minX < right;
  }

  if (pointStrictlyInside(box, a) || pointStrictlyInside(box, b)) {
    return true;
  }
  const shrunk: BoundingBox = {
    x: box.x + PARAMETRIC_EPSILON,
    y: box.y + PARAMETRIC_EPSILON,
    width: Math.max(0, box.width - PARAMETRIC_EPSILON * 2),
    height: Math.max(0, box.height - PARAMETRIC_EPSILON * 2),
  };
  return lineIntersectsBox(a, b, shrunk);
}

export function anyObstacleOnLine(a: Point, b: Point, obstacles: BoundingBox[], margin: number): boolean {
  return obstacles.some((obstacle) => lineIntersectsBox(a, b, expandBox(obstacle, margin)));
}

export function unionBounds(boxes: Iterable<BoundingBox>): BoundingBox | undefined {
  let minX = Number.POSITIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;

  for (const box of boxes) {
    minX = Math.min(minX, box.x);
    minY = Math.min(minY, box.y);
    maxX = Math.max(maxX, boxRight(box));
    maxY = Math.max(maxY, boxBottom(box));
  }

  if (!Number.isFinite(minX) || !Number.isFinite(minY) || !Number.isFinite(maxX) || !Number.isFinite(maxY)) {
    return undefined;
  }

  return {
    x: minX,
    y: minY,
    width: maxX - minX,
    height: maxY - minY,
  };
}

export function samePoints(a: Point[], b: Point[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  return a.every((point, index) => point.x === b[index].x && point.y === b[index].y);
}
