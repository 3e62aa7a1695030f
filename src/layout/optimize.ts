import type { BoundingBox, DiagramConnector, DiagramDocument, OptimizeOptions, Point } from "../types.js";
import { ancestorIds, collectNodeBounds, nodeIndex } from "../model/document.js";
import { resolveOptimizeOptions } from "./defaults.js";
import { anyObstacleOnLine, boxBottom, boxCenter, boxRight, samePoints, snapPoint, snapToGrid } from "./geometry.js";

interface CorridorSegment {
  connector: DiagramConnector;
  /** Index of the segment's first waypoint; the second is `first + 1`. */
  first: number;
  horizontal: boolean;
  fixed: number;
  rangeStart: number;
  rangeEnd: number;
}

interface OptimizeJob {
  connector: DiagramConnector;
  source: Point;
  target: Point;
  obstacles: BoundingBox[];
}

const COLLINEAR_TOLERANCE = 1;
const MAX_CENTER_SHIFT_RATIO = 0.4;
const MAX_ROUNDS = 50;

function sameX(a: Point, b: Point): boolean {
  return Math.abs(a.x - b.x) < COLLINEAR_TOLERANCE;
}

function sameY(a: Point, b: Point): boolean {
  return Math.abs(a.y - b.y) < COLLINEAR_TOLERANCE;
}

export function removeCollinearPoints(path: Point[]): Point[] {
  if (path.length <= 2) {
    return path;
  }

  const result: Point[] = [path[0]];
  for (let i = 1; i < path.length - 1; i += 1) {
    const prev = result[result.length - 1];
    const current = path[i];
    const next = path[i + 1];
    const vertical = sameX(prev, current) && sameX(current, next);
    const horizontal = sameY(prev, current) && sameY(current, next);
    if (!vertical && !horizontal) {
      result.push(current);
    }
  }
  result.push(path[path.length - 1]);
  return result;
}

/**
 * Aligns near-orthogonal segments exactly. Interior points move; the fixed end point
 * instead pulls its neighbour when that keeps the neighbour's other segment orthogonal.
 */
export function straightenSegments(path: Point[], threshold: number): Point[] {
  if (path.length <= 2) {
    return path;
  }

  const result: Point[] = [path[0]];
  const last = path.length - 1;
  for (let i = 1; i < last; i += 1) {
    const prev = result[i - 1];
    const current = { ...path[i] };
    const dx = Math.abs(current.x - prev.x);
    const dy = Math.abs(current.y - prev.y);
    if (dx < threshold && dy >= threshold) {
      current.x = prev.x;
    } else if (dy < threshold && dx >= threshold) {
      current.y = prev.y;
    }
    result.push(current);
  }

  const end = path[last];
  const beforeEnd = result[last - 1];
  const anchor = result[last - 2];
  const dx = Math.abs(end.x - beforeEnd.x);
  const dy = Math.abs(end.y - beforeEnd.y);
  if (dx > 0 && dx < threshold && dy >= threshold && sameY(anchor, beforeEnd)) {
    result[last - 1] = { x: end.x, y: beforeEnd.y };
  } else if (dy > 0 && dy < threshold && dx >= threshold && sameX(anchor, beforeEnd)) {
    result[last - 1] = { x: beforeEnd.x, y: end.y };
  }
  result.push(end);
  return result;
}

/**
 * Drops interior points whose neighbours can be joined by a segment that clears
 * every obstacle. Repeats until nothing changes.
 */
export function shortenDetours(path: Point[], obstacles: BoundingBox[], margin: number): Point[] {
  const result = [...path];
  let changed = true;

  while (changed) {
    changed = false;
    let i = 1;
    while (i < result.length - 1) {
      if (anyObstacleOnLine(result[i - 1], result[i + 1], obstacles, margin)) {
        i += 1;
      } else {
        result.splice(i, 1);
        changed = true;
      }
    }
  }

  return result;
}

function channelBounds(
  fixed: number,
  spanStart: number,
  spanEnd: number,
  horizontal: boolean,
  obstacles: BoundingBox[],
  margin: number,
): { low: number; high: number } | undefined {
  let low = Number.NEGATIVE_INFINITY;
  let high = Number.POSITIVE_INFINITY;

  for (const box of obstacles) {
    const crossStart = horizontal ? box.x : box.y;
    const crossEnd = horizontal ? boxRight(box) : boxBottom(box);
    if (crossEnd + margin < spanStart || crossStart - margin > spanEnd) {
      continue;
    }
    const sideStart = horizontal ? box.y : box.x;
    const sideEnd = horizontal ? boxBottom(box) : boxRight(box);
    if (sideEnd + margin <= fixed) {
      low = Math.max(low, sideEnd + margin);
    } else if (sideStart - margin >= fixed) {
      high = Math.min(high, sideStart - margin);
    }
  }

  if (!Number.isFinite(low) || !Number.isFinite(high)) {
    return undefined;
  }
  return { low, high };
}

/**
 * Moves each interior segment to the middle of the free channel between the nearest
 * obstacles on both sides, when the channel is at least two margins wide and the
 * shift stays under 40% of its width.
 */
export function centerInChannels(path: Point[], obstacles: BoundingBox[], margin: number): Point[] {
  const result = path.map((point) => ({ ...point }));

  for (let i = 1; i < result.length - 2; i += 1) {
    const a = result[i];
    const b = result[i + 1];
    const horizontal = sameY(a, b);
    if (!horizontal && !sameX(a, b)) {
      continue;
    }

    const fixed = horizontal ? a.y : a.x;
    const spanStart = horizontal ? Math.min(a.x, b.x) : Math.min(a.y, b.y);
    const spanEnd = horizontal ? Math.max(a.x, b.x) : Math.max(a.y, b.y);
    const channel = channelBounds(fixed, spanStart, spanEnd, horizontal, obstacles, margin);
    if (!channel) {
      continue;
    }

    const width = channel.high - channel.low;
    const center = (channel.low + channel.high) / 2;
    if (width < margin * 2 || Math.abs(center - fixed) >= width * MAX_CENTER_SHIFT_RATIO) {
      continue;
    }
    if (horizontal) {
      a.y = center;
      b.y = center;
    } else {
      a.x = center;
      b.x = center;
    }
  }

  return result;
}

function collectCorridorSegments(connectors: DiagramConnector[]): CorridorSegment[] {
  const segments: CorridorSegment[] = [];
  for (const connector of connectors) {
    const points = connector.waypoints;
    for (let i = 0; i < points.length - 1; i += 1) {
      const a = points[i];
      const b = points[i + 1];
      if (sameY(a, b)) {
        segments.push({
          connector,
          first: i,
          horizontal: true,
          fixed: a.y,
          rangeStart: Math.min(a.x, b.x),
          rangeEnd: Math.max(a.x, b.x),
        });
      } else if (sameX(a, b)) {
        segments.push({
          connector,
          first: i,
          horizontal: false,
          fixed: a.x,
          rangeStart: Math.min(a.y, b.y),
          rangeEnd: Math.max(a.y, b.y),
        });
      }
    }
  }
  return segments;
}

/**
 * Spreads segments of different connectors that share a corridor `spacing` apart
 * around their average position. Only segments between two waypoints move; a
 * segment ending at a node centre stays put.
 */
export function separateParallelSegments(connectors: DiagramConnector[], spacing: number, gridSize: number): number {
  if (connectors.length < 2) {
    return 0;
  }

  const segments = collectCorridorSegments(connectors);
  const processed = new Set<number>();
  let moves = 0;

  for (let i = 0; i < segments.length; i += 1) {
    if (processed.has(i)) {
      continue;
    }
    const seed = segments[i];
    const cluster = [seed];
    for (let j = i + 1; j < segments.length; j += 1) {
      const other = segments[j];
      if (
        processed.has(j) ||
        other.horizontal !== seed.horizontal ||
        other.connector === seed.connector ||
        Math.abs(other.fixed - seed.fixed) > spacing * 2 ||
        other.rangeEnd < seed.rangeStart ||
        seed.rangeEnd < other.rangeStart
      ) {
        continue;
      }
      cluster.push(other);
      processed.add(j);
    }
    processed.add(i);
    if (cluster.length < 2) {
      continue;
    }

    const average = cluster.reduce((sum, segment) => sum + segment.fixed, 0) / cluster.length;
    const startOffset = average - ((cluster.length - 1) * spacing) / 2;
    cluster.forEach((segment, index) => {
      const coordinate = snapToGrid(startOffset + index * spacing, gridSize);
      if (Math.abs(coordinate - segment.fixed) < 1) {
        return;
      }
      for (const point of [segment.connector.waypoints[segment.first], segment.connector.waypoints[segment.first + 1]]) {
        if (segment.horizontal) {
          point.y = coordinate;
        } else {
          point.x = coordinate;
        }
      }
      moves += 1;
    });
  }

  return moves;
}

function optimizeRound(jobs: OptimizeJob[], options: OptimizeOptions, gridSize: number): void {
  for (const job of jobs) {
    let path: Point[] = [job.source, ...job.connector.waypoints, job.target];
    path = removeCollinearPoints(path);
    path = straightenSegments(path, options.straightenThreshold);
    path = shortenDetours(path, job.obstacles, options.margin);
    path = centerInChannels(path, job.obstacles, options.margin);
    job.connector.waypoints = path.slice(1, -1).map((point) => snapPoint(point, gridSize));
  }

  separateParallelSegments(
    jobs.map((job) => job.connector),
    options.nudgeSpacing,
    gridSize,
  );
}

function captureWaypoints(jobs: OptimizeJob[]): Point[][] {
  return jobs.map((job) => job.connector.waypoints.map((point) => ({ ...point })));
}

/**
 * Post-processes routed connectors: collinear removal, straightening, detour
 * shortening and channel centering per connector, then corridor separation across
 * connectors. Rounds repeat until the waypoints stop changing; when rounds cycle,
 * the cycle's smallest state is kept, so optimizing the result again changes
 * nothing. Returns how many connectors ended with different waypoints.
 */
export function optimizeEdgePaths(doc: DiagramDocument, options: Partial<OptimizeOptions> = {}): number {
  const resolved = resolveOptimizeOptions(options);
  const bounds = collectNodeBounds(doc);
  if (bounds.size === 0) {
    return 0;
  }
  const nodes = nodeIndex(doc);
  const gridSize = doc.gridSize > 0 ? doc.gridSize : 10;

  const jobs: OptimizeJob[] = [];
  for (const connector of doc.connectors) {
    const source = bounds.get(connector.sourceId);
    const target = bounds.get(connector.targetId);
    if (!source || !target || connector.waypoints.length === 0) {
      continue;
    }
    const excluded = new Set<string>([
      connector.sourceId,
      connector.targetId,
      ...ancestorIds(connector.sourceId, nodes),
      ...ancestorIds(connector.targetId, nodes),
    ]);
    jobs.push({
      connector,
      source: boxCenter(source),
      target: boxCenter(target),
      obstacles: [...bounds].filter(([id]) => !excluded.has(id)).map(([, box]) => box),
    });
  }

  const originals = captureWaypoints(jobs);
  const seen = [JSON.stringify(originals)];
  const states = [originals];
  for (let round = 0; round < MAX_ROUNDS; round += 1) {
    optimizeRound(jobs, resolved, gridSize);
    const current = captureWaypoints(jobs);
    const key = JSON.stringify(current);
    const repeat = seen.indexOf(key);
    if (repeat >= 0) {
      let settled = repeat;
      for (let i = repeat + 1; i < seen.length; i += 1) {
        if (seen[i] < seen[settled]) {
          settled = i;
        }
      }
      jobs.forEach((job, index) => {
        job.connector.waypoints = states[settled][index].map((point) => ({ ...point }));
      });
      break;
    }
    seen.push(key);
    states.push(current);
  }

  let modified = 0;
  jobs.forEach((job, index) => {
    if (!samePoints(job.connector.waypoints, originals[index])) {
      modified += 1;
    }
  });
  return modified;
}
