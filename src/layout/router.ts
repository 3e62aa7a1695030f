import type { BoundingBox, DiagramDocument, Point, RouterOptions } from "../types.js";
import { ancestorIds, collectNodeBounds, nodeIndex } from "../model/document.js";
import { resolveRouterOptions } from "./defaults.js";
import {
  anyObstacleOnLine,
  boxBottom,
  boxCenter,
  boxRight,
  expandBox,
  pointStrictlyInside,
  segmentEntersBox,
  snapDownToGrid,
  snapPoint,
  snapToGrid,
  snapUpToGrid,
} from "./geometry.js";
import { MinHeap } from "./heap.js";

interface GridState {
  xi: number;
  yi: number;
}

interface SearchEntry {
  state: number;
  g: number;
}

// right, left, down, up
const MOVES: Array<[number, number]> = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

function sortedUnique(values: number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

function buildGridLines(
  source: BoundingBox,
  target: BoundingBox,
  obstacles: BoundingBox[],
  margin: number,
  gridSize: number,
): { xs: number[]; ys: number[] } {
  const sourceCenter = boxCenter(source);
  const targetCenter = boxCenter(target);
  const xs = [sourceCenter.x, targetCenter.x];
  const ys = [sourceCenter.y, targetCenter.y];

  for (const box of [...obstacles, source, target]) {
    xs.push(snapDownToGrid(box.x - margin, gridSize));
    xs.push(snapUpToGrid(boxRight(box) + margin, gridSize));
    ys.push(snapDownToGrid(box.y - margin, gridSize));
    ys.push(snapUpToGrid(boxBottom(box) + margin, gridSize));
  }

  return { xs: sortedUnique(xs), ys: sortedUnique(ys) };
}

/**
 * Drops interior points that continue straight on, then the two end points.
 */
export function simplifyPath(path: Point[]): Point[] {
  if (path.length <= 2) {
    return [];
  }

  const kept: Point[] = [];
  for (let i = 1; i < path.length - 1; i += 1) {
    const prev = path[i - 1];
    const current = path[i];
    const next = path[i + 1];
    const horizontalIn = Math.abs(current.x - prev.x) > 0.5;
    const verticalIn = Math.abs(current.y - prev.y) > 0.5;
    const horizontalOut = Math.abs(next.x - current.x) > 0.5;
    const verticalOut = Math.abs(next.y - current.y) > 0.5;
    if ((horizontalIn && verticalOut) || (verticalIn && horizontalOut)) {
      kept.push(current);
    }
  }
  return kept;
}

export function fallbackRoute(
  source: BoundingBox,
  target: BoundingBox,
  obstacles: BoundingBox[],
  margin: number,
  gridSize: number,
): Point[] {
  const start = boxCenter(source);
  const end = boxCenter(target);

  if (Math.abs(end.x - start.x) >= Math.abs(end.y - start.y)) {
    const above = obstacles.length > 0 ? Math.min(...obstacles.map((box) => box.y)) - margin * 2 : start.y;
    const below = obstacles.length > 0 ? Math.max(...obstacles.map(boxBottom)) + margin * 2 : start.y;
    const midY = (start.y + end.y) / 2;
    const routeY = Math.abs(above - midY) < Math.abs(below - midY) ? above : below;
    return [
      { x: snapToGrid(start.x, gridSize), y: snapToGrid(routeY, gridSize) },
      { x: snapToGrid(end.x, gridSize), y: snapToGrid(routeY, gridSize) },
    ];
  }

  const left = obstacles.length > 0 ? Math.min(...obstacles.map((box) => box.x)) - margin * 2 : start.x;
  const right = obstacles.length > 0 ? Math.max(...obstacles.map(boxRight)) + margin * 2 : start.x;
  const midX = (start.x + end.x) / 2;
  const routeX = Math.abs(left - midX) < Math.abs(right - midX) ? left : right;
  return [
    { x: snapToGrid(routeX, gridSize), y: snapToGrid(start.y, gridSize) },
    { x: snapToGrid(routeX, gridSize), y: snapToGrid(end.y, gridSize) },
  ];
}

/**
 * Orthogonal route from the centre of `source` to the centre of `target` that keeps
 * `margin` clear of every obstacle. Returns intermediate waypoints only; an empty
 * list means the straight centre line is already clear.
 */
export function routeOrthogonal(
  source: BoundingBox,
  target: BoundingBox,
  obstacles: BoundingBox[],
  margin: number,
  gridSize: number,
  options: Partial<RouterOptions> = {},
): Point[] {
  const { bendPenalty, maxExpansions } = resolveRouterOptions(options);
  const start = boxCenter(source);
  const end = boxCenter(target);

  if (!anyObstacleOnLine(start, end, obstacles, margin)) {
    return [];
  }

  const { xs, ys } = buildGridLines(source, target, obstacles, margin, gridSize);
  const expanded = obstacles.map((box) => expandBox(box, margin));
  const width = xs.length;
  const stateOf = (xi: number, yi: number): number => yi * width + xi;
  const gridOf = (state: number): GridState => ({ xi: state % width, yi: Math.floor(state / width) });
  const pointOf = (state: number): Point => {
    const { xi, yi } = gridOf(state);
    return { x: xs[xi], y: ys[yi] };
  };

  const blocked = (point: Point): boolean => expanded.some((box) => pointStrictlyInside(box, point));
  const moveBlocked = (a: Point, b: Point): boolean => expanded.some((box) => segmentEntersBox(a, b, box));

  const closestState = (point: Point): number | undefined => {
    let best: number | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (let xi = 0; xi < xs.length; xi += 1) {
      for (let yi = 0; yi < ys.length; yi += 1) {
        const candidate = { x: xs[xi], y: ys[yi] };
        if (blocked(candidate)) {
          continue;
        }
        const distance = Math.abs(candidate.x - point.x) + Math.abs(candidate.y - point.y);
        if (distance < bestDistance) {
          bestDistance = distance;
          best = stateOf(xi, yi);
        }
      }
    }
    return best;
  };

  const startState = closestState(start);
  const goalState = closestState(end);
  if (startState === undefined || goalState === undefined) {
    return fallbackRoute(source, target, obstacles, margin, gridSize);
  }
  if (startState === goalState) {
    return [];
  }

  const goal = pointOf(goalState);
  const heuristic = (point: Point): number => Math.abs(point.x - goal.x) + Math.abs(point.y - goal.y);

  const open = new MinHeap<SearchEntry>();
  const gScore = new Map<number, number>([[startState, 0]]);
  const parent = new Map<number, number>();
  open.push(heuristic(pointOf(startState)), { state: startState, g: 0 });

  let expansions = 0;
  let found = false;
  while (open.size > 0) {
    const entry = open.pop();
    if (!entry) {
      break;
    }
    if (entry.g > (gScore.get(entry.state) ?? Number.POSITIVE_INFINITY)) {
      continue;
    }
    if (entry.state === goalState) {
      found = true;
      break;
    }
    expansions += 1;
    if (expansions > maxExpansions) {
      break;
    }

    const { xi, yi } = gridOf(entry.state);
    const here = pointOf(entry.state);
    const from = parent.get(entry.state);
    const incoming = from === undefined ? undefined : gridOf(from);

    for (const [dx, dy] of MOVES) {
      const nxi = xi + dx;
      const nyi = yi + dy;
      if (nxi < 0 || nxi >= xs.length || nyi < 0 || nyi >= ys.length) {
        continue;
      }
      const next = { x: xs[nxi], y: ys[nyi] };
      if (moveBlocked(here, next)) {
        continue;
      }

      let cost = Math.abs(next.x - here.x) + Math.abs(next.y - here.y);
      if (incoming && (xi - incoming.xi !== dx || yi - incoming.yi !== dy)) {
        cost += bendPenalty;
      }

      const tentative = entry.g + cost;
      const neighbor = stateOf(nxi, nyi);
      if (tentative < (gScore.get(neighbor) ?? Number.POSITIVE_INFINITY)) {
        gScore.set(neighbor, tentative);
        parent.set(neighbor, entry.state);
        open.push(tentative + heuristic(next), { state: neighbor, g: tentative });
      }
    }
  }

  if (!found) {
    return fallbackRoute(source, target, obstacles, margin, gridSize);
  }

  const path: Point[] = [];
  let cursor: number | undefined = goalState;
  while (cursor !== undefined) {
    path.push(pointOf(cursor));
    cursor = parent.get(cursor);
  }
  path.reverse();

  return simplifyPath(path).map((point) => snapPoint(point, gridSize));
}

/**
 * Routes every connector of the document around all other nodes. Containers that
 * hold either endpoint are not treated as obstacles. Returns the number routed.
 */
export function routeDiagramConnectors(
  doc: DiagramDocument,
  margin = 15,
  options: Partial<RouterOptions> = {},
): number {
  const bounds = collectNodeBounds(doc);
  if (bounds.size === 0) {
    return 0;
  }
  const nodes = nodeIndex(doc);

  let routed = 0;
  for (const connector of doc.connectors) {
    const source = bounds.get(connector.sourceId);
    const target = bounds.get(connector.targetId);
    if (!source || !target) {
      continue;
    }

    const excluded = new Set<string>([
      connector.sourceId,
      connector.targetId,
      ...ancestorIds(connector.sourceId, nodes),
      ...ancestorIds(connector.targetId, nodes),
    ]);
    const obstacles: BoundingBox[] = [];
    for (const [id, box] of bounds) {
      if (!excluded.has(id)) {
        obstacles.push(box);
      }
    }

    connector.waypoints = routeOrthogonal(source, target, obstacles, margin, doc.gridSize, options);
    routed += 1;
  }

  return routed;
}
