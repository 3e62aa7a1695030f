import type {
  ArrangeConfig,
  BoundingBox,
  DiagramDocument,
  LayoutDirection,
  NodeSide,
  PortAnchor,
  PortMode,
  PortPair,
} from "../types.js";
import { addConnector, addNode, collectNodeBounds } from "../model/document.js";
import {
  DEFAULT_CHAIN_EDGE_STYLE,
  DEFAULT_NODE_STYLE,
  DEFAULT_TREE_EDGE_STYLE,
  resolveArrangeConfig,
} from "./defaults.js";
import { boxCenter, snapToGrid } from "./geometry.js";

export interface ArrangeOptions {
  style?: string;
  config?: Partial<ArrangeConfig>;
}

export interface TreeOptions extends ArrangeOptions {
  edgeStyle?: string;
  direction?: LayoutDirection;
}

export interface ConnectionRef {
  sourceId: string;
  targetId: string;
}

const PORT_EDGE_INSET = 0.15;
const MIN_DISTRIBUTION_GAP = 10;

export function arrangeRow(
  doc: DiagramDocument,
  labels: string[],
  options: ArrangeOptions & { y?: number } = {},
): string[] {
  const config = resolveArrangeConfig(options.config);
  const y = snapToGrid(options.y ?? config.startY, config.gridSize);
  return labels.map((label, i) =>
    addNode(doc, {
      label,
      x: snapToGrid(config.startX + i * (config.defaultWidth + config.hSpacing), config.gridSize),
      y,
      width: config.defaultWidth,
      height: config.defaultHeight,
      style: options.style ?? DEFAULT_NODE_STYLE,
    }),
  );
}

export function arrangeColumn(
  doc: DiagramDocument,
  labels: string[],
  options: ArrangeOptions & { x?: number } = {},
): string[] {
  const config = resolveArrangeConfig(options.config);
  const x = snapToGrid(options.x ?? config.startX, config.gridSize);
  return labels.map((label, i) =>
    addNode(doc, {
      label,
      x,
      y: snapToGrid(config.startY + i * (config.defaultHeight + config.vSpacing), config.gridSize),
      width: config.defaultWidth,
      height: config.defaultHeight,
      style: options.style ?? DEFAULT_NODE_STYLE,
    }),
  );
}

export function arrangeGrid(
  doc: DiagramDocument,
  labels: string[],
  columns = 3,
  options: ArrangeOptions = {},
): string[] {
  const config = resolveArrangeConfig(options.config);
  const perRow = Math.max(1, Math.floor(columns));
  return labels.map((label, i) => {
    const column = i % perRow;
    const row = Math.floor(i / perRow);
    return addNode(doc, {
      label,
      x: snapToGrid(config.startX + column * (config.defaultWidth + config.hSpacing), config.gridSize),
      y: snapToGrid(config.startY + row * (config.defaultHeight + config.vSpacing), config.gridSize),
      width: config.defaultWidth,
      height: config.defaultHeight,
      style: options.style ?? DEFAULT_NODE_STYLE,
    });
  });
}

function sortByBarycenter(level: string[], neighbors: (label: string) => string[], position: Map<string, number>): void {
  const barycenter = new Map<string, number>();
  level.forEach((label, index) => {
    const placed = neighbors(label).filter((neighbor) => position.has(neighbor));
    if (placed.length === 0) {
      barycenter.set(label, position.get(label) ?? index);
      return;
    }
    barycenter.set(label, placed.reduce((sum, neighbor) => sum + (position.get(neighbor) ?? 0), 0) / placed.length);
  });
  level.sort((a, b) => (barycenter.get(a) ?? 0) - (barycenter.get(b) ?? 0));
  level.forEach((label, index) => {
    position.set(label, index);
  });
}

/**
 * Places a tree breadth-first from `root`, one level per rank, with one barycenter
 * sweep down and one back up. Returns label -> node id.
 */
export function arrangeTree(
  doc: DiagramDocument,
  adjacency: Record<string, string[]>,
  root: string,
  options: TreeOptions = {},
): Record<string, string> {
  const config = resolveArrangeConfig(options.config);
  const direction = options.direction ?? "TB";

  const levelOf = new Map<string, number>([[root, 0]]);
  const queue = [root];
  let head = 0;
  while (head < queue.length) {
    const label = queue[head];
    head += 1;
    for (const child of adjacency[label] ?? []) {
      if (!levelOf.has(child)) {
        levelOf.set(child, (levelOf.get(label) ?? 0) + 1);
        queue.push(child);
      }
    }
  }

  const maxLevel = Math.max(...levelOf.values());
  const levels: string[][] = Array.from({ length: maxLevel + 1 }, () => []);
  for (const [label, level] of levelOf) {
    levels[level].push(label);
  }

  const parents = new Map<string, string[]>();
  for (const [parent, children] of Object.entries(adjacency)) {
    for (const child of children) {
      const list = parents.get(child) ?? [];
      list.push(parent);
      parents.set(child, list);
    }
  }

  const position = new Map<string, number>();
  levels[0].forEach((label, index) => {
    position.set(label, index);
  });
  for (let level = 1; level <= maxLevel; level += 1) {
    sortByBarycenter(levels[level], (label) => parents.get(label) ?? [], position);
  }
  for (let level = maxLevel - 1; level >= 0; level -= 1) {
    sortByBarycenter(levels[level], (label) => adjacency[label] ?? [], position);
  }

  const vertical = direction === "TB" || direction === "BT";
  const crossSize = vertical ? config.defaultWidth : config.defaultHeight;
  const crossGap = vertical ? config.hSpacing : config.vSpacing;
  const levelStep = vertical ? config.defaultHeight + config.vSpacing : config.defaultWidth + config.hSpacing;
  const widest = Math.max(...levels.map((level) => level.length));
  const widestExtent = widest * crossSize + (widest - 1) * crossGap;

  const labelToId: Record<string, string> = {};
  levels.forEach((labels, level) => {
    const extent = labels.length * crossSize + (labels.length - 1) * crossGap;
    const offset = (widestExtent - extent) / 2;
    const step = direction === "BT" || direction === "RL" ? maxLevel - level : level;

    labels.forEach((label, i) => {
      const cross = offset + i * (crossSize + crossGap);
      const x = vertical ? config.startX + cross : config.startX + step * levelStep;
      const y = vertical ? config.startY + step * levelStep : config.startY + cross;
      labelToId[label] = addNode(doc, {
        label,
        x: snapToGrid(x, config.gridSize),
        y: snapToGrid(y, config.gridSize),
        width: config.defaultWidth,
        height: config.defaultHeight,
        style: options.style ?? DEFAULT_NODE_STYLE,
      });
    });
  });

  for (const [parent, children] of Object.entries(adjacency)) {
    for (const child of children) {
      const sourceId = labelToId[parent];
      const targetId = labelToId[child];
      if (sourceId && targetId) {
        addConnector(doc, { sourceId, targetId, style: options.edgeStyle ?? DEFAULT_TREE_EDGE_STYLE });
      }
    }
  }

  return labelToId;
}

export function connectChain(
  doc: DiagramDocument,
  ids: string[],
  options: { style?: string; labels?: string[] } = {},
): string[] {
  const connectorIds: string[] = [];
  for (let i = 0; i < ids.length - 1; i += 1) {
    connectorIds.push(
      addConnector(doc, {
        sourceId: ids[i],
        targetId: ids[i + 1],
        label: options.labels?.[i] ?? "",
        style: options.style ?? DEFAULT_CHAIN_EDGE_STYLE,
      }),
    );
  }
  return connectorIds;
}

export function chooseBestPorts(source: BoundingBox, target: BoundingBox, mode: PortMode = "auto"): PortPair {
  const from = boxCenter(source);
  const to = boxCenter(target);
  const dx = to.x - from.x;
  const dy = to.y - from.y;

  let resolved = mode;
  if (resolved === "auto") {
    if (Math.abs(dx) > Math.abs(dy) * 1.5) {
      resolved = "horizontal";
    } else if (Math.abs(dy) > Math.abs(dx) * 1.5) {
      resolved = "vertical";
    } else {
      resolved = Math.abs(dy) >= Math.abs(dx) ? "vertical" : "horizontal";
    }
  }

  if (resolved === "horizontal") {
    return dx >= 0
      ? { exit: { x: 1, y: 0.5 }, entry: { x: 0, y: 0.5 } }
      : { exit: { x: 0, y: 0.5 }, entry: { x: 1, y: 0.5 } };
  }
  return dy >= 0
    ? { exit: { x: 0.5, y: 1 }, entry: { x: 0.5, y: 0 } }
    : { exit: { x: 0.5, y: 0 }, entry: { x: 0.5, y: 1 } };
}

function connectionSides(source: BoundingBox, target: BoundingBox): [NodeSide, NodeSide] {
  const from = boxCenter(source);
  const to = boxCenter(target);
  const dx = to.x - from.x;
  const dy = to.y - from.y;

  if (Math.abs(dx) > Math.abs(dy) * 1.2) {
    return dx >= 0 ? ["right", "left"] : ["left", "right"];
  }
  return dy >= 0 ? ["bottom", "top"] : ["top", "bottom"];
}

function sidePort(side: NodeSide, count: number, index: number): PortAnchor {
  const t = count <= 1 ? 0.5 : PORT_EDGE_INSET + ((1 - 2 * PORT_EDGE_INSET) * index) / (count - 1);
  switch (side) {
    case "top":
      return { x: t, y: 0 };
    case "bottom":
      return { x: t, y: 1 };
    case "left":
      return { x: 0, y: t };
    case "right":
      return { x: 1, y: t };
  }
}

function siblingSortKey(box: BoundingBox | undefined, side: NodeSide): number {
  if (!box) {
    return 0;
  }
  const center = boxCenter(box);
  return side === "top" || side === "bottom" ? center.x : center.y;
}

function groupBySide(keys: string[]): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  keys.forEach((key, index) => {
    const group = groups.get(key) ?? [];
    group.push(index);
    groups.set(key, group);
  });
  return groups;
}

/**
 * Port anchors for a batch of connections. Connections that leave (or enter) the
 * same side of the same node are spread along that side, ordered by the position of
 * the node at their other end.
 */
export function distributePortsForBatch(connections: ConnectionRef[], bounds: Map<string, BoundingBox>): PortPair[] {
  if (connections.length === 0) {
    return [];
  }

  const sides = connections.map((connection): [NodeSide, NodeSide] => {
    const source = bounds.get(connection.sourceId);
    const target = bounds.get(connection.targetId);
    return source && target ? connectionSides(source, target) : ["right", "left"];
  });

  const exitGroups = groupBySide(connections.map((connection, i) => `${connection.sourceId}\u0000${sides[i][0]}`));
  const entryGroups = groupBySide(connections.map((connection, i) => `${connection.targetId}\u0000${sides[i][1]}`));

  const exitRank = new Map<number, { index: number; count: number }>();
  for (const members of exitGroups.values()) {
    const side = sides[members[0]][0];
    const ordered = [...members].sort(
      (a, b) =>
        siblingSortKey(bounds.get(connections[a].targetId), side) -
        siblingSortKey(bounds.get(connections[b].targetId), side),
    );
    ordered.forEach((member, index) => exitRank.set(member, { index, count: ordered.length }));
  }

  const entryRank = new Map<number, { index: number; count: number }>();
  for (const members of entryGroups.values()) {
    const side = sides[members[0]][1];
    const ordered = [...members].sort(
      (a, b) =>
        siblingSortKey(bounds.get(connections[a].sourceId), side) -
        siblingSortKey(bounds.get(connections[b].sourceId), side),
    );
    ordered.forEach((member, index) => entryRank.set(member, { index, count: ordered.length }));
  }

  return connections.map((_, i) => {
    const exit = exitRank.get(i) ?? { index: 0, count: 1 };
    const entry = entryRank.get(i) ?? { index: 0, count: 1 };
    return {
      exit: sidePort(sides[i][0], exit.count, exit.index),
      entry: sidePort(sides[i][1], entry.count, entry.index),
    };
  });
}

/**
 * Writes distributed exit and entry anchors onto every connector whose endpoints are
 * known. Returns the number of connectors updated.
 */
export function applyPortDistribution(doc: DiagramDocument): number {
  const bounds = collectNodeBounds(doc);
  const connectors = doc.connectors.filter(
    (connector) => bounds.has(connector.sourceId) && bounds.has(connector.targetId),
  );
  const ports = distributePortsForBatch(connectors, bounds);
  connectors.forEach((connector, i) => {
    connector.exitPort = ports[i].exit;
    connector.entryPort = ports[i].entry;
  });
  return connectors.length;
}

export function distributeEvenly(sizes: number[], start: number, end: number): number[] {
  if (sizes.length === 0) {
    return [];
  }
  if (sizes.length === 1) {
    return [start];
  }

  const free = end - start - sizes.reduce((sum, size) => sum + size, 0);
  const gap = Math.max(free / (sizes.length - 1), MIN_DISTRIBUTION_GAP);
  const positions: number[] = [];
  let cursor = start;
  for (const size of sizes) {
    positions.push(cursor);
    cursor += size + gap;
  }
  return positions;
}
