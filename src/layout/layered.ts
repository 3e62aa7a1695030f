import type {
  DiagramDocument,
  GraphEdgeInput,
  LayeredLayoutResult,
  LayeredNodeInput,
  LayeredNodePlacement,
  LayoutDirection,
  LayoutEngineConfig,
  Point,
} from "../types.js";
import { addConnector, addNode, isTopLevel, nodeIndex } from "../model/document.js";
import { DEFAULT_EDGE_STYLE, DEFAULT_NODE_STYLE, resolveLayoutEngineConfig } from "./defaults.js";
import { snapToGrid } from "./geometry.js";
import { estimateNodeSize } from "./measure.js";
import { resolveNodeOverlaps } from "./overlap.js";
import { routeDiagramConnectors } from "./router.js";

interface LayerNode {
  key: string;
  label: string;
  width: number;
  height: number;
  rank: number;
  order: number;
  x: number;
  y: number;
  virtual: boolean;
}

interface LayerEdge {
  source: number;
  target: number;
  label: string;
  reversed: boolean;
}

interface LayerGraph {
  nodes: LayerNode[];
  edges: LayerEdge[];
  /** Expanded unit-span adjacency in effective orientation. */
  predecessors: number[][];
  successors: number[][];
}

export interface LayeredLayoutOptions {
  direction?: LayoutDirection;
  config?: Partial<LayoutEngineConfig>;
  nodeStyles?: Record<string, string>;
  edgeStyle?: string;
}

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

function isVertical(direction: LayoutDirection): boolean {
  return direction === "TB" || direction === "BT";
}

function isSelfLoop(edge: LayerEdge): boolean {
  return edge.source === edge.target;
}

function effectiveSource(edge: LayerEdge): number {
  return edge.reversed ? edge.target : edge.source;
}

function effectiveTarget(edge: LayerEdge): number {
  return edge.reversed ? edge.source : edge.target;
}

function buildGraph(inputs: LayeredNodeInput[], edges: GraphEdgeInput[]): LayerGraph {
  const index = new Map<string, number>();
  const nodes: LayerNode[] = [];

  for (const input of inputs) {
    if (index.has(input.key)) {
      continue;
    }
    index.set(input.key, nodes.length);
    nodes.push({
      key: input.key,
      label: input.label,
      width: input.width,
      height: input.height,
      rank: 0,
      order: 0,
      x: 0,
      y: 0,
      virtual: false,
    });
  }

  const layerEdges: LayerEdge[] = [];
  for (const edge of edges) {
    const source = index.get(edge.source);
    const target = index.get(edge.target);
    if (source === undefined || target === undefined) {
      continue;
    }
    layerEdges.push({ source, target, label: edge.label ?? "", reversed: false });
  }

  return { nodes, edges: layerEdges, predecessors: [], successors: [] };
}

/**
 * Iterative DFS in ingestion order. An edge reaching a node still on the stack is
 * flagged as reversed; the caller-visible direction stays untouched.
 */
function markBackEdges(graph: LayerGraph): number {
  const outgoing: number[][] = graph.nodes.map(() => []);
  graph.edges.forEach((edge, edgeIndex) => {
    if (!isSelfLoop(edge)) {
      outgoing[edge.source].push(edgeIndex);
    }
  });

  const color = graph.nodes.map(() => WHITE);
  let reversedCount = 0;

  for (let start = 0; start < graph.nodes.length; start += 1) {
    if (color[start] !== WHITE) {
      continue;
    }
    color[start] = GRAY;
    const stack: Array<{ node: number; next: number }> = [{ node: start, next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const edgeIndexes = outgoing[frame.node];
      if (frame.next >= edgeIndexes.length) {
        color[frame.node] = BLACK;
        stack.pop();
        continue;
      }

      const edge = graph.edges[edgeIndexes[frame.next]];
      frame.next += 1;
      if (color[edge.target] === GRAY) {
        edge.reversed = true;
        reversedCount += 1;
      } else if (color[edge.target] === WHITE) {
        color[edge.target] = GRAY;
        stack.push({ node: edge.target, next: 0 });
      }
    }
  }

  return reversedCount;
}

function assignRanks(graph: LayerGraph): void {
  const count = graph.nodes.length;
  if (count === 0) {
    return;
  }

  const effectiveOut: number[][] = graph.nodes.map(() => []);
  const inDegree = graph.nodes.map(() => 0);
  for (const edge of graph.edges) {
    if (isSelfLoop(edge)) {
      continue;
    }
    effectiveOut[effectiveSource(edge)].push(effectiveTarget(edge));
    inDegree[effectiveTarget(edge)] += 1;
  }

  const ranks = graph.nodes.map(() => -1);
  let sources: number[] = [];
  for (let i = 0; i < count; i += 1) {
    if (inDegree[i] === 0) {
      sources.push(i);
    }
  }
  if (sources.length === 0) {
    sources = [0];
  }

  const queue: number[] = [];
  for (const source of sources) {
    ranks[source] = 0;
    queue.push(source);
  }

  let head = 0;
  while (head < queue.length) {
    const node = queue[head];
    head += 1;
    const nextRank = ranks[node] + 1;
    for (const child of effectiveOut[node]) {
      if (ranks[child] < nextRank) {
        ranks[child] = nextRank;
        queue.push(child);
      }
    }
  }

  graph.nodes.forEach((node, i) => {
    node.rank = Math.max(0, ranks[i]);
  });
}

function addVirtualNode(graph: LayerGraph, rank: number): number {
  const index = graph.nodes.length;
  graph.nodes.push({
    key: `__virtual_${index}`,
    label: "",
    width: 1,
    height: 1,
    rank,
    order: 0,
    x: 0,
    y: 0,
    virtual: true,
  });
  graph.predecessors.push([]);
  graph.successors.push([]);
  return index;
}

function link(graph: LayerGraph, from: number, to: number): void {
  graph.successors[from].push(to);
  graph.predecessors[to].push(from);
}

function insertVirtualNodes(graph: LayerGraph): number {
  graph.predecessors = graph.nodes.map(() => []);
  graph.successors = graph.nodes.map(() => []);
  let virtualCount = 0;

  for (const edge of graph.edges) {
    if (isSelfLoop(edge)) {
      continue;
    }
    const from = effectiveSource(edge);
    const to = effectiveTarget(edge);
    const fromRank = graph.nodes[from].rank;
    const toRank = graph.nodes[to].rank;

    if (toRank - fromRank <= 1) {
      link(graph, from, to);
      continue;
    }

    let previous = from;
    for (let rank = fromRank + 1; rank < toRank; rank += 1) {
      const virtualNode = addVirtualNode(graph, rank);
      virtualCount += 1;
      link(graph, previous, virtualNode);
      previous = virtualNode;
    }
    link(graph, previous, to);
  }

  return virtualCount;
}

function groupByRank(graph: LayerGraph): number[][] {
  const maxRank = graph.nodes.reduce((max, node) => Math.max(max, node.rank), 0);
  const byRank: number[][] = Array.from({ length: maxRank + 1 }, () => []);
  graph.nodes.forEach((node, i) => {
    byRank[node.rank].push(i);
  });
  for (const rankNodes of byRank) {
    rankNodes.forEach((nodeIndexInRank, order) => {
      graph.nodes[nodeIndexInRank].order = order;
    });
  }
  return byRank;
}

function barycenterSort(rankNodes: number[], nodes: LayerNode[], neighbors: number[][]): void {
  const barycenter = new Map<number, number>();
  for (const index of rankNodes) {
    const adjacent = neighbors[index];
    if (adjacent.length === 0) {
      barycenter.set(index, nodes[index].order);
      continue;
    }
    const sum = adjacent.reduce((total, neighbor) => total + nodes[neighbor].order, 0);
    barycenter.set(index, sum / adjacent.length);
  }

  // Array#sort is stable, ties keep their previous order.
  rankNodes.sort((a, b) => (barycenter.get(a) ?? 0) - (barycenter.get(b) ?? 0));
  rankNodes.forEach((index, order) => {
    nodes[index].order = order;
  });
}

function minimizeCrossings(graph: LayerGraph, byRank: number[][], sweeps: number): void {
  const maxRank = byRank.length - 1;
  for (let sweep = 0; sweep < sweeps; sweep += 1) {
    for (let rank = 1; rank <= maxRank; rank += 1) {
      barycenterSort(byRank[rank], graph.nodes, graph.predecessors);
    }
    for (let rank = maxRank - 1; rank >= 0; rank -= 1) {
      barycenterSort(byRank[rank], graph.nodes, graph.successors);
    }
  }
}

function equalizeRankSizes(graph: LayerGraph, byRank: number[][], direction: LayoutDirection): void {
  const vertical = isVertical(direction);
  for (const rankNodes of byRank) {
    const real = rankNodes.map((index) => graph.nodes[index]).filter((node) => !node.virtual);
    if (real.length === 0) {
      continue;
    }
    if (vertical) {
      const height = Math.max(...real.map((node) => node.height));
      real.forEach((node) => {
        node.height = height;
      });
    } else {
      const width = Math.max(...real.map((node) => node.width));
      real.forEach((node) => {
        node.width = width;
      });
    }
  }
}

function assignCoordinates(
  graph: LayerGraph,
  byRank: number[][],
  config: LayoutEngineConfig,
  direction: LayoutDirection,
): void {
  const vertical = isVertical(direction);
  const primarySize = (node: LayerNode): number => (vertical ? node.height : node.width);
  const crossSize = (node: LayerNode): number => (vertical ? node.width : node.height);
  const realNodes = byRank.map((rankNodes) =>
    rankNodes.map((index) => graph.nodes[index]).filter((node) => !node.virtual),
  );

  const crossExtent = realNodes.map((nodes) =>
    nodes.length === 0
      ? 0
      : nodes.reduce((sum, node) => sum + crossSize(node), 0) + (nodes.length - 1) * config.nodeSpacing,
  );
  const widest = Math.max(0, ...crossExtent);

  const rankOffsets: number[] = new Array<number>(byRank.length).fill(0);
  const walk = byRank.map((_, rank) => rank);
  if (direction === "BT" || direction === "RL") {
    walk.reverse();
  }
  let cumulative = vertical ? config.startY : config.startX;
  for (const rank of walk) {
    rankOffsets[rank] = cumulative;
    const nodes = realNodes[rank];
    const extent =
      nodes.length > 0
        ? Math.max(...nodes.map(primarySize))
        : vertical
          ? config.defaultHeight
          : config.defaultWidth;
    cumulative += extent + config.rankSpacing;
  }

  byRank.forEach((rankNodes, rank) => {
    let cursor = (vertical ? config.startX : config.startY) + (widest - crossExtent[rank]) / 2;
    for (const index of rankNodes) {
      const node = graph.nodes[index];
      if (vertical) {
        node.x = cursor;
        node.y = rankOffsets[rank];
      } else {
        node.x = rankOffsets[rank];
        node.y = cursor;
      }
      if (!node.virtual) {
        cursor += crossSize(node) + config.nodeSpacing;
      }
    }
  });
}

/**
 * Layered (Sugiyama) layout of a directed graph. Edges naming an unknown key are
 * ignored; self-loops take no part in ranking or ordering.
 */
export function computeLayeredLayout(
  nodes: LayeredNodeInput[],
  edges: GraphEdgeInput[],
  config: LayoutEngineConfig,
  direction: LayoutDirection = "TB",
): LayeredLayoutResult {
  const graph = buildGraph(nodes, edges);
  if (graph.nodes.length === 0) {
    return {
      placements: new Map(),
      maxRank: 0,
      backEdgeCount: 0,
      virtualNodeCount: 0,
      overlapConverged: true,
    };
  }

  const backEdgeCount = markBackEdges(graph);
  assignRanks(graph);
  const virtualNodeCount = insertVirtualNodes(graph);
  const byRank = groupByRank(graph);
  minimizeCrossings(graph, byRank, config.barycenterSweeps);
  equalizeRankSizes(graph, byRank, direction);
  assignCoordinates(graph, byRank, config, direction);

  const real = graph.nodes.filter((node) => !node.virtual);
  const overlap = resolveNodeOverlaps(real, {
    margin: config.overlapPadding,
    maxIterations: config.maxOverlapIterations,
    gridSize: config.gridSize,
  });

  const placements = new Map<string, LayeredNodePlacement>();
  for (const node of real) {
    placements.set(node.key, {
      key: node.key,
      rank: node.rank,
      order: node.order,
      x: node.x,
      y: node.y,
      width: node.width,
      height: node.height,
    });
  }

  return {
    placements,
    maxRank: byRank.length - 1,
    backEdgeCount,
    virtualNodeCount,
    overlapConverged: overlap.converged,
  };
}

function collectLabels(edges: GraphEdgeInput[]): string[] {
  const seen = new Set<string>();
  const labels: string[] = [];
  for (const edge of edges) {
    for (const label of [edge.source, edge.target]) {
      if (!seen.has(label)) {
        seen.add(label);
        labels.push(label);
      }
    }
  }
  return labels;
}

/**
 * Lays out the graph described by `edges` and adds one node per label and one
 * connector per edge to the document. Returns label -> node id.
 */
export function layoutLayered(
  doc: DiagramDocument,
  edges: GraphEdgeInput[],
  options: LayeredLayoutOptions = {},
): Record<string, string> {
  const config = resolveLayoutEngineConfig({ gridSize: doc.gridSize, ...options.config });
  const direction = options.direction ?? "TB";
  const styles = options.nodeStyles ?? {};

  const inputs: LayeredNodeInput[] = collectLabels(edges).map((label) => {
    const size = estimateNodeSize(label, config.defaultWidth, config.defaultHeight);
    return { key: label, label, width: size.width, height: size.height };
  });
  const result = computeLayeredLayout(inputs, edges, config, direction);

  const labelToId: Record<string, string> = {};
  for (const input of inputs) {
    const placement = result.placements.get(input.key);
    if (!placement) {
      continue;
    }
    labelToId[input.key] = addNode(doc, {
      label: input.label,
      x: snapToGrid(placement.x, config.gridSize),
      y: snapToGrid(placement.y, config.gridSize),
      width: placement.width,
      height: placement.height,
      style: styles[input.key] ?? DEFAULT_NODE_STYLE,
    });
  }

  for (const edge of edges) {
    const sourceId = labelToId[edge.source];
    const targetId = labelToId[edge.target];
    if (!sourceId || !targetId) {
      continue;
    }
    addConnector(doc, {
      sourceId,
      targetId,
      label: edge.label ?? "",
      style: options.edgeStyle ?? DEFAULT_EDGE_STYLE,
    });
  }

  if (config.routeEdges) {
    routeDiagramConnectors(doc, config.edgeMargin);
  }

  return labelToId;
}

function relayoutGrid(doc: DiagramDocument, ids: string[], config: LayoutEngineConfig): Record<string, Point> {
  const nodes = nodeIndex(doc);
  const columns = Math.max(1, Math.floor(Math.sqrt(ids.length)));
  const moved: Record<string, Point> = {};

  ids.forEach((id, i) => {
    const node = nodes.get(id);
    if (!node) {
      return;
    }
    const column = i % columns;
    const row = Math.floor(i / columns);
    node.x = snapToGrid(config.startX + column * (node.width + config.nodeSpacing), config.gridSize);
    node.y = snapToGrid(config.startY + row * (node.height + config.rankSpacing), config.gridSize);
    moved[id] = { x: node.x, y: node.y };
  });

  return moved;
}

/**
 * Re-runs the layered layout over the top-level nodes of an existing document,
 * using its connectors as the edge list. Nested nodes move with their container.
 * A `gridSize` override becomes the document's grid.
 */
export function relayoutDiagram(
  doc: DiagramDocument,
  options: { direction?: LayoutDirection; config?: Partial<LayoutEngineConfig> } = {},
): Record<string, Point> {
  const config = resolveLayoutEngineConfig({ ...options.config, gridSize: options.config?.gridSize ?? doc.gridSize });
  doc.gridSize = config.gridSize;
  const nodes = nodeIndex(doc);
  const topLevel = doc.nodes.filter((node) => isTopLevel(node, nodes));
  if (topLevel.length === 0) {
    return {};
  }

  const topLevelIds = new Set(topLevel.map((node) => node.id));
  const edges: GraphEdgeInput[] = doc.connectors
    .filter((connector) => topLevelIds.has(connector.sourceId) && topLevelIds.has(connector.targetId))
    .map((connector) => ({ source: connector.sourceId, target: connector.targetId, label: connector.label }));

  if (edges.length === 0) {
    return relayoutGrid(
      doc,
      topLevel.map((node) => node.id),
      config,
    );
  }

  const inputs: LayeredNodeInput[] = topLevel.map((node) => ({
    key: node.id,
    label: node.label,
    width: node.width,
    height: node.height,
  }));
  const result = computeLayeredLayout(inputs, edges, config, options.direction ?? "TB");

  const moved: Record<string, Point> = {};
  for (const node of topLevel) {
    const placement = result.placements.get(node.id);
    if (!placement) {
      continue;
    }
    node.x = snapToGrid(placement.x, config.gridSize);
    node.y = snapToGrid(placement.y, config.gridSize);
    node.width = placement.width;
    node.height = placement.height;
    moved[node.id] = { x: node.x, y: node.y };
  }

  if (config.routeEdges) {
    routeDiagramConnectors(doc, config.edgeMargin);
  }

  return moved;
}
