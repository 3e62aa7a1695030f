import yaml from "js-yaml";
import type {
  DiagramConnector,
  DiagramDocument,
  DiagramNode,
  GraphEdgeInput,
  GraphSource,
  LayoutDirection,
  LayoutEngineConfig,
  Point,
  PortAnchor,
} from "../types.js";
import { DEFAULT_EDGE_STYLE, DEFAULT_NODE_STYLE, emptyDocument } from "../layout/defaults.js";

type RawRecord = Record<string, unknown>;

const DIRECTIONS: LayoutDirection[] = ["TB", "BT", "LR", "RL"];

const NUMERIC_CONFIG_KEYS = [
  "rankSpacing",
  "nodeSpacing",
  "defaultWidth",
  "defaultHeight",
  "gridSize",
  "maxOverlapIterations",
  "overlapPadding",
  "barycenterSweeps",
  "edgeMargin",
  "startX",
  "startY",
] as const;

function asNumber(input: unknown): number | undefined {
  return typeof input === "number" && Number.isFinite(input) ? input : undefined;
}

function asString(input: unknown): string | undefined {
  if (typeof input === "string") {
    return input;
  }
  if (typeof input === "number" && Number.isFinite(input)) {
    return String(input);
  }
  return undefined;
}

function isRecord(input: unknown): input is RawRecord {
  return Boolean(input) && typeof input === "object" && !Array.isArray(input);
}

function loadRecord(raw: string, what: string): RawRecord {
  const loaded = yaml.load(raw);
  if (loaded === undefined || loaded === null) {
    return {};
  }
  if (!isRecord(loaded)) {
    throw new Error(`${what} must be a mapping at the top level`);
  }
  return loaded;
}

function requireNumber(input: unknown, field: string): number {
  const value = asNumber(input);
  if (value === undefined) {
    throw new Error(`${field} must be a finite number`);
  }
  return value;
}

export function parseDirection(input: unknown, field = "direction"): LayoutDirection {
  if (input === undefined || input === null) {
    return "TB";
  }
  const text = String(input).trim().toUpperCase();
  const found = DIRECTIONS.find((direction) => direction === text);
  if (!found) {
    throw new Error(`${field} must be one of ${DIRECTIONS.join(", ")} (got ${String(input)})`);
  }
  return found;
}

function parseEdge(input: unknown, index: number): GraphEdgeInput {
  const field = `edges[${index}]`;

  if (Array.isArray(input)) {
    const source = asString(input[0]);
    const target = asString(input[1]);
    if (!source || !target) {
      throw new Error(`${field} must be [source, target] or [source, target, label]`);
    }
    const label = asString(input[2]);
    return label ? { source, target, label } : { source, target };
  }

  if (isRecord(input)) {
    const source = asString(input.source ?? input.from);
    const target = asString(input.target ?? input.to);
    if (!source) {
      throw new Error(`${field}.source is required`);
    }
    if (!target) {
      throw new Error(`${field}.target is required`);
    }
    const label = asString(input.label);
    return label ? { source, target, label } : { source, target };
  }

  throw new Error(`${field} must be a list or a mapping`);
}

export function parseLayoutConfig(input: unknown, field = "config"): Partial<LayoutEngineConfig> {
  if (input === undefined || input === null) {
    return {};
  }
  if (!isRecord(input)) {
    throw new Error(`${field} must be a mapping`);
  }

  const config: Partial<LayoutEngineConfig> = {};
  for (const key of NUMERIC_CONFIG_KEYS) {
    if (input[key] !== undefined) {
      config[key] = requireNumber(input[key], `${field}.${key}`);
    }
  }
  if (input.routeEdges !== undefined) {
    if (typeof input.routeEdges !== "boolean") {
      throw new Error(`${field}.routeEdges must be true or false`);
    }
    config.routeEdges = input.routeEdges;
  }
  return config;
}

function parseStringMap(input: unknown, field: string): Record<string, string> {
  if (input === undefined || input === null) {
    return {};
  }
  if (!isRecord(input)) {
    throw new Error(`${field} must be a mapping`);
  }
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(input)) {
    const text = asString(value);
    if (text === undefined) {
      throw new Error(`${field}.${key} must be a string`);
    }
    out[key] = text;
  }
  return out;
}

/**
 * Parses a graph file (YAML or JSON):
 *
 * ```yaml
 * direction: LR
 * edges:
 *   - [Client, Gateway, request]
 *   - { source: Gateway, target: Store }
 * nodeStyles: { Store: "shape=cylinder;" }
 * config: { rankSpacing: 120 }
 * ```
 */
export function loadGraphSource(raw: string): GraphSource {
  const loaded = loadRecord(raw, "graph file");

  const rawEdges = loaded.edges ?? [];
  if (!Array.isArray(rawEdges)) {
    throw new Error("edges must be a list");
  }

  const source: GraphSource = {
    direction: parseDirection(loaded.direction),
    edges: rawEdges.map((edge, index) => parseEdge(edge, index)),
    nodeStyles: parseStringMap(loaded.nodeStyles, "nodeStyles"),
    config: parseLayoutConfig(loaded.config),
  };
  const edgeStyle = asString(loaded.edgeStyle);
  if (edgeStyle) {
    source.edgeStyle = edgeStyle;
  }
  return source;
}

function parsePoint(input: unknown, field: string): Point {
  if (Array.isArray(input)) {
    return { x: requireNumber(input[0], `${field}[0]`), y: requireNumber(input[1], `${field}[1]`) };
  }
  if (isRecord(input)) {
    return { x: requireNumber(input.x, `${field}.x`), y: requireNumber(input.y, `${field}.y`) };
  }
  throw new Error(`${field} must be {x, y} or [x, y]`);
}

function parseNode(input: unknown, index: number): DiagramNode {
  const field = `nodes[${index}]`;
  if (!isRecord(input)) {
    throw new Error(`${field} must be a mapping`);
  }
  const id = asString(input.id);
  if (!id) {
    throw new Error(`${field}.id is required`);
  }

  const width = requireNumber(input.width, `${field}.width`);
  const height = requireNumber(input.height, `${field}.height`);
  if (width < 0 || height < 0) {
    throw new Error(`${field} width and height must not be negative`);
  }

  const node: DiagramNode = {
    id,
    label: asString(input.label) ?? "",
    style: asString(input.style) ?? DEFAULT_NODE_STYLE,
    x: asNumber(input.x) ?? 0,
    y: asNumber(input.y) ?? 0,
    width,
    height,
  };
  const parentId = asString(input.parentId ?? input.parent);
  if (parentId) {
    node.parentId = parentId;
  }
  if (input.container === true) {
    node.container = true;
  }
  return node;
}

function parsePort(input: unknown, field: string): PortAnchor | undefined {
  if (input === undefined || input === null) {
    return undefined;
  }
  const point = parsePoint(input, field);
  if (point.x < 0 || point.x > 1 || point.y < 0 || point.y > 1) {
    throw new Error(`${field} must lie within 0..1`);
  }
  return point;
}

function parseConnector(input: unknown, index: number, nodeIds: Set<string>): DiagramConnector {
  const field = `connectors[${index}]`;
  if (!isRecord(input)) {
    throw new Error(`${field} must be a mapping`);
  }
  const id = asString(input.id);
  if (!id) {
    throw new Error(`${field}.id is required`);
  }
  const sourceId = asString(input.sourceId ?? input.source);
  const targetId = asString(input.targetId ?? input.target);
  if (!sourceId || !nodeIds.has(sourceId)) {
    throw new Error(`${field}.source must name a node id`);
  }
  if (!targetId || !nodeIds.has(targetId)) {
    throw new Error(`${field}.target must name a node id`);
  }

  const rawWaypoints = input.waypoints ?? [];
  if (!Array.isArray(rawWaypoints)) {
    throw new Error(`${field}.waypoints must be a list`);
  }

  const connector: DiagramConnector = {
    id,
    sourceId,
    targetId,
    label: asString(input.label) ?? "",
    style: asString(input.style) ?? DEFAULT_EDGE_STYLE,
    waypoints: rawWaypoints.map((point, i) => parsePoint(point, `${field}.waypoints[${i}]`)),
  };
  const exitPort = parsePort(input.exitPort, `${field}.exitPort`);
  if (exitPort) {
    connector.exitPort = exitPort;
  }
  const entryPort = parsePort(input.entryPort, `${field}.entryPort`);
  if (entryPort) {
    connector.entryPort = entryPort;
  }
  if (input.labelOffset !== undefined && input.labelOffset !== null) {
    connector.labelOffset = parsePoint(input.labelOffset, `${field}.labelOffset`);
  }
  return connector;
}

function highestNumericId(ids: string[]): number {
  let highest = 1;
  for (const id of ids) {
    if (/^\d+$/u.test(id)) {
      highest = Math.max(highest, Number(id));
    }
  }
  return highest;
}

/**
 * Parses a positioned diagram (YAML or JSON): grid and page settings, nodes with
 * optional `parentId`, connectors with optional waypoints and port anchors.
 */
export function loadDiagram(raw: string): DiagramDocument {
  const loaded = loadRecord(raw, "diagram file");

  const page = loaded.page === undefined ? {} : loaded.page;
  if (!isRecord(page)) {
    throw new Error("page must be a mapping");
  }
  const gridSize = loaded.gridSize === undefined ? undefined : requireNumber(loaded.gridSize, "gridSize");
  if (gridSize !== undefined && gridSize < 0) {
    throw new Error("gridSize must not be negative");
  }
  const doc = emptyDocument({
    gridSize,
    pageWidth: page.width === undefined ? undefined : requireNumber(page.width, "page.width"),
    pageHeight: page.height === undefined ? undefined : requireNumber(page.height, "page.height"),
  });

  const rawNodes = loaded.nodes ?? [];
  if (!Array.isArray(rawNodes)) {
    throw new Error("nodes must be a list");
  }
  doc.nodes = rawNodes.map((node, index) => parseNode(node, index));

  const nodeIds = new Set<string>();
  for (const node of doc.nodes) {
    if (nodeIds.has(node.id)) {
      throw new Error(`duplicate node id: ${node.id}`);
    }
    nodeIds.add(node.id);
  }

  const rawConnectors = loaded.connectors ?? [];
  if (!Array.isArray(rawConnectors)) {
    throw new Error("connectors must be a list");
  }
  doc.connectors = rawConnectors.map((connector, index) => parseConnector(connector, index, nodeIds));

  doc.nextId = highestNumericId([...nodeIds, ...doc.connectors.map((connector) => connector.id)]) + 1;
  return doc;
}

/**
 * Plain-object form of a document, the same shape `loadDiagram` reads back.
 */
export function serializeDiagram(doc: DiagramDocument): RawRecord {
  return {
    gridSize: doc.gridSize,
    page: { width: doc.pageWidth, height: doc.pageHeight },
    nodes: doc.nodes.map((node) => ({ ...node })),
    connectors: doc.connectors.map((connector) => ({
      ...connector,
      waypoints: connector.waypoints.map((point) => ({ ...point })),
    })),
  };
}

export function dumpDiagram(doc: DiagramDocument, format: "yaml" | "json" = "yaml"): string {
  const data = serializeDiagram(doc);
  if (format === "json") {
    return `${JSON.stringify(data, null, 2)}\n`;
  }
  return yaml.dump(data, { noRefs: true, lineWidth: 120 });
}
