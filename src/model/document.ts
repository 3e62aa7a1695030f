import type { BoundingBox, DiagramConnector, DiagramDocument, DiagramNode, Point } from "../types.js";
import { DEFAULT_EDGE_STYLE, DEFAULT_NODE_STYLE } from "../layout/defaults.js";

export interface NodeDraft {
  label: string;
  x: number;
  y: number;
  width: number;
  height: number;
  style?: string;
  parentId?: string;
  container?: boolean;
  id?: string;
}

export interface ConnectorDraft {
  sourceId: string;
  targetId: string;
  label?: string;
  style?: string;
  waypoints?: Point[];
  id?: string;
}

export function nextCellId(doc: DiagramDocument): string {
  const used = new Set<string>([...doc.nodes.map((node) => node.id), ...doc.connectors.map((edge) => edge.id)]);
  let id = String(doc.nextId);
  doc.nextId += 1;
  while (used.has(id)) {
    id = String(doc.nextId);
    doc.nextId += 1;
  }
  return id;
}

export function addNode(doc: DiagramDocument, draft: NodeDraft): string {
  const id = draft.id ?? nextCellId(doc);
  const node: DiagramNode = {
    id,
    label: draft.label,
    style: draft.style ?? DEFAULT_NODE_STYLE,
    x: draft.x,
    y: draft.y,
    width: draft.width,
    height: draft.height,
  };
  if (draft.parentId) {
    node.parentId = draft.parentId;
  }
  if (draft.container) {
    node.container = true;
  }
  doc.nodes.push(node);
  return id;
}

export function addConnector(doc: DiagramDocument, draft: ConnectorDraft): string {
  const id = draft.id ?? nextCellId(doc);
  const connector: DiagramConnector = {
    id,
    sourceId: draft.sourceId,
    targetId: draft.targetId,
    label: draft.label ?? "",
    style: draft.style ?? DEFAULT_EDGE_STYLE,
    waypoints: draft.waypoints ? draft.waypoints.map((point) => ({ x: point.x, y: point.y })) : [],
  };
  doc.connectors.push(connector);
  return id;
}

export function nodeIndex(doc: DiagramDocument): Map<string, DiagramNode> {
  return new Map(doc.nodes.map((node) => [node.id, node]));
}

export function findNode(doc: DiagramDocument, id: string): DiagramNode | undefined {
  return doc.nodes.find((node) => node.id === id);
}

export function findConnector(doc: DiagramDocument, id: string): DiagramConnector | undefined {
  return doc.connectors.find((connector) => connector.id === id);
}

export function isTopLevel(node: DiagramNode, nodes: Map<string, DiagramNode>): boolean {
  return !node.parentId || !nodes.has(node.parentId);
}

/**
 * Offset contributed by a node's container chain. Walks parent links iteratively
 * and stops on a repeated id so malformed cycles cannot loop.
 */
export function parentOffset(nodeId: string, nodes: Map<string, DiagramNode>): Point {
  let x = 0;
  let y = 0;
  const seen = new Set<string>([nodeId]);
  let parentId = nodes.get(nodeId)?.parentId;

  while (parentId && !seen.has(parentId)) {
    const parent = nodes.get(parentId);
    if (!parent) {
      break;
    }
    seen.add(parentId);
    x += parent.x;
    y += parent.y;
    parentId = parent.parentId;
  }

  return { x, y };
}

export function ancestorIds(nodeId: string, nodes: Map<string, DiagramNode>): Set<string> {
  const out = new Set<string>();
  let parentId = nodes.get(nodeId)?.parentId;
  while (parentId && !out.has(parentId) && parentId !== nodeId) {
    if (!nodes.has(parentId)) {
      break;
    }
    out.add(parentId);
    parentId = nodes.get(parentId)?.parentId;
  }
  return out;
}

export function absoluteBounds(doc: DiagramDocument, nodeId: string): BoundingBox | undefined {
  const nodes = nodeIndex(doc);
  const node = nodes.get(nodeId);
  if (!node) {
    return undefined;
  }
  const offset = parentOffset(nodeId, nodes);
  return {
    x: node.x + offset.x,
    y: node.y + offset.y,
    width: node.width,
    height: node.height,
  };
}

export function collectNodeBounds(doc: DiagramDocument): Map<string, BoundingBox> {
  const nodes = nodeIndex(doc);
  const bounds = new Map<string, BoundingBox>();
  for (const node of doc.nodes) {
    const offset = parentOffset(node.id, nodes);
    bounds.set(node.id, {
      x: node.x + offset.x,
      y: node.y + offset.y,
      width: node.width,
      height: node.height,
    });
  }
  return bounds;
}
