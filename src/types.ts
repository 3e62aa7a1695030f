export type LayoutDirection = "TB" | "BT" | "LR" | "RL";

export type NodeSide = "top" | "bottom" | "left" | "right";

export type PortMode = "auto" | "horizontal" | "vertical";

export interface Point {
  x: number;
  y: number;
}

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PortAnchor {
  x: number;
  y: number;
}

export interface PortPair {
  exit: PortAnchor;
  entry: PortAnchor;
}

export interface DiagramNode {
  id: string;
  label: string;
  style: string;
  x: number;
  y: number;
  width: number;
  height: number;
  parentId?: string;
  container?: boolean;
}

export interface DiagramConnector {
  id: string;
  sourceId: string;
  targetId: string;
  label: string;
  style: string;
  waypoints: Point[];
  exitPort?: PortAnchor;
  entryPort?: PortAnchor;
  labelOffset?: Point;
}

export interface DiagramDocument {
  gridSize: number;
  pageWidth: number;
  pageHeight: number;
  nodes: DiagramNode[];
  connectors: DiagramConnector[];
  nextId: number;
}

export interface GraphEdgeInput {
  source: string;
  target: string;
  label?: string;
}

export interface LayoutEngineConfig {
  rankSpacing: number;
  nodeSpacing: number;
  defaultWidth: number;
  defaultHeight: number;
  gridSize: number;
  maxOverlapIterations: number;
  overlapPadding: number;
  barycenterSweeps: number;
  edgeMargin: number;
  routeEdges: boolean;
  startX: number;
  startY: number;
}

export interface ArrangeConfig {
  startX: number;
  startY: number;
  hSpacing: number;
  vSpacing: number;
  defaultWidth: number;
  defaultHeight: number;
  gridSize: number;
}

export interface RouterOptions {
  bendPenalty: number;
  maxExpansions: number;
}

export interface OptimizeOptions {
  margin: number;
  straightenThreshold: number;
  nudgeSpacing: number;
}

export interface LayeredNodeInput {
  key: string;
  label: string;
  width: number;
  height: number;
}

export interface LayeredNodePlacement {
  key: string;
  rank: number;
  order: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface LayeredLayoutResult {
  placements: Map<string, LayeredNodePlacement>;
  maxRank: number;
  backEdgeCount: number;
  virtualNodeCount: number;
  overlapConverged: boolean;
}

export interface GraphSource {
  direction: LayoutDirection;
  edges: GraphEdgeInput[];
  nodeStyles: Record<string, string>;
  edgeStyle?: string;
  config: Partial<LayoutEngineConfig>;
}

export interface PolishReport {
  relayout: number;
  overlaps: number;
  compacted: number;
  alignedRows: number;
  alignedColumns: number;
  equalized: number;
  routed: number;
  optimized: number;
  labels: number;
  centered: number;
  margins: number;
}
