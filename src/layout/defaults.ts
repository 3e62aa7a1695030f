import type { ArrangeConfig, DiagramDocument, LayoutEngineConfig, OptimizeOptions, RouterOptions } from "../types.js";

export const DEFAULT_LAYOUT_ENGINE_CONFIG: LayoutEngineConfig = {
  rankSpacing: 100,
  nodeSpacing: 60,
  defaultWidth: 120,
  defaultHeight: 60,
  gridSize: 10,
  maxOverlapIterations: 50,
  overlapPadding: 20,
  barycenterSweeps: 4,
  edgeMargin: 15,
  routeEdges: true,
  startX: 50,
  startY: 80,
};

export const DEFAULT_ARRANGE_CONFIG: ArrangeConfig = {
  startX: 50,
  startY: 50,
  hSpacing: 60,
  vSpacing: 60,
  defaultWidth: 120,
  defaultHeight: 60,
  gridSize: 10,
};

export const DEFAULT_ROUTER_OPTIONS: RouterOptions = {
  bendPenalty: 5,
  maxExpansions: 20000,
};

export const DEFAULT_OPTIMIZE_OPTIONS: OptimizeOptions = {
  margin: 15,
  straightenThreshold: 8,
  nudgeSpacing: 10,
};

export const DEFAULT_NODE_STYLE = "rounded=1;whiteSpace=wrap;html=1;";
export const DEFAULT_EDGE_STYLE =
  "edgeStyle=orthogonalEdgeStyle;rounded=1;orthogonalLoop=1;jettySize=auto;html=1;endArrow=classic;";
export const DEFAULT_TREE_EDGE_STYLE = "edgeStyle=orthogonalEdgeStyle;rounded=0;html=1;endArrow=classic;";
export const DEFAULT_CHAIN_EDGE_STYLE = "endArrow=classic;html=1;";

function pickDefined<T extends object>(overrides: Partial<T> | undefined): Partial<T> {
  const out: Partial<T> = {};
  if (!overrides) {
    return out;
  }
  for (const key in overrides) {
    const value = overrides[key];
    if (Object.hasOwn(overrides, key) && value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

export function resolveLayoutEngineConfig(overrides?: Partial<LayoutEngineConfig>): LayoutEngineConfig {
  return { ...DEFAULT_LAYOUT_ENGINE_CONFIG, ...pickDefined(overrides) };
}

export function resolveArrangeConfig(overrides?: Partial<ArrangeConfig>): ArrangeConfig {
  return { ...DEFAULT_ARRANGE_CONFIG, ...pickDefined(overrides) };
}

export function resolveRouterOptions(overrides?: Partial<RouterOptions>): RouterOptions {
  return { ...DEFAULT_ROUTER_OPTIONS, ...pickDefined(overrides) };
}

export function resolveOptimizeOptions(overrides?: Partial<OptimizeOptions>): OptimizeOptions {
  return { ...DEFAULT_OPTIMIZE_OPTIONS, ...pickDefined(overrides) };
}

export function emptyDocument(options: { gridSize?: number; pageWidth?: number; pageHeight?: number } = {}): DiagramDocument {
  return {
    gridSize: options.gridSize ?? 10,
    pageWidth: options.pageWidth ?? 827,
    pageHeight: options.pageHeight ?? 1169,
    nodes: [],
    connectors: [],
    nextId: 2,
  };
}
