export {
  alignColumnCenters,
  alignRankBaselines,
  applyPortDistribution,
  arrangeColumn,
  arrangeGrid,
  arrangeRow,
  arrangeTree,
  buildLayeredDiagram,
  centerDiagramOnPage,
  chooseBestPorts,
  compactDiagram,
  computeLayeredLayout,
  connectChain,
  distributeEvenly,
  distributePortsForBatch,
  ensurePageMargins,
  equalizeConnectedSizes,
  findOverlappingNodes,
  layoutLayered,
  optimizeEdgePaths,
  polishDiagram,
  positionEdgeLabels,
  relayoutDiagram,
  resolveDiagramOverlaps,
  resolveNodeOverlaps,
  routeDiagramConnectors,
  routeOrthogonal,
} from "./layout/index.js";
export type { BuildDiagramOptions, BuildDiagramResult, PolishOptions } from "./layout/index.js";
export {
  DEFAULT_ARRANGE_CONFIG,
  DEFAULT_LAYOUT_ENGINE_CONFIG,
  DEFAULT_OPTIMIZE_OPTIONS,
  DEFAULT_ROUTER_OPTIONS,
  emptyDocument,
} from "./layout/defaults.js";
export { snapToGrid } from "./layout/geometry.js";
export { estimateNodeSize } from "./layout/measure.js";
export { addConnector, addNode, absoluteBounds, collectNodeBounds, findConnector, findNode } from "./model/document.js";
export { dumpDiagram, loadDiagram, loadGraphSource } from "./model/input.js";
export { evaluateLayout } from "./quality/report.js";
export type { LayoutEvaluation, LayoutMetrics } from "./quality/report.js";
export type * from "./types.js";
