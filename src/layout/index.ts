import type { DiagramDocument, GraphSource, LayoutDirection, LayoutEngineConfig, PolishReport } from "../types.js";
import { emptyDocument, resolveLayoutEngineConfig } from "./defaults.js";
import { layoutLayered, relayoutDiagram } from "./layered.js";
import { optimizeEdgePaths } from "./optimize.js";
import { resolveDiagramOverlaps } from "./overlap.js";
import {
  alignColumnCenters,
  alignRankBaselines,
  centerDiagramOnPage,
  compactDiagram,
  ensurePageMargins,
  equalizeConnectedSizes,
  positionEdgeLabels,
} from "./polish.js";
import { routeDiagramConnectors } from "./router.js";

export interface BuildDiagramOptions {
  config?: Partial<LayoutEngineConfig>;
  direction?: LayoutDirection;
  pageMargin?: number;
}

export interface BuildDiagramResult {
  doc: DiagramDocument;
  labelToId: Record<string, string>;
  optimized: number;
}

export interface PolishOptions {
  direction?: LayoutDirection;
  config?: Partial<LayoutEngineConfig>;
}

export function buildLayeredDiagram(graph: GraphSource, options: BuildDiagramOptions = {}): BuildDiagramResult {
  const config = resolveLayoutEngineConfig({ ...graph.config, ...options.config });
  const doc = emptyDocument({ gridSize: config.gridSize });

  const labelToId = layoutLayered(doc, graph.edges, {
    direction: options.direction ?? graph.direction,
    config,
    nodeStyles: graph.nodeStyles,
    edgeStyle: graph.edgeStyle,
  });
  const optimized = config.routeEdges ? optimizeEdgePaths(doc, { margin: config.edgeMargin }) : 0;
  ensurePageMargins(doc, options.pageMargin ?? 40);

  return { doc, labelToId, optimized };
}

/**
 * Full cleanup of an existing document: relayout, overlap removal, compaction,
 * alignment, routing, optimization, label placement and page placement. Overlaps
 * are resolved again after alignment, which can pull neighbours together. A
 * `gridSize` in the config replaces the document's grid; `routeEdges: false`
 * keeps the existing connector paths.
 */
export function polishDiagram(doc: DiagramDocument, options: PolishOptions = {}): PolishReport {
  const direction = options.direction ?? "TB";
  const edgeMargin = options.config?.edgeMargin ?? 15;
  const routeEdges = options.config?.routeEdges ?? true;
  if (options.config?.gridSize !== undefined) {
    doc.gridSize = options.config.gridSize;
  }

  const relayout = Object.keys(
    relayoutDiagram(doc, {
      direction,
      config: { ...options.config, routeEdges: false },
    }),
  ).length;
  const overlaps = resolveDiagramOverlaps(doc, 20);
  const compacted = compactDiagram(doc, 40);
  const alignedRows = alignRankBaselines(doc, 20);
  const alignedColumns = alignColumnCenters(doc, 20);
  const equalized = equalizeConnectedSizes(doc, direction);
  const settled = resolveDiagramOverlaps(doc, 20);
  const routed = routeEdges ? routeDiagramConnectors(doc, edgeMargin) : 0;
  const optimized = routeEdges ? optimizeEdgePaths(doc, { margin: edgeMargin }) : 0;
  const labels = positionEdgeLabels(doc, 8);
  const centered = centerDiagramOnPage(doc, 50);
  const margins = ensurePageMargins(doc, 40);

  return {
    relayout,
    overlaps: overlaps + settled,
    compacted,
    alignedRows,
    alignedColumns,
    equalized,
    routed,
    optimized,
    labels,
    centered,
    margins,
  };
}

export { computeLayeredLayout, layoutLayered, relayoutDiagram } from "./layered.js";
export { findOverlappingNodes, resolveDiagramOverlaps, resolveNodeOverlaps } from "./overlap.js";
export { routeDiagramConnectors, routeOrthogonal } from "./router.js";
export { optimizeEdgePaths } from "./optimize.js";
export {
  applyPortDistribution,
  arrangeColumn,
  arrangeGrid,
  arrangeRow,
  arrangeTree,
  chooseBestPorts,
  connectChain,
  distributeEvenly,
  distributePortsForBatch,
} from "./arrange.js";
export {
  alignColumnCenters,
  alignRankBaselines,
  centerDiagramOnPage,
  compactDiagram,
  ensurePageMargins,
  equalizeConnectedSizes,
  positionEdgeLabels,
} from "./polish.js";
