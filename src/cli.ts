#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import fs from "node:fs/promises";
import path from "node:path";
import type { DiagramDocument, LayoutDirection, LayoutEngineConfig } from "./types.js";
import { applyPortDistribution } from "./layout/arrange.js";
import { buildLayeredDiagram, polishDiagram } from "./layout/index.js";
import { relayoutDiagram } from "./layout/layered.js";
import { optimizeEdgePaths } from "./layout/optimize.js";
import { findOverlappingNodes } from "./layout/overlap.js";
import { routeDiagramConnectors } from "./layout/router.js";
import { dumpDiagram, loadDiagram, loadGraphSource, parseDirection } from "./model/input.js";
import { evaluateLayout } from "./quality/report.js";
import { logger } from "./utils/logger.js";

const program = new Command();

interface LayoutCliOptions {
  output?: string;
  direction?: string;
  rankSpacing?: number;
  nodeSpacing?: number;
  gridSize?: number;
  margin?: number;
  route: boolean;
}

interface RouteCliOptions {
  output?: string;
  margin?: number;
  ports?: boolean;
}

function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`not a number: ${value}`);
  }
  return parsed;
}

function parsePositiveOption(value: string): number {
  const parsed = parseNumberOption(value);
  if (parsed <= 0) {
    throw new InvalidArgumentError(`must be greater than zero: ${value}`);
  }
  return parsed;
}

function configFromOptions(opts: LayoutCliOptions): Partial<LayoutEngineConfig> {
  const config: Partial<LayoutEngineConfig> = {};
  if (opts.rankSpacing !== undefined) {
    config.rankSpacing = opts.rankSpacing;
  }
  if (opts.nodeSpacing !== undefined) {
    config.nodeSpacing = opts.nodeSpacing;
  }
  if (opts.gridSize !== undefined) {
    config.gridSize = opts.gridSize;
  }
  if (opts.margin !== undefined) {
    config.edgeMargin = opts.margin;
  }
  if (!opts.route) {
    config.routeEdges = false;
  }
  return config;
}

function directionFromOptions(opts: LayoutCliOptions): LayoutDirection | undefined {
  return opts.direction === undefined ? undefined : parseDirection(opts.direction, "--direction");
}

function formatForPath(outputPath: string | undefined): "yaml" | "json" {
  return outputPath && /\.json$/iu.test(outputPath) ? "json" : "yaml";
}

async function readDiagram(input: string): Promise<DiagramDocument> {
  const raw = await fs.readFile(input, "utf8");
  return loadDiagram(raw);
}

async function writeDiagram(doc: DiagramDocument, outputPath: string | undefined): Promise<void> {
  const text = dumpDiagram(doc, formatForPath(outputPath));
  if (!outputPath) {
    process.stdout.write(text);
    return;
  }
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, text, "utf8");
  logger.success(`Written: ${outputPath}`);
}

async function runBuild(input: string, opts: LayoutCliOptions): Promise<void> {
  const graph = loadGraphSource(await fs.readFile(input, "utf8"));
  if (graph.edges.length === 0) {
    logger.warn(`${input} has no edges; the diagram will be empty`);
  }

  const { doc, labelToId, optimized } = buildLayeredDiagram(graph, {
    config: configFromOptions(opts),
    direction: directionFromOptions(opts),
  });
  logger.debug(`placed ${Object.keys(labelToId).length} nodes, ${doc.connectors.length} connectors`);
  logger.debug(`optimizer changed ${optimized} connectors`);
  await writeDiagram(doc, opts.output);
}

async function runRelayout(input: string, opts: LayoutCliOptions): Promise<void> {
  const doc = await readDiagram(input);
  const moved = relayoutDiagram(doc, {
    direction: directionFromOptions(opts),
    config: configFromOptions(opts),
  });
  logger.debug(`relayout moved ${Object.keys(moved).length} nodes`);
  await writeDiagram(doc, opts.output);
}

async function runRoute(input: string, opts: RouteCliOptions): Promise<void> {
  const doc = await readDiagram(input);
  if (opts.ports) {
    logger.debug(`assigned ports on ${applyPortDistribution(doc)} connectors`);
  }
  const routed = routeDiagramConnectors(doc, opts.margin ?? 15);
  logger.debug(`routed ${routed} connectors`);
  await writeDiagram(doc, opts.output);
}

async function runOptimize(input: string, opts: RouteCliOptions): Promise<void> {
  const doc = await readDiagram(input);
  const modified = optimizeEdgePaths(doc, opts.margin === undefined ? {} : { margin: opts.margin });
  logger.debug(`optimizer changed ${modified} connectors`);
  await writeDiagram(doc, opts.output);
}

async function runPolish(input: string, opts: LayoutCliOptions): Promise<void> {
  const doc = await readDiagram(input);
  const report = polishDiagram(doc, {
    direction: directionFromOptions(opts),
    config: configFromOptions(opts),
  });
  for (const [step, count] of Object.entries(report)) {
    // stdout carries the document when there is no output file
    if (opts.output) {
      logger.info(`${step}: ${count}`);
    } else {
      logger.debug(`${step}: ${count}`);
    }
  }
  await writeDiagram(doc, opts.output);
}

async function runInspect(input: string): Promise<void> {
  const doc = await readDiagram(input);
  const evaluation = evaluateLayout(doc);
  const overlaps = findOverlappingNodes(doc);

  logger.section(`${input}: ${doc.nodes.length} nodes, ${doc.connectors.length} connectors`);
  logger.log(`score: ${evaluation.score.toFixed(1)}`);
  for (const [metric, value] of Object.entries(evaluation.metrics)) {
    logger.log(`  ${metric}: ${value}`);
  }
  for (const [a, b] of overlaps) {
    logger.warn(`nodes ${a} and ${b} overlap`);
  }
  if (overlaps.length === 0 && evaluation.metrics.edgeThroughNodeCount === 0) {
    logger.success("no overlapping nodes and no connectors through nodes");
  }
}

function addLayoutOptions(command: Command): Command {
  return command
    .option("-o, --output <path>", "output diagram path (.yaml or .json); stdout when omitted")
    .addOption(new Option("-d, --direction <dir>", "layout direction").choices(["TB", "BT", "LR", "RL"]))
    .option("--rank-spacing <n>", "distance between ranks", parsePositiveOption)
    .option("--node-spacing <n>", "distance between nodes in a rank", parsePositiveOption)
    .option("--grid-size <n>", "grid size for snapping", parsePositiveOption)
    .option("--margin <n>", "clearance kept between connectors and nodes", parseNumberOption)
    .option("--no-route", "skip connector routing");
}

program
  .name("ortholayout")
  .description("Layered layout and orthogonal connector routing for diagrams")
  .version("0.1.0");

addLayoutOptions(
  program
    .command("build")
    .description("Lay out a graph file (edges, styles, config) into a positioned diagram")
    .argument("<graph>", "graph file (.yaml or .json)"),
).action(async (input: string, opts: LayoutCliOptions) => runBuild(input, opts));

addLayoutOptions(
  program
    .command("relayout")
    .description("Re-run the layered layout on an existing diagram")
    .argument("<diagram>", "diagram file (.yaml or .json)"),
).action(async (input: string, opts: LayoutCliOptions) => runRelayout(input, opts));

addLayoutOptions(
  program
    .command("polish")
    .description("Relayout, remove overlaps, compact, align, route and optimize a diagram")
    .argument("<diagram>", "diagram file (.yaml or .json)"),
).action(async (input: string, opts: LayoutCliOptions) => runPolish(input, opts));

program
  .command("route")
  .description("Route every connector around the other nodes")
  .argument("<diagram>", "diagram file (.yaml or .json)")
  .option("-o, --output <path>", "output diagram path; stdout when omitted")
  .option("--margin <n>", "clearance kept between connectors and nodes", parseNumberOption)
  .option("--ports", "distribute exit and entry ports before routing")
  .action(async (input: string, opts: RouteCliOptions) => runRoute(input, opts));

program
  .command("optimize")
  .description("Straighten, shorten, centre and separate existing connector paths")
  .argument("<diagram>", "diagram file (.yaml or .json)")
  .option("-o, --output <path>", "output diagram path; stdout when omitted")
  .option("--margin <n>", "clearance kept between connectors and nodes", parseNumberOption)
  .action(async (input: string, opts: RouteCliOptions) => runOptimize(input, opts));

program
  .command("inspect")
  .description("Report overlaps, crossings, bends and off-grid coordinates")
  .argument("<diagram>", "diagram file (.yaml or .json)")
  .action(async (input: string) => runInspect(input));

program.parseAsync(process.argv).catch((error) => {
  logger.error(error instanceof Error ? error.message : String(error));
  logger.debug(error instanceof Error ? error.stack ?? "" : "");
  process.exit(1);
});
