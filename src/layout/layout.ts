import { debugLog } from '../core/debug.js';
import * as acyclic from './acyclic.js';
import { addBorderSegments } from './add-border-segments.js';
import { layout as conservativeLayout } from './conservative.js';
import * as coordinateSystem from './coordinate-system.js';
import { buildLayoutGraph, updateInputGraph } from './graph-io.js';
import * as nestingGraph from './nesting-graph.js';
import * as normalize from './normalize.js';
import { crossCount, order } from './order/index.js';
import { parentDummyChains } from './parent-dummy-chains.js';
import { position } from './position/index.js';
import { rank } from './rank/index.js';
import { insertSelfEdges, positionSelfEdges, removeSelfEdges } from './self-edges.js';
import type { InputGraph, LayoutGraph, LayoutNode, LayoutOptions, Point } from './types.js';
import {
  addDummyNode,
  asNonCompoundGraph,
  buildLayerMatrix,
  graphConfig,
  intersectRect,
  normalizeRanks,
  notime,
  removeEmptyRanks,
  time,
  type TimeFn,
} from './util.js';

/**
 * Lays out `inputGraph` with the full layered pipeline and writes the
 * results back onto its labels: node `x`/`y` (centers), `rank` and `order`,
 * compound node size and rank span, edge `points` and label `x`/`y`, and the
 * drawing's `width`/`height` on the graph label.
 *
 * Graphs with an edge attached to a compound node go through the
 * conservative `layout` instead.
 */
export function layoutDagreish(inputGraph: InputGraph, opts: LayoutOptions = {}): void {
  if (hasEdgeOnCompoundNode(inputGraph)) {
    debugLog('layout', 'edge on a compound node, using the conservative layout');
    conservativeLayout(inputGraph, opts);
    return;
  }

  const timeFn: TimeFn = opts.debugTiming ? time : notime;
  timeFn('layout', () => {
    const layoutGraph = timeFn('  buildLayoutGraph', () => buildLayoutGraph(inputGraph));
    timeFn('  runLayout', () => runLayout(layoutGraph, timeFn, opts));
    timeFn('  updateInputGraph', () => updateInputGraph(inputGraph, layoutGraph));
  });
}

export interface CrossingReport {
  /** Node ids per rank in their final order, dummy nodes included. */
  layering: string[][];
  /** Weighted crossings of the initial DFS order. */
  initialCrossings: number;
  /** Weighted crossings of the order the sweeps settled on. */
  crossings: number;
}

/**
 * Runs the pipeline up to crossing minimisation and reports how much the
 * sweeps improved on the initial order. The caller's graph is not modified.
 */
export function crossingReport(inputGraph: InputGraph): CrossingReport {
  if (hasEdgeOnCompoundNode(inputGraph)) {
    throw new Error('Crossing report is not available for graphs with edges on compound nodes');
  }
  const initial = buildLayoutGraph(inputGraph);
  rankAndOrder(initial, notime, { disableOptimalOrderHeuristic: true });
  const initialCrossings = crossCount(initial, buildLayerMatrix(initial));

  const g = buildLayoutGraph(inputGraph);
  rankAndOrder(g, notime, {});
  const layering = buildLayerMatrix(g);
  return { layering, initialCrossings, crossings: crossCount(g, layering) };
}

function runLayout(g: LayoutGraph, timeFn: TimeFn, opts: LayoutOptions): void {
  rankAndOrder(g, timeFn, opts);
  positionAndRoute(g, timeFn);
}

function rankAndOrder(g: LayoutGraph, timeFn: TimeFn, opts: LayoutOptions): void {
  timeFn('    makeSpaceForEdgeLabels', () => makeSpaceForEdgeLabels(g));
  timeFn('    removeSelfEdges', () => removeSelfEdges(g));
  timeFn('    acyclic', () => acyclic.run(g));
  timeFn('    nestingGraph.run', () => nestingGraph.run(g));
  timeFn('    rank', () => rank(asNonCompoundGraph(g)));
  timeFn('    injectEdgeLabelProxies', () => injectEdgeLabelProxies(g));
  timeFn('    removeEmptyRanks', () => removeEmptyRanks(g));
  timeFn('    nestingGraph.cleanup', () => nestingGraph.cleanup(g));
  timeFn('    normalizeRanks', () => normalizeRanks(g));
  timeFn('    assignRankMinMax', () => assignRankMinMax(g));
  timeFn('    removeEdgeLabelProxies', () => removeEdgeLabelProxies(g));
  timeFn('    normalize.run', () => normalize.run(g));
  timeFn('    parentDummyChains', () => parentDummyChains(g));
  timeFn('    addBorderSegments', () => addBorderSegments(g));
  timeFn('    order', () => order(g, opts));
}

function positionAndRoute(g: LayoutGraph, timeFn: TimeFn): void {
  timeFn('    adjustCoordinateSystem', () => coordinateSystem.adjust(g));
  timeFn('    insertSelfEdges', () => insertSelfEdges(g));
  timeFn('    position', () => position(g));
  timeFn('    positionSelfEdges', () => positionSelfEdges(g));
  timeFn('    removeBorderNodes', () => removeBorderNodes(g));
  timeFn('    normalize.undo', () => normalize.undo(g));
  timeFn('    fixupEdgeLabelCoords', () => fixupEdgeLabelCoords(g));
  timeFn('    undoCoordinateSystem', () => coordinateSystem.undo(g));
  timeFn('    translateGraph', () => translateGraph(g));
  timeFn('    assignNodeIntersects', () => assignNodeIntersects(g));
  timeFn('    assignDefaultLabelCoords', () => assignDefaultLabelCoords(g));
  timeFn('    acyclic.undo', () => acyclic.undo(g));
}

export function hasEdgeOnCompoundNode(g: InputGraph): boolean {
  if (!g.isCompound()) return false;
  return g.edges().some(e => g.children(e.v).length > 0 || g.children(e.w).length > 0);
}

/*
 * Halving ranksep and doubling minlen gives every edge a spare rank in the
 * middle where its label can sit. Labels placed to the side of the edge
 * also reserve `labeloffset`: across the rank axis for an explicit TB or BT,
 * and on the height otherwise, the defaulted rankdir included.
 */
function makeSpaceForEdgeLabels(g: LayoutGraph): void {
  const graph = graphConfig(g);
  const vertical = !graph.rankdirDefaulted && (graph.rankdir === 'TB' || graph.rankdir === 'BT');
  graph.ranksep /= 2;
  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (!edge) continue;
    edge.labelled = edge.width > 0 || edge.height > 0;
    edge.minlen *= 2;
    if (edge.labelpos !== 'c') {
      if (vertical) {
        edge.width += edge.labeloffset;
      } else {
        edge.height += edge.labeloffset;
      }
    }
  }
}

/*
 * A labelled edge gets a proxy node on the rank midway along it, so empty
 * rank removal keeps that rank and normalize knows where to put the label.
 */
function injectEdgeLabelProxies(g: LayoutGraph): void {
  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (!edge?.width || !edge.height) continue;
    const vRank = g.node(e.v)?.rank;
    const wRank = g.node(e.w)?.rank;
    if (vRank === undefined || wRank === undefined) continue;
    const label: LayoutNode = {
      width: 0,
      height: 0,
      rank: Math.floor((wRank - vRank) / 2) + vRank,
      edgeObj: e,
    };
    addDummyNode(g, 'edge-proxy', label, '_ep');
  }
}

function assignRankMinMax(g: LayoutGraph): void {
  let maxRank = 0;
  for (const v of g.nodes()) {
    const node = g.node(v);
    if (!node?.borderTop || !node.borderBottom) continue;
    node.minRank = g.node(node.borderTop)?.rank;
    node.maxRank = g.node(node.borderBottom)?.rank;
    maxRank = Math.max(maxRank, node.maxRank ?? 0);
  }
  graphConfig(g).maxRank = maxRank;
}

function removeEdgeLabelProxies(g: LayoutGraph): void {
  for (const v of g.nodes()) {
    const node = g.node(v);
    if (node?.dummy !== 'edge-proxy') continue;
    if (node.edgeObj) {
      const edge = g.edge(node.edgeObj);
      if (edge) edge.labelRank = node.rank;
    }
    g.removeNode(v);
  }
}

/*
 * A subgraph's box spans its top and bottom border nodes vertically and its
 * left/right border columns horizontally, taking the outermost border node
 * on any rank.
 */
function removeBorderNodes(g: LayoutGraph): void {
  for (const v of g.nodes()) {
    if (!g.children(v).length) continue;
    const node = g.node(v);
    if (!node?.borderTop || !node.borderBottom) continue;
    const t = g.node(node.borderTop);
    const b = g.node(node.borderBottom);
    if (t?.y === undefined || b?.y === undefined) continue;

    let lx = Number.POSITIVE_INFINITY;
    for (const id of node.borderLeft ?? []) {
      const x = id === undefined ? undefined : g.node(id)?.x;
      if (x !== undefined) lx = Math.min(lx, x);
    }
    let rx = Number.NEGATIVE_INFINITY;
    for (const id of node.borderRight ?? []) {
      const x = id === undefined ? undefined : g.node(id)?.x;
      if (x !== undefined) rx = Math.max(rx, x);
    }
    if (!Number.isFinite(lx) || !Number.isFinite(rx)) continue;

    node.width = Math.abs(rx - lx);
    node.height = Math.abs(b.y - t.y);
    node.x = lx + node.width / 2;
    node.y = t.y + node.height / 2;
  }

  for (const v of g.nodes()) {
    if (g.node(v)?.dummy === 'border') {
      g.removeNode(v);
    }
  }
}

/* Undoes the labeloffset reservation and moves side labels off the edge. */
function fixupEdgeLabelCoords(g: LayoutGraph): void {
  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (edge?.x === undefined) continue;
    if (edge.labelpos === 'l' || edge.labelpos === 'r') {
      edge.width -= edge.labeloffset;
    }
    switch (edge.labelpos) {
      case 'l':
        edge.x -= edge.width / 2 + edge.labeloffset;
        break;
      case 'r':
        edge.x += edge.width / 2 + edge.labeloffset;
        break;
    }
  }
}

/*
 * Shifts everything so the top-left of the drawing (nodes and edge label
 * boxes) sits at the margin, and records the drawing size.
 */
function translateGraph(g: LayoutGraph): void {
  let minX = Number.POSITIVE_INFINITY;
  let maxX = 0;
  let minY = Number.POSITIVE_INFINITY;
  let maxY = 0;
  const graphLabel = graphConfig(g);
  const marginX = graphLabel.marginx || 0;
  const marginY = graphLabel.marginy || 0;

  const getExtremes = (attrs: { x?: number; y?: number; width: number; height: number }): void => {
    const x = attrs.x ?? 0;
    const y = attrs.y ?? 0;
    minX = Math.min(minX, x - attrs.width / 2);
    maxX = Math.max(maxX, x + attrs.width / 2);
    minY = Math.min(minY, y - attrs.height / 2);
    maxY = Math.max(maxY, y + attrs.height / 2);
  };

  for (const v of g.nodes()) {
    const node = g.node(v);
    if (node) getExtremes(node);
  }
  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (edge?.x !== undefined) getExtremes(edge);
  }

  if (!Number.isFinite(minX) || !Number.isFinite(minY)) {
    graphLabel.width = marginX * 2;
    graphLabel.height = marginY * 2;
    return;
  }

  minX -= marginX;
  minY -= marginY;

  for (const v of g.nodes()) {
    const node = g.node(v);
    if (!node) continue;
    node.x = (node.x ?? 0) - minX;
    node.y = (node.y ?? 0) - minY;
  }

  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (!edge) continue;
    for (const p of edge.points ?? []) {
      p.x -= minX;
      p.y -= minY;
    }
    if (edge.x !== undefined) edge.x -= minX;
    if (edge.y !== undefined) edge.y -= minY;
  }

  graphLabel.width = maxX - minX + marginX;
  graphLabel.height = maxY - minY + marginY;
}

/*
 * Ends every edge on the boundary of its nodes. An edge without routing
 * points first gets the midpoint between the node centers, so each edge
 * has at least three points.
 */
function assignNodeIntersects(g: LayoutGraph): void {
  for (const e of g.edges()) {
    const edge = g.edge(e);
    const nodeV = g.node(e.v);
    const nodeW = g.node(e.w);
    if (!edge || !nodeV || !nodeW) continue;
    const rectV = { x: nodeV.x ?? 0, y: nodeV.y ?? 0, width: nodeV.width, height: nodeV.height };
    const rectW = { x: nodeW.x ?? 0, y: nodeW.y ?? 0, width: nodeW.width, height: nodeW.height };

    let points: Point[] = edge.points ?? [];
    if (!points.length) {
      points = [{ x: (rectV.x + rectW.x) / 2, y: (rectV.y + rectW.y) / 2 }];
    }
    const first = points[0];
    const last = points[points.length - 1];
    edge.points = [intersectRect(rectV, first), ...points, intersectRect(rectW, last)];
  }
}

/*
 * Labelled edges that never got a label dummy (zero width or height) take
 * the middle routing point, pushed sideways by labelpos.
 */
function assignDefaultLabelCoords(g: LayoutGraph): void {
  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (!edge?.points || edge.x !== undefined || edge.y !== undefined) continue;
    if (!edge.labelled) continue;
    const mid = edge.points[Math.floor(edge.points.length / 2)];
    if (!mid) continue;
    let x = mid.x;
    if (edge.labelpos === 'l') x -= edge.labeloffset + edge.width / 2;
    else if (edge.labelpos === 'r') x += edge.labeloffset + edge.width / 2;
    edge.x = x;
    edge.y = mid.y;
  }
}
