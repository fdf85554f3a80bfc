import * as acyclic from './acyclic.js';
import { buildLayoutGraph, updateInputGraph } from './graph-io.js';
import type { InputGraph, LayoutGraph, LayoutOptions, Point } from './types.js';
import { graphConfig, notime, time, type TimeFn } from './util.js';

/**
 * Conservative layout: longest-path ranks, centred rows and straight edges.
 *
 * It makes no attempt at crossing reduction. Rows keep insertion order, and
 * edge points are interpolated on the line between the two nodes. Results are
 * written back the same way `layoutDagreish` writes them.
 */
export function layout(inputGraph: InputGraph, opts: LayoutOptions = {}): void {
  const timeFn: TimeFn = opts.debugTiming ? time : notime;
  timeFn('conservative layout', () => {
    const g = buildLayoutGraph(inputGraph);
    runConservative(g);
    updateInputGraph(inputGraph, g);
  });
}

function runConservative(g: LayoutGraph): void {
  acyclic.run(g);

  const graph = graphConfig(g);
  const edges = g.edges();

  let maxEdgeLabelWidth = 0;
  let maxEdgeLabelHeight = 0;
  for (const e of edges) {
    const label = g.edge(e);
    if (!label) continue;
    maxEdgeLabelWidth = Math.max(maxEdgeLabelWidth, label.width);
    maxEdgeLabelHeight = Math.max(maxEdgeLabelHeight, label.height);
  }

  // Wide labels push nodes apart across the rank axis (TB/BT) or push ranks apart (LR/RL).
  const vertical = graph.rankdir === 'TB' || graph.rankdir === 'BT';
  const nodeSep = vertical ? Math.max(graph.nodesep, maxEdgeLabelWidth) : Math.max(graph.nodesep, maxEdgeLabelHeight);
  const rankSep = vertical ? graph.ranksep : Math.max(graph.ranksep, maxEdgeLabelWidth);

  const leaves = g.nodes().filter(v => !g.children(v).length);
  const ranks = assignRanks(g, leaves);
  compactCompoundRanks(g, ranks);

  let maxRank = 0;
  for (const r of ranks.values()) maxRank = Math.max(maxRank, r);
  const layers: string[][] = [];
  for (let i = 0; i <= maxRank; i++) layers.push([]);
  for (const v of leaves) layers[ranks.get(v) ?? 0].push(v);

  // Extra room between adjacent ranks for the tallest label crossing the gap
  const gapExtra: number[] = new Array<number>(Math.max(0, layers.length - 1)).fill(0);
  for (const e of edges) {
    if (e.v === e.w) continue;
    const vRank = ranks.get(e.v);
    const wRank = ranks.get(e.w);
    const label = g.edge(e);
    if (vRank === undefined || wRank === undefined || !label) continue;
    if (wRank !== vRank + 1 || label.height <= 0) continue;
    gapExtra[vRank] = Math.max(gapExtra[vRank], label.height);
  }

  const rankHeights: number[] = [];
  const rankWidths: number[] = [];
  for (const layer of layers) {
    let h = 0;
    let w = 0;
    layer.forEach((v, i) => {
      const node = g.node(v);
      h = Math.max(h, node?.height ?? 0);
      w += node?.width ?? 0;
      if (i + 1 < layer.length) w += nodeSep;
    });
    rankHeights.push(h);
    rankWidths.push(w);
  }
  const maxRankWidth = Math.max(0, ...rankWidths);

  let yCursor = 0;
  layers.forEach((layer, rankIdx) => {
    const y = yCursor + rankHeights[rankIdx] / 2;
    let xCursor = (maxRankWidth - rankWidths[rankIdx]) / 2;
    layer.forEach((v, order) => {
      const node = g.node(v);
      if (!node) return;
      node.x = xCursor + node.width / 2;
      node.y = y;
      node.rank = rankIdx;
      node.order = order;
      xCursor += node.width + nodeSep;
    });
    yCursor += rankHeights[rankIdx];
    if (rankIdx + 1 < layers.length) {
      yCursor += rankSep + (gapExtra[rankIdx] ?? 0);
    }
  });
  const totalHeight = yCursor;

  assignCompoundBounds(g);
  routeEdges(g, graph.edgesep);
  transformRankDir(g, graph.rankdir, totalHeight);
  assignCompoundBounds(g);

  graph.width = vertical ? maxRankWidth : totalHeight;
  graph.height = vertical ? totalHeight : maxRankWidth;

  acyclic.undo(g);
}

/*
 * Longest path from the sources, visiting leaves in Kahn order (sources in
 * insertion order, successors in edge order). A cycle left over after
 * acyclic falls back to plain insertion order.
 */
function assignRanks(g: LayoutGraph, leaves: string[]): Map<string, number> {
  const indegree = new Map<string, number>();
  for (const v of leaves) indegree.set(v, 0);
  for (const e of g.edges()) {
    if (e.v === e.w) continue;
    const d = indegree.get(e.w);
    if (d !== undefined) indegree.set(e.w, d + 1);
  }

  const queue = leaves.filter(v => indegree.get(v) === 0);
  let topo: string[] = [];
  for (let head = 0; head < queue.length; head++) {
    const n = queue[head];
    topo.push(n);
    for (const e of g.outEdges(n)) {
      if (e.v === e.w) continue;
      const d = indegree.get(e.w);
      if (d === undefined) continue;
      const next = Math.max(0, d - 1);
      indegree.set(e.w, next);
      if (next === 0) queue.push(e.w);
    }
  }
  if (topo.length !== leaves.length) {
    topo = leaves.slice();
  }

  const ranks = new Map<string, number>();
  for (const v of leaves) ranks.set(v, 0);
  for (const n of topo) {
    const r = ranks.get(n) ?? 0;
    for (const e of g.outEdges(n)) {
      if (e.v === e.w) continue;
      const current = ranks.get(e.w);
      if (current === undefined) continue;
      const next = r + minlenOf(g, e.v, e.w, e.name);
      if (next > current) ranks.set(e.w, next);
    }
  }
  return ranks;
}

/* Pulls the leaf children of each subgraph onto one rank where every edge constraint allows it. */
function compactCompoundRanks(g: LayoutGraph, ranks: Map<string, number>): void {
  for (const parent of g.nodes()) {
    const targets = g.children(parent).filter(c => ranks.has(c));
    if (targets.length < 2) continue;

    let minNeeded = 0;
    let maxAllowed = Number.POSITIVE_INFINITY;
    for (const child of targets) {
      let minRank = 0;
      for (const e of g.inEdges(child)) {
        const predRank = ranks.get(e.v);
        if (predRank === undefined) continue;
        minRank = Math.max(minRank, predRank + minlenOf(g, e.v, e.w, e.name));
      }
      let maxRank = Number.POSITIVE_INFINITY;
      for (const e of g.outEdges(child)) {
        const succRank = ranks.get(e.w);
        if (succRank === undefined) continue;
        maxRank = Math.min(maxRank, Math.max(0, succRank - minlenOf(g, e.v, e.w, e.name)));
      }
      minNeeded = Math.max(minNeeded, minRank);
      maxAllowed = Math.min(maxAllowed, maxRank);
    }

    if (minNeeded <= maxAllowed) {
      for (const child of targets) ranks.set(child, minNeeded);
    }
  }
}

function minlenOf(g: LayoutGraph, v: string, w: string, name: string | undefined): number {
  return Math.max(1, Math.floor(g.edge(v, w, name)?.minlen ?? 1));
}

/*
 * Self-loops become a fixed seven-point loop right of the node. Other edges
 * run straight from the bottom of the source to the top of the target
 * through `2 * minlen + 1` evenly spaced points; a label sits on the middle
 * one, pushed sideways by labelpos.
 */
function routeEdges(g: LayoutGraph, edgesep: number): void {
  for (const e of g.edges()) {
    const source = g.node(e.v);
    const target = g.node(e.w);
    const label = g.edge(e);
    if (!source || !target || !label) continue;
    const sx = source.x ?? 0;
    const sy = source.y ?? 0;
    const points: Point[] = [];
    label.points = points;
    delete label.x;
    delete label.y;

    if (e.v === e.w) {
      const step = Math.max(edgesep, 1);
      const x0 = sx + source.width / 2 + step;
      const x1 = x0 + step;
      const yTop = sy - source.height / 2;
      const yBot = sy + source.height / 2;
      points.push(
        { x: x0, y: sy },
        { x: x0, y: yTop },
        { x: x1, y: yTop },
        { x: x1, y: sy },
        { x: x1, y: yBot },
        { x: x0, y: yBot },
        { x: x0, y: sy },
      );
      continue;
    }

    const start = { x: sx, y: sy + source.height / 2 };
    const end = { x: target.x ?? 0, y: (target.y ?? 0) - target.height / 2 };
    const count = 2 * Math.max(1, Math.floor(label.minlen)) + 1;
    for (let i = 0; i < count; i++) {
      const t = i / (count - 1);
      points.push({ x: start.x + (end.x - start.x) * t, y: start.y + (end.y - start.y) * t });
    }

    if (label.width > 0 || label.height > 0) {
      const mid = points[Math.floor(count / 2)];
      let x = mid.x;
      if (label.labelpos === 'l') x -= label.labeloffset + label.width / 2;
      else if (label.labelpos === 'r') x += label.labeloffset + label.width / 2;
      label.x = x;
      label.y = mid.y;
    }
  }
}

/* Maps the top-to-bottom drawing onto the requested direction. Node sizes are left as given. */
function transformRankDir(g: LayoutGraph, rankdir: string, totalHeight: number): void {
  if (rankdir === 'TB') return;

  const map = (p: { x: number; y: number }): Point => {
    switch (rankdir) {
      case 'BT':
        return { x: p.x, y: totalHeight - p.y };
      case 'LR':
        return { x: p.y, y: p.x };
      default:
        return { x: totalHeight - p.y, y: p.x };
    }
  };

  for (const v of g.nodes()) {
    const node = g.node(v);
    if (node?.x === undefined || node.y === undefined) continue;
    const p = map({ x: node.x, y: node.y });
    node.x = p.x;
    node.y = p.y;
  }

  for (const e of g.edges()) {
    const label = g.edge(e);
    if (!label) continue;
    label.points = (label.points ?? []).map(map);
    if (label.x !== undefined && label.y !== undefined) {
      const p = map({ x: label.x, y: label.y });
      label.x = p.x;
      label.y = p.y;
    }
  }
}

/*
 * Subgraph boxes enclose their positioned descendants; rank span covers
 * their ranked leaves. Inner subgraphs are sized before outer ones.
 */
interface Bounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
  minRank: number;
  maxRank: number;
}

function assignCompoundBounds(g: LayoutGraph): void {
  const visit = (v: string): Bounds | undefined => {
    const node = g.node(v);
    if (!node) return undefined;
    const children = g.children(v);
    if (!children.length) {
      if (node.x === undefined || node.y === undefined) return undefined;
      return {
        minX: node.x - node.width / 2,
        maxX: node.x + node.width / 2,
        minY: node.y - node.height / 2,
        maxY: node.y + node.height / 2,
        minRank: node.rank ?? 0,
        maxRank: node.rank ?? 0,
      };
    }

    let bounds: Bounds | undefined;
    for (const child of children) {
      const b = visit(child);
      if (!b) continue;
      bounds = bounds
        ? {
            minX: Math.min(bounds.minX, b.minX),
            maxX: Math.max(bounds.maxX, b.maxX),
            minY: Math.min(bounds.minY, b.minY),
            maxY: Math.max(bounds.maxY, b.maxY),
            minRank: Math.min(bounds.minRank, b.minRank),
            maxRank: Math.max(bounds.maxRank, b.maxRank),
          }
        : b;
    }
    if (!bounds) return undefined;
    node.width = bounds.maxX - bounds.minX;
    node.height = bounds.maxY - bounds.minY;
    node.x = bounds.minX + node.width / 2;
    node.y = bounds.minY + node.height / 2;
    node.minRank = bounds.minRank;
    node.maxRank = bounds.maxRank;
    return bounds;
  };

  for (const v of g.children()) visit(v);
}
