import { Graph } from '../graphlib/graph.js';
import type { DummyKind, LayoutEdge, LayoutGraph, LayoutGraphLabel, LayoutNode, Point } from './types.js';

export interface RankEdge {
  weight: number;
  minlen: number;
}

const idCounters = new WeakMap<object, number>();

/** Ids for synthetic nodes and edges; counters are per graph so separate layouts never interact. */
export function uniqueId(g: object, prefix: string): string {
  const next = (idCounters.get(g) ?? 0) + 1;
  idCounters.set(g, next);
  return prefix + next;
}

export function defaultGraphLabel(): LayoutGraphLabel {
  return {
    rankdir: 'TB',
    nodesep: 50,
    edgesep: 20,
    ranksep: 50,
    marginx: 0,
    marginy: 0,
    ranker: 'network-simplex',
  };
}

export function graphConfig(g: LayoutGraph): LayoutGraphLabel {
  let label = g.graph();
  if (!label) {
    label = defaultGraphLabel();
    g.setGraph(label);
  }
  return label;
}

export function defaultEdgeLabel(): LayoutEdge {
  return { minlen: 1, weight: 1, width: 0, height: 0, labeloffset: 10, labelpos: 'r' };
}

export function addDummyNode(g: LayoutGraph, type: DummyKind, attrs: LayoutNode, name: string): string {
  let v: string;
  do {
    v = uniqueId(g, name);
  } while (g.hasNode(v));
  attrs.dummy = type;
  g.setNode(v, attrs);
  return v;
}

/** Collapses a multigraph into a simple graph, summing weights and keeping the largest minlen. */
export function simplify<E extends RankEdge, G>(g: Graph<LayoutNode, E, G>): Graph<LayoutNode, RankEdge, unknown> {
  const simplified = new Graph<LayoutNode, RankEdge, unknown>().setGraph(g.graph());
  for (const v of g.nodes()) simplified.setNode(v, g.node(v));
  for (const e of g.edges()) {
    const prev = simplified.edge(e.v, e.w) ?? { weight: 0, minlen: 1 };
    const label = g.edge(e);
    simplified.setEdge(e.v, e.w, {
      weight: prev.weight + (label?.weight ?? 0),
      minlen: Math.max(prev.minlen, label?.minlen ?? 1),
    });
  }
  return simplified;
}

/** Leaf-only view of a compound graph; labels are shared with the source. */
export function asNonCompoundGraph(g: LayoutGraph): LayoutGraph {
  const simplified: LayoutGraph = new Graph<LayoutNode, LayoutEdge, LayoutGraphLabel>({
    multigraph: g.isMultigraph(),
  });
  simplified.setGraph(graphConfig(g));
  for (const v of g.nodes()) {
    if (g.children(v).length === 0) simplified.setNode(v, g.node(v));
  }
  for (const e of g.edges()) {
    simplified.setEdge(e.v, e.w, g.edge(e), e.name);
  }
  return simplified;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Point where the segment from the center of `rect` towards `point` leaves
 * the rectangle. A point at the center yields the center itself.
 */
export function intersectRect(rect: Rect, point: Point): Point {
  const { x, y } = rect;
  const dx = point.x - x;
  const dy = point.y - y;
  let w = rect.width / 2;
  let h = rect.height / 2;

  if (!dx && !dy) return { x, y };

  let sx: number;
  let sy: number;
  if (Math.abs(dy) * w > Math.abs(dx) * h) {
    if (dy < 0) h = -h;
    sx = (h * dx) / dy;
    sy = h;
  } else {
    if (dx < 0) w = -w;
    sx = w;
    sy = (w * dy) / dx;
  }
  return { x: x + sx, y: y + sy };
}

/** Rank-indexed rows of node ids, each row indexed by `order`. */
export function buildLayerMatrix(g: LayoutGraph): string[][] {
  const layering: string[][] = [];
  for (let i = 0; i <= maxRank(g); i++) layering.push([]);
  for (const v of g.nodes()) {
    const node = g.node(v);
    if (node?.rank === undefined) continue;
    layering[node.rank][node.order ?? 0] = v;
  }
  return layering;
}

/** Shifts ranks so the smallest becomes 0. */
export function normalizeRanks(g: LayoutGraph): void {
  let min = Infinity;
  for (const v of g.nodes()) {
    const rank = g.node(v)?.rank;
    if (rank !== undefined) min = Math.min(min, rank);
  }
  if (!Number.isFinite(min)) return;
  for (const v of g.nodes()) {
    const node = g.node(v);
    if (node?.rank !== undefined) node.rank -= min;
  }
}

export function removeEmptyRanks(g: LayoutGraph): void {
  let offset = Infinity;
  for (const v of g.nodes()) {
    const rank = g.node(v)?.rank;
    if (rank !== undefined) offset = Math.min(offset, rank);
  }
  if (!Number.isFinite(offset)) return;

  const layers: (string[] | undefined)[] = [];
  for (const v of g.nodes()) {
    const rank = g.node(v)?.rank;
    if (rank === undefined) continue;
    const idx = rank - offset;
    const layer = layers[idx] ?? [];
    layer.push(v);
    layers[idx] = layer;
  }

  let delta = 0;
  const nodeRankFactor = graphConfig(g).nodeRankFactor ?? 0;
  for (let i = 0; i < layers.length; i++) {
    const vs = layers[i];
    if (vs === undefined && i % nodeRankFactor !== 0) {
      --delta;
    } else if (vs !== undefined && delta) {
      for (const v of vs) {
        const node = g.node(v);
        if (node?.rank !== undefined) node.rank += delta;
      }
    }
  }
}

export function addBorderNode(g: LayoutGraph, prefix: string, rank?: number, order?: number): string {
  const node: LayoutNode = { width: 0, height: 0 };
  if (rank !== undefined && order !== undefined) {
    node.rank = rank;
    node.order = order;
  }
  return addDummyNode(g, 'border', node, prefix);
}

export function maxRank<E, G>(g: Graph<LayoutNode, E, G>): number {
  let max = -1;
  for (const v of g.nodes()) {
    const rank = g.node(v)?.rank;
    if (rank !== undefined && rank > max) max = rank;
  }
  return max;
}

export function partition<T>(collection: T[], fn: (value: T) => boolean): { lhs: T[]; rhs: T[] } {
  const lhs: T[] = [];
  const rhs: T[] = [];
  for (const value of collection) {
    if (fn(value)) lhs.push(value);
    else rhs.push(value);
  }
  return { lhs, rhs };
}

export type TimeFn = <T>(name: string, fn: () => T) => T;

export function time<T>(name: string, fn: () => T): T {
  const start = Date.now();
  try {
    return fn();
  } finally {
    console.log(name + ' time: ' + (Date.now() - start) + 'ms');
  }
}

export function notime<T>(_name: string, fn: () => T): T {
  return fn();
}

export function minBy<T>(values: T[], fn: (value: T) => number): T | undefined {
  let best: T | undefined;
  let bestScore = NaN;
  for (const value of values) {
    const score = fn(value);
    if (Number.isNaN(score)) continue;
    if (Number.isNaN(bestScore) || score < bestScore) {
      best = value;
      bestScore = score;
    }
  }
  return best;
}

export function range(start: number, end: number, step = 1): number[] {
  const out: number[] = [];
  if (step > 0) for (let i = start; i < end; i += step) out.push(i);
  else for (let i = start; i > end; i += step) out.push(i);
  return out;
}
