/*
 * Horizontal coordinate assignment after Brandes and Köpf, "Fast and Simple
 * Horizontal Coordinate Assignment", with the corrections from Carstens,
 * "Node and Label Placement in a Layered Layout Algorithm".
 *
 * Four candidate layouts are built (up/down crossed with left/right
 * alignment); the narrowest becomes the reference the others are aligned
 * to, and each node finally takes the average of its two median candidates.
 */
import { Graph } from '../../graphlib/graph.js';
import type { Alignment, BorderType, LayoutGraph } from '../types.js';
import { buildLayerMatrix } from '../util.js';

export type Conflicts = Map<string, Set<string>>;
export type Xs = Map<string, number>;
export type AlignmentKey = 'ul' | 'ur' | 'dl' | 'dr';

const ALIGNMENT_KEYS: AlignmentKey[] = ['ul', 'ur', 'dl', 'dr'];

/**
 * Type-1 conflicts: a non-inner segment crossing an inner segment (one
 * between two dummy nodes). The inner segment wins, so the other is marked.
 */
export function findType1Conflicts(g: LayoutGraph, layering: string[][]): Conflicts {
  const conflicts: Conflicts = new Map();

  const visitLayer = (prevLayer: string[], layer: string[]): string[] => {
    let k0 = 0;
    let scanPos = 0;
    const prevLayerLength = prevLayer.length;
    const lastNode = layer[layer.length - 1];

    layer.forEach((v, i) => {
      const w = findOtherInnerSegmentNode(g, v);
      const k1 = w !== undefined ? (g.node(w)?.order ?? 0) : prevLayerLength;

      if (w !== undefined || v === lastNode) {
        for (const scanNode of layer.slice(scanPos, i + 1)) {
          for (const u of g.predecessors(scanNode)) {
            const uLabel = g.node(u);
            const uPos = uLabel?.order ?? 0;
            if ((uPos < k0 || k1 < uPos) && !(uLabel?.dummy && g.node(scanNode)?.dummy)) {
              addConflict(conflicts, u, scanNode);
            }
          }
        }
        scanPos = i + 1;
        k0 = k1;
      }
    });

    return layer;
  };

  if (layering.length) layering.reduce(visitLayer);
  return conflicts;
}

/**
 * Type-2 conflicts: inner segments crossing the vertical borders of a
 * subgraph. Dummies whose predecessors fall outside the border window on
 * the north layer are marked.
 */
export function findType2Conflicts(g: LayoutGraph, layering: string[][]): Conflicts {
  const conflicts: Conflicts = new Map();

  const scan = (
    south: string[],
    southPos: number,
    southEnd: number,
    prevNorthBorder: number | undefined,
    nextNorthBorder: number | undefined,
  ): void => {
    for (let i = southPos; i < southEnd; i++) {
      const v = south[i];
      if (!g.node(v)?.dummy) continue;
      for (const u of g.predecessors(v)) {
        const uNode = g.node(u);
        if (!uNode?.dummy) continue;
        const uOrder = uNode.order ?? 0;
        if (
          (prevNorthBorder !== undefined && uOrder < prevNorthBorder) ||
          (nextNorthBorder !== undefined && uOrder > nextNorthBorder)
        ) {
          addConflict(conflicts, u, v);
        }
      }
    }
  };

  const visitLayer = (north: string[], south: string[]): string[] => {
    let prevNorthPos = -1;
    let nextNorthPos: number | undefined;
    let southPos = 0;

    south.forEach((v, southLookahead) => {
      if (g.node(v)?.dummy === 'border') {
        const predecessors = g.predecessors(v);
        if (predecessors.length) {
          nextNorthPos = g.node(predecessors[0])?.order ?? 0;
          scan(south, southPos, southLookahead, prevNorthPos, nextNorthPos);
          southPos = southLookahead;
          prevNorthPos = nextNorthPos;
        }
      }
      scan(south, southPos, south.length, nextNorthPos, north.length);
    });

    return south;
  };

  if (layering.length) layering.reduce(visitLayer);
  return conflicts;
}

export function findOtherInnerSegmentNode(g: LayoutGraph, v: string): string | undefined {
  if (g.node(v)?.dummy) {
    return g.predecessors(v).find(u => g.node(u)?.dummy);
  }
  return undefined;
}

export function addConflict(conflicts: Conflicts, v: string, w: string): void {
  if (v > w) [v, w] = [w, v];
  let conflictsV = conflicts.get(v);
  if (!conflictsV) {
    conflictsV = new Set();
    conflicts.set(v, conflictsV);
  }
  conflictsV.add(w);
}

export function hasConflict(conflicts: Conflicts, v: string, w: string): boolean {
  if (v > w) [v, w] = [w, v];
  return conflicts.get(v)?.has(w) ?? false;
}

export interface VerticalAlignment {
  root: Map<string, string>;
  align: Map<string, string>;
}

/**
 * Aligns each node with the median of its neighbours (on the layer given by
 * `neighborFn`) into blocks, skipping marked conflicts and never crossing
 * an alignment already made on the same layer.
 */
export function verticalAlignment(
  layering: string[][],
  conflicts: Conflicts,
  neighborFn: (v: string) => string[],
): VerticalAlignment {
  const root = new Map<string, string>();
  const align = new Map<string, string>();
  const pos = new Map<string, number>();

  for (const layer of layering) {
    layer.forEach((v, order) => {
      root.set(v, v);
      align.set(v, v);
      pos.set(v, order);
    });
  }

  const posOf = (v: string): number => pos.get(v) ?? 0;

  for (const layer of layering) {
    let prevIdx = -1;
    for (const v of layer) {
      const ws = neighborFn(v);
      if (!ws.length) continue;
      ws.sort((a, b) => posOf(a) - posOf(b));
      const mp = (ws.length - 1) / 2;
      for (let i = Math.floor(mp), il = Math.ceil(mp); i <= il; ++i) {
        const w = ws[i];
        if (align.get(v) === v && prevIdx < posOf(w) && !hasConflict(conflicts, v, w)) {
          const wRoot = root.get(w) ?? w;
          align.set(w, v);
          align.set(v, wRoot);
          root.set(v, wRoot);
          prevIdx = posOf(w);
        }
      }
    }
  }

  return { root, align };
}

/**
 * Places each block as far left as separation allows, then pulls blocks
 * right towards their successors where that leaves room. Every node takes
 * its block root's coordinate.
 */
export function horizontalCompaction(
  g: LayoutGraph,
  layering: string[][],
  root: Map<string, string>,
  align: Map<string, string>,
  reverseSep = false,
): Xs {
  const xs: Xs = new Map();
  const blockG = buildBlockGraph(g, layering, root, reverseSep);
  const borderType: BorderType = reverseSep ? 'borderLeft' : 'borderRight';

  const iterate = (setXsFunc: (v: string) => void, nextNodesFunc: (v: string) => string[]): void => {
    let stack = blockG.nodes();
    const visited = new Set<string>();
    let elem = stack.pop();
    while (elem !== undefined) {
      if (visited.has(elem)) {
        setXsFunc(elem);
      } else {
        visited.add(elem);
        stack.push(elem);
        stack = stack.concat(nextNodesFunc(elem));
      }
      elem = stack.pop();
    }
  };

  // Smallest coordinates
  const pass1 = (elem: string): void => {
    xs.set(
      elem,
      blockG.inEdges(elem).reduce((acc, e) => Math.max(acc, (xs.get(e.v) ?? 0) + (blockG.edge(e) ?? 0)), 0),
    );
  };

  // Greatest coordinates, skipping the border on the side being compacted against
  const pass2 = (elem: string): void => {
    const min = blockG
      .outEdges(elem)
      .reduce((acc, e) => Math.min(acc, (xs.get(e.w) ?? 0) - (blockG.edge(e) ?? 0)), Number.POSITIVE_INFINITY);
    const node = g.node(elem);
    if (min !== Number.POSITIVE_INFINITY && node?.borderType !== borderType) {
      xs.set(elem, Math.max(xs.get(elem) ?? 0, min));
    }
  };

  iterate(pass1, v => blockG.predecessors(v));
  iterate(pass2, v => blockG.successors(v));

  const result: Xs = new Map();
  for (const v of align.keys()) {
    result.set(v, xs.get(root.get(v) ?? v) ?? 0);
  }
  return result;
}

function buildBlockGraph(
  g: LayoutGraph,
  layering: string[][],
  root: Map<string, string>,
  reverseSep: boolean,
): Graph<unknown, number, unknown> {
  const blockGraph = new Graph<unknown, number, unknown>();
  const graphLabel = g.graph();
  const sepFn = sep(graphLabel?.nodesep ?? 0, graphLabel?.edgesep ?? 0, reverseSep);

  for (const layer of layering) {
    let u: string | undefined;
    for (const v of layer) {
      const vRoot = root.get(v) ?? v;
      blockGraph.setNode(vRoot);
      if (u !== undefined) {
        const uRoot = root.get(u) ?? u;
        const prevMax = blockGraph.edge(uRoot, vRoot);
        blockGraph.setEdge(uRoot, vRoot, Math.max(sepFn(g, v, u), prevMax ?? 0));
      }
      u = v;
    }
  }

  return blockGraph;
}

/** Minimum distance between the centers of neighbours `w` (left) and `v` (right). */
function sep(nodeSep: number, edgeSep: number, reverseSep: boolean) {
  return (g: LayoutGraph, v: string, w: string): number => {
    const vLabel = g.node(v);
    const wLabel = g.node(w);
    const vWidth = vLabel?.width ?? 0;
    const wWidth = wLabel?.width ?? 0;
    let sum = 0;
    let delta = 0;

    sum += vWidth / 2;
    if (vLabel?.labelpos === 'l') delta = -vWidth / 2;
    else if (vLabel?.labelpos === 'r') delta = vWidth / 2;
    if (delta) sum += reverseSep ? delta : -delta;
    delta = 0;

    sum += (vLabel?.dummy ? edgeSep : nodeSep) / 2;
    sum += (wLabel?.dummy ? edgeSep : nodeSep) / 2;

    sum += wWidth / 2;
    if (wLabel?.labelpos === 'l') delta = wWidth / 2;
    else if (wLabel?.labelpos === 'r') delta = -wWidth / 2;
    if (delta) sum += reverseSep ? delta : -delta;

    return sum;
  };
}

function width(g: LayoutGraph, v: string): number {
  return g.node(v)?.width ?? 0;
}

/** The candidate layout with the smallest total width; earlier keys win ties. */
export function findSmallestWidthAlignment(g: LayoutGraph, xss: Map<AlignmentKey, Xs>): Xs {
  let best: Xs = new Map();
  let bestWidth = Number.POSITIVE_INFINITY;
  for (const key of ALIGNMENT_KEYS) {
    const xs = xss.get(key);
    if (!xs) continue;
    let max = Number.NEGATIVE_INFINITY;
    let min = Number.POSITIVE_INFINITY;
    for (const [v, x] of xs) {
      const halfWidth = width(g, v) / 2;
      max = Math.max(x + halfWidth, max);
      min = Math.min(x - halfWidth, min);
    }
    const w = max - min;
    if (w < bestWidth) {
      bestWidth = w;
      best = xs;
    }
  }
  return best;
}

/**
 * Shifts the left-aligned candidates so their minimum matches `alignTo`'s
 * and the right-aligned ones so their maximum does.
 */
export function alignCoordinates(xss: Map<AlignmentKey, Xs>, alignTo: Xs): void {
  const alignToVals = Array.from(alignTo.values());
  const alignToMin = Math.min(...alignToVals);
  const alignToMax = Math.max(...alignToVals);

  for (const alignment of ALIGNMENT_KEYS) {
    const xs = xss.get(alignment);
    if (!xs || xs === alignTo) continue;
    const xsVals = Array.from(xs.values());
    const delta = alignment.endsWith('l') ? alignToMin - Math.min(...xsVals) : alignToMax - Math.max(...xsVals);
    if (delta) {
      const shifted: Xs = new Map();
      for (const [v, x] of xs) shifted.set(v, x + delta);
      xss.set(alignment, shifted);
    }
  }
}

/** Final x per node: the requested candidate, or the mean of the two medians. */
export function balance(xss: Map<AlignmentKey, Xs>, align?: Alignment): Xs {
  const result: Xs = new Map();
  const ul = xss.get('ul');
  if (!ul) return result;

  for (const v of ul.keys()) {
    if (align) {
      result.set(v, xss.get(toAlignmentKey(align))?.get(v) ?? 0);
    } else {
      const xs: number[] = [];
      for (const key of ALIGNMENT_KEYS) {
        const x = xss.get(key)?.get(v);
        if (x !== undefined) xs.push(x);
      }
      xs.sort((a, b) => a - b);
      result.set(v, (xs[1] + xs[2]) / 2);
    }
  }
  return result;
}

function toAlignmentKey(align: Alignment): AlignmentKey {
  switch (align) {
    case 'UL':
      return 'ul';
    case 'UR':
      return 'ur';
    case 'DL':
      return 'dl';
    case 'DR':
      return 'dr';
  }
}

export function positionX(g: LayoutGraph): Xs {
  const layering = buildLayerMatrix(g);
  const conflicts = findType1Conflicts(g, layering);
  for (const [v, ws] of findType2Conflicts(g, layering)) {
    for (const w of ws) addConflict(conflicts, v, w);
  }

  const xss = new Map<AlignmentKey, Xs>();
  for (const vert of ['u', 'd'] as const) {
    let adjustedLayering = vert === 'u' ? layering : layering.slice().reverse();
    for (const horiz of ['l', 'r'] as const) {
      const key: AlignmentKey = vert === 'u' ? (horiz === 'l' ? 'ul' : 'ur') : horiz === 'l' ? 'dl' : 'dr';
      if (horiz === 'r') {
        adjustedLayering = adjustedLayering.map(inner => inner.slice().reverse());
      }

      const neighborFn = vert === 'u' ? (v: string) => g.predecessors(v) : (v: string) => g.successors(v);
      const align = verticalAlignment(adjustedLayering, conflicts, neighborFn);
      let xs = horizontalCompaction(g, adjustedLayering, align.root, align.align, horiz === 'r');
      if (horiz === 'r') {
        const negated: Xs = new Map();
        for (const [v, x] of xs) negated.set(v, -x);
        xs = negated;
      }
      xss.set(key, xs);
    }
  }

  const smallestWidth = findSmallestWidthAlignment(g, xss);
  alignCoordinates(xss, smallestWidth);
  return balance(xss, g.graph()?.align);
}
