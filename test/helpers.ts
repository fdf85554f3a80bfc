import { Graph } from '../src/graphlib/graph.js';
import type {
  EdgeLabel,
  GraphLabel,
  InputGraph,
  LayoutEdge,
  LayoutGraph,
  LayoutGraphLabel,
  LayoutNode,
  NodeLabel,
} from '../src/layout/types.js';
import { defaultEdgeLabel, defaultGraphLabel } from '../src/layout/util.js';

export function layoutGraph(label: Partial<LayoutGraphLabel> = {}): LayoutGraph {
  const g: LayoutGraph = new Graph<LayoutNode, LayoutEdge, LayoutGraphLabel>({ multigraph: true, compound: true });
  g.setGraph({ ...defaultGraphLabel(), ...label });
  return g;
}

export function node(attrs: Partial<LayoutNode> = {}): LayoutNode {
  return { width: 0, height: 0, ...attrs };
}

export function edge(attrs: Partial<LayoutEdge> = {}): LayoutEdge {
  return { ...defaultEdgeLabel(), ...attrs };
}

export function setPath(g: LayoutGraph, vs: string[], attrs: Partial<LayoutEdge> = {}): void {
  for (let i = 1; i < vs.length; i++) {
    g.setEdge(vs[i - 1], vs[i], edge(attrs));
  }
}

export function rankOf(g: LayoutGraph, v: string): number | undefined {
  return g.node(v)?.rank;
}

/** Small deterministic PRNG (mulberry32) for generated graphs. */
export function prng(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Random DAG over `n` nodes: edges only go from lower to higher index. */
export function randomDag(seed: number, n: number, edgeChance = 0.3): { nodes: string[]; edges: [string, string][] } {
  const rand = prng(seed);
  const nodes = Array.from({ length: n }, (_, i) => `n${i}`);
  const edges: [string, string][] = [];
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      if (rand() < edgeChance) edges.push([nodes[i], nodes[j]]);
    }
  }
  return { nodes, edges };
}

export interface NodeSpec {
  id: string;
  width?: number;
  height?: number;
  parent?: string;
}

export interface EdgeSpec {
  v: string;
  w: string;
  name?: string;
  label?: EdgeLabel;
}

/** Caller-facing graph as layout receives it. */
export function inputGraph(nodes: NodeSpec[], edges: EdgeSpec[], options: GraphLabel = {}): InputGraph {
  const g: InputGraph = new Graph<NodeLabel, EdgeLabel, GraphLabel>({ multigraph: true, compound: true });
  g.setGraph({ ...options });
  for (const n of nodes) {
    g.setNode(n.id, { width: n.width ?? 0, height: n.height ?? 0 });
  }
  for (const n of nodes) {
    if (n.parent !== undefined) g.setParent(n.id, n.parent);
  }
  for (const e of edges) {
    g.setEdge(e.v, e.w, { ...e.label }, e.name);
  }
  return g;
}
