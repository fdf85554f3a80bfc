import type { LayoutGraph } from './types.js';
import { addBorderNode, addDummyNode, defaultEdgeLabel, graphConfig } from './util.js';

/*
 * A nesting graph keeps each subgraph on a contiguous band of ranks. Every
 * subgraph gets a top and bottom border node; nesting edges tie the border
 * nodes to the children, and a root node connected to every top-level node
 * makes the graph connected, which the ranker requires.
 *
 * Existing edge lengths are multiplied by `nodeSep = 2 * height + 1` so the
 * border nodes get ranks of their own between real nodes; the multiplier is
 * recorded as `nodeRankFactor` so the empty ranks can be dropped again.
 *
 * Graphs without subgraphs still get the root, which connects their
 * components.
 */
export function run(g: LayoutGraph): void {
  const root = addDummyNode(g, 'root', { width: 0, height: 0 }, '_root');
  const depths = treeDepths(g);
  let height = -Infinity;
  for (const depth of depths.values()) height = Math.max(height, depth);
  height -= 1;
  const nodeSep = 2 * height + 1;

  const config = graphConfig(g);
  config.nestingRoot = root;

  for (const e of g.edges()) {
    const edge = g.edge(e);
    if (edge) edge.minlen *= nodeSep;
  }

  // Heavy enough to keep subgraphs vertically compact.
  const weight = sumWeights(g) + 1;

  for (const child of g.children()) {
    dfs(g, root, nodeSep, weight, height, depths, child);
  }

  config.nodeRankFactor = nodeSep;
}

function dfs(
  g: LayoutGraph,
  root: string,
  nodeSep: number,
  weight: number,
  height: number,
  depths: Map<string, number>,
  v: string,
): void {
  const children = g.children(v);
  if (!children.length) {
    if (v !== root) {
      g.setEdge(root, v, { ...defaultEdgeLabel(), weight: 0, minlen: nodeSep });
    }
    return;
  }

  const top = addBorderNode(g, '_bt');
  const bottom = addBorderNode(g, '_bb');
  const label = g.node(v);

  g.setParent(top, v);
  g.setParent(bottom, v);
  if (label) {
    label.borderTop = top;
    label.borderBottom = bottom;
  }

  const depth = depths.get(v) ?? 0;
  for (const child of children) {
    dfs(g, root, nodeSep, weight, height, depths, child);

    const childNode = g.node(child);
    const childTop = childNode?.borderTop ?? child;
    const childBottom = childNode?.borderBottom ?? child;
    const thisWeight = childNode?.borderTop ? weight : 2 * weight;
    const minlen = childTop !== childBottom ? 1 : height - depth + 1;

    g.setEdge(top, childTop, { ...defaultEdgeLabel(), weight: thisWeight, minlen, nestingEdge: true });
    g.setEdge(childBottom, bottom, { ...defaultEdgeLabel(), weight: thisWeight, minlen, nestingEdge: true });
  }

  if (!g.parent(v)) {
    g.setEdge(root, top, { ...defaultEdgeLabel(), weight: 0, minlen: height + depth });
  }
}

function treeDepths(g: LayoutGraph): Map<string, number> {
  const depths = new Map<string, number>();
  const dfs = (v: string, depth: number): void => {
    for (const child of g.children(v)) dfs(child, depth + 1);
    depths.set(v, depth);
  };
  for (const v of g.children()) dfs(v, 1);
  return depths;
}

function sumWeights(g: LayoutGraph): number {
  return g.edges().reduce((acc, e) => acc + (g.edge(e)?.weight ?? 0), 0);
}

/** Removes the nesting root and nesting edges; the border nodes stay. */
export function cleanup(g: LayoutGraph): void {
  const config = graphConfig(g);
  if (config.nestingRoot !== undefined) g.removeNode(config.nestingRoot);
  delete config.nestingRoot;
  for (const e of g.edges()) {
    if (g.edge(e)?.nestingEdge) g.removeEdge(e);
  }
}
