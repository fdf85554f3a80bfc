import type { Edge, Graph } from '../../graphlib/graph.js';
import { postorder, preorder } from '../../graphlib/alg.js';
import type { LayoutNode } from '../types.js';
import { minBy, simplify, type RankEdge } from '../util.js';
import { feasibleTree, type Tree, type TreeNode } from './feasible-tree.js';
import { longestPath, slack } from './util.js';

type SimpleGraph = Graph<LayoutNode, RankEdge, unknown>;

/*
 * Network simplex ranking (Gansner et al., "A Technique for Drawing Directed
 * Graphs"). Start from a feasible tight tree, then repeatedly swap a tree
 * edge with a negative cut value for the non-tree edge of minimum slack that
 * reconnects the two halves. The graph must be connected and acyclic.
 */
export function networkSimplex<E extends RankEdge, G>(graph: Graph<LayoutNode, E, G>): void {
  const g: SimpleGraph = simplify(graph);
  longestPath(g);
  const t = feasibleTree(g);
  initLowLimValues(t);
  initCutValues(t, g);

  let e: Edge | undefined;
  while ((e = leaveEdge(t))) {
    const f = enterEdge(t, g, e);
    if (!f) break;
    exchangeEdges(t, g, e, f);
  }
}

export function initCutValues(t: Tree, g: SimpleGraph): void {
  let vs = postorder(t, t.nodes());
  vs = vs.slice(0, vs.length - 1);
  for (const v of vs) assignCutValue(t, g, v);
}

function assignCutValue(t: Tree, g: SimpleGraph, child: string): void {
  const parent = t.node(child)?.parent;
  if (parent === undefined) return;
  const edge = t.edge(child, parent);
  if (edge) edge.cutvalue = calcCutValue(t, g, child);
}

/** Cut value of the tree edge between `child` and its parent. */
export function calcCutValue(t: Tree, g: SimpleGraph, child: string): number {
  const parent = t.node(child)?.parent;
  if (parent === undefined) return 0;
  // Whether the tree edge points from child to parent in the graph.
  let childIsTail = true;
  let graphEdge = g.edge(child, parent);
  if (!graphEdge) {
    childIsTail = false;
    graphEdge = g.edge(parent, child);
  }

  let cutValue = graphEdge?.weight ?? 0;
  for (const e of g.nodeEdges(child)) {
    const isOutEdge = e.v === child;
    const other = isOutEdge ? e.w : e.v;
    if (other === parent) continue;
    const pointsToHead = isOutEdge === childIsTail;
    const otherWeight = g.edge(e)?.weight ?? 0;
    cutValue += pointsToHead ? otherWeight : -otherWeight;
    if (t.hasEdge(child, other)) {
      const otherCutValue = t.edge(child, other)?.cutvalue ?? 0;
      cutValue += pointsToHead ? -otherCutValue : otherCutValue;
    }
  }
  return cutValue;
}

export function initLowLimValues(tree: Tree, root: string | undefined = tree.nodes()[0]): void {
  if (root === undefined) return;
  dfsAssignLowLim(tree, new Set(), 1, root);
}

function dfsAssignLowLim(tree: Tree, visited: Set<string>, nextLim: number, v: string, parent?: string): number {
  const low = nextLim;
  visited.add(v);
  for (const w of tree.neighbors(v)) {
    if (!visited.has(w)) nextLim = dfsAssignLowLim(tree, visited, nextLim, w, v);
  }
  const label = tree.node(v);
  if (label) {
    label.low = low;
    label.lim = nextLim;
    if (parent !== undefined) label.parent = parent;
    else delete label.parent;
  }
  return nextLim + 1;
}

export function leaveEdge(tree: Tree): Edge | undefined {
  return tree.edges().find(e => (tree.edge(e)?.cutvalue ?? 0) < 0);
}

export function enterEdge(t: Tree, g: SimpleGraph, edge: Edge): Edge | undefined {
  let v = edge.v;
  let w = edge.w;
  // The tree is undirected; orient the edge the way the graph has it.
  if (!g.hasEdge(v, w)) {
    v = edge.w;
    w = edge.v;
  }

  const vLabel = t.node(v);
  const wLabel = t.node(w);
  if (!vLabel || !wLabel) return undefined;
  let tailLabel = vLabel;
  let flip = false;

  // If the root is in the tail of the edge, reverse the descendant test.
  if ((vLabel.lim ?? 0) > (wLabel.lim ?? 0)) {
    tailLabel = wLabel;
    flip = true;
  }

  const candidates = g.edges().filter(
    e => flip === isDescendant(t.node(e.v), tailLabel) && flip !== isDescendant(t.node(e.w), tailLabel),
  );
  return minBy(candidates, e => slack(g, e));
}

export function exchangeEdges(t: Tree, g: SimpleGraph, e: Edge, f: Edge): void {
  t.removeEdge(e.v, e.w);
  t.setEdge(f.v, f.w, {});
  initLowLimValues(t);
  initCutValues(t, g);
  updateRanks(t, g);
}

function updateRanks(t: Tree, g: SimpleGraph): void {
  const root = t.nodes()[0];
  if (root === undefined) return;
  const vs = preorder(t, [root]).slice(1);
  for (const v of vs) {
    const parent = t.node(v)?.parent;
    if (parent === undefined) continue;
    let edge = g.edge(v, parent);
    let flipped = false;
    if (!edge) {
      edge = g.edge(parent, v);
      flipped = true;
    }
    const node = g.node(v);
    const minlen = edge?.minlen ?? 1;
    if (node) node.rank = (g.node(parent)?.rank ?? 0) + (flipped ? minlen : -minlen);
  }
}

function isDescendant(vLabel: TreeNode | undefined, rootLabel: TreeNode): boolean {
  const lim = vLabel?.lim ?? NaN;
  return (rootLabel.low ?? 0) <= lim && lim <= (rootLabel.lim ?? 0);
}
