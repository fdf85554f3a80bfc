import { Graph } from '../../graphlib/graph.js';
import type { LayoutNode } from '../types.js';
import { minBy, type RankEdge } from '../util.js';
import { slack } from './util.js';

export interface TreeNode {
  low?: number;
  lim?: number;
  parent?: string;
}

export interface TreeEdge {
  cutvalue?: number;
}

export type Tree = Graph<TreeNode, TreeEdge>;

/**
 * Grows a tight spanning tree (every tree edge has zero slack) from the
 * first node, shifting the ranks of the tree nodes towards the edge of
 * smallest slack that leaves the tree until every node is covered. Ranks in
 * `g` are updated in place; the input must be connected.
 */
export function feasibleTree<E extends RankEdge, G>(g: Graph<LayoutNode, E, G>): Tree {
  const t: Tree = new Graph<TreeNode, TreeEdge>({ directed: false });
  const start = g.nodes()[0];
  if (start === undefined) return t;
  const size = g.nodeCount();
  t.setNode(start, {});

  while (tightTree(t, g) < size) {
    const edge = findMinSlackEdge(t, g);
    if (!edge) break;
    const delta = t.hasNode(edge.v) ? slack(g, edge) : -slack(g, edge);
    shiftRanks(t, g, delta);
  }
  return t;
}

/** Extends `t` with every node reachable over tight edges; returns the tree size. */
function tightTree<E extends RankEdge, G>(t: Tree, g: Graph<LayoutNode, E, G>): number {
  const dfs = (v: string): void => {
    for (const e of g.nodeEdges(v)) {
      const w = v === e.v ? e.w : e.v;
      if (!t.hasNode(w) && !slack(g, e)) {
        t.setNode(w, {});
        t.setEdge(v, w, {});
        dfs(w);
      }
    }
  };
  for (const v of t.nodes()) dfs(v);
  return t.nodeCount();
}

function findMinSlackEdge<E extends RankEdge, G>(t: Tree, g: Graph<LayoutNode, E, G>) {
  return minBy(g.edges(), e => (t.hasNode(e.v) !== t.hasNode(e.w) ? slack(g, e) : NaN));
}

function shiftRanks<E extends RankEdge, G>(t: Tree, g: Graph<LayoutNode, E, G>, delta: number): void {
  for (const v of t.nodes()) {
    const node = g.node(v);
    if (node?.rank !== undefined) node.rank += delta;
  }
}
