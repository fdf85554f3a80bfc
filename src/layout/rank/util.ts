import type { Edge, Graph } from '../../graphlib/graph.js';
import type { LayoutNode } from '../types.js';
import type { RankEdge } from '../util.js';

/**
 * Initial ranking by longest path: sinks sit at rank 0 and every other node
 * as low as its out-edges allow, so ranks come out non-positive. Later stages
 * normalize them.
 */
export function longestPath<E extends RankEdge, G>(g: Graph<LayoutNode, E, G>): void {
  const visited = new Set<string>();

  const dfs = (v: string): number => {
    const label = g.node(v);
    if (visited.has(v)) return label?.rank ?? 0;
    visited.add(v);

    let rank = Infinity;
    for (const e of g.outEdges(v)) {
      rank = Math.min(rank, dfs(e.w) - (g.edge(e)?.minlen ?? 1));
    }
    if (rank === Infinity) rank = 0;
    if (label) label.rank = rank;
    return rank;
  };

  for (const v of g.sources()) dfs(v);
}

/** How much longer `e` is than its minimum length. */
export function slack<E extends RankEdge, G>(g: Graph<LayoutNode, E, G>, e: Edge): number {
  return (g.node(e.w)?.rank ?? 0) - (g.node(e.v)?.rank ?? 0) - (g.edge(e)?.minlen ?? 1);
}
