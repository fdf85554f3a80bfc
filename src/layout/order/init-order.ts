import type { LayoutGraph } from '../types.js';

/**
 * Initial layering: a DFS over the leaf nodes, started from each leaf in
 * rank order (insertion order breaking ties) and following successors,
 * appending nodes to their rank as they are reached.
 */
export function initOrder(g: LayoutGraph): string[][] {
  const visited = new Set<string>();
  const simpleNodes = g.nodes().filter(v => !g.children(v).length);
  let maxRank = -1;
  for (const v of simpleNodes) maxRank = Math.max(maxRank, g.node(v)?.rank ?? -1);
  const layers: string[][] = [];
  for (let i = 0; i <= maxRank; i++) layers.push([]);

  const dfs = (v: string): void => {
    if (visited.has(v)) return;
    visited.add(v);
    const rank = g.node(v)?.rank;
    if (rank !== undefined) layers[rank].push(v);
    for (const w of g.successors(v)) dfs(w);
  };

  const orderedVs = simpleNodes
    .map((v, i) => ({ v, i, rank: g.node(v)?.rank ?? 0 }))
    .sort((a, b) => a.rank - b.rank || a.i - b.i)
    .map(entry => entry.v);
  for (const v of orderedVs) dfs(v);

  return layers;
}
