import type { BarycenterEntry, LayerGraph } from './types.js';

/** Weighted mean `order` of each movable node's in-neighbours. */
export function barycenter(g: LayerGraph, movable: string[]): BarycenterEntry[] {
  return movable.map(v => {
    const inV = g.inEdges(v);
    if (!inV.length) {
      return { v };
    }
    let sum = 0;
    let weight = 0;
    for (const e of inV) {
      const edgeWeight = g.edge(e)?.weight ?? 0;
      const order = g.node(e.v)?.order ?? 0;
      sum += edgeWeight * order;
      weight += edgeWeight;
    }
    return { v, barycenter: sum / weight, weight };
  });
}
