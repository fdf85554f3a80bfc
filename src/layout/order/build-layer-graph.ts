import { Graph } from '../../graphlib/graph.js';
import type { LayoutGraph } from '../types.js';
import { uniqueId } from '../util.js';
import type { LayerEdge, LayerGraph, LayerGraphLabel, LayerNode } from './types.js';

export type Relationship = 'inEdges' | 'outEdges';

/**
 * Builds the graph for one rank that a single ordering sweep works on.
 *
 * The result holds every node on `rank`, plus every subgraph spanning it
 * (labelled with its left/right border node for the rank). Nodes keep their
 * place in the hierarchy, hanging under a fresh root otherwise. Edges along
 * `relationship` are folded onto the neighbouring rank, weights summed, so the
 * neighbours' `order` can be read during the sweep.
 *
 * Node labels are shared with `g`; setting `order` here sets it on `g`.
 */
export function buildLayerGraph(g: LayoutGraph, rank: number, relationship: Relationship): LayerGraph {
  const root = createRootNode(g);
  const result = new Graph<LayerNode, LayerEdge, LayerGraphLabel>({ compound: true })
    .setGraph({ root })
    .setDefaultNodeLabel(v => g.node(v));

  for (const v of g.nodes()) {
    const node = g.node(v);
    if (!node) continue;
    const parent = g.parent(v);

    const spans =
      node.minRank !== undefined && node.maxRank !== undefined && node.minRank <= rank && rank <= node.maxRank;
    if (node.rank === rank || spans) {
      result.setNode(v);
      result.setParent(v, parent ?? root);

      const edges = relationship === 'inEdges' ? g.inEdges(v) : g.outEdges(v);
      for (const e of edges) {
        const u = e.v === v ? e.w : e.v;
        const prev = result.edge(u, v);
        const weight = prev !== undefined ? prev.weight : 0;
        result.setEdge(u, v, { weight: (g.edge(e)?.weight ?? 0) + weight });
      }

      if (node.minRank !== undefined) {
        result.setNode(v, {
          slice: true,
          borderLeft: node.borderLeft?.[rank],
          borderRight: node.borderRight?.[rank],
        });
      }
    }
  }

  return result;
}

function createRootNode(g: LayoutGraph): string {
  let v: string;
  do {
    v = uniqueId(g, '_root');
  } while (g.hasNode(v));
  return v;
}
