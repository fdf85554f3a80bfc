import { Graph } from '../../graphlib/graph.js';
import type { LayoutGraph, LayoutOptions } from '../types.js';
import { buildLayerMatrix, maxRank, range } from '../util.js';
import { addSubgraphConstraints } from './add-subgraph-constraints.js';
import { buildLayerGraph, type Relationship } from './build-layer-graph.js';
import { crossCount } from './cross-count.js';
import { initOrder } from './init-order.js';
import { sortSubgraph } from './sort-subgraph.js';
import type { ConstraintGraph, LayerGraph } from './types.js';

export { addSubgraphConstraints } from './add-subgraph-constraints.js';
export { barycenter } from './barycenter.js';
export { buildLayerGraph } from './build-layer-graph.js';
export { crossCount } from './cross-count.js';
export { initOrder } from './init-order.js';
export { resolveConflicts } from './resolve-conflicts.js';
export { sort } from './sort.js';
export { sortSubgraph } from './sort-subgraph.js';

export type OrderOptions = Pick<LayoutOptions, 'disableOptimalOrderHeuristic'>;

/**
 * Assigns `order` to every node so as to minimise weighted edge crossings.
 *
 * Starts from a DFS order, then sweeps layer by layer, alternating upward
 * and downward, sorting each rank by the barycenter of its fixed neighbours
 * and alternating the tie bias every two sweeps. The best layering seen is
 * kept; the loop stops after four sweeps without improvement.
 */
export function order(g: LayoutGraph, opts: OrderOptions = {}): void {
  const mr = maxRank(g);
  const downLayerGraphs = buildLayerGraphs(g, range(1, mr + 1), 'inEdges');
  const upLayerGraphs = buildLayerGraphs(g, range(mr - 1, -1, -1), 'outEdges');

  const initial = initOrder(g);
  assignOrder(g, initial);

  if (opts.disableOptimalOrderHeuristic) {
    return;
  }

  let layering = initial;
  let bestCC = Number.POSITIVE_INFINITY;
  let best: string[][] = layering;

  for (let i = 0, lastBest = 0; lastBest < 4; ++i, ++lastBest) {
    sweepLayerGraphs(i % 2 ? downLayerGraphs : upLayerGraphs, i % 4 >= 2);

    layering = buildLayerMatrix(g);
    const cc = crossCount(g, layering);
    if (cc < bestCC) {
      lastBest = 0;
      best = layering.map(layer => layer.slice());
      bestCC = cc;
    }
  }

  assignOrder(g, best);
}

function buildLayerGraphs(g: LayoutGraph, ranks: number[], relationship: Relationship): LayerGraph[] {
  return ranks.map(rank => buildLayerGraph(g, rank, relationship));
}

function sweepLayerGraphs(layerGraphs: LayerGraph[], biasRight: boolean): void {
  const cg: ConstraintGraph = new Graph();
  for (const lg of layerGraphs) {
    const root = lg.graph()?.root;
    if (root === undefined) continue;
    const sorted = sortSubgraph(lg, root, cg, biasRight);
    sorted.vs.forEach((v, i) => {
      const node = lg.node(v);
      if (node) node.order = i;
    });
    addSubgraphConstraints(lg, cg, sorted.vs);
  }
}

function assignOrder(g: LayoutGraph, layering: string[][]): void {
  for (const layer of layering) {
    layer.forEach((v, i) => {
      const node = g.node(v);
      if (node) node.order = i;
    });
  }
}
