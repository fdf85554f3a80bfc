import { barycenter } from './barycenter.js';
import { resolveConflicts } from './resolve-conflicts.js';
import { sort } from './sort.js';
import { isSlice, type BarycenterEntry, type ConstraintGraph, type LayerGraph, type SortEntry, type SortResult } from './types.js';

/**
 * Orders the children of `v` in a layer graph, recursing into child
 * subgraphs first and folding their barycenters into their own entry. A
 * subgraph's border nodes wrap its children, and its barycenter counts the
 * positions of the border predecessors.
 */
export function sortSubgraph(g: LayerGraph, v: string, cg: ConstraintGraph, biasRight: boolean): SortResult {
  let movable = g.children(v);
  const node = g.node(v);
  const bl = node && isSlice(node) ? node.borderLeft : undefined;
  const br = node && isSlice(node) ? node.borderRight : undefined;
  const subgraphs = new Map<string, SortResult>();

  if (bl) {
    movable = movable.filter(w => w !== bl && w !== br);
  }

  const barycenters = barycenter(g, movable);
  for (const entry of barycenters) {
    if (g.children(entry.v).length) {
      const subgraphResult = sortSubgraph(g, entry.v, cg, biasRight);
      subgraphs.set(entry.v, subgraphResult);
      if (subgraphResult.barycenter !== undefined) {
        mergeBarycenters(entry, subgraphResult);
      }
    }
  }

  const entries = resolveConflicts(barycenters, cg);
  expandSubgraphs(entries, subgraphs);

  const result = sort(entries, biasRight);

  if (bl && br) {
    result.vs = [bl, ...result.vs, br];
    const blPred = g.predecessors(bl)[0];
    const brPred = g.predecessors(br)[0];
    if (blPred !== undefined) {
      const blPredOrder = g.node(blPred)?.order ?? 0;
      const brPredOrder = brPred === undefined ? NaN : (g.node(brPred)?.order ?? 0);
      const weight = result.weight ?? 0;
      const bary = result.barycenter ?? 0;
      result.barycenter = (bary * weight + blPredOrder + brPredOrder) / (weight + 2);
      result.weight = weight + 2;
    }
  }

  return result;
}

function expandSubgraphs(entries: SortEntry[], subgraphs: Map<string, SortResult>): void {
  for (const entry of entries) {
    entry.vs = entry.vs.flatMap(v => subgraphs.get(v)?.vs ?? [v]);
  }
}

function mergeBarycenters(target: BarycenterEntry, other: SortResult): void {
  const otherBary = other.barycenter ?? 0;
  const otherWeight = other.weight ?? 0;
  if (target.barycenter !== undefined) {
    const weight = target.weight ?? 0;
    target.barycenter = (target.barycenter * weight + otherBary * otherWeight) / (weight + otherWeight);
    target.weight = weight + otherWeight;
  } else {
    target.barycenter = otherBary;
    target.weight = otherWeight;
  }
}
