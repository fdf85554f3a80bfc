import type { ConstraintGraph, LayerGraph } from './types.js';

/**
 * Records, for each pair of sibling subgraphs met in `vs`, that the first
 * stays left of the second in the sweeps that follow.
 */
export function addSubgraphConstraints(g: LayerGraph, cg: ConstraintGraph, vs: string[]): void {
  const prev = new Map<string, string>();
  let rootPrev: string | undefined;

  for (const v of vs) {
    let child = g.parent(v);
    while (child !== undefined) {
      const parent = g.parent(child);
      let prevChild: string | undefined;
      if (parent !== undefined) {
        prevChild = prev.get(parent);
        prev.set(parent, child);
      } else {
        prevChild = rootPrev;
        rootPrev = child;
      }
      if (prevChild !== undefined && prevChild !== child) {
        cg.setEdge(prevChild, child);
        break;
      }
      child = parent;
    }
  }
}
