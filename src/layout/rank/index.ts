import type { LayoutGraph } from '../types.js';
import { graphConfig } from '../util.js';
import { feasibleTree } from './feasible-tree.js';
import { networkSimplex } from './network-simplex.js';
import { longestPath } from './util.js';

/**
 * Assigns `rank` to every node so that `rank(w) - rank(v) >= minlen` holds
 * for each edge. Expects a connected, acyclic, non-compound graph; ranks may
 * come out negative and are normalized by the caller.
 */
export function rank(g: LayoutGraph): void {
  switch (graphConfig(g).ranker) {
    case 'tight-tree':
      tightTreeRanker(g);
      break;
    case 'longest-path':
      longestPath(g);
      break;
    case 'network-simplex':
    default:
      networkSimplex(g);
  }
}

function tightTreeRanker(g: LayoutGraph): void {
  longestPath(g);
  feasibleTree(g);
}

export { longestPath, slack } from './util.js';
export { feasibleTree } from './feasible-tree.js';
export { networkSimplex } from './network-simplex.js';
