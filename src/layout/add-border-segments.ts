import type { BorderType, LayoutGraph, LayoutNode } from './types.js';
import { addDummyNode, defaultEdgeLabel } from './util.js';

/**
 * Gives every subgraph a left and a right border node on each rank it
 * spans, chained top to bottom. Ordering keeps children between them.
 */
export function addBorderSegments(g: LayoutGraph): void {
  const dfs = (v: string): void => {
    for (const child of g.children(v)) dfs(child);
    const node = g.node(v);
    if (node?.minRank === undefined || node.maxRank === undefined) return;
    node.borderLeft = [];
    node.borderRight = [];
    for (let rank = node.minRank, maxRank = node.maxRank + 1; rank < maxRank; ++rank) {
      addBorderNode(g, 'borderLeft', '_bl', v, node, rank);
      addBorderNode(g, 'borderRight', '_br', v, node, rank);
    }
  };
  for (const v of g.children()) dfs(v);
}

function addBorderNode(g: LayoutGraph, prop: BorderType, prefix: string, sg: string, sgNode: LayoutNode, rank: number): void {
  const label: LayoutNode = { width: 0, height: 0, rank, borderType: prop };
  const borders = sgNode[prop] ?? [];
  sgNode[prop] = borders;
  const prev = borders[rank - 1];
  const curr = addDummyNode(g, 'border', label, prefix);
  borders[rank] = curr;
  g.setParent(curr, sg);
  if (prev) {
    g.setEdge(prev, curr, { ...defaultEdgeLabel(), weight: 1 });
  }
}
