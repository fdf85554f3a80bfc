import type { LayoutGraph, LayoutNode } from './types.js';
import { addDummyNode, defaultEdgeLabel, graphConfig } from './util.js';

/*
 * Breaks every edge that spans more than one rank into a chain of unit
 * edges joined by dummy nodes, one per intermediate rank. The dummy at the
 * edge's `labelRank` takes the label's size so positioning leaves room for
 * it. The first dummy of each chain is recorded in `dummyChains`.
 *
 * Ranks must be normalized before this runs.
 */
export function run(g: LayoutGraph): void {
  graphConfig(g).dummyChains = [];
  for (const edge of g.edges()) {
    normalizeEdge(g, edge.v, edge.w, edge.name);
  }
}

function normalizeEdge(g: LayoutGraph, v: string, w: string, name: string | undefined): void {
  const edgeObj = name === undefined ? { v, w } : { v, w, name };
  let vRank = g.node(v)?.rank;
  const wRank = g.node(w)?.rank;
  const edgeLabel = g.edge(v, w, name);
  if (vRank === undefined || wRank === undefined || !edgeLabel) return;
  const labelRank = edgeLabel.labelRank;

  if (wRank === vRank + 1) return;
  g.removeEdge(v, w, name);

  let u = v;
  let i = 0;
  for (++vRank; vRank < wRank; ++i, ++vRank) {
    edgeLabel.points = [];
    const attrs: LayoutNode = { width: 0, height: 0, edgeLabel, edgeObj, rank: vRank };
    const dummy = addDummyNode(g, 'edge', attrs, '_d');
    if (vRank === labelRank) {
      attrs.width = edgeLabel.width;
      attrs.height = edgeLabel.height;
      attrs.dummy = 'edge-label';
      attrs.labelpos = edgeLabel.labelpos;
    }
    g.setEdge(u, dummy, { ...defaultEdgeLabel(), weight: edgeLabel.weight }, name);
    if (i === 0) graphConfig(g).dummyChains?.push(dummy);
    u = dummy;
  }

  g.setEdge(u, w, { ...defaultEdgeLabel(), weight: edgeLabel.weight }, name);
}

/**
 * Restores the original edges, collecting the dummy coordinates into their
 * `points`. The edge-label dummy also hands its position and size back to
 * the edge label.
 */
export function undo(g: LayoutGraph): void {
  for (const start of graphConfig(g).dummyChains ?? []) {
    let v: string | undefined = start;
    let node = g.node(start);
    const origLabel = node?.edgeLabel;
    const edgeObj = node?.edgeObj;
    if (!origLabel || !edgeObj) continue;
    g.setEdge(edgeObj.v, edgeObj.w, origLabel, edgeObj.name);

    const points = origLabel.points ?? [];
    origLabel.points = points;
    while (v !== undefined && node?.dummy) {
      const w: string | undefined = g.successors(v)[0];
      g.removeNode(v);
      points.push({ x: node.x ?? 0, y: node.y ?? 0 });
      if (node.dummy === 'edge-label') {
        origLabel.x = node.x;
        origLabel.y = node.y;
        origLabel.width = node.width;
        origLabel.height = node.height;
      }
      v = w;
      node = w === undefined ? undefined : g.node(w);
    }
  }
}
