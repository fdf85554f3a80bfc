import type { LayoutGraph } from '../types.js';
import { asNonCompoundGraph, buildLayerMatrix } from '../util.js';
import { positionX } from './bk.js';

/**
 * Assigns `x` and `y` to every leaf node. Ranks stack top to bottom, each
 * as tall as its tallest node and `ranksep` apart; `x` comes from
 * Brandes–Köpf on the leaf-only view of the graph.
 */
export function position(g: LayoutGraph): void {
  const leaves = asNonCompoundGraph(g);

  positionY(leaves);
  for (const [v, x] of positionX(leaves)) {
    const node = leaves.node(v);
    if (node) node.x = x;
  }
}

function positionY(g: LayoutGraph): void {
  const layering = buildLayerMatrix(g);
  const rankSep = g.graph()?.ranksep ?? 0;
  let prevY = 0;
  for (const layer of layering) {
    let maxHeight = 0;
    for (const v of layer) maxHeight = Math.max(maxHeight, g.node(v)?.height ?? 0);
    for (const v of layer) {
      const node = g.node(v);
      if (node) node.y = prevY + maxHeight / 2;
    }
    prevY += maxHeight + rankSep;
  }
}
