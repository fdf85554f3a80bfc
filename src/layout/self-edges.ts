import type { LayoutGraph } from './types.js';
import { addDummyNode, buildLayerMatrix } from './util.js';

/*
 * Self-loops take no part in ranking or ordering. They are parked on their
 * node, come back as a dummy placed right after the node in its layer so
 * positioning reserves room for the loop, and finally become a five-point
 * loop on the node's side.
 */

export function removeSelfEdges(g: LayoutGraph): void {
  for (const e of g.edges()) {
    if (e.v !== e.w) continue;
    const node = g.node(e.v);
    const label = g.edge(e);
    if (!node || !label) continue;
    const selfEdges = node.selfEdges ?? [];
    selfEdges.push({ e, label });
    node.selfEdges = selfEdges;
    g.removeEdge(e);
  }
}

export function insertSelfEdges(g: LayoutGraph): void {
  const layers = buildLayerMatrix(g);
  for (const layer of layers) {
    let orderShift = 0;
    layer.forEach((v, i) => {
      const node = g.node(v);
      if (!node) return;
      node.order = i + orderShift;
      for (const selfEdge of node.selfEdges ?? []) {
        addDummyNode(
          g,
          'selfedge',
          {
            width: selfEdge.label.width,
            height: selfEdge.label.height,
            rank: node.rank,
            order: i + ++orderShift,
            edgeObj: selfEdge.e,
            edgeLabel: selfEdge.label,
          },
          '_se',
        );
      }
      delete node.selfEdges;
    });
  }
}

export function positionSelfEdges(g: LayoutGraph): void {
  for (const v of g.nodes()) {
    const node = g.node(v);
    if (node?.dummy !== 'selfedge' || !node.edgeObj || !node.edgeLabel) continue;
    const selfNode = g.node(node.edgeObj.v);
    if (!selfNode) continue;
    const x = (selfNode.x ?? 0) + selfNode.width / 2;
    const y = selfNode.y ?? 0;
    const dx = (node.x ?? 0) - x;
    const dy = selfNode.height / 2;
    g.setEdge(node.edgeObj.v, node.edgeObj.w, node.edgeLabel, node.edgeObj.name);
    g.removeNode(v);
    node.edgeLabel.points = [
      { x: x + (2 * dx) / 3, y: y - dy },
      { x: x + (5 * dx) / 6, y: y - dy },
      { x: x + dx, y },
      { x: x + (5 * dx) / 6, y: y + dy },
      { x: x + (2 * dx) / 3, y: y + dy },
    ];
    node.edgeLabel.x = node.x;
    node.edgeLabel.y = node.y;
  }
}
