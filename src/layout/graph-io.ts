import { Graph } from '../graphlib/graph.js';
import { resolveEdgeConfig, resolveGraphConfig } from './config.js';
import type { InputGraph, LayoutEdge, LayoutGraph, LayoutGraphLabel, LayoutNode } from './types.js';

/**
 * Copies the caller's graph into a fresh multigraph compound graph, keeping
 * only the attributes layout reads and filling in defaults. Layout never
 * touches the caller's labels until `updateInputGraph`.
 */
export function buildLayoutGraph(inputGraph: InputGraph): LayoutGraph {
  const g: LayoutGraph = new Graph<LayoutNode, LayoutEdge, LayoutGraphLabel>({ multigraph: true, compound: true });
  g.setGraph(resolveGraphConfig(inputGraph.graph()));

  for (const v of inputGraph.nodes()) {
    const node = inputGraph.node(v);
    g.setNode(v, { width: node?.width ?? 0, height: node?.height ?? 0 });
    g.setParent(v, inputGraph.parent(v));
  }

  for (const e of inputGraph.edges()) {
    g.setEdge(e.v, e.w, resolveEdgeConfig(inputGraph.edge(e)), e.name);
  }

  return g;
}

/** Copies final coordinates from the layout graph back onto the caller's labels. */
export function updateInputGraph(inputGraph: InputGraph, layoutGraph: LayoutGraph): void {
  for (const v of inputGraph.nodes()) {
    const layoutLabel = layoutGraph.node(v);
    if (!layoutLabel) continue;
    let inputLabel = inputGraph.node(v);
    if (!inputLabel) {
      inputLabel = {};
      inputGraph.setNode(v, inputLabel);
    }
    inputLabel.x = layoutLabel.x;
    inputLabel.y = layoutLabel.y;
    inputLabel.rank = layoutLabel.rank;
    inputLabel.order = layoutLabel.order;

    if (layoutGraph.children(v).length) {
      inputLabel.width = layoutLabel.width;
      inputLabel.height = layoutLabel.height;
      inputLabel.minRank = layoutLabel.minRank;
      inputLabel.maxRank = layoutLabel.maxRank;
    }
  }

  for (const e of inputGraph.edges()) {
    const layoutLabel = layoutGraph.edge(e);
    if (!layoutLabel) continue;
    let inputLabel = inputGraph.edge(e);
    if (!inputLabel) {
      inputLabel = {};
      inputGraph.setEdge(e.v, e.w, inputLabel, e.name);
    }
    inputLabel.points = layoutLabel.points;
    if (layoutLabel.x !== undefined) {
      inputLabel.x = layoutLabel.x;
      inputLabel.y = layoutLabel.y;
    }
  }

  const graphLabel = inputGraph.graph() ?? {};
  const layoutGraphLabel = layoutGraph.graph();
  graphLabel.width = layoutGraphLabel?.width;
  graphLabel.height = layoutGraphLabel?.height;
  inputGraph.setGraph(graphLabel);
}
