import type { InputGraph, Point } from '../layout/types.js';

export interface NodeResult {
  id: string;
  x?: number;
  y?: number;
  width: number;
  height: number;
  rank?: number;
  order?: number;
  parent?: string;
  minRank?: number;
  maxRank?: number;
}

export interface EdgeResult {
  v: string;
  w: string;
  name?: string;
  points: Point[];
  x?: number;
  y?: number;
}

export interface LayoutResult {
  width?: number;
  height?: number;
  nodes: NodeResult[];
  edges: EdgeResult[];
}

/** Plain JSON view of a laid-out graph; undefined fields are left out. */
export function toLayoutResult(graph: InputGraph): LayoutResult {
  const nodes = graph.nodes().map(id => {
    const label = graph.node(id) ?? {};
    const node: NodeResult = { id, width: label.width ?? 0, height: label.height ?? 0 };
    if (label.x !== undefined) node.x = label.x;
    if (label.y !== undefined) node.y = label.y;
    if (label.rank !== undefined) node.rank = label.rank;
    if (label.order !== undefined) node.order = label.order;
    const parent = graph.parent(id);
    if (parent !== undefined) node.parent = parent;
    if (label.minRank !== undefined) node.minRank = label.minRank;
    if (label.maxRank !== undefined) node.maxRank = label.maxRank;
    return node;
  });

  const edges = graph.edges().map(e => {
    const label = graph.edge(e) ?? {};
    const edge: EdgeResult = { v: e.v, w: e.w, points: (label.points ?? []).map(p => ({ x: p.x, y: p.y })) };
    if (e.name !== undefined) edge.name = e.name;
    if (label.x !== undefined) edge.x = label.x;
    if (label.y !== undefined) edge.y = label.y;
    return edge;
  });

  const result: LayoutResult = { nodes, edges };
  const graphLabel = graph.graph();
  if (graphLabel?.width !== undefined) result.width = graphLabel.width;
  if (graphLabel?.height !== undefined) result.height = graphLabel.height;
  return result;
}
