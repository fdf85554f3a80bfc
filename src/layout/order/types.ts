import type { Graph } from '../../graphlib/graph.js';
import type { LayoutNode } from '../types.js';

/** Stand-in for a subgraph inside a layer graph: its borders on that rank. */
export interface SubgraphSlice {
  slice: true;
  borderLeft?: string;
  borderRight?: string;
  order?: number;
}

export type LayerNode = LayoutNode | SubgraphSlice;

export interface LayerEdge {
  weight: number;
}

export interface LayerGraphLabel {
  root: string;
}

export type LayerGraph = Graph<LayerNode, LayerEdge, LayerGraphLabel>;

/** Constraint graph: an edge `a -> b` means subgraph `a` must stay left of `b`. */
export type ConstraintGraph = Graph<unknown, unknown, unknown>;

export interface BarycenterEntry {
  v: string;
  barycenter?: number;
  weight?: number;
}

export interface SortEntry {
  vs: string[];
  i: number;
  barycenter?: number;
  weight?: number;
}

export interface SortResult {
  vs: string[];
  barycenter?: number;
  weight?: number;
}

export function isSlice(node: LayerNode): node is SubgraphSlice {
  return 'slice' in node;
}
