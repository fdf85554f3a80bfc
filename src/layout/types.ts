import type { Edge, Graph } from '../graphlib/graph.js';

export type RankDir = 'TB' | 'BT' | 'LR' | 'RL';
export type LabelPos = 'l' | 'c' | 'r';
export type Alignment = 'UL' | 'UR' | 'DL' | 'DR';
export type Ranker = 'network-simplex' | 'tight-tree' | 'longest-path';
export type Acyclicer = 'greedy' | 'dfs';

export interface Point {
  x: number;
  y: number;
}

// ---- consumer-facing labels ----

export interface NodeLabel {
  width?: number;
  height?: number;
  /** Center, written by layout. */
  x?: number;
  y?: number;
  rank?: number;
  order?: number;
  /** Rank span of a compound node, written by layout. */
  minRank?: number;
  maxRank?: number;
}

export interface EdgeLabel {
  minlen?: number;
  weight?: number;
  /** Label box; zero means the edge carries no label. */
  width?: number;
  height?: number;
  labelpos?: LabelPos;
  labeloffset?: number;
  /** Routing points, written by layout. */
  points?: Point[];
  /** Label center, written by layout for labelled edges. */
  x?: number;
  y?: number;
}

export interface GraphLabel {
  rankdir?: RankDir;
  nodesep?: number;
  edgesep?: number;
  ranksep?: number;
  marginx?: number;
  marginy?: number;
  acyclicer?: Acyclicer;
  ranker?: Ranker;
  align?: Alignment;
  /** Drawing size, written by layout. */
  width?: number;
  height?: number;
}

export type InputGraph = Graph<NodeLabel, EdgeLabel, GraphLabel>;

export interface LayoutOptions {
  /** Print per-stage timings to the console. */
  debugTiming?: boolean;
  /** Stop crossing minimisation after the initial DFS order. */
  disableOptimalOrderHeuristic?: boolean;
}

// ---- internal layout graph ----

export type DummyKind = 'edge' | 'edge-label' | 'edge-proxy' | 'border' | 'root' | 'selfedge';
export type BorderType = 'borderLeft' | 'borderRight';

export interface SelfEdge {
  e: Edge;
  label: LayoutEdge;
}

export interface LayoutNode {
  width: number;
  height: number;
  x?: number;
  y?: number;
  rank?: number;
  order?: number;
  minRank?: number;
  maxRank?: number;
  dummy?: DummyKind;
  borderType?: BorderType;
  borderTop?: string;
  borderBottom?: string;
  borderLeft?: (string | undefined)[];
  borderRight?: (string | undefined)[];
  labelpos?: LabelPos;
  /** Label and key of the edge a dummy stands for. */
  edgeLabel?: LayoutEdge;
  edgeObj?: Edge;
  selfEdges?: SelfEdge[];
  /** Network-simplex bookkeeping. */
  low?: number;
  lim?: number;
  parent?: string;
}

export interface LayoutEdge {
  minlen: number;
  weight: number;
  width: number;
  height: number;
  labeloffset: number;
  labelpos: LabelPos;
  /** Whether the caller gave the edge a label size, before any padding. */
  labelled?: boolean;
  labelRank?: number;
  nestingEdge?: boolean;
  reversed?: boolean;
  forwardName?: string;
  cutvalue?: number;
  x?: number;
  y?: number;
  points?: Point[];
}

export interface LayoutGraphLabel {
  rankdir: RankDir;
  /** Set when the caller gave no rankdir and the default applies. */
  rankdirDefaulted?: boolean;
  nodesep: number;
  edgesep: number;
  ranksep: number;
  marginx: number;
  marginy: number;
  acyclicer?: Acyclicer;
  ranker: Ranker;
  align?: Alignment;
  width?: number;
  height?: number;
  nestingRoot?: string;
  nodeRankFactor?: number;
  dummyChains?: string[];
  maxRank?: number;
}

export type LayoutGraph = Graph<LayoutNode, LayoutEdge, LayoutGraphLabel>;
