export { layout } from './conservative.js';
export { crossingReport, hasEdgeOnCompoundNode, layoutDagreish } from './layout.js';
export type { CrossingReport } from './layout.js';
export { buildLayoutGraph, updateInputGraph } from './graph-io.js';
export { resolveEdgeConfig, resolveGraphConfig } from './config.js';
export { crossCount } from './order/index.js';
export { intersectRect } from './util.js';
export type {
  Acyclicer,
  Alignment,
  EdgeLabel,
  GraphLabel,
  InputGraph,
  LabelPos,
  LayoutOptions,
  NodeLabel,
  Point,
  RankDir,
  Ranker,
} from './types.js';
