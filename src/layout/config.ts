import type { EdgeLabel, GraphLabel, LayoutEdge, LayoutGraphLabel } from './types.js';
import { defaultEdgeLabel, defaultGraphLabel } from './util.js';

/** Graph options with every default filled in. Only layout inputs are read; output fields are dropped. */
export function resolveGraphConfig(label: GraphLabel = {}): LayoutGraphLabel {
  const defaults = defaultGraphLabel();
  const config: LayoutGraphLabel = {
    rankdir: label.rankdir ?? defaults.rankdir,
    nodesep: label.nodesep ?? defaults.nodesep,
    edgesep: label.edgesep ?? defaults.edgesep,
    ranksep: label.ranksep ?? defaults.ranksep,
    marginx: label.marginx ?? defaults.marginx,
    marginy: label.marginy ?? defaults.marginy,
    ranker: label.ranker ?? defaults.ranker,
  };
  if (label.rankdir === undefined) config.rankdirDefaulted = true;
  if (label.acyclicer !== undefined) config.acyclicer = label.acyclicer;
  if (label.align !== undefined) config.align = label.align;
  return config;
}

export function resolveEdgeConfig(label: EdgeLabel = {}): LayoutEdge {
  const defaults = defaultEdgeLabel();
  return {
    minlen: label.minlen ?? defaults.minlen,
    weight: label.weight ?? defaults.weight,
    width: label.width ?? defaults.width,
    height: label.height ?? defaults.height,
    labeloffset: label.labeloffset ?? defaults.labeloffset,
    labelpos: label.labelpos ?? defaults.labelpos,
  };
}
