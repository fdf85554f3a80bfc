import type { Edge } from '../graphlib/graph.js';
import { greedyFAS } from './greedy-fas.js';
import type { LayoutGraph } from './types.js';
import { graphConfig, uniqueId } from './util.js';

/**
 * Reverses a feedback arc set so the graph becomes acyclic. Self-loops never
 * join the set. Reversed edges get a fresh name and remember the original
 * one in `forwardName` so `undo` can restore them.
 */
export function run(g: LayoutGraph): void {
  const fas = graphConfig(g).acyclicer === 'greedy' ? greedyFAS(g, weightFn(g)) : dfsFAS(g);
  for (const e of fas) {
    if (e.v === e.w) continue;
    const label = g.edge(e);
    if (!label) continue;
    g.removeEdge(e);
    label.forwardName = e.name;
    label.reversed = true;
    g.setEdge(e.w, e.v, label, uniqueId(g, 'rev'));
  }
}

function weightFn(g: LayoutGraph): (e: Edge) => number {
  return e => {
    const weight = g.edge(e)?.weight ?? 1;
    return Number.isFinite(weight) ? Math.round(weight) : 0;
  };
}

function dfsFAS(g: LayoutGraph): Edge[] {
  const fas: Edge[] = [];
  const stack = new Set<string>();
  const visited = new Set<string>();

  const dfs = (v: string): void => {
    if (visited.has(v)) return;
    visited.add(v);
    stack.add(v);
    for (const e of g.outEdges(v)) {
      if (e.v === e.w) continue;
      if (stack.has(e.w)) {
        fas.push(e);
      } else {
        dfs(e.w);
      }
    }
    stack.delete(v);
  };

  for (const v of g.nodes()) dfs(v);
  return fas;
}

export function undo(g: LayoutGraph): void {
  for (const e of g.edges()) {
    const label = g.edge(e);
    if (!label?.reversed) continue;
    g.removeEdge(e);
    const forwardName = label.forwardName;
    delete label.reversed;
    delete label.forwardName;
    label.points?.reverse();
    g.setEdge(e.w, e.v, label, forwardName);
  }
}
