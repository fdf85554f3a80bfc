import type { LayoutGraph } from './types.js';
import { graphConfig } from './util.js';

interface LowLim {
  low: number;
  lim: number;
}

/**
 * Moves every dummy of a long edge into the subgraph whose rank span it
 * crosses: climbing from the tail towards the lowest common ancestor, then
 * descending towards the head.
 */
export function parentDummyChains(g: LayoutGraph): void {
  const postorderNums = postorder(g);

  for (const start of graphConfig(g).dummyChains ?? []) {
    let v: string | undefined = start;
    const edgeObj = g.node(start)?.edgeObj;
    if (!edgeObj) continue;
    const { path, lca } = findPath(g, postorderNums, edgeObj.v, edgeObj.w);
    let pathIdx = 0;
    let pathV = path[pathIdx];
    let ascending = true;

    while (v !== undefined && v !== edgeObj.w) {
      const rank = g.node(v)?.rank ?? NaN;

      if (ascending) {
        while ((pathV = path[pathIdx]) !== lca && maxRankOf(g, pathV) < rank) {
          pathIdx++;
        }
        if (pathV === lca) ascending = false;
      }

      if (!ascending) {
        while (pathIdx < path.length - 1 && minRankOf(g, (pathV = path[pathIdx + 1])) <= rank) {
          pathIdx++;
        }
        pathV = path[pathIdx];
      }

      g.setParent(v, pathV);
      v = g.successors(v)[0];
    }
  }
}

function maxRankOf(g: LayoutGraph, v: string | undefined): number {
  return (v === undefined ? undefined : g.node(v)?.maxRank) ?? NaN;
}

function minRankOf(g: LayoutGraph, v: string | undefined): number {
  return (v === undefined ? undefined : g.node(v)?.minRank) ?? NaN;
}

/**
 * Path of ancestors from `v` up to the lowest common ancestor of `v` and `w`
 * (`undefined` standing for the graph root) and back down to `w`.
 */
function findPath(
  g: LayoutGraph,
  postorderNums: Map<string, LowLim>,
  v: string,
  w: string,
): { path: (string | undefined)[]; lca: string | undefined } {
  const vPath: (string | undefined)[] = [];
  const wPath: string[] = [];
  const vNums = postorderNums.get(v);
  const wNums = postorderNums.get(w);
  const low = Math.min(vNums?.low ?? 0, wNums?.low ?? 0);
  const lim = Math.max(vNums?.lim ?? 0, wNums?.lim ?? 0);

  let parent: string | undefined = v;
  let parentNums: LowLim | undefined;
  do {
    parent = g.parent(parent);
    vPath.push(parent);
    parentNums = parent === undefined ? undefined : postorderNums.get(parent);
  } while (parent !== undefined && parentNums !== undefined && (parentNums.low > low || lim > parentNums.lim));
  const lca = parent;

  parent = w;
  while ((parent = g.parent(parent)) !== lca && parent !== undefined) {
    wPath.push(parent);
  }

  return { path: vPath.concat(wPath.reverse()), lca };
}

function postorder(g: LayoutGraph): Map<string, LowLim> {
  const result = new Map<string, LowLim>();
  let lim = 0;
  const dfs = (v: string): void => {
    const low = lim;
    for (const child of g.children(v)) dfs(child);
    result.set(v, { low, lim: lim++ });
  };
  for (const v of g.children()) dfs(v);
  return result;
}
