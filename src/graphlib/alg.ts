import type { Graph } from './graph.js';

export function preorder<N, E, G>(g: Graph<N, E, G>, vs: string[]): string[] {
  return dfs(g, vs, 'pre');
}

export function postorder<N, E, G>(g: Graph<N, E, G>, vs: string[]): string[] {
  return dfs(g, vs, 'post');
}

function dfs<N, E, G>(g: Graph<N, E, G>, vs: string[], order: 'pre' | 'post'): string[] {
  const navigation = (v: string) => (g.isDirected() ? g.successors(v) : g.neighbors(v));
  const acc: string[] = [];
  const visited = new Set<string>();
  const visit = (v: string): void => {
    if (visited.has(v)) return;
    visited.add(v);
    if (order === 'pre') acc.push(v);
    for (const w of navigation(v)) visit(w);
    if (order === 'post') acc.push(v);
  };
  for (const v of vs) {
    if (!g.hasNode(v)) {
      throw new Error(`Graph does not have node: ${v}`);
    }
    visit(v);
  }
  return acc;
}

/** Strongly connected components (Tarjan), in the order they complete. */
export function tarjan<N, E, G>(g: Graph<N, E, G>): string[][] {
  let index = 0;
  const stack: string[] = [];
  const visited = new Map<string, { onStack: boolean; lowlink: number; index: number }>();
  const results: string[][] = [];

  const dfsVisit = (v: string): void => {
    const entry = { onStack: true, lowlink: index, index: index++ };
    visited.set(v, entry);
    stack.push(v);

    for (const w of g.successors(v)) {
      const seen = visited.get(w);
      if (!seen) {
        dfsVisit(w);
        entry.lowlink = Math.min(entry.lowlink, visited.get(w)?.lowlink ?? entry.lowlink);
      } else if (seen.onStack) {
        entry.lowlink = Math.min(entry.lowlink, seen.index);
      }
    }

    if (entry.lowlink === entry.index) {
      const cmpt: string[] = [];
      let w: string | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        const wEntry = visited.get(w);
        if (wEntry) wEntry.onStack = false;
        cmpt.push(w);
      } while (v !== w);
      results.push(cmpt);
    }
  };

  for (const v of g.nodes()) {
    if (!visited.has(v)) dfsVisit(v);
  }
  return results;
}

export function findCycles<N, E, G>(g: Graph<N, E, G>): string[][] {
  return tarjan(g).filter(cmpt => cmpt.length > 1 || (cmpt.length === 1 && g.hasEdge(cmpt[0], cmpt[0])));
}

export class CycleException extends Error {
  constructor() {
    super('Graph contains a cycle');
    this.name = 'CycleException';
  }
}

export function topsort<N, E, G>(g: Graph<N, E, G>): string[] {
  const visited = new Set<string>();
  const stack = new Set<string>();
  const results: string[] = [];

  const visit = (v: string): void => {
    if (stack.has(v)) throw new CycleException();
    if (visited.has(v)) return;
    stack.add(v);
    visited.add(v);
    for (const w of g.predecessors(v)) visit(w);
    stack.delete(v);
    results.push(v);
  };

  for (const v of g.sinks()) visit(v);
  if (visited.size !== g.nodeCount()) throw new CycleException();
  return results;
}

export function isAcyclic<N, E, G>(g: Graph<N, E, G>): boolean {
  try {
    topsort(g);
  } catch (e) {
    if (e instanceof CycleException) return false;
    throw e;
  }
  return true;
}

/** Weakly connected components, each listed in discovery order. */
export function components<N, E, G>(g: Graph<N, E, G>): string[][] {
  const visited = new Set<string>();
  const cmpts: string[][] = [];
  for (const start of g.nodes()) {
    if (visited.has(start)) continue;
    const cmpt: string[] = [];
    const queue = [start];
    while (queue.length > 0) {
      const v = queue.pop();
      if (v === undefined || visited.has(v)) continue;
      visited.add(v);
      cmpt.push(v);
      queue.push(...g.successors(v), ...g.predecessors(v));
    }
    cmpts.push(cmpt);
  }
  return cmpts;
}
