import { Graph, type Edge } from '../graphlib/graph.js';
import { List, type ListCell } from './data/list.js';

/*
 * Greedy feedback arc set heuristic (Eades, Lin and Smyth). Nodes sit in
 * buckets keyed by `out - in`; sinks and sources are peeled off first, then
 * the node with the largest surplus, whose in-edges join the arc set.
 */

interface FasEntry {
  v: string;
  in: number;
  out: number;
  cell?: ListCell<FasEntry>;
}

type FasGraph = Graph<FasEntry, number>;

const DEFAULT_WEIGHT_FN = (): number => 1;

export function greedyFAS<N, E, G>(g: Graph<N, E, G>, weightFn: (e: Edge) => number = DEFAULT_WEIGHT_FN): Edge[] {
  if (g.nodeCount() <= 1) return [];
  const state = buildState(g, weightFn);
  const results = doGreedyFAS(state.graph, state.buckets, state.zeroIdx);
  return results.flatMap(e => g.outEdges(e.v, e.w));
}

function doGreedyFAS(g: FasGraph, buckets: List<FasEntry>[], zeroIdx: number): Edge[] {
  let results: Edge[] = [];
  const sources = buckets[buckets.length - 1];
  const sinks = buckets[0];

  while (g.nodeCount()) {
    let entry: FasEntry | undefined;
    while ((entry = sinks.dequeue())) removeNode(g, buckets, zeroIdx, entry);
    while ((entry = sources.dequeue())) removeNode(g, buckets, zeroIdx, entry);
    if (g.nodeCount()) {
      for (let i = buckets.length - 2; i > 0; --i) {
        entry = buckets[i].dequeue();
        if (entry) {
          results = results.concat(removeNode(g, buckets, zeroIdx, entry, true));
          break;
        }
      }
    }
  }
  return results;
}

function removeNode(g: FasGraph, buckets: List<FasEntry>[], zeroIdx: number, entry: FasEntry, collectPredecessors = false): Edge[] {
  const results: Edge[] = [];
  for (const edge of g.inEdges(entry.v)) {
    const weight = g.edge(edge) ?? 0;
    const uEntry = g.node(edge.v);
    if (collectPredecessors) results.push({ v: edge.v, w: edge.w });
    if (!uEntry) continue;
    uEntry.out -= weight;
    assignBucket(buckets, zeroIdx, uEntry);
  }
  for (const edge of g.outEdges(entry.v)) {
    const weight = g.edge(edge) ?? 0;
    const wEntry = g.node(edge.w);
    if (!wEntry) continue;
    wEntry.in -= weight;
    assignBucket(buckets, zeroIdx, wEntry);
  }
  g.removeNode(entry.v);
  return results;
}

function buildState<N, E, G>(g: Graph<N, E, G>, weightFn: (e: Edge) => number) {
  const fasGraph: FasGraph = new Graph<FasEntry, number>();
  let maxIn = 0;
  let maxOut = 0;

  for (const v of g.nodes()) {
    fasGraph.setNode(v, { v, in: 0, out: 0 });
  }

  // Parallel edges collapse into one edge carrying the summed weight.
  for (const e of g.edges()) {
    if (e.v === e.w) continue;
    const weight = weightFn(e);
    const prevWeight = fasGraph.edge(e.v, e.w) ?? 0;
    fasGraph.setEdge(e.v, e.w, prevWeight + weight);
    const vEntry = fasGraph.node(e.v);
    const wEntry = fasGraph.node(e.w);
    if (vEntry) maxOut = Math.max(maxOut, (vEntry.out += weight));
    if (wEntry) maxIn = Math.max(maxIn, (wEntry.in += weight));
  }

  const buckets: List<FasEntry>[] = [];
  for (let i = 0; i < maxOut + maxIn + 3; i++) buckets.push(new List<FasEntry>());
  const zeroIdx = maxIn + 1;

  for (const v of fasGraph.nodes()) {
    const entry = fasGraph.node(v);
    if (entry) assignBucket(buckets, zeroIdx, entry);
  }

  return { graph: fasGraph, buckets, zeroIdx };
}

function assignBucket(buckets: List<FasEntry>[], zeroIdx: number, entry: FasEntry): void {
  if (!entry.out) {
    buckets[0].enqueue(entry);
  } else if (!entry.in) {
    buckets[buckets.length - 1].enqueue(entry);
  } else {
    buckets[entry.out - entry.in + zeroIdx].enqueue(entry);
  }
}
