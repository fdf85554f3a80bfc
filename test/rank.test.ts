import { describe, expect, test } from 'vitest';
import { Graph } from '../src/graphlib/index.js';
import type { TreeEdge, TreeNode } from '../src/layout/rank/feasible-tree.js';
import { enterEdge, initLowLimValues, leaveEdge } from '../src/layout/rank/network-simplex.js';
import { feasibleTree, longestPath, networkSimplex, rank, slack } from '../src/layout/rank/index.js';
import type { LayoutGraph, LayoutNode, Ranker } from '../src/layout/types.js';
import { normalizeRanks, type RankEdge } from '../src/layout/util.js';
import { edge, layoutGraph, node, rankOf, setPath } from './helpers.js';

function gansnerGraph(ranker?: Ranker): LayoutGraph {
  const g = layoutGraph(ranker ? { ranker } : {});
  g.setDefaultNodeLabel(() => node());
  setPath(g, ['a', 'b', 'c', 'd', 'h']);
  setPath(g, ['a', 'e', 'g', 'h']);
  setPath(g, ['a', 'f', 'g']);
  return g;
}

function ranks(g: LayoutGraph): Record<string, number | undefined> {
  const out: Record<string, number | undefined> = {};
  for (const v of g.nodes()) out[v] = rankOf(g, v);
  return out;
}

function tree(): Graph<TreeNode, TreeEdge> {
  const t = new Graph<TreeNode, TreeEdge>({ directed: false });
  t.setDefaultNodeLabel(() => ({}));
  t.setDefaultEdgeLabel(() => ({}));
  return t;
}

describe.each<Ranker>(['network-simplex', 'tight-tree', 'longest-path'])('rank with %s', ranker => {
  test('respects minlen on every edge', () => {
    const g = gansnerGraph(ranker);
    g.setEdge('b', 'g', edge({ minlen: 2 }));
    rank(g);
    for (const e of g.edges()) {
      expect(slack(g, e)).toBeGreaterThanOrEqual(0);
    }
  });

  test('ranks a single node', () => {
    const g = layoutGraph({ ranker });
    g.setNode('a', node());
    rank(g);
    expect(rankOf(g, 'a')).toBe(0);
  });
});

describe('longestPath', () => {
  test('puts sinks at rank 0 and everything else as low as possible', () => {
    const g = gansnerGraph();
    longestPath(g);
    normalizeRanks(g);
    expect(ranks(g)).toEqual({ a: 0, b: 1, c: 2, d: 3, h: 4, e: 2, g: 3, f: 2 });
  });
});

describe('feasibleTree', () => {
  test('builds a tight tree spanning every node', () => {
    const g = layoutGraph();
    g.setNode('a', node({ rank: 0 }));
    g.setNode('b', node({ rank: 1 }));
    g.setNode('c', node({ rank: 3 }));
    g.setEdge('a', 'b', edge());
    g.setEdge('b', 'c', edge());
    const t = feasibleTree(g);
    expect(t.nodeCount()).toBe(3);
    expect((rankOf(g, 'c') ?? NaN) - (rankOf(g, 'b') ?? NaN)).toBe(1);
    for (const e of t.edges()) {
      const forward = g.hasEdge(e.v, e.w) ? { v: e.v, w: e.w } : { v: e.w, w: e.v };
      expect(slack(g, forward)).toBe(0);
    }
  });
});

describe('networkSimplex', () => {
  function ns(g: LayoutGraph): void {
    networkSimplex(g);
    normalizeRanks(g);
  }

  test('ranks a two node graph', () => {
    const g = layoutGraph();
    g.setEdge('a', 'b', edge());
    g.setNode('a', node());
    g.setNode('b', node());
    ns(g);
    expect(ranks(g)).toEqual({ a: 0, b: 1 });
  });

  test('ranks a diamond', () => {
    const g = layoutGraph();
    g.setDefaultNodeLabel(() => node());
    setPath(g, ['a', 'b', 'd']);
    setPath(g, ['a', 'c', 'd']);
    ns(g);
    expect(ranks(g)).toEqual({ a: 0, b: 1, d: 2, c: 1 });
  });

  test('uses minlen', () => {
    const g = layoutGraph();
    g.setDefaultNodeLabel(() => node());
    setPath(g, ['a', 'b', 'd']);
    g.setEdge('a', 'c', edge());
    g.setEdge('c', 'd', edge({ minlen: 2 }));
    ns(g);
    expect(ranks(g)).toEqual({ a: 0, b: 2, d: 3, c: 1 });
  });

  test('ranks the gansner graph optimally', () => {
    const g = gansnerGraph();
    ns(g);
    expect(ranks(g)).toEqual({ a: 0, b: 1, c: 2, d: 3, h: 4, e: 1, g: 2, f: 1 });
  });

  test('handles multi-edges', () => {
    const g = layoutGraph();
    g.setDefaultNodeLabel(() => node());
    setPath(g, ['a', 'b', 'c', 'd']);
    g.setEdge('a', 'e', edge({ weight: 2 }));
    g.setEdge('e', 'd', edge());
    g.setEdge('b', 'c', edge({ minlen: 2 }), 'multi');
    ns(g);
    expect(ranks(g)).toEqual({ a: 0, b: 1, c: 3, d: 4, e: 1 });
  });

  test('leaveEdge finds a tree edge with a negative cut value', () => {
    const t = tree();
    t.setEdge('a', 'b', { cutvalue: 1 });
    t.setEdge('b', 'c', { cutvalue: 1 });
    expect(leaveEdge(t)).toBeUndefined();
    t.setEdge('b', 'c', { cutvalue: -1 });
    expect(leaveEdge(t)).toEqual({ v: 'b', w: 'c' });
  });

  test('enterEdge picks the reconnecting edge with the least slack', () => {
    const g = new Graph<LayoutNode, RankEdge, unknown>();
    g.setNode('a', node({ rank: 0 }));
    g.setNode('b', node({ rank: 1 }));
    g.setNode('c', node({ rank: 3 }));
    g.setNode('d', node({ rank: 4 }));
    g.setEdge('a', 'd', { weight: 1, minlen: 1 });
    g.setEdge('a', 'c', { weight: 1, minlen: 1 });
    g.setEdge('c', 'd', { weight: 1, minlen: 1 });
    g.setEdge('b', 'c', { weight: 1, minlen: 1 });

    const t = tree();
    t.setPath(['c', 'd', 'a', 'b']);
    initLowLimValues(t, 'a');

    expect(enterEdge(t, g, { v: 'c', w: 'd' })).toEqual({ v: 'b', w: 'c' });
  });
});
