import { describe, expect, test } from 'vitest';
import { Graph } from '../src/graphlib/index.js';
import {
  addSubgraphConstraints,
  barycenter,
  buildLayerGraph,
  crossCount,
  initOrder,
  order,
  resolveConflicts,
  sort,
  sortSubgraph,
} from '../src/layout/order/index.js';
import type { LayerEdge, LayerGraph, LayerGraphLabel, LayerNode } from '../src/layout/order/types.js';
import * as normalize from '../src/layout/normalize.js';
import { longestPath } from '../src/layout/rank/index.js';
import type { LayoutGraph } from '../src/layout/types.js';
import { buildLayerMatrix, normalizeRanks } from '../src/layout/util.js';
import { edge, layoutGraph, node, randomDag, setPath } from './helpers.js';

function layerGraph(): LayerGraph {
  return new Graph<LayerNode, LayerEdge, LayerGraphLabel>({ compound: true }).setGraph({ root: 'root' });
}

function ranked(ranks: Record<string, number>): LayoutGraph {
  const g = layoutGraph();
  for (const [v, rank] of Object.entries(ranks)) g.setNode(v, node({ rank }));
  return g;
}

function orders(g: LayoutGraph, vs: string[]): (number | undefined)[] {
  return vs.map(v => g.node(v)?.order);
}

describe('barycenter', () => {
  test('has no barycenter without in-edges', () => {
    const g = layerGraph();
    g.setNode('x', node());
    expect(barycenter(g, ['x'])).toEqual([{ v: 'x' }]);
  });

  test('weights neighbour orders by edge weight', () => {
    const g = layerGraph();
    g.setNode('a', node({ order: 0 }));
    g.setNode('b', node({ order: 1 }));
    g.setNode('x', node());
    g.setEdge('a', 'x', { weight: 2 });
    g.setEdge('b', 'x', { weight: 1 });
    const [entry] = barycenter(g, ['x']);
    expect(entry.v).toBe('x');
    expect(entry.barycenter).toBeCloseTo(1 / 3);
    expect(entry.weight).toBe(3);
  });
});

describe('resolveConflicts', () => {
  test('returns entries as they are without constraints', () => {
    const cg = new Graph();
    const result = resolveConflicts(
      [
        { v: 'a', barycenter: 2, weight: 3 },
        { v: 'b', barycenter: 1, weight: 2 },
      ],
      cg,
    );
    expect(result).toEqual([
      { vs: ['b'], i: 1, barycenter: 1, weight: 2 },
      { vs: ['a'], i: 0, barycenter: 2, weight: 3 },
    ]);
  });

  test('keeps constrained entries apart when barycenters agree', () => {
    const cg = new Graph();
    cg.setEdge('a', 'b');
    const result = resolveConflicts(
      [
        { v: 'a', barycenter: 1, weight: 1 },
        { v: 'b', barycenter: 2, weight: 1 },
      ],
      cg,
    );
    expect(result).toEqual([
      { vs: ['a'], i: 0, barycenter: 1, weight: 1 },
      { vs: ['b'], i: 1, barycenter: 2, weight: 1 },
    ]);
  });

  test('merges a violated constraint into one weighted entry', () => {
    const cg = new Graph();
    cg.setEdge('a', 'b');
    const result = resolveConflicts(
      [
        { v: 'a', barycenter: 2, weight: 3 },
        { v: 'b', barycenter: 1, weight: 2 },
      ],
      cg,
    );
    expect(result).toEqual([{ vs: ['a', 'b'], i: 0, barycenter: 8 / 5, weight: 5 }]);
  });

  test('merges equal barycenters', () => {
    const cg = new Graph();
    cg.setEdge('a', 'b');
    const result = resolveConflicts(
      [
        { v: 'a', barycenter: 1, weight: 1 },
        { v: 'b', barycenter: 1, weight: 1 },
      ],
      cg,
    );
    expect(result).toEqual([{ vs: ['a', 'b'], i: 0, barycenter: 1, weight: 2 }]);
  });
});

describe('sort', () => {
  test('sorts by barycenter and reports the weighted mean', () => {
    expect(
      sort(
        [
          { vs: ['a'], i: 0, barycenter: 2, weight: 1 },
          { vs: ['b'], i: 1, barycenter: 1, weight: 1 },
        ],
        false,
      ),
    ).toEqual({ vs: ['b', 'a'], barycenter: 1.5, weight: 2 });
  });

  test('slots entries without a barycenter back at their index', () => {
    expect(
      sort(
        [
          { vs: ['a'], i: 0, barycenter: 3, weight: 1 },
          { vs: ['b'], i: 1 },
          { vs: ['c'], i: 2, barycenter: 1, weight: 1 },
        ],
        false,
      ),
    ).toEqual({ vs: ['c', 'b', 'a'], barycenter: 2, weight: 2 });
  });

  test('breaks ties by index, reversed under bias', () => {
    const entries = () => [
      { vs: ['a'], i: 0, barycenter: 1, weight: 1 },
      { vs: ['b'], i: 1, barycenter: 1, weight: 1 },
    ];
    expect(sort(entries(), false).vs).toEqual(['a', 'b']);
    expect(sort(entries(), true).vs).toEqual(['b', 'a']);
  });

  test('keeps the index order when nothing is sortable', () => {
    expect(
      sort(
        [
          { vs: ['a'], i: 0 },
          { vs: ['b'], i: 1 },
        ],
        false,
      ),
    ).toEqual({ vs: ['a', 'b'] });
  });
});

describe('crossCount', () => {
  test('counts zero for parallel edges', () => {
    const g = layoutGraph();
    g.setEdge('a', 'c', edge());
    g.setEdge('b', 'd', edge());
    expect(crossCount(g, [['a', 'b'], ['c', 'd']])).toBe(0);
  });

  test('multiplies the weights of crossing edges', () => {
    const g = layoutGraph();
    g.setEdge('a', 'd', edge({ weight: 2 }));
    g.setEdge('b', 'c', edge({ weight: 3 }));
    expect(crossCount(g, [['a', 'b'], ['c', 'd']])).toBe(6);
  });

  test('sums crossings across layers', () => {
    const g = layoutGraph();
    setPath(g, ['a', 'd', 'e']);
    setPath(g, ['b', 'c', 'f']);
    g.setNode('x', node());
    expect(crossCount(g, [['a', 'b'], ['c', 'd'], ['e', 'f']])).toBe(2);
  });
});

describe('initOrder', () => {
  test('follows successors depth first from the lowest rank', () => {
    const g = ranked({ a: 0, b: 1, c: 1, d: 0 });
    g.setEdge('a', 'c', edge());
    g.setEdge('d', 'b', edge());
    expect(initOrder(g)).toEqual([['a', 'd'], ['c', 'b']]);
  });
});

describe('addSubgraphConstraints', () => {
  test('constrains sibling subgraphs in the order met', () => {
    const g = layerGraph();
    const cg = new Graph();
    g.setParent('a', 'sg1');
    g.setParent('b', 'sg2');
    addSubgraphConstraints(g, cg, ['a', 'b']);
    expect(cg.edges()).toEqual([{ v: 'sg1', w: 'sg2' }]);
  });

  test('adds nothing for nodes of the same subgraph', () => {
    const g = layerGraph();
    const cg = new Graph();
    g.setParent('a', 'sg1');
    g.setParent('b', 'sg1');
    addSubgraphConstraints(g, cg, ['a', 'b']);
    expect(cg.edgeCount()).toBe(0);
  });
});

describe('sortSubgraph', () => {
  function seeded(): LayerGraph {
    const g = layerGraph()
      .setDefaultNodeLabel(() => node())
      .setDefaultEdgeLabel(() => ({ weight: 1 }));
    for (let i = 0; i < 5; i++) g.setNode(String(i), node({ order: i }));
    return g;
  }

  test('sorts a flat subgraph by barycenter and reports its totals', () => {
    const g = seeded();
    g.setEdge('3', 'x');
    g.setEdge('1', 'y', { weight: 2 });
    g.setEdge('4', 'y');
    g.setParent('x', 'movable');
    g.setParent('y', 'movable');
    expect(sortSubgraph(g, 'movable', new Graph(), false)).toEqual({ vs: ['y', 'x'], barycenter: 2.25, weight: 4 });
  });

  test('leaves a node without neighbours at its position', () => {
    const g = seeded();
    g.setEdge('3', 'x');
    g.setNode('y');
    g.setEdge('1', 'z', { weight: 2 });
    g.setEdge('4', 'z');
    for (const v of ['x', 'y', 'z']) g.setParent(v, 'movable');
    expect(sortSubgraph(g, 'movable', new Graph(), false).vs).toEqual(['z', 'y', 'x']);
  });

  test('breaks ties to the left, or to the right when biased', () => {
    const g = seeded();
    g.setEdge('1', 'x');
    g.setEdge('1', 'y');
    for (const v of ['x', 'y']) g.setParent(v, 'movable');
    expect(sortSubgraph(g, 'movable', new Graph(), false).vs).toEqual(['x', 'y']);
    expect(sortSubgraph(g, 'movable', new Graph(), true).vs).toEqual(['y', 'x']);
  });

  test('keeps a nested subgraph together when it has no barycenter of its own', () => {
    const g = seeded();
    for (const v of ['a', 'b', 'c']) g.setParent(v, 'y');
    g.setEdge('0', 'x');
    g.setEdge('1', 'z');
    g.setEdge('2', 'y');
    for (const v of ['x', 'y', 'z']) g.setParent(v, 'movable');
    expect(sortSubgraph(g, 'movable', new Graph(), false).vs).toEqual(['x', 'z', 'a', 'b', 'c']);
  });

  test('folds the barycenter of a nested subgraph into its entry', () => {
    const g = seeded();
    for (const v of ['a', 'b', 'c']) g.setParent(v, 'y');
    g.setEdge('0', 'a', { weight: 3 });
    g.setEdge('0', 'x');
    g.setEdge('1', 'z');
    g.setEdge('2', 'y');
    for (const v of ['x', 'y', 'z']) g.setParent(v, 'movable');
    expect(sortSubgraph(g, 'movable', new Graph(), false).vs).toEqual(['x', 'a', 'b', 'c', 'z']);
  });

  test('places a nested subgraph by its children when it has no in-edges', () => {
    const g = seeded();
    for (const v of ['a', 'b', 'c']) g.setParent(v, 'y');
    g.setEdge('0', 'a');
    g.setEdge('1', 'b');
    g.setEdge('0', 'x');
    g.setEdge('1', 'z');
    for (const v of ['x', 'y', 'z']) g.setParent(v, 'movable');
    expect(sortSubgraph(g, 'movable', new Graph(), false).vs).toEqual(['x', 'a', 'b', 'c', 'z']);
  });

  test('puts border nodes at the ends of the subgraph', () => {
    const g = seeded();
    g.setEdge('0', 'x');
    g.setEdge('1', 'y');
    g.setEdge('2', 'z');
    g.setNode('sg1', { slice: true, borderLeft: 'bl', borderRight: 'br' });
    for (const v of ['x', 'y', 'z', 'bl', 'br']) g.setParent(v, 'sg1');
    expect(sortSubgraph(g, 'sg1', new Graph(), false).vs).toEqual(['bl', 'x', 'y', 'z', 'br']);
  });

  test('counts the previous border nodes in the subgraph barycenter', () => {
    const g = layerGraph()
      .setDefaultNodeLabel(() => node())
      .setDefaultEdgeLabel(() => ({ weight: 1 }));
    g.setNode('bl1', node({ order: 0 }));
    g.setNode('br1', node({ order: 1 }));
    g.setEdge('bl1', 'bl2');
    g.setEdge('br1', 'br2');
    for (const v of ['bl2', 'br2']) g.setParent(v, 'sg');
    g.setNode('sg', { slice: true, borderLeft: 'bl2', borderRight: 'br2' });
    expect(sortSubgraph(g, 'sg', new Graph(), false)).toEqual({ vs: ['bl2', 'br2'], barycenter: 0.5, weight: 2 });
  });
});

describe('buildLayerGraph', () => {
  function fourNodes(): LayoutGraph {
    return ranked({ a: 1, b: 1, c: 2, d: 3 });
  }

  function sorted(vs: string[]): string[] {
    return vs.slice().sort();
  }

  test('hangs nodes without a parent under a fresh root', () => {
    const lg = buildLayerGraph(fourNodes(), 1, 'inEdges');
    const root = lg.graph()?.root ?? '';
    expect(lg.hasNode(root)).toBe(true);
    expect(lg.children()).toEqual([root]);
    expect(sorted(lg.children(root))).toEqual(['a', 'b']);
  });

  test('copies the nodes of the requested rank', () => {
    const g = fourNodes();
    const lg1 = buildLayerGraph(g, 1, 'inEdges');
    expect(lg1.hasNode('a')).toBe(true);
    expect(lg1.hasNode('b')).toBe(true);
    expect(buildLayerGraph(g, 2, 'inEdges').hasNode('c')).toBe(true);
    expect(buildLayerGraph(g, 3, 'inEdges').hasNode('d')).toBe(true);
    expect(buildLayerGraph(g, 3, 'inEdges').hasNode('a')).toBe(false);
  });

  test('shares node labels with the layout graph', () => {
    const g = ranked({ a: 1, b: 2 });
    g.setEdge('a', 'b', edge());
    const lg = buildLayerGraph(g, 2, 'inEdges');
    expect(lg.node('a')).toBe(g.node('a'));
    expect(lg.node('b')).toBe(g.node('b'));
    const b = lg.node('b');
    if (b) b.order = 7;
    expect(g.node('b')?.order).toBe(7);
  });

  test('copies in-edges onto the rank', () => {
    const g = fourNodes();
    g.setEdge('a', 'c', edge({ weight: 2 }));
    g.setEdge('b', 'c', edge({ weight: 3 }));
    g.setEdge('c', 'd', edge({ weight: 4 }));

    expect(buildLayerGraph(g, 1, 'inEdges').edgeCount()).toBe(0);
    const lg2 = buildLayerGraph(g, 2, 'inEdges');
    expect(lg2.edgeCount()).toBe(2);
    expect(lg2.edge('a', 'c')).toEqual({ weight: 2 });
    expect(lg2.edge('b', 'c')).toEqual({ weight: 3 });
    const lg3 = buildLayerGraph(g, 3, 'inEdges');
    expect(lg3.edgeCount()).toBe(1);
    expect(lg3.edge('c', 'd')).toEqual({ weight: 4 });
  });

  test('copies out-edges onto the rank, reversed', () => {
    const g = fourNodes();
    g.setEdge('a', 'c', edge({ weight: 2 }));
    g.setEdge('b', 'c', edge({ weight: 3 }));
    g.setEdge('c', 'd', edge({ weight: 4 }));

    const lg1 = buildLayerGraph(g, 1, 'outEdges');
    expect(lg1.edgeCount()).toBe(2);
    expect(lg1.edge('c', 'a')).toEqual({ weight: 2 });
    expect(lg1.edge('c', 'b')).toEqual({ weight: 3 });
    const lg2 = buildLayerGraph(g, 2, 'outEdges');
    expect(lg2.edgeCount()).toBe(1);
    expect(lg2.edge('d', 'c')).toEqual({ weight: 4 });
    expect(buildLayerGraph(g, 3, 'outEdges').edgeCount()).toBe(0);
  });

  test('sums the weights of parallel edges', () => {
    const g = ranked({ a: 1, b: 2 });
    g.setEdge('a', 'b', edge({ weight: 2 }));
    g.setEdge('a', 'b', edge({ weight: 3 }), 'multi');
    expect(buildLayerGraph(g, 2, 'inEdges').edge('a', 'b')).toEqual({ weight: 5 });
  });

  test('keeps the hierarchy and gives subgraphs their border nodes for the rank', () => {
    const g = ranked({ a: 0, b: 0, c: 0 });
    g.setNode('sg', node({ minRank: 0, maxRank: 0, borderLeft: ['bl'], borderRight: ['br'] }));
    g.setParent('a', 'sg');
    g.setParent('b', 'sg');

    const lg = buildLayerGraph(g, 0, 'inEdges');
    const root = lg.graph()?.root ?? '';
    expect(sorted(lg.children(root))).toEqual(['c', 'sg']);
    expect(lg.parent('a')).toBe('sg');
    expect(lg.parent('b')).toBe('sg');
    expect(lg.node('sg')).toEqual({ slice: true, borderLeft: 'bl', borderRight: 'br' });
  });
});

describe('order', () => {
  test('adds no crossings to a tree', () => {
    const g = ranked({ a: 1, b: 2, e: 2, c: 3, d: 3, f: 3 });
    setPath(g, ['a', 'b', 'c']);
    g.setEdge('b', 'd', edge());
    setPath(g, ['a', 'e', 'f']);
    order(g);
    expect(crossCount(g, buildLayerMatrix(g))).toBe(0);
  });

  test('untangles a crossing the initial order makes', () => {
    const g = ranked({ a: 0, b: 0, c: 1, d: 1, e: 1 });
    g.setEdge('a', 'c', edge());
    g.setEdge('a', 'e', edge());
    g.setEdge('b', 'c', edge());
    g.setEdge('b', 'd', edge());

    order(g, { disableOptimalOrderHeuristic: true });
    expect(orders(g, ['c', 'e', 'd'])).toEqual([0, 1, 2]);
    expect(crossCount(g, buildLayerMatrix(g))).toBe(1);

    order(g);
    expect(orders(g, ['e', 'c', 'd'])).toEqual([0, 1, 2]);
    expect(crossCount(g, buildLayerMatrix(g))).toBe(0);
  });

  test('reaches the single unavoidable crossing of a bowtie', () => {
    const g = ranked({ a: 0, b: 0, c: 1, d: 1 });
    g.setEdge('a', 'c', edge());
    g.setEdge('a', 'd', edge());
    g.setEdge('b', 'c', edge());
    g.setEdge('b', 'd', edge());
    order(g);
    expect(crossCount(g, buildLayerMatrix(g))).toBe(1);
  });

  test('keeps a subgraph contiguous even when splitting it would cross less', () => {
    const g = ranked({ x: 0, y: 0, z: 0, a: 1, c: 1 });
    g.setNode('S', node({ minRank: 0, maxRank: 0 }));
    g.setParent('x', 'S');
    g.setParent('z', 'S');
    g.setEdge('x', 'a', edge());
    g.setEdge('y', 'a', edge());
    g.setEdge('y', 'c', edge());
    g.setEdge('z', 'c', edge());

    order(g, { disableOptimalOrderHeuristic: true });
    expect(orders(g, ['x', 'y', 'z'])).toEqual([0, 1, 2]);
    expect(crossCount(g, buildLayerMatrix(g))).toBe(0);

    order(g);
    expect(orders(g, ['y', 'x', 'z', 'a', 'c'])).toEqual([0, 1, 2, 0, 1]);
    expect(crossCount(g, buildLayerMatrix(g))).toBe(1);
  });

  describe('on generated graphs', () => {
    function generated(seed: number): LayoutGraph {
      const { nodes, edges } = randomDag(seed, 9, 0.3);
      const g = layoutGraph();
      for (const v of nodes) g.setNode(v, node());
      for (const [v, w] of edges) g.setEdge(v, w, edge());
      longestPath(g);
      normalizeRanks(g);
      normalize.run(g);
      return g;
    }

    const seeds = [1, 2, 3, 4, 5, 6, 7, 8];

    test.each(seeds)('orders every rank as a permutation (seed %i)', seed => {
      const g = generated(seed);
      order(g);
      for (const layer of buildLayerMatrix(g)) {
        const seen = layer.map(v => g.node(v)?.order).sort((a, b) => (a ?? 0) - (b ?? 0));
        expect(seen).toEqual(layer.map((_, i) => i));
      }
    });

    test.each(seeds)('orders copies of the same graph identically (seed %i)', seed => {
      const first = generated(seed);
      order(first);
      const second = generated(seed);
      order(second);
      expect(buildLayerMatrix(second)).toEqual(buildLayerMatrix(first));
    });

    test.each(seeds)('does not add crossings when run again (seed %i)', seed => {
      const g = generated(seed);
      order(g);
      const first = crossCount(g, buildLayerMatrix(g));
      order(g);
      expect(crossCount(g, buildLayerMatrix(g))).toBeLessThanOrEqual(first);
    });
  });
});
