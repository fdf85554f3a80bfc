import { describe, expect, test } from 'vitest';
import { Graph, alg, type Edge } from '../src/graphlib/index.js';
import { greedyFAS } from '../src/layout/greedy-fas.js';

function withoutEdges<E>(g: Graph<unknown, E>, fas: Edge[]): Graph<unknown, E> {
  for (const e of fas) g.removeEdge(e);
  return g;
}

describe('greedyFAS', () => {
  test('returns nothing for an empty graph or a single node', () => {
    expect(greedyFAS(new Graph())).toEqual([]);
    expect(greedyFAS(new Graph().setNode('a'))).toEqual([]);
  });

  test('returns nothing for an acyclic graph', () => {
    const g = new Graph();
    g.setPath(['a', 'b', 'c']);
    g.setEdge('b', 'd');
    g.setEdge('a', 'e');
    expect(greedyFAS(g)).toEqual([]);
  });

  test('breaks a two-node cycle with one edge', () => {
    const g = new Graph();
    g.setPath(['a', 'b', 'a']);
    expect(greedyFAS(g)).toEqual([{ v: 'b', w: 'a' }]);
  });

  test('ignores self-loops', () => {
    const g = new Graph();
    g.setEdge('a', 'a');
    g.setEdge('a', 'b');
    expect(greedyFAS(g)).toEqual([]);
  });

  test('returns every parallel edge of a chosen arc', () => {
    const g = new Graph({ multigraph: true });
    g.setEdge('a', 'b');
    g.setEdge('a', 'b', undefined, 'x');
    g.setEdge('b', 'a');
    g.setEdge('b', 'a', undefined, 'y');
    const fas = greedyFAS(g);
    expect(fas).toEqual([{ v: 'b', w: 'a' }, { v: 'b', w: 'a', name: 'y' }]);
    expect(alg.isAcyclic(withoutEdges(g, fas))).toBe(true);
  });

  test('leaves an acyclic graph for interleaved cycles', () => {
    const g = new Graph<unknown, number>();
    g.setPath(['a', 'b', 'c', 'd', 'a']);
    g.setPath(['a', 'e', 'f', 'a']);
    g.setEdge('c', 'a');
    g.setEdge('f', 'b');
    const fas = greedyFAS(g);
    expect(alg.isAcyclic(withoutEdges(g, fas))).toBe(true);
  });

  test('prefers breaking the lighter edge', () => {
    const g = new Graph<unknown, number>();
    g.setEdge('a', 'b', 5);
    g.setEdge('b', 'a', 1);
    expect(greedyFAS(g, e => g.edge(e) ?? 0)).toEqual([{ v: 'b', w: 'a' }]);
  });
});
