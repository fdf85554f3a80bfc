import type { LayoutGraph } from '../types.js';

/**
 * Weighted number of edge crossings between consecutive layers, counted
 * with an accumulator tree (Barth, Jünger and Mutzel, "Simple and
 * Efficient Bilayer Cross Counting"). Two edges with weights `a` and `b`
 * that cross contribute `a * b`.
 */
export function crossCount(g: LayoutGraph, layering: string[][]): number {
  let cc = 0;
  for (let i = 1; i < layering.length; ++i) {
    cc += twoLayerCrossCount(g, layering[i - 1], layering[i]);
  }
  return cc;
}

function twoLayerCrossCount(g: LayoutGraph, northLayer: string[], southLayer: string[]): number {
  const southPos = new Map<string, number>();
  southLayer.forEach((v, i) => southPos.set(v, i));

  const southEntries = northLayer.flatMap(v => {
    const entries: { pos: number; weight: number }[] = [];
    for (const e of g.outEdges(v)) {
      const pos = southPos.get(e.w);
      if (pos === undefined) continue;
      entries.push({ pos, weight: g.edge(e)?.weight ?? 0 });
    }
    return entries.sort((a, b) => a.pos - b.pos);
  });

  let firstIndex = 1;
  while (firstIndex < southLayer.length) firstIndex <<= 1;
  const treeSize = 2 * firstIndex - 1;
  firstIndex -= 1;
  const tree: number[] = new Array<number>(treeSize).fill(0);

  let cc = 0;
  for (const entry of southEntries) {
    let index = entry.pos + firstIndex;
    tree[index] += entry.weight;
    let weightSum = 0;
    while (index > 0) {
      if (index % 2) {
        weightSum += tree[index + 1];
      }
      index = (index - 1) >> 1;
      tree[index] += entry.weight;
    }
    cc += entry.weight * weightSum;
  }

  return cc;
}
