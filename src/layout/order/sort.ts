import { partition } from '../util.js';
import type { SortEntry, SortResult } from './types.js';

/**
 * Orders entries by barycenter. Entries without one keep their index `i`
 * and are slotted back in as soon as the running position reaches it.
 * Equal barycenters fall back to `i`, descending under `biasRight`.
 */
export function sort(entries: SortEntry[], biasRight: boolean): SortResult {
  const parts = partition(entries, entry => entry.barycenter !== undefined);
  const sortable = parts.lhs;
  const unsortable = parts.rhs.slice().sort((a, b) => b.i - a.i);
  const vs: string[][] = [];
  let sum = 0;
  let weight = 0;
  let vsIndex = 0;

  sortable.sort(compareWithBias(biasRight));

  vsIndex = consumeUnsortable(vs, unsortable, vsIndex);

  for (const entry of sortable) {
    vsIndex += entry.vs.length;
    vs.push(entry.vs);
    sum += (entry.barycenter ?? 0) * (entry.weight ?? 0);
    weight += entry.weight ?? 0;
    vsIndex = consumeUnsortable(vs, unsortable, vsIndex);
  }

  const result: SortResult = { vs: vs.flat() };
  if (weight) {
    result.barycenter = sum / weight;
    result.weight = weight;
  }
  return result;
}

function consumeUnsortable(vs: string[][], unsortable: SortEntry[], index: number): number {
  let last: SortEntry | undefined;
  while (unsortable.length && (last = unsortable[unsortable.length - 1]).i <= index) {
    unsortable.pop();
    vs.push(last.vs);
    index++;
  }
  return index;
}

function compareWithBias(bias: boolean) {
  return (entryV: SortEntry, entryW: SortEntry): number => {
    const bv = entryV.barycenter ?? NaN;
    const bw = entryW.barycenter ?? NaN;
    if (bv < bw) {
      return -1;
    } else if (bv > bw) {
      return 1;
    }
    return !bias ? entryV.i - entryW.i : entryW.i - entryV.i;
  };
}
