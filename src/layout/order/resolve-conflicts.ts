import type { BarycenterEntry, ConstraintGraph, SortEntry } from './types.js';

interface ConflictEntry {
  indegree: number;
  in: ConflictEntry[];
  out: ConflictEntry[];
  vs: string[];
  i: number;
  barycenter?: number;
  weight?: number;
  merged?: boolean;
}

/*
 * Given barycenter entries and a constraint graph, merges entries whose
 * barycenters would order them against a constraint, so sorting by
 * barycenter can never break one. Based on Forster, "A Fast and Simple
 * Heuristic for Constrained Two-Level Crossing Reduction".
 *
 * A predecessor merges into its successor when either has no barycenter or
 * the predecessor's barycenter is not smaller; ties merge. The merged entry
 * lists the predecessor's nodes first and keeps the smaller index `i`.
 */
export function resolveConflicts(entries: BarycenterEntry[], cg: ConstraintGraph): SortEntry[] {
  const mappedEntries = new Map<string, ConflictEntry>();
  entries.forEach((entry, i) => {
    const tmp: ConflictEntry = { indegree: 0, in: [], out: [], vs: [entry.v], i };
    if (entry.barycenter !== undefined) {
      tmp.barycenter = entry.barycenter;
      tmp.weight = entry.weight;
    }
    mappedEntries.set(entry.v, tmp);
  });

  for (const e of cg.edges()) {
    const entryV = mappedEntries.get(e.v);
    const entryW = mappedEntries.get(e.w);
    if (entryV && entryW) {
      entryW.indegree++;
      entryV.out.push(entryW);
    }
  }

  const sourceSet = Array.from(mappedEntries.values()).filter(entry => !entry.indegree);
  return doResolveConflicts(sourceSet);
}

function doResolveConflicts(sourceSet: ConflictEntry[]): SortEntry[] {
  const entries: ConflictEntry[] = [];

  const handleIn = (vEntry: ConflictEntry) => (uEntry: ConflictEntry) => {
    if (uEntry.merged) return;
    if (
      uEntry.barycenter === undefined ||
      vEntry.barycenter === undefined ||
      uEntry.barycenter >= vEntry.barycenter
    ) {
      mergeEntries(vEntry, uEntry);
    }
  };

  const handleOut = (vEntry: ConflictEntry) => (wEntry: ConflictEntry) => {
    wEntry.in.push(vEntry);
    if (--wEntry.indegree === 0) {
      sourceSet.push(wEntry);
    }
  };

  let entry: ConflictEntry | undefined;
  while ((entry = sourceSet.pop())) {
    entries.push(entry);
    entry.in.reverse().forEach(handleIn(entry));
    entry.out.forEach(handleOut(entry));
  }

  return entries
    .filter(e => !e.merged)
    .map(e => {
      const result: SortEntry = { vs: e.vs, i: e.i };
      if (e.barycenter !== undefined) result.barycenter = e.barycenter;
      if (e.weight !== undefined) result.weight = e.weight;
      return result;
    });
}

function mergeEntries(target: ConflictEntry, source: ConflictEntry): void {
  let sum = 0;
  let weight = 0;

  if (target.weight) {
    sum += (target.barycenter ?? 0) * target.weight;
    weight += target.weight;
  }

  if (source.weight) {
    sum += (source.barycenter ?? 0) * source.weight;
    weight += source.weight;
  }

  target.vs = source.vs.concat(target.vs);
  target.barycenter = sum / weight;
  target.weight = weight;
  target.i = Math.min(source.i, target.i);
  source.merged = true;
}
