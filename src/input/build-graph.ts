import type { ZodIssue } from 'zod';
import { errorDiag, warningDiag } from '../core/errorBuilder.js';
import type { Diagnostic } from '../core/types.js';
import { Graph } from '../graphlib/graph.js';
import type { EdgeLabel, GraphLabel, InputGraph, NodeLabel } from '../layout/types.js';
import { GraphInputSchema } from './schema.js';

export interface BuildResult {
  /** Absent when the description failed schema validation. */
  graph?: InputGraph;
  diagnostics: Diagnostic[];
}

function formatPath(path: (string | number)[]): string {
  let out = '';
  for (const part of path) {
    out += typeof part === 'number' ? `[${part}]` : out ? `.${part}` : part;
  }
  return out;
}

function schemaDiagnostic(issue: ZodIssue): Diagnostic {
  const path = formatPath(issue.path);
  return errorDiag('GRAPH-SCHEMA', path ? `${path}: ${issue.message}` : issue.message, path ? { path } : {});
}

/**
 * Validates a graph description and builds the graph layout runs on.
 *
 * Problems are reported as diagnostics rather than thrown. Offending nodes,
 * parents and edges are left out so the rest of the graph can still be laid
 * out; callers should not lay out a graph that came with errors.
 */
export function buildGraph(input: unknown): BuildResult {
  const parsed = GraphInputSchema.safeParse(input);
  if (!parsed.success) {
    return { diagnostics: parsed.error.issues.map(schemaDiagnostic) };
  }

  const data = parsed.data;
  const diagnostics: Diagnostic[] = [];
  const graph: InputGraph = new Graph<NodeLabel, EdgeLabel, GraphLabel>({ multigraph: true, compound: true });
  graph.setGraph({ ...data.options });

  data.nodes.forEach((node, i) => {
    if (graph.hasNode(node.id)) {
      diagnostics.push(
        errorDiag('GRAPH-DUPLICATE-NODE', `Node '${node.id}' is defined more than once.`, {
          path: `nodes[${i}]`,
          hint: 'Give every node a unique id; merge the two definitions if they describe the same node.',
        }),
      );
      return;
    }
    const label: NodeLabel = {};
    if (node.width !== undefined) label.width = node.width;
    if (node.height !== undefined) label.height = node.height;
    graph.setNode(node.id, label);
  });

  data.nodes.forEach((node, i) => {
    const parent = node.parent;
    if (parent === undefined) return;
    const path = `nodes[${i}].parent`;
    if (!graph.hasNode(parent)) {
      diagnostics.push(
        errorDiag('GRAPH-PARENT-UNKNOWN', `Parent '${parent}' of node '${node.id}' is not defined.`, {
          path,
          hint: `Add a node with id '${parent}' or remove the parent reference.`,
        }),
      );
      return;
    }
    if (wouldCreateCycle(graph, node.id, parent)) {
      diagnostics.push(
        errorDiag('GRAPH-PARENT-CYCLE', `Making '${parent}' the parent of '${node.id}' creates a nesting cycle.`, {
          path,
          hint: 'A subgraph cannot contain itself, directly or through its children.',
        }),
      );
      return;
    }
    graph.setParent(node.id, parent);
  });

  data.edges.forEach((edge, i) => {
    const path = `edges[${i}]`;
    const missing = [edge.v, edge.w].filter(v => !graph.hasNode(v));
    if (missing.length) {
      for (const v of new Set(missing)) {
        diagnostics.push(
          errorDiag('GRAPH-EDGE-UNKNOWN-NODE', `Edge ${edge.v} -> ${edge.w} references unknown node '${v}'.`, {
            path,
            hint: `Declare '${v}' under nodes.`,
          }),
        );
      }
      return;
    }
    if (graph.hasEdge(edge.v, edge.w, edge.name)) {
      const which = edge.name === undefined ? '' : ` named '${edge.name}'`;
      diagnostics.push(
        warningDiag('GRAPH-DUPLICATE-EDGE', `Edge ${edge.v} -> ${edge.w}${which} is defined more than once; the last definition wins.`, {
          path,
          hint: 'Give parallel edges distinct names to keep both.',
        }),
      );
    }
    const label: EdgeLabel = {};
    if (edge.minlen !== undefined) label.minlen = edge.minlen;
    if (edge.weight !== undefined) label.weight = edge.weight;
    if (edge.width !== undefined) label.width = edge.width;
    if (edge.height !== undefined) label.height = edge.height;
    if (edge.labelpos !== undefined) label.labelpos = edge.labelpos;
    if (edge.labeloffset !== undefined) label.labeloffset = edge.labeloffset;
    graph.setEdge(edge.v, edge.w, label, edge.name);
  });

  return { graph, diagnostics };
}

function wouldCreateCycle(graph: InputGraph, v: string, parent: string): boolean {
  for (let ancestor: string | undefined = parent; ancestor !== undefined; ancestor = graph.parent(ancestor)) {
    if (ancestor === v) return true;
  }
  return false;
}
