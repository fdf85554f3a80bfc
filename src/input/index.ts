import { debugLog } from '../core/debug.js';
import { errorDiag, warningDiag } from '../core/errorBuilder.js';
import type { Diagnostic, Engine } from '../core/types.js';
import { layout } from '../layout/conservative.js';
import { crossingReport, hasEdgeOnCompoundNode, layoutDagreish, type CrossingReport } from '../layout/layout.js';
import type { GraphLabel } from '../layout/types.js';
import { buildGraph } from './build-graph.js';
import { toLayoutResult, type LayoutResult } from './result.js';

export { buildGraph, type BuildResult } from './build-graph.js';
export { toLayoutResult, type EdgeResult, type LayoutResult, type NodeResult } from './result.js';
export { GraphInputSchema, type GraphInput, type ParsedGraphInput } from './schema.js';

export interface LayoutInputOptions {
  engine?: Engine;
  /** Graph options that take precedence over those in the description. */
  overrides?: Pick<GraphLabel, 'rankdir' | 'nodesep' | 'ranksep' | 'edgesep'>;
  debugTiming?: boolean;
}

export interface LayoutInputResult {
  result?: LayoutResult;
  diagnostics: Diagnostic[];
}

const hasErrors = (diagnostics: Diagnostic[]) => diagnostics.some(d => d.severity === 'error');

/** Builds, lays out and serialises a graph description. Invalid descriptions yield diagnostics only. */
export function layoutInput(input: unknown, options: LayoutInputOptions = {}): LayoutInputResult {
  const { graph, diagnostics } = buildGraph(input);
  if (!graph || hasErrors(diagnostics)) {
    return { diagnostics };
  }

  const overrides = options.overrides ?? {};
  const label = graph.graph() ?? {};
  if (overrides.rankdir !== undefined) label.rankdir = overrides.rankdir;
  if (overrides.nodesep !== undefined) label.nodesep = overrides.nodesep;
  if (overrides.ranksep !== undefined) label.ranksep = overrides.ranksep;
  if (overrides.edgesep !== undefined) label.edgesep = overrides.edgesep;
  graph.setGraph(label);

  const engine = options.engine ?? 'dagreish';
  debugLog('input', `laying out ${graph.nodeCount()} nodes, ${graph.edgeCount()} edges with ${engine}`);
  if (engine === 'dagreish') {
    if (hasEdgeOnCompoundNode(graph)) {
      diagnostics.push(
        warningDiag('LAYOUT-FALLBACK', 'An edge is attached to a subgraph; the conservative layout was used.', {
          hint: 'Connect edges to nodes inside the subgraph to get the full layout.',
        }),
      );
    }
    layoutDagreish(graph, { debugTiming: options.debugTiming });
  } else {
    layout(graph, { debugTiming: options.debugTiming });
  }

  return { result: toLayoutResult(graph), diagnostics };
}

export interface CrossingInputResult {
  report?: CrossingReport;
  diagnostics: Diagnostic[];
}

/** Orders a graph description and reports its crossing counts before and after the sweeps. */
export function countCrossings(input: unknown): CrossingInputResult {
  const { graph, diagnostics } = buildGraph(input);
  if (!graph || hasErrors(diagnostics)) {
    return { diagnostics };
  }
  if (hasEdgeOnCompoundNode(graph)) {
    diagnostics.push(
      errorDiag('LAYOUT-COMPOUND-EDGE', 'Crossings cannot be counted when an edge is attached to a subgraph.', {
        hint: 'Connect edges to nodes inside the subgraph.',
      }),
    );
    return { diagnostics };
  }
  return { report: crossingReport(graph), diagnostics };
}
