// Public SDK surface for programmatic use
export type { Diagnostic, Engine } from './core/types.js';

// Graph store
export { Graph, alg } from './graphlib/index.js';
export type { Edge, GraphOptions } from './graphlib/index.js';

// Layout engines
export * from './layout/index.js';

// Graph descriptions: validation, layout and serialisation
export {
  buildGraph,
  countCrossings,
  layoutInput,
  toLayoutResult,
  GraphInputSchema,
} from './input/index.js';
export type {
  BuildResult,
  CrossingInputResult,
  EdgeResult,
  GraphInput,
  LayoutInputOptions,
  LayoutInputResult,
  LayoutResult,
  NodeResult,
  ParsedGraphInput,
} from './input/index.js';

// Formatting
export { textReport, toJsonResult } from './core/format.js';
