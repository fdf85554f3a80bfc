export { Graph } from './graph.js';
export type { Edge, GraphOptions } from './graph.js';
export * as alg from './alg.js';
