import { z } from 'zod';

const upper = (v: unknown) => (typeof v === 'string' ? v.toUpperCase() : v);
const lower = (v: unknown) => (typeof v === 'string' ? v.toLowerCase() : v);

const size = z.number().finite().nonnegative();

export const RankDirSchema = z.preprocess(upper, z.enum(['TB', 'BT', 'LR', 'RL']));
export const LabelPosSchema = z.preprocess(lower, z.enum(['l', 'c', 'r']));
export const AlignSchema = z.preprocess(upper, z.enum(['UL', 'UR', 'DL', 'DR']));

export const GraphOptionsSchema = z
  .object({
    rankdir: RankDirSchema.optional(),
    nodesep: size.optional(),
    edgesep: size.optional(),
    ranksep: size.optional(),
    marginx: size.optional(),
    marginy: size.optional(),
    acyclicer: z.enum(['greedy', 'dfs']).optional(),
    ranker: z.enum(['network-simplex', 'tight-tree', 'longest-path']).optional(),
    align: AlignSchema.optional(),
  })
  .strict();

export const NodeInputSchema = z.object({
  id: z.string().min(1, 'Node id must not be empty'),
  width: size.optional(),
  height: size.optional(),
  parent: z.string().min(1).optional(),
});

export const EdgeInputSchema = z.object({
  v: z.string().min(1),
  w: z.string().min(1),
  name: z.string().optional(),
  minlen: z.number().int().nonnegative().optional(),
  weight: size.optional(),
  width: size.optional(),
  height: size.optional(),
  labelpos: LabelPosSchema.optional(),
  labeloffset: z.number().finite().optional(),
});

export const GraphInputSchema = z.object({
  options: GraphOptionsSchema.optional(),
  nodes: z.array(NodeInputSchema).default([]),
  edges: z.array(EdgeInputSchema).default([]),
});

export type ParsedGraphInput = z.output<typeof GraphInputSchema>;

/**
 * Plain-object graph description accepted by `buildGraph`. Enumerated
 * options are matched case-insensitively.
 */
export interface GraphInput {
  options?: {
    rankdir?: string;
    nodesep?: number;
    edgesep?: number;
    ranksep?: number;
    marginx?: number;
    marginy?: number;
    acyclicer?: 'greedy' | 'dfs';
    ranker?: 'network-simplex' | 'tight-tree' | 'longest-path';
    align?: string;
  };
  nodes?: { id: string; width?: number; height?: number; parent?: string }[];
  edges?: {
    v: string;
    w: string;
    name?: string;
    minlen?: number;
    weight?: number;
    width?: number;
    height?: number;
    labelpos?: string;
    labeloffset?: number;
  }[];
}
