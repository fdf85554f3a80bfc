/**
 * Labeled multigraph with optional compound (parent/child) structure.
 *
 * The API follows graphlib, the graph store dagre is built on, so layout
 * stages read the same way they do upstream. Every collection is Map backed:
 * nodes, edges, children and adjacency lists iterate in insertion order, and
 * re-setting an existing node or edge keeps its position.
 */

export interface Edge {
  v: string;
  w: string;
  name?: string;
}

export interface GraphOptions {
  directed?: boolean;
  multigraph?: boolean;
  compound?: boolean;
}

const DEFAULT_EDGE_NAME = '\x00';
const GRAPH_NODE = '\x00';
const EDGE_KEY_DELIM = '\x01';

type NodeLabelFactory<N> = (v: string) => N | undefined;
type EdgeLabelFactory<E> = (v: string, w: string, name?: string) => E | undefined;

export class Graph<N = unknown, E = unknown, G = unknown> {
  private readonly directed: boolean;
  private readonly multigraph: boolean;
  private readonly compound: boolean;

  private label: G | undefined;
  private defaultNodeLabelFn: NodeLabelFactory<N> = () => undefined;
  private defaultEdgeLabelFn: EdgeLabelFactory<E> = () => undefined;

  private readonly nodeLabels = new Map<string, N | undefined>();
  private readonly inMap = new Map<string, Map<string, Edge>>();
  private readonly outMap = new Map<string, Map<string, Edge>>();
  private readonly predsMap = new Map<string, Map<string, number>>();
  private readonly sucsMap = new Map<string, Map<string, number>>();
  private readonly edgeObjs = new Map<string, Edge>();
  private readonly edgeLabels = new Map<string, E | undefined>();

  private readonly parentMap = new Map<string, string>();
  private readonly childrenMap = new Map<string, Set<string>>();

  constructor(opts: GraphOptions = {}) {
    this.directed = opts.directed ?? true;
    this.multigraph = opts.multigraph ?? false;
    this.compound = opts.compound ?? false;
    if (this.compound) {
      this.childrenMap.set(GRAPH_NODE, new Set());
    }
  }

  isDirected(): boolean { return this.directed; }
  isMultigraph(): boolean { return this.multigraph; }
  isCompound(): boolean { return this.compound; }

  setGraph(label: G): this {
    this.label = label;
    return this;
  }

  graph(): G | undefined {
    return this.label;
  }

  setDefaultNodeLabel(fn: NodeLabelFactory<N>): this {
    this.defaultNodeLabelFn = fn;
    return this;
  }

  setDefaultEdgeLabel(fn: EdgeLabelFactory<E>): this {
    this.defaultEdgeLabelFn = fn;
    return this;
  }

  // ---- nodes ----

  nodeCount(): number {
    return this.nodeLabels.size;
  }

  nodes(): string[] {
    return Array.from(this.nodeLabels.keys());
  }

  sources(): string[] {
    return this.nodes().filter(v => (this.inMap.get(v)?.size ?? 0) === 0);
  }

  sinks(): string[] {
    return this.nodes().filter(v => (this.outMap.get(v)?.size ?? 0) === 0);
  }

  setNodes(vs: string[], value?: N): this {
    for (const v of vs) this.setNode(v, value);
    return this;
  }

  setNode(v: string, value?: N): this {
    if (this.nodeLabels.has(v)) {
      if (value !== undefined) this.nodeLabels.set(v, value);
      return this;
    }
    this.nodeLabels.set(v, value !== undefined ? value : this.defaultNodeLabelFn(v));
    if (this.compound) {
      this.parentMap.set(v, GRAPH_NODE);
      this.childrenMap.set(v, new Set());
      this.childrenMap.get(GRAPH_NODE)?.add(v);
    }
    this.inMap.set(v, new Map());
    this.predsMap.set(v, new Map());
    this.outMap.set(v, new Map());
    this.sucsMap.set(v, new Map());
    return this;
  }

  node(v: string): N | undefined {
    return this.nodeLabels.get(v);
  }

  hasNode(v: string): boolean {
    return this.nodeLabels.has(v);
  }

  removeNode(v: string): this {
    if (!this.nodeLabels.has(v)) return this;
    this.nodeLabels.delete(v);
    if (this.compound) {
      this.removeFromParentsChildList(v);
      this.parentMap.delete(v);
      for (const child of this.children(v)) {
        this.setParent(child);
      }
      this.childrenMap.delete(v);
    }
    for (const e of Array.from(this.inMap.get(v)?.values() ?? [])) this.removeEdge(e);
    for (const e of Array.from(this.outMap.get(v)?.values() ?? [])) this.removeEdge(e);
    this.inMap.delete(v);
    this.predsMap.delete(v);
    this.outMap.delete(v);
    this.sucsMap.delete(v);
    return this;
  }

  // ---- compound structure ----

  setParent(v: string, parent?: string): this {
    if (!this.compound) {
      throw new Error('Cannot set parent in a non-compound graph');
    }
    let target = GRAPH_NODE;
    if (parent !== undefined) {
      for (let ancestor: string | undefined = parent; ancestor !== undefined; ancestor = this.parent(ancestor)) {
        if (ancestor === v) {
          throw new Error(`Setting ${parent} as parent of ${v} would create a cycle`);
        }
      }
      this.setNode(parent);
      target = parent;
    }
    this.setNode(v);
    this.removeFromParentsChildList(v);
    this.parentMap.set(v, target);
    this.childrenMap.get(target)?.add(v);
    return this;
  }

  private removeFromParentsChildList(v: string): void {
    const p = this.parentMap.get(v);
    if (p !== undefined) this.childrenMap.get(p)?.delete(v);
  }

  parent(v: string): string | undefined {
    if (!this.compound) return undefined;
    const p = this.parentMap.get(v);
    return p === GRAPH_NODE ? undefined : p;
  }

  /** Children of `v`, or the top-level nodes when `v` is omitted. */
  children(v?: string): string[] {
    if (this.compound) {
      const set = this.childrenMap.get(v ?? GRAPH_NODE);
      return set ? Array.from(set) : [];
    }
    if (v === undefined) return this.nodes();
    return [];
  }

  // ---- adjacency ----

  predecessors(v: string): string[] {
    return Array.from(this.predsMap.get(v)?.keys() ?? []);
  }

  successors(v: string): string[] {
    return Array.from(this.sucsMap.get(v)?.keys() ?? []);
  }

  neighbors(v: string): string[] {
    const seen = new Set<string>(this.predecessors(v));
    for (const w of this.successors(v)) seen.add(w);
    return Array.from(seen);
  }

  // ---- edges ----

  edgeCount(): number {
    return this.edgeObjs.size;
  }

  edges(): Edge[] {
    return Array.from(this.edgeObjs.values());
  }

  setEdge(v: string, w: string, value?: E, name?: string): this {
    const id = this.edgeId(v, w, name);
    if (this.edgeLabels.has(id)) {
      if (value !== undefined) this.edgeLabels.set(id, value);
      return this;
    }
    if (name !== undefined && !this.multigraph) {
      throw new Error('Cannot set a named edge when isMultigraph = false');
    }

    this.setNode(v);
    this.setNode(w);
    this.edgeLabels.set(id, value !== undefined ? value : this.defaultEdgeLabelFn(v, w, name));

    const edgeObj = this.edgeObj(v, w, name);
    this.edgeObjs.set(id, edgeObj);
    increment(this.predsMap.get(edgeObj.w), edgeObj.v);
    increment(this.sucsMap.get(edgeObj.v), edgeObj.w);
    this.inMap.get(edgeObj.w)?.set(id, edgeObj);
    this.outMap.get(edgeObj.v)?.set(id, edgeObj);
    return this;
  }

  setPath(vs: string[], value?: E): this {
    for (let i = 1; i < vs.length; i++) {
      this.setEdge(vs[i - 1], vs[i], value);
    }
    return this;
  }

  edge(e: Edge): E | undefined;
  edge(v: string, w: string, name?: string): E | undefined;
  edge(v: string | Edge, w?: string, name?: string): E | undefined {
    return this.edgeLabels.get(this.idOf(v, w, name));
  }

  hasEdge(e: Edge): boolean;
  hasEdge(v: string, w: string, name?: string): boolean;
  hasEdge(v: string | Edge, w?: string, name?: string): boolean {
    return this.edgeLabels.has(this.idOf(v, w, name));
  }

  removeEdge(e: Edge): this;
  removeEdge(v: string, w: string, name?: string): this;
  removeEdge(v: string | Edge, w?: string, name?: string): this {
    const id = this.idOf(v, w, name);
    const edge = this.edgeObjs.get(id);
    if (edge) {
      this.edgeLabels.delete(id);
      this.edgeObjs.delete(id);
      decrement(this.predsMap.get(edge.w), edge.v);
      decrement(this.sucsMap.get(edge.v), edge.w);
      this.inMap.get(edge.w)?.delete(id);
      this.outMap.get(edge.v)?.delete(id);
    }
    return this;
  }

  /** In-edges of `v`, optionally restricted to those coming from `u`. */
  inEdges(v: string, u?: string): Edge[] {
    const edges = Array.from(this.inMap.get(v)?.values() ?? []);
    return u === undefined ? edges : edges.filter(e => e.v === u);
  }

  /** Out-edges of `v`, optionally restricted to those going to `w`. */
  outEdges(v: string, w?: string): Edge[] {
    const edges = Array.from(this.outMap.get(v)?.values() ?? []);
    return w === undefined ? edges : edges.filter(e => e.w === w);
  }

  nodeEdges(v: string, w?: string): Edge[] {
    return this.inEdges(v, w).concat(this.outEdges(v, w));
  }

  private idOf(v: string | Edge, w: string | undefined, name: string | undefined): string {
    if (typeof v === 'string') return this.edgeId(v, w ?? '', name);
    return this.edgeId(v.v, v.w, v.name);
  }

  private edgeId(v: string, w: string, name: string | undefined): string {
    let [a, b] = [v, w];
    if (!this.directed && a > b) [a, b] = [b, a];
    return a + EDGE_KEY_DELIM + b + EDGE_KEY_DELIM + (name === undefined ? DEFAULT_EDGE_NAME : name);
  }

  private edgeObj(v: string, w: string, name: string | undefined): Edge {
    let [a, b] = [v, w];
    if (!this.directed && a > b) [a, b] = [b, a];
    const obj: Edge = { v: a, w: b };
    if (name !== undefined) obj.name = name;
    return obj;
  }
}

function increment(map: Map<string, number> | undefined, k: string): void {
  if (!map) return;
  map.set(k, (map.get(k) ?? 0) + 1);
}

function decrement(map: Map<string, number> | undefined, k: string): void {
  if (!map) return;
  const n = (map.get(k) ?? 0) - 1;
  if (n <= 0) map.delete(k);
  else map.set(k, n);
}
