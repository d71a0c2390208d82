import { assertLabel, assertPairs } from '../config';
import type { PairInput } from '../config';
import { GraphConsumedError } from '../errors';

export type VertexId = number;
export type EdgeId = number;

export type EdgeRecord = {
  id: EdgeId;
  source: VertexId;
  target: VertexId;
};

export type MultigraphJSON = {
  labels: string[];
  edges: Array<[VertexId, VertexId]>;
};

export type AdjListInput = Record<string, ReadonlyArray<string>>;

/**
 * Directed multigraph over string labels. Labels are interned to dense vertex
 * ids in first-appearance order. Each vertex owns a bag of destinations in
 * input order and a cursor into it; traversal consumes edges by advancing the
 * cursor, so a graph serves exactly one traversal (see `clone()`).
 */
export class Multigraph {
  private readonly _labels: string[];
  private readonly _index: Map<string, VertexId>;
  private readonly _edges: EdgeRecord[];
  private readonly _out: VertexId[][];
  private readonly _indegree: number[];
  private readonly _sourceOrder: VertexId[];
  private readonly _cursor: number[];
  private _taken = 0;
  private _consumed = false;

  constructor(labels: string[], edges: EdgeRecord[]) {
    this._labels = labels;
    this._edges = edges;
    this._index = new Map();
    labels.forEach((label, v) => {
      if (this._index.has(label)) throw new Error(`Duplicate vertex label "${label}"`);
      this._index.set(label, v);
    });

    const n = labels.length;
    this._out = Array.from({ length: n }, () => []);
    this._indegree = Array(n).fill(0);
    this._cursor = Array(n).fill(0);
    this._sourceOrder = [];

    for (const edge of edges) {
      const { source, target } = edge;
      if (source < 0 || target < 0 || source >= n || target >= n) {
        throw new Error(`Invalid vertex id(s) ${source}, ${target}`);
      }
      const bag = this._out[source];
      if (bag.length === 0) this._sourceOrder.push(source);
      bag.push(target);
      this._indegree[target] += 1;
    }
  }

  static fromJSON(json: MultigraphJSON): Multigraph {
    const edges = json.edges.map(([source, target], id) => ({ id, source, target }));
    return new Multigraph([...json.labels], edges);
  }

  toJSON(): MultigraphJSON {
    return {
      labels: [...this._labels],
      edges: this._edges.map((edge): [VertexId, VertexId] => [edge.source, edge.target]),
    };
  }

  vertexCount(): number {
    return this._labels.length;
  }

  edgeCount(): number {
    return this._edges.length;
  }

  vertices(): VertexId[] {
    return this._labels.map((_, i) => i);
  }

  edges(): EdgeRecord[] {
    return this._edges.map((edge) => ({ ...edge }));
  }

  edge(e: EdgeId): EdgeRecord {
    const record = this._edges[e];
    if (!record) throw new Error(`Edge ${e} not found`);
    return { ...record };
  }

  label(v: VertexId): string {
    const label = this._labels[v];
    if (label === undefined) throw new Error(`Vertex ${v} not found`);
    return label;
  }

  labels(path: ReadonlyArray<VertexId>): string[] {
    return path.map((v) => this.label(v));
  }

  vertexOf(label: string): VertexId | undefined {
    return this._index.get(label);
  }

  sourceVertices(): VertexId[] {
    return [...this._sourceOrder];
  }

  sourceLabels(): string[] {
    return this._sourceOrder.map((v) => this.label(v));
  }

  outdegree(v: VertexId): number {
    return this._out[v]?.length ?? 0;
  }

  indegree(v: VertexId): number {
    return this._indegree[v] ?? 0;
  }

  remainingOutdegree(v: VertexId): number {
    return this.outdegree(v) - (this._cursor[v] ?? 0);
  }

  outNeighbors(v: VertexId): VertexId[] {
    return (this._out[v] ?? []).slice(this._cursor[v] ?? 0);
  }

  remainingEdges(): number {
    return this._edges.length - this._taken;
  }

  get consumed(): boolean {
    return this._consumed;
  }

  /** Removes and returns the next unconsumed destination of `v`. */
  takeEdge(v: VertexId): VertexId | undefined {
    const bag = this._out[v];
    const cursor = this._cursor[v] ?? 0;
    if (!bag || cursor >= bag.length) return undefined;
    this._cursor[v] = cursor + 1;
    this._taken += 1;
    return bag[cursor];
  }

  assertUnconsumed(): void {
    if (this._consumed) throw new GraphConsumedError();
  }

  markConsumed(): void {
    this._consumed = true;
  }

  clone(): Multigraph {
    return new Multigraph([...this._labels], this.edges());
  }

  toAdjList(): Record<string, string[]> {
    return Object.fromEntries(
      this._sourceOrder.map((v): [string, string[]] => [this.label(v), this.labels(this.outNeighbors(v))]),
    );
  }
}

export class MultigraphBuilder {
  private labels: string[] = [];
  private index = new Map<string, VertexId>();
  private edges: EdgeRecord[] = [];

  addVertex(label: string): VertexId {
    assertLabel(label, ['label']);
    const existing = this.index.get(label);
    if (existing !== undefined) return existing;
    const id = this.labels.length;
    this.labels.push(label);
    this.index.set(label, id);
    return id;
  }

  addEdge(source: string, target: string): EdgeId {
    assertLabel(source, ['source']);
    assertLabel(target, ['target']);
    const u = this.addVertex(source);
    const v = this.addVertex(target);
    const id = this.edges.length;
    this.edges.push({ id, source: u, target: v });
    return id;
  }

  build(): Multigraph {
    return new Multigraph([...this.labels], this.edges.map((edge) => ({ ...edge })));
  }
}

export function buildMultigraph(pairs: ReadonlyArray<PairInput>): Multigraph {
  assertPairs(pairs);
  const builder = new MultigraphBuilder();
  for (const [source, target] of pairs) {
    builder.addEdge(source, target);
  }
  return builder.build();
}

export function fromAdjList(adj: AdjListInput): Multigraph {
  const builder = new MultigraphBuilder();
  for (const [source, targets] of Object.entries(adj)) {
    for (const target of targets) {
      builder.addEdge(source, target);
    }
  }
  return builder.build();
}

export function toAdjList(graph: Multigraph): Record<string, string[]> {
  return graph.toAdjList();
}

export function toPairs(graph: Multigraph): Array<[string, string]> {
  return graph.edges().map((edge): [string, string] => [graph.label(edge.source), graph.label(edge.target)]);
}
