import type { Multigraph, VertexId } from '../graph';
import { DisconnectedGraphError, EmptyInputError, NoEulerianPathError } from '../errors';
import type { ReconstructionError } from '../errors';

export type DegreeTable = {
  indegree: number[];
  outdegree: number[];
  balance: number[]; // outdegree - indegree
};

export type EulerianGraphValidation =
  | { ok: true; start: VertexId; end: VertexId; circuit: boolean }
  | { ok: false; error: ReconstructionError };

export function degreeTable(graph: Multigraph): DegreeTable {
  const indegree = graph.vertices().map((v) => graph.indegree(v));
  const outdegree = graph.vertices().map((v) => graph.outdegree(v));
  const balance = outdegree.map((out, v) => out - (indegree[v] ?? 0));
  return { indegree, outdegree, balance };
}

export function selectStartNode(graph: Multigraph): VertexId {
  if (graph.edgeCount() === 0) throw new EmptyInputError();
  const sources = graph.sourceVertices();
  for (const v of sources) {
    if (graph.outdegree(v) > graph.indegree(v)) return v;
  }
  const [first] = sources;
  if (first === undefined) throw new EmptyInputError();
  return first;
}

export function weakComponents(graph: Multigraph): VertexId[][] {
  const n = graph.vertexCount();
  const adjacency: VertexId[][] = Array.from({ length: n }, () => []);
  for (const edge of graph.edges()) {
    adjacency[edge.source]?.push(edge.target);
    adjacency[edge.target]?.push(edge.source);
  }

  const seen: boolean[] = Array(n).fill(false);
  const components: VertexId[][] = [];
  for (let root = 0; root < n; root += 1) {
    if (seen[root] || (adjacency[root]?.length ?? 0) === 0) continue;
    const component: VertexId[] = [];
    const stack: VertexId[] = [root];
    seen[root] = true;
    while (stack.length > 0) {
      const cur = stack.pop();
      if (cur === undefined) break;
      component.push(cur);
      for (const next of adjacency[cur] ?? []) {
        if (!seen[next]) {
          seen[next] = true;
          stack.push(next);
        }
      }
    }
    components.push(component.sort((a, b) => a - b));
  }
  return components;
}

export function validateEulerianGraph(graph: Multigraph): EulerianGraphValidation {
  if (graph.edgeCount() === 0) return { ok: false, error: new EmptyInputError() };

  const components = weakComponents(graph);
  if (components.length > 1) {
    return {
      ok: false,
      error: new DisconnectedGraphError({ stage: 'validation', componentCount: components.length }),
    };
  }

  const { balance } = degreeTable(graph);
  const starts: VertexId[] = [];
  const ends: VertexId[] = [];
  const skewed: VertexId[] = [];
  balance.forEach((b, v) => {
    if (b === 1) starts.push(v);
    else if (b === -1) ends.push(v);
    else if (b !== 0) skewed.push(v);
  });

  if (skewed.length > 0) {
    const labels = graph.labels(skewed);
    return {
      ok: false,
      error: new NoEulerianPathError(
        `Nodes ${labels.join(', ')} have an in/out degree difference greater than one.`,
        labels,
      ),
    };
  }
  if (starts.length > 1) {
    const labels = graph.labels(starts);
    return {
      ok: false,
      error: new NoEulerianPathError(`Multiple start candidates: ${labels.join(', ')}.`, labels),
    };
  }
  if (ends.length > 1) {
    const labels = graph.labels(ends);
    return {
      ok: false,
      error: new NoEulerianPathError(`Multiple end candidates: ${labels.join(', ')}.`, labels),
    };
  }

  const start = starts[0] ?? selectStartNode(graph);
  const end = ends[0] ?? start;
  return { ok: true, start, end, circuit: starts.length === 0 };
}

export function assertEulerianGraph(graph: Multigraph): { start: VertexId; end: VertexId; circuit: boolean } {
  const result = validateEulerianGraph(graph);
  if (!result.ok) throw result.error;
  return { start: result.start, end: result.end, circuit: result.circuit };
}
