import type { Multigraph, VertexId } from '../graph';
import { selectStartNode } from '../degree';
import { resolveTraversalOptions } from '../config';
import type { TraversalOptions } from '../config';
import { DisconnectedGraphError, NoEulerianPathError, TraversalAbortedError, UnknownNodeError } from '../errors';
import { createLogger } from '../log';

export type PathValidation = { ok: boolean; errors: string[] };

const resolveStart = (graph: Multigraph, label?: string): VertexId => {
  if (label === undefined) return selectStartNode(graph);
  const v = graph.vertexOf(label);
  if (v === undefined) throw new UnknownNodeError(label);
  return v;
};

/**
 * Iterative Hierholzer walk. Consumes `graph`: each edge is taken from its
 * source bag exactly once, after which the graph cannot be traversed again.
 *
 * Every popped vertex must be the one that sat beneath the previously popped
 * vertex; a mismatch means a sub-walk dead-ended away from where it started,
 * which only happens when the graph has no Eulerian path from `start`.
 */
export function findEulerianPath(graph: Multigraph, options: TraversalOptions = {}): VertexId[] {
  const { start: startLabel, signal, checkInterval, logger: injected } = resolveTraversalOptions(options);
  const logger = injected ?? createLogger('euler');
  graph.assertUnconsumed();
  const start = resolveStart(graph, startLabel);
  const consumedEdges = () => graph.edgeCount() - graph.remainingEdges();

  if (signal?.aborted) throw new TraversalAbortedError(0);
  graph.markConsumed();
  logger.debug(
    `traversing ${graph.edgeCount()} edge(s) over ${graph.vertexCount()} node(s) from "${graph.label(start)}"`,
  );

  const stack: VertexId[] = [start];
  const path: VertexId[] = [];
  let expectedNext: VertexId | undefined;
  let steps = 0;

  while (stack.length > 0) {
    steps += 1;
    if (signal && steps % checkInterval === 0 && signal.aborted) {
      throw new TraversalAbortedError(consumedEdges());
    }

    const top = stack[stack.length - 1];
    const next = graph.takeEdge(top);
    if (next !== undefined) {
      stack.push(next);
      continue;
    }

    stack.pop();
    if (expectedNext !== undefined && top !== expectedNext) {
      const resume = graph.label(expectedNext);
      const deadEnd = graph.label(top);
      throw new NoEulerianPathError(
        `Walk from "${resume}" dead-ended at "${deadEnd}" instead of returning to it; no Eulerian path starts at "${graph.label(start)}".`,
        [resume, deadEnd],
      );
    }
    path.push(top);
    expectedNext = stack[stack.length - 1];
  }

  path.reverse();

  const expected = graph.edgeCount() + 1;
  if (path.length !== expected) {
    throw new DisconnectedGraphError({
      stage: 'traversal',
      expected,
      actual: path.length,
      remainingEdges: graph.remainingEdges(),
    });
  }

  logger.debug(`path complete after ${steps} step(s)`);
  return path;
}

export function findEulerianLabelPath(graph: Multigraph, options: TraversalOptions = {}): string[] {
  return graph.labels(findEulerianPath(graph, options));
}

/**
 * Checks `path` walks every edge of `graph` exactly once. Reads the original
 * edge list, so it works on consumed graphs too.
 */
export function validateEulerianPath(graph: Multigraph, path: ReadonlyArray<string>): PathValidation {
  const errors: string[] = [];
  const expectedLength = graph.edgeCount() + 1;
  if (path.length !== expectedLength) {
    errors.push(`Path has ${path.length} node(s); expected edge count + 1 = ${expectedLength}.`);
  }

  const available = new Map<string, Map<string, number>>();
  for (const edge of graph.edges()) {
    const from = graph.label(edge.source);
    const to = graph.label(edge.target);
    const targets = available.get(from) ?? new Map<string, number>();
    targets.set(to, (targets.get(to) ?? 0) + 1);
    available.set(from, targets);
  }

  for (let i = 0; i + 1 < path.length; i += 1) {
    const from = path[i];
    const to = path[i + 1];
    const targets = available.get(from);
    const count = targets?.get(to) ?? 0;
    if (!targets || count === 0) {
      errors.push(`Step ${i} uses missing or exhausted edge ${from} -> ${to}.`);
      continue;
    }
    targets.set(to, count - 1);
  }

  return { ok: errors.length === 0, errors };
}
