import { describe, expect, it, vi } from 'vitest';

import { buildMultigraph } from '../src/graph';
import { findEulerianLabelPath, findEulerianPath, validateEulerianPath } from '../src/euler';
import {
  DisconnectedGraphError,
  GraphConsumedError,
  InvalidOptionsError,
  NoEulerianPathError,
  TraversalAbortedError,
  UnknownNodeError,
} from '../src/errors';
import type { Logger } from '../src/log';

const chainPairs: Array<[string, string]> = [
  ['AC', 'CT'],
  ['CT', 'TG'],
  ['TG', 'GA'],
];

const silentLogger = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('eulerian path', () => {
  it('walks a simple chain', () => {
    const g = buildMultigraph(chainPairs);
    expect(findEulerianLabelPath(g)).toEqual(['AC', 'CT', 'TG', 'GA']);
  });

  it('consumes the graph', () => {
    const g = buildMultigraph(chainPairs);
    findEulerianPath(g);
    expect(g.consumed).toBe(true);
    expect(g.remainingEdges()).toBe(0);
    expect(() => findEulerianPath(g)).toThrow(GraphConsumedError);
    expect(findEulerianPath(g.clone())).toEqual([0, 1, 2, 3]);
  });

  it('splices nested circuits into the path', () => {
    const g = buildMultigraph([
      ['A', 'B'],
      ['B', 'A'],
      ['B', 'C'],
      ['C', 'B'],
    ]);
    expect(findEulerianLabelPath(g)).toEqual(['A', 'B', 'C', 'B', 'A']);
  });

  it('uses parallel edges once each', () => {
    const g = buildMultigraph([
      ['A', 'B'],
      ['A', 'B'],
      ['B', 'A'],
    ]);
    expect(findEulerianLabelPath(g)).toEqual(['A', 'B', 'A', 'B']);
  });

  it('detects leftover edges after the walk', () => {
    const g = buildMultigraph([
      ['AA', 'AB'],
      ['CC', 'CD'],
    ]);
    let caught: unknown;
    try {
      findEulerianPath(g);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(DisconnectedGraphError);
    expect(caught).toMatchObject({ details: { stage: 'traversal', expected: 3, actual: 2, remainingEdges: 1 } });
  });

  it('detects a walk that dead-ends away from its origin', () => {
    const g = buildMultigraph([
      ['A', 'B'],
      ['A', 'C'],
    ]);
    expect(() => findEulerianPath(g)).toThrow(NoEulerianPathError);
    try {
      findEulerianPath(g.clone());
    } catch (error) {
      expect(error).toMatchObject({ nodes: ['A', 'C'] });
    }
  });

  it('honours an explicit start label', () => {
    expect(() => findEulerianPath(buildMultigraph(chainPairs), { start: 'GG' })).toThrow(UnknownNodeError);
    expect(() => findEulerianPath(buildMultigraph(chainPairs), { start: 'CT' })).toThrow(DisconnectedGraphError);
  });

  it('stops on an aborted signal without consuming the graph', () => {
    const controller = new AbortController();
    controller.abort();
    const g = buildMultigraph(chainPairs);
    expect(() => findEulerianPath(g, { signal: controller.signal })).toThrow(TraversalAbortedError);
    expect(g.consumed).toBe(false);
  });

  it('validates options', () => {
    expect(() => findEulerianPath(buildMultigraph(chainPairs), { checkInterval: 0 })).toThrow(InvalidOptionsError);
  });

  it('walks long chains without recursion', () => {
    const pairs: Array<[string, string]> = [];
    for (let i = 0; i < 50_000; i += 1) pairs.push([`n${i}`, `n${i + 1}`]);
    const path = findEulerianLabelPath(buildMultigraph(pairs), { checkInterval: 4096 });
    expect(path).toHaveLength(50_001);
    expect(path[0]).toBe('n0');
    expect(path[50_000]).toBe('n50000');
  });

  it('logs through an injected logger', () => {
    const logger = silentLogger();
    findEulerianPath(buildMultigraph(chainPairs), { logger });
    expect(logger.debug).toHaveBeenCalledWith('traversing 3 edge(s) over 4 node(s) from "AC"');
    expect(logger.debug).toHaveBeenCalledWith('path complete after 7 step(s)');
  });
});

describe('path validation', () => {
  it('accepts the walk it produced, even after consumption', () => {
    const g = buildMultigraph(chainPairs);
    const path = findEulerianLabelPath(g);
    expect(validateEulerianPath(g, path)).toEqual({ ok: true, errors: [] });
  });

  it('lists broken steps', () => {
    const g = buildMultigraph(chainPairs);
    expect(validateEulerianPath(g, ['AC', 'TG'])).toEqual({
      ok: false,
      errors: ['Path has 2 node(s); expected edge count + 1 = 4.', 'Step 0 uses missing or exhausted edge AC -> TG.'],
    });
  });
});
