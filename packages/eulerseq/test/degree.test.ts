import { describe, expect, it } from 'vitest';

import { MultigraphBuilder, buildMultigraph } from '../src/graph';
import {
  assertEulerianGraph,
  degreeTable,
  selectStartNode,
  validateEulerianGraph,
  weakComponents,
} from '../src/degree';
import { DisconnectedGraphError, EmptyInputError, NoEulerianPathError } from '../src/errors';

const chain = () =>
  buildMultigraph([
    ['AC', 'CT'],
    ['CT', 'TG'],
    ['TG', 'GA'],
  ]);

describe('start node selection', () => {
  it('picks the node with more outgoing than incoming edges', () => {
    const g = chain();
    expect(g.label(selectStartNode(g))).toBe('AC');
  });

  it('counts indegree per node rather than the total edge count', () => {
    const g = buildMultigraph([
      ['B', 'C'],
      ['C', 'B'],
      ['A', 'B'],
    ]);
    expect(g.label(selectStartNode(g))).toBe('A');
  });

  it('falls back to the first source key on a circuit', () => {
    const g = buildMultigraph([
      ['Y', 'Z'],
      ['X', 'Y'],
      ['Z', 'X'],
    ]);
    expect(g.label(selectStartNode(g))).toBe('Y');
  });

  it('scans candidates in source-key order', () => {
    // P is seen first as a target, so Q becomes a source key before it.
    const g = buildMultigraph([
      ['A', 'P'],
      ['Q', 'R'],
      ['P', 'S'],
      ['P', 'T'],
      ['T', 'A'],
    ]);
    expect(g.sourceLabels()).toEqual(['A', 'Q', 'P', 'T']);
    expect(g.label(selectStartNode(g))).toBe('Q');
  });

  it('fails on an empty graph', () => {
    expect(() => selectStartNode(new MultigraphBuilder().build())).toThrow(EmptyInputError);
  });
});

describe('degree validation', () => {
  it('tabulates in, out and balance', () => {
    const g = buildMultigraph([
      ['A', 'B'],
      ['A', 'C'],
      ['B', 'C'],
    ]);
    expect(degreeTable(g)).toEqual({
      indegree: [0, 1, 2],
      outdegree: [2, 1, 0],
      balance: [2, 0, -2],
    });
  });

  it('groups weakly connected components', () => {
    const g = buildMultigraph([
      ['AA', 'AB'],
      ['CC', 'CD'],
    ]);
    expect(weakComponents(g)).toEqual([
      [0, 1],
      [2, 3],
    ]);
  });

  it('reports disconnected graphs before degree problems', () => {
    const result = validateEulerianGraph(
      buildMultigraph([
        ['AA', 'AB'],
        ['CC', 'CD'],
      ]),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(DisconnectedGraphError);
    expect(result.error).toMatchObject({ details: { stage: 'validation', componentCount: 2 } });
  });

  it('rejects imbalance greater than one', () => {
    const result = validateEulerianGraph(
      buildMultigraph([
        ['A', 'B'],
        ['A', 'C'],
      ]),
    );
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(NoEulerianPathError);
    expect(result.error).toMatchObject({ nodes: ['A'] });
  });

  it('rejects several start candidates', () => {
    const g = buildMultigraph([
      ['A', 'B'],
      ['C', 'B'],
      ['B', 'D'],
      ['B', 'E'],
    ]);
    expect(() => assertEulerianGraph(g)).toThrow('Multiple start candidates: A, C.');
  });

  it('accepts paths and circuits', () => {
    const g = chain();
    const path = assertEulerianGraph(g);
    expect(g.label(path.start)).toBe('AC');
    expect(g.label(path.end)).toBe('GA');
    expect(path.circuit).toBe(false);

    const loop = buildMultigraph([
      ['P', 'Q'],
      ['Q', 'P'],
    ]);
    expect(validateEulerianGraph(loop)).toEqual({ ok: true, start: 0, end: 0, circuit: true });
  });

  it('reports empty graphs', () => {
    const result = validateEulerianGraph(new MultigraphBuilder().build());
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(EmptyInputError);
  });
});
