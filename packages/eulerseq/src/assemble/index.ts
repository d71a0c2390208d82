import { buildMultigraph } from '../graph';
import { assertEulerianGraph } from '../degree';
import { findEulerianLabelPath } from '../euler';
import { assertPairs, resolveGappedOptions, resolveReconstructOptions } from '../config';
import type {
  GappedReconstructOptions,
  PairInput,
  ReconstructOptions,
  ResolvedReconstructOptions,
} from '../config';
import { EmptyInputError, GappedOverlapError, InvalidPairError, isReconstructionError } from '../errors';
import type { ReconstructionError } from '../errors';
import { readPairEdges, splitPair } from '../kmer';
import type { ReadPair } from '../kmer';
import { createLogger } from '../log';

export type ReconstructResult =
  | { ok: true; sequence: string; path: string[] }
  | { ok: false; error: ReconstructionError };

export function spellPath(labels: ReadonlyArray<string>): string {
  if (labels.length === 0) return '';
  let out = labels[0];
  for (let i = 1; i < labels.length; i += 1) {
    out += labels[i].slice(-1);
  }
  return out;
}

/**
 * Spells a path of paired nodes `prefix|suffix`, where both halves are
 * (k-1)-mers and the suffix half starts k + d characters after the prefix
 * half. The two spelled strings must agree wherever they overlap.
 */
export function spellGappedPath(path: ReadonlyArray<string>, gap: { k: number; d: number }): string {
  if (path.length === 0) return '';
  const width = gap.k - 1;
  const firsts: string[] = [];
  const seconds: string[] = [];
  path.forEach((label, index) => {
    const { first, second } = splitPair(label);
    if (first.length !== width || second.length !== width) {
      throw new InvalidPairError(`Node [${index}] "${label}" does not hold two ${width}-mers.`);
    }
    firsts.push(first);
    seconds.push(second);
  });

  const prefix = spellPath(firsts);
  const suffix = spellPath(seconds);
  const offset = gap.k + gap.d;
  if (offset > suffix.length) throw new GappedOverlapError(prefix.length);
  for (let i = offset; i < prefix.length; i += 1) {
    if (prefix[i] !== suffix[i - offset]) throw new GappedOverlapError(i);
  }
  return prefix + suffix.slice(suffix.length - offset);
}

const walk = (pairs: ReadonlyArray<PairInput>, options: ResolvedReconstructOptions): string[] => {
  const { validate, start, signal, checkInterval, logger: injected } = options;
  const logger = injected ?? createLogger('assemble');
  assertPairs(pairs);
  if (pairs.length === 0) throw new EmptyInputError();

  const graph = buildMultigraph(pairs);
  if (validate) {
    const { start: from, circuit } = assertEulerianGraph(graph);
    logger.debug(`graph admits an Eulerian ${circuit ? 'circuit' : 'path'} from "${graph.label(from)}"`);
  }
  return findEulerianLabelPath(graph, { start, signal, checkInterval, logger: injected });
};

export function reconstructPath(pairs: ReadonlyArray<PairInput>, options: ReconstructOptions = {}): string[] {
  return walk(pairs, resolveReconstructOptions(options));
}

export function reconstruct(pairs: ReadonlyArray<PairInput>, options: ReconstructOptions = {}): string {
  return spellPath(reconstructPath(pairs, options));
}

export function reconstructSafe(pairs: ReadonlyArray<PairInput>, options: ReconstructOptions = {}): ReconstructResult {
  try {
    const path = reconstructPath(pairs, options);
    return { ok: true, sequence: spellPath(path), path };
  } catch (error) {
    if (isReconstructionError(error)) return { ok: false, error };
    throw error;
  }
}

export function reconstructFromReadPairs(
  readPairs: ReadonlyArray<ReadPair>,
  options: GappedReconstructOptions,
): string {
  const { gap, reconstruct: resolved } = resolveGappedOptions(options);
  const path = walk(readPairEdges(readPairs), resolved);
  return spellGappedPath(path, gap);
}
