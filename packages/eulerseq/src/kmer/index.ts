import { resolveCompositionOptions } from '../config';
import { InvalidOptionsError, InvalidPairError } from '../errors';

export const PAIR_SEPARATOR = '|';

export type ReadPair = {
  first: string;
  second: string;
};

export function kmerComposition(text: string, k: number): string[] {
  resolveCompositionOptions(k);
  if (k > text.length) {
    throw new InvalidOptionsError(`k (${k}) exceeds the text length (${text.length}).`);
  }
  const kmers: string[] = [];
  for (let i = 0; i + k <= text.length; i += 1) {
    kmers.push(text.slice(i, i + k));
  }
  return kmers;
}

export function overlapEdges(kmers: ReadonlyArray<string>): Array<[string, string]> {
  return kmers.map((kmer, index): [string, string] => {
    if (kmer.length < 2) {
      throw new InvalidPairError(`Invalid k-mer at [${index}]: needs at least 2 characters to form an edge.`);
    }
    return [kmer.slice(0, -1), kmer.slice(1)];
  });
}

export function compositionEdges(text: string, k: number): Array<[string, string]> {
  return overlapEdges(kmerComposition(text, k));
}

export function pairedComposition(text: string, k: number, d: number): ReadPair[] {
  resolveCompositionOptions(k, d);
  const span = 2 * k + d;
  if (span > text.length) {
    throw new InvalidOptionsError(`Read-pair span 2k + d (${span}) exceeds the text length (${text.length}).`);
  }
  const pairs: ReadPair[] = [];
  for (let i = 0; i + span <= text.length; i += 1) {
    pairs.push({ first: text.slice(i, i + k), second: text.slice(i + k + d, i + span) });
  }
  return pairs;
}

const checkRead = (read: string, path: string) => {
  if (read.length < 2) {
    throw new InvalidPairError(`Invalid read pair at ${path}: reads need at least 2 characters.`);
  }
  if (read.includes(PAIR_SEPARATOR)) {
    throw new InvalidPairError(`Invalid read pair at ${path}: reads may not contain "${PAIR_SEPARATOR}".`);
  }
};

export const joinPair = (first: string, second: string) => `${first}${PAIR_SEPARATOR}${second}`;

export function splitPair(label: string): ReadPair {
  const at = label.indexOf(PAIR_SEPARATOR);
  if (at < 0 || label.indexOf(PAIR_SEPARATOR, at + 1) >= 0) {
    throw new InvalidPairError(`Node "${label}" is not a single "first${PAIR_SEPARATOR}second" pair.`);
  }
  return { first: label.slice(0, at), second: label.slice(at + 1) };
}

/**
 * Paired de Bruijn edges: each read pair (a, b) links the node of the two
 * prefixes to the node of the two suffixes.
 */
export function readPairEdges(readPairs: ReadonlyArray<ReadPair>): Array<[string, string]> {
  return readPairs.map(({ first, second }, index): [string, string] => {
    checkRead(first, `[${index}].first`);
    checkRead(second, `[${index}].second`);
    if (first.length !== second.length) {
      throw new InvalidPairError(`Invalid read pair at [${index}]: reads have different lengths.`);
    }
    return [joinPair(first.slice(0, -1), second.slice(0, -1)), joinPair(first.slice(1), second.slice(1))];
  });
}
