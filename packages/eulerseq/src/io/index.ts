import type { Multigraph } from '../graph';
import { InvalidPairError } from '../errors';
import { PAIR_SEPARATOR } from '../kmer';
import type { ReadPair } from '../kmer';

type Line = { text: string; lineNumber: number };

const contentLines = (text: string): Line[] => {
  const lines: Line[] = [];
  text.split(/\r?\n/).forEach((raw, idx) => {
    const trimmed = raw.trim();
    if (!trimmed || trimmed.startsWith('#')) return;
    lines.push({ text: trimmed, lineNumber: idx + 1 });
  });
  return lines;
};

export function parseReadPairs(text: string): ReadPair[] {
  return contentLines(text).map(({ text: line, lineNumber }) => {
    const parts = line.split(PAIR_SEPARATOR).map((part) => part.trim());
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
      throw new InvalidPairError(`Line ${lineNumber}: expected "first${PAIR_SEPARATOR}second", got "${line}".`);
    }
    return { first: parts[0], second: parts[1] };
  });
}

export function parseEdgeList(text: string): Array<[string, string]> {
  return contentLines(text).map(({ text: line, lineNumber }): [string, string] => {
    const parts = line.split(/\s+/);
    if (parts.length !== 2) {
      throw new InvalidPairError(`Line ${lineNumber}: expected two labels separated by whitespace, got "${line}".`);
    }
    return [parts[0], parts[1]];
  });
}

const ADJACENCY_RE = /^(\S+)\s*->\s*(.+)$/;

export function parseAdjacencyList(text: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const { text: line, lineNumber } of contentLines(text)) {
    const match = ADJACENCY_RE.exec(line);
    if (!match) {
      throw new InvalidPairError(`Line ${lineNumber}: expected "source -> target[,target...]", got "${line}".`);
    }
    const [, source, rest] = match;
    const targets = rest.split(',').map((target) => target.trim());
    if (targets.some((target) => target.length === 0)) {
      throw new InvalidPairError(`Line ${lineNumber}: empty target in "${line}".`);
    }
    for (const target of targets) pairs.push([source, target]);
  }
  return pairs;
}

export function formatAdjacencyList(graph: Multigraph): string {
  return graph
    .sourceVertices()
    .filter((v) => graph.remainingOutdegree(v) > 0)
    .map((v) => `${graph.label(v)} -> ${graph.labels(graph.outNeighbors(v)).join(',')}`)
    .join('\n');
}
