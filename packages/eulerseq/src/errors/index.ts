export type ReconstructionErrorCode =
  | 'EMPTY_INPUT'
  | 'DISCONNECTED_GRAPH'
  | 'NO_EULERIAN_PATH'
  | 'INVALID_PAIR'
  | 'INVALID_OPTIONS'
  | 'UNKNOWN_NODE'
  | 'GRAPH_CONSUMED'
  | 'TRAVERSAL_ABORTED'
  | 'GAPPED_OVERLAP';

/**
 * Base class for every failure reported by the reconstruction pipeline.
 * Callers branch on `code` (or `instanceof`) instead of parsing messages.
 */
export class ReconstructionError extends Error {
  readonly code: ReconstructionErrorCode;

  constructor(code: ReconstructionErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'ReconstructionError';
  }
}

export class EmptyInputError extends ReconstructionError {
  constructor(message = 'No paired k-mers supplied: nothing to reconstruct.') {
    super('EMPTY_INPUT', message);
    this.name = 'EmptyInputError';
  }
}

export type DisconnectedGraphDetails =
  | { stage: 'validation'; componentCount: number }
  | { stage: 'traversal'; expected: number; actual: number; remainingEdges: number };

export class DisconnectedGraphError extends ReconstructionError {
  readonly details: DisconnectedGraphDetails;

  constructor(details: DisconnectedGraphDetails) {
    super(
      'DISCONNECTED_GRAPH',
      details.stage === 'validation'
        ? `Graph edges form ${details.componentCount} disconnected components.`
        : `Eulerian path covers ${details.actual} of ${details.expected} nodes (${details.remainingEdges} edge(s) left unconsumed).`,
    );
    this.details = details;
    this.name = 'DisconnectedGraphError';
  }
}

export class NoEulerianPathError extends ReconstructionError {
  readonly nodes: string[];

  constructor(message: string, nodes: string[] = []) {
    super('NO_EULERIAN_PATH', message);
    this.nodes = nodes;
    this.name = 'NoEulerianPathError';
  }
}

export class InvalidPairError extends ReconstructionError {
  constructor(message: string) {
    super('INVALID_PAIR', message);
    this.name = 'InvalidPairError';
  }
}

export class InvalidOptionsError extends ReconstructionError {
  constructor(message: string) {
    super('INVALID_OPTIONS', message);
    this.name = 'InvalidOptionsError';
  }
}

export class UnknownNodeError extends ReconstructionError {
  readonly label: string;

  constructor(label: string) {
    super('UNKNOWN_NODE', `Node "${label}" is not part of the graph.`);
    this.label = label;
    this.name = 'UnknownNodeError';
  }
}

export class GraphConsumedError extends ReconstructionError {
  constructor() {
    super('GRAPH_CONSUMED', 'Multigraph was already consumed by a traversal; clone it before traversing again.');
    this.name = 'GraphConsumedError';
  }
}

export class TraversalAbortedError extends ReconstructionError {
  readonly consumedEdges: number;

  constructor(consumedEdges: number) {
    super('TRAVERSAL_ABORTED', `Traversal aborted after consuming ${consumedEdges} edge(s).`);
    this.consumedEdges = consumedEdges;
    this.name = 'TraversalAbortedError';
  }
}

export class GappedOverlapError extends ReconstructionError {
  readonly position: number;

  constructor(position: number) {
    super('GAPPED_OVERLAP', `Paired path cannot be stitched: prefix and suffix strings disagree or leave a gap at position ${position}.`);
    this.position = position;
    this.name = 'GappedOverlapError';
  }
}

export function isReconstructionError(value: unknown): value is ReconstructionError {
  return value instanceof ReconstructionError;
}
