import { z } from 'zod';

import { InvalidOptionsError, InvalidPairError } from '../errors';
import type { Logger } from '../log';

export type PairInput = readonly [string, string];

const isLogger = (value: unknown): value is Logger => {
  if (typeof value !== 'object' || value === null) return false;
  return ['debug', 'info', 'warn', 'error'].every((key) => typeof Reflect.get(value, key) === 'function');
};

export const traversalOptionsSchema = z
  .object({
    start: z.string().min(1, 'start must be a non-empty label').optional(),
    signal: z.instanceof(AbortSignal).optional(),
    checkInterval: z.number().int().positive().default(1024),
    logger: z.custom<Logger>(isLogger, { message: 'logger must provide debug, info, warn and error' }).optional(),
  })
  .strict();

export const reconstructOptionsSchema = traversalOptionsSchema
  .extend({
    validate: z.boolean().default(true),
  })
  .strict();

export const gappedOptionsSchema = z
  .object({
    k: z.number().int().min(2, 'k must be at least 2 for paired reads'),
    d: z.number().int().min(0),
  })
  .strict();

export const compositionOptionsSchema = z
  .object({
    k: z.number().int().min(1),
    d: z.number().int().min(0).default(0),
  })
  .strict();

export type TraversalOptions = z.input<typeof traversalOptionsSchema>;
export type ResolvedTraversalOptions = z.output<typeof traversalOptionsSchema>;
export type ReconstructOptions = z.input<typeof reconstructOptionsSchema>;
export type ResolvedReconstructOptions = z.output<typeof reconstructOptionsSchema>;
export type GappedOptions = z.input<typeof gappedOptionsSchema>;
export type GappedReconstructOptions = ReconstructOptions & GappedOptions;

/**
 * Formats an issue path as a dot/bracket string.
 *
 *   []                 → "(root)"
 *   ["checkInterval"]  → "checkInterval"
 *   [3, 1]             → "[3][1]"
 */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  if (path.length === 0) return '(root)';
  return path.map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`)).join('');
}

export function formatIssues(issues: readonly z.ZodIssue[]): string {
  return issues.map((issue) => `  ${formatIssuePath(issue.path)}: ${issue.message}`).join('\n');
}

const parseOptions = <S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.output<S> => {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidOptionsError(`Invalid ${what} options:\n${formatIssues(result.error.issues)}`);
  }
  return result.data;
};

export function resolveTraversalOptions(options?: TraversalOptions): ResolvedTraversalOptions {
  return parseOptions(traversalOptionsSchema, options, 'traversal');
}

export function resolveReconstructOptions(options?: ReconstructOptions): ResolvedReconstructOptions {
  return parseOptions(reconstructOptionsSchema, options, 'reconstruct');
}

export function resolveGappedOptions(options: GappedReconstructOptions) {
  const { k, d, ...rest } = options;
  return {
    gap: parseOptions(gappedOptionsSchema, { k, d }, 'paired read'),
    reconstruct: resolveReconstructOptions(rest),
  };
}

export function resolveCompositionOptions(k: number, d = 0) {
  return parseOptions(compositionOptionsSchema, { k, d }, 'composition');
}

const labelSchema = z
  .string({ required_error: 'expected a string label', invalid_type_error: 'expected a string label' })
  .min(1, 'label must be non-empty');

export const pairSchema = z.tuple([labelSchema, labelSchema], {
  errorMap: (issue, ctx) =>
    issue.code === 'invalid_type' || issue.code === 'too_small' || issue.code === 'too_big'
      ? { message: 'expected a [source, destination] tuple' }
      : { message: ctx.defaultError },
});

export const pairsSchema = z.array(pairSchema, {
  invalid_type_error: 'expected an array of [source, destination] tuples',
});

const pairError = (issues: readonly z.ZodIssue[], prefix: ReadonlyArray<string | number> = []) => {
  const [issue] = issues;
  const path = [...prefix, ...(issue?.path ?? [])];
  const message = issue?.message ?? 'invalid input';
  return path.length === 0
    ? new InvalidPairError(`Invalid pairs: ${message}.`)
    : new InvalidPairError(`Invalid pair at ${formatIssuePath(path)}: ${message}.`);
};

export function assertLabel(label: unknown, path: ReadonlyArray<string | number>): asserts label is string {
  const result = labelSchema.safeParse(label);
  if (!result.success) throw pairError(result.error.issues, path);
}

/** Reports the first offending pair by its issue path, e.g. `[2][1]`. */
export function assertPairs(pairs: unknown): asserts pairs is ReadonlyArray<PairInput> {
  const result = pairsSchema.safeParse(pairs);
  if (!result.success) throw pairError(result.error.issues);
}
