import { z } from 'zod';

import type {
  Clock,
  Comparator,
  ConfigurationMode,
  FunctionTestOptions,
  OutputSink,
  Stringifier
} from './types';

import {
  placeholderStringifier,
  primitiveStringifier,
  strictEquality
} from './strategies';
import { validateWithSchema } from './validator';

export const DEFAULT_OUTPUT_LINE_LENGTH = 60;
export const DEFAULT_FILL_CHAR = '.';

const callable = (label: string) =>
  z.custom<(...args: never[]) => unknown>(
    value => typeof value === 'function',
    { message: `Expected ${label} to be a function` }
  );

const sinkSchema = z.custom<OutputSink>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    'write' in value &&
    typeof value.write === 'function',
  { message: 'Expected an object with a write(text) method' }
);

/**
 * Shape of the harness options.
 *
 * Strategy fields are only checked for being callable; their typed
 * signatures come from the generic `FunctionTestOptions<R>` and are read
 * from the caller's object, never from the schema output.
 */
export const FunctionTestOptionsSchema = z.object({
  comparator: callable('comparator').optional(),
  stringifier: callable('stringifier').optional(),
  verbose: z.boolean().optional(),
  outputLineLength: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_OUTPUT_LINE_LENGTH),
  fillChar: z
    .string()
    .length(1, 'Expected a single padding character')
    .default(DEFAULT_FILL_CHAR),
  sink: sinkSchema.optional(),
  clock: callable('clock').optional()
});

/**
 * Fully resolved configuration of one harness.
 */
export type ResolvedFunctionTestOptions<R> = {
  mode: ConfigurationMode;
  comparator: Comparator<R>;
  stringifier: Stringifier<R>;
  verbose: boolean;
  outputLineLength: number;
  fillChar: string;
  sink: OutputSink;
  clock: Clock;
};

/**
 * Resolves the construction mode from which strategies were supplied.
 */
export function resolveMode<R>(
  options: Pick<FunctionTestOptions<R>, 'comparator' | 'stringifier'>
): ConfigurationMode {
  if (options.comparator) {
    return options.stringifier ? 'full' : 'comparator-only';
  }
  return options.stringifier ? 'stringifier-only' : 'default';
}

/**
 * Validates the options and applies the mode-dependent defaults.
 *
 * | mode             | comparator       | stringifier        | verbose |
 * |------------------|------------------|--------------------|---------|
 * | full             | given            | given              | `true`  |
 * | comparator-only  | given            | placeholder marker | `false` |
 * | stringifier-only | `===`            | given              | `true`  |
 * | default          | `===`            | `String(value)`    | `true`  |
 *
 * An explicit `verbose` always wins over the mode default.
 *
 * @param options - Caller-supplied options.
 * @returns The resolved configuration.
 * @throws If an option has the wrong shape (e.g. a negative line length).
 */
export function resolveOptions<R>(
  options: FunctionTestOptions<R>
): ResolvedFunctionTestOptions<R> {
  const settings = validateWithSchema(
    FunctionTestOptionsSchema,
    options,
    'FunctionTest options'
  );

  const mode = resolveMode(options);

  const comparator = options.comparator ?? strictEquality;
  const stringifier =
    options.stringifier ??
    (mode === 'comparator-only' ? placeholderStringifier : primitiveStringifier);

  return {
    mode,
    comparator,
    stringifier,
    verbose: settings.verbose ?? mode !== 'comparator-only',
    outputLineLength: settings.outputLineLength,
    fillChar: settings.fillChar,
    sink: options.sink ?? process.stdout,
    clock: options.clock ?? (() => performance.now())
  };
}
