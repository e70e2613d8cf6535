/**
 * The callable under test. Arity and argument types are fixed by `A`.
 *
 * @template R - The result type returned by the callable.
 * @template A - The argument tuple the callable accepts.
 */
export type TestedFunction<R, A extends readonly unknown[]> = (...args: A) => R;

/**
 * Decides whether an actual invocation result matches the expected one.
 */
export type Comparator<R> = (actual: R, expected: R) => boolean;

/**
 * Renders a result value as human-readable text for failure diagnostics.
 */
export type Stringifier<R> = (value: R) => string;

/**
 * A monotonic millisecond source, e.g. `() => performance.now()`.
 *
 * It is called as a plain function, so pass a bound or wrapped method:
 * `performance.now` on its own throws when called without its receiver.
 */
export type Clock = () => number;

/**
 * Destination of the report text. `process.stdout` satisfies this contract.
 */
export interface OutputSink {
  write(text: string): unknown;
}

/**
 * Construction options for a `FunctionTest`.
 *
 * Which of `comparator` and `stringifier` are present selects the
 * configuration mode and therefore the default verbosity:
 *
 * | comparator | stringifier | mode            | verbose |
 * |------------|-------------|-----------------|---------|
 * | yes        | yes         | full            | `true`  |
 * | yes        | no          | comparator-only | `false` |
 * | no         | yes         | stringifier-only| `true`  |
 * | no         | no          | default         | `true`  |
 */
export type FunctionTestOptions<R> = {
  /**
   * Result comparison. Falls back to strict equality (`===`).
   */
  comparator?: Comparator<R>;

  /**
   * Result rendering. Falls back to `String(value)` when no comparator is
   * given either, otherwise to a placeholder marker.
   */
  stringifier?: Stringifier<R>;

  /**
   * Whether failures print the rendered actual and expected values.
   * Overrides the mode default when set.
   */
  verbose?: boolean;

  /**
   * Column the label line is padded to.
   * @default 60
   */
  outputLineLength?: number;

  /**
   * Single character used to pad the label line.
   * @default '.'
   */
  fillChar?: string;

  /**
   * @default process.stdout
   */
  sink?: OutputSink;

  /**
   * @default () => performance.now()
   */
  clock?: Clock;
};

/**
 * The construction mode resolved from the supplied strategies.
 */
export type ConfigurationMode =
  | 'full'
  | 'comparator-only'
  | 'stringifier-only'
  | 'default';

/**
 * A fault thrown while a test case ran.
 *
 * - `structured`: an `Error` (or an object carrying a string `name` and
 *   `message`), reported with its type name and message.
 * - `opaque`: anything else that was thrown (strings, numbers, `undefined`...).
 */
export type FaultDescription =
  | { kind: 'structured'; typeName: string; message: string }
  | { kind: 'opaque' };

/**
 * The result of a single `test` call, discriminated by `verdict`.
 *
 * `actual` is only `undefined` for a fault raised by the callable itself:
 * a fault raised later by the comparator or stringifier keeps the result
 * that was already obtained.
 */
export type TestOutcome<R> =
  | { verdict: 'passed'; success: true; actual: R; elapsedMs: number }
  | { verdict: 'failed'; success: false; actual: R; elapsedMs: number }
  | {
      verdict: 'faulted';
      success: false;
      actual: R | undefined;
      fault: FaultDescription;
    };

export type Verdict = TestOutcome<unknown>['verdict'];
