import type {
  Clock,
  Comparator,
  ConfigurationMode,
  FunctionTestOptions,
  OutputSink,
  Stringifier,
  TestedFunction,
  TestOutcome
} from './types';

import { describeFault } from './fault';
import { resolveOptions } from './options';
import {
  formatFailure,
  formatFailureDetail,
  formatFault,
  formatLabel,
  formatPass
} from './report';

/**
 * Invokes one function with given arguments, compares its return value to an
 * expected one, measures the run time and writes the verdict to a text sink.
 *
 * Faults thrown while a case runs are caught and reported, so one failing
 * case never aborts a test series:
 *
 * ```ts
 * const listOf = (i: number, j: number) => [1, i, j];
 *
 * const tester = new FunctionTest(listOf, {
 *   comparator: shallowArrayEquality,
 *   stringifier: listStringifier(', ')
 * });
 *
 * tester.test('Run 1', [1, 13, 15], 13, 15); // OK
 * tester.test('Run 2', [1, 13, 15], 13, 99); // FAILED, with RESULT/EXPECTED lines
 * ```
 *
 * Execution is synchronous: `test` returns only after the callable returned
 * and the report was written. A callable that never returns blocks the caller.
 * Instances are not meant to be shared between concurrently running tasks.
 *
 * @template R - The result type of the tested function.
 * @template A - The argument tuple of the tested function.
 */
export class FunctionTest<R, A extends readonly unknown[]> {
  readonly fn: TestedFunction<R, A>;
  readonly comparator: Comparator<R>;
  readonly stringifier: Stringifier<R>;
  readonly sink: OutputSink;
  readonly mode: ConfigurationMode;

  /** Whether failures print the rendered actual and expected values. */
  verbose: boolean;

  /** Column the `TESTING <name>: ` label is padded to. */
  outputLineLength: number;

  private readonly fillChar: string;
  private readonly clock: Clock;

  /**
   * @param fn - The function under test. Must return a value.
   * @param options - Strategies and display settings; which strategies are
   *   present selects the configuration mode (see `FunctionTestOptions`).
   * @throws If an option has the wrong shape.
   */
  constructor(fn: TestedFunction<R, A>, options: FunctionTestOptions<R> = {}) {
    const resolved = resolveOptions(options);

    this.fn = fn;
    this.comparator = resolved.comparator;
    this.stringifier = resolved.stringifier;
    this.sink = resolved.sink;
    this.mode = resolved.mode;
    this.verbose = resolved.verbose;
    this.outputLineLength = resolved.outputLineLength;
    this.fillChar = resolved.fillChar;
    this.clock = resolved.clock;
  }

  /**
   * Runs one test case.
   *
   * Steps:
   * 1. Write the padded `TESTING <name>: ` label.
   * 2. Invoke the function and time the call alone, truncated to whole
   *    milliseconds.
   * 3. Compare actual and expected; write `OK` or `FAILED` (plus the
   *    `RESULT`/`EXPECTED` block when verbose).
   * 4. If the function, comparator or stringifier throws, write an
   *    `EXCEPTION` block instead.
   *
   * `verbose` and `outputLineLength` are read once, at the start of the call.
   * The clock and the sink are not guarded: a fault of theirs propagates.
   *
   * @param name - Human-readable label, used only for display.
   * @param expected - The anticipated return value.
   * @param args - Arguments passed to the function.
   * @returns The verdict and the actual result. Never throws because of the
   *   function, comparator or stringifier.
   */
  test(name: string, expected: R, ...args: A): TestOutcome<R> {
    const verbose = this.verbose;

    this.sink.write(
      formatLabel(name, {
        outputLineLength: this.outputLineLength,
        fillChar: this.fillChar
      })
    );

    const { report, outcome } = this.run(expected, args, verbose);
    this.sink.write(report);

    return outcome;
  }

  private run(expected: R, args: A, verbose: boolean): CaseReport<R> {
    const start = this.clock();
    let result: R;

    try {
      result = this.fn(...args);
    } catch (thrown) {
      return faulted<R>(thrown, undefined);
    }

    const elapsedMs = Math.max(0, Math.trunc(this.clock() - start));

    let matches: boolean;
    try {
      matches = this.comparator(result, expected);
    } catch (thrown) {
      return faulted(thrown, result);
    }

    if (matches) {
      return {
        report: formatPass(elapsedMs),
        outcome: { verdict: 'passed', success: true, actual: result, elapsedMs }
      };
    }

    let report = formatFailure(elapsedMs);

    if (verbose) {
      try {
        report += formatFailureDetail(
          this.stringifier(result),
          this.stringifier(expected)
        );
      } catch (thrown) {
        // The FAILED line stands; the fault follows it.
        return faulted(thrown, result, report);
      }
    }

    return {
      report,
      outcome: { verdict: 'failed', success: false, actual: result, elapsedMs }
    };
  }
}

/**
 * The text written after the label and the outcome returned for one case.
 */
type CaseReport<R> = {
  report: string;
  outcome: TestOutcome<R>;
};

function faulted<R>(
  thrown: unknown,
  actual: R | undefined,
  preface = ''
): CaseReport<R> {
  const fault = describeFault(thrown);
  return {
    report: preface + formatFault(fault),
    outcome: { verdict: 'faulted', success: false, actual, fault }
  };
}

/**
 * Creates a `FunctionTest`, inferring the result and argument types from `fn`.
 *
 * @param fn - The function under test.
 * @param options - Strategies and display settings.
 */
export function createFunctionTest<R, A extends readonly unknown[]>(
  fn: TestedFunction<R, A>,
  options: FunctionTestOptions<R> = {}
): FunctionTest<R, A> {
  return new FunctionTest(fn, options);
}
