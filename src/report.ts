import type { FaultDescription } from './types';

/**
 * Report line formats
 * -------------------
 * Every byte the harness writes is produced here, so golden-output tests can
 * target these functions directly. A test case produces exactly one of:
 *
 * ```text
 * TESTING square: ............................................ OK (0 ms)
 *
 * TESTING square: ............................................ FAILED (0 ms)
 *  RESULT:   9
 *  EXPECTED: 10
 * .
 *
 * TESTING divide: ............................................ EXCEPTION
 * RangeError:
 * division by zero
 *
 * TESTING opaque: ............................................ EXCEPTION
 * unknown
 * ```
 *
 * The detail block after `FAILED` is only written in verbose mode.
 */

export type LabelOptions = {
  /**
   * Column the label is padded to. Labels already at or past this width are
   * written as-is (never truncated).
   */
  outputLineLength: number;

  /**
   * Padding character.
   */
  fillChar: string;
};

/**
 * Formats the label that opens every test case.
 *
 * The text `TESTING <name>: ` is right-padded with `fillChar` up to
 * `outputLineLength` columns, followed by a single space and no newline.
 *
 * @param name - Human-readable test name, used verbatim.
 * @param options - Width and padding character.
 * @returns The label, e.g. `"TESTING sq: ....... "` (padding shortened here).
 */
export function formatLabel(name: string, options: LabelOptions): string {
  const label = `TESTING ${name}: `;
  return `${label.padEnd(options.outputLineLength, options.fillChar)} `;
}

/**
 * @param elapsedMs - Whole milliseconds spent in the callable.
 */
export function formatPass(elapsedMs: number): string {
  return `OK (${elapsedMs} ms)\n`;
}

/**
 * @param elapsedMs - Whole milliseconds spent in the callable.
 */
export function formatFailure(elapsedMs: number): string {
  return `FAILED (${elapsedMs} ms)\n`;
}

/**
 * Formats the verbose diagnostic block written after a `FAILED` line:
 * the rendered actual value, the rendered expected value and a closing `.`
 * separator line.
 *
 * @param renderedActual - Stringified actual result.
 * @param renderedExpected - Stringified expected result.
 * @returns Three newline-terminated lines.
 */
export function formatFailureDetail(
  renderedActual: string,
  renderedExpected: string
): string {
  return [
    ` RESULT:   ${renderedActual}`,
    ` EXPECTED: ${renderedExpected}`,
    '.',
    ''
  ].join('\n');
}

/**
 * Formats the block written in place of `OK`/`FAILED` when a fault was caught.
 *
 * - `structured`: `EXCEPTION`, then `<type name>:`, then the message.
 * - `opaque`: `EXCEPTION`, then the literal `unknown`.
 *
 * @param fault - The classified fault.
 * @returns Newline-terminated lines.
 */
export function formatFault(fault: FaultDescription): string {
  switch (fault.kind) {
    case 'structured':
      return `EXCEPTION\n${fault.typeName}:\n${fault.message}\n`;

    case 'opaque':
      return 'EXCEPTION\nunknown\n';
  }
}
