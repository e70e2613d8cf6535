import type { Clock, OutputSink } from '../types';

/**
 * An in-process sink recording every chunk the harness writes.
 */
export type MemorySink = OutputSink & {
  readonly chunks: string[];

  /**
   * Everything written so far, concatenated.
   */
  text(): string;
};

export function createMemorySink(): MemorySink {
  const chunks: string[] = [];
  return {
    chunks,
    write(text: string) {
      chunks.push(text);
      return true;
    },
    text: () => chunks.join('')
  };
}

/**
 * Creates a clock returning `readings` one after the other. Once exhausted
 * it keeps returning the last reading (or `0` when none were given).
 *
 * A case whose callable returns reads the clock twice (start, end); one
 * whose callable throws reads it once.
 */
export function createFakeClock(readings: readonly number[]): Clock {
  let index = 0;
  return () => {
    const reading = readings[Math.min(index, readings.length - 1)] ?? 0;
    index++;
    return reading;
  };
}

/**
 * The label line as written for `name` with the default width and padding,
 * spelled out with an explicit dot count.
 */
export function label(name: string, dots: number): string {
  return `TESTING ${name}: ${'.'.repeat(dots)} `;
}
