import type { Mismatch, MismatchOptions } from '../types';
import { findMismatches } from '..';

/**
 * Mismatch Input
 * The pair of values compared by one scenario.
 */
export type MismatchInput = {
  /**
   * The value a tested function produced.
   */
  actual: unknown;

  /**
   * The anticipated value.
   */
  expected: unknown;

  /**
   * Optional per-scenario overrides.
   */
  options?: Partial<MismatchOptions>;
};

export type MismatchRunner = (input: MismatchInput) => Mismatch[];

/**
 * Creates a runner with a fixed set of base options.
 *
 * Per-scenario options are merged first, so the base options win and each
 * suite enforces its intended configuration.
 */
export function createMismatchRunner(
  baseOptions: Partial<MismatchOptions> = {}
): MismatchRunner {
  return input =>
    findMismatches(input.actual, input.expected, {
      ...input.options,
      ...baseOptions
    });
}

/**
 * Runner for atomic arrays compared by reference.
 */
export function createAtomicReferenceRunner(): MismatchRunner {
  return createMismatchRunner({ arrays: 'atomic', arrayEquality: 'reference' });
}

/**
 * Runner for atomic arrays compared item by item (`Object.is`).
 */
export function createAtomicShallowRunner(): MismatchRunner {
  return createMismatchRunner({ arrays: 'atomic', arrayEquality: 'shallow' });
}
