import { describe, expect, test } from 'vitest';

import type { TestScenario } from './types';
import type { Mismatch } from '../types';
import type { MismatchInput } from './helpers';
import { resolveScenarioInput } from './test-utils';
import { createMismatchRunner } from './helpers';
import { findMismatches, hasMismatch } from '..';

/**
 * Options coverage.
 * Focus: ignoreKeys and trackCircularReferences.
 * Note: the array policies are covered in mismatch.arrays.test.ts.
 */
describe('Options coverage: ignoreKeys, trackCircularReferences.', () => {
  describe('ignoreKeys', () => {
    const run = createMismatchRunner();

    const scenarios: Array<TestScenario<MismatchInput, Mismatch[]>> = [
      {
        id: 'Ignore Prevents Recursion',
        description: 'Ignored keys report nothing even when nested values change.',
        input: {
          actual: { a: 2, skip: { x: 2 } },
          expected: { a: 1, skip: { x: 1 } },
          options: { ignoreKeys: ['skip'] }
        },
        expected: [{ kind: 'changed', path: ['a'] }]
      },
      {
        id: 'Ignore Suppresses Missing',
        description: 'Ignored keys are never missing.',
        input: {
          actual: {},
          expected: { skip: 1 },
          options: { ignoreKeys: ['skip'] }
        },
        expected: []
      },
      {
        id: 'Ignore Suppresses Unexpected',
        description: 'Ignored keys are never unexpected.',
        input: {
          actual: { createdAt: 5 },
          expected: {},
          options: { ignoreKeys: ['createdAt'] }
        },
        expected: []
      },
      {
        id: 'Ignore Does Not Apply To Arrays',
        description: 'Array indices are never skipped, even if listed.',
        input: {
          actual: [],
          expected: [1],
          options: { ignoreKeys: ['0'] }
        },
        expected: [{ kind: 'missing', path: [0] }]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(run(resolveScenarioInput(input))).toStrictEqual(expected);
    });
  });

  describe('trackCircularReferences', () => {
    const runWithCycles = createMismatchRunner({
      trackCircularReferences: true
    });

    const buildSelfCycle = (): MismatchInput => {
      const node: Record<string, unknown> = {};
      node.self = node;
      return { actual: node, expected: node };
    };

    const buildIsomorphicCycles = (): MismatchInput => {
      const left: Record<string, unknown> = { v: 1 };
      left.self = left;
      const right: Record<string, unknown> = { v: 1 };
      right.self = right;
      return { actual: left, expected: right };
    };

    const buildDivergingCycles = (): MismatchInput => {
      const left: Record<string, unknown> = { v: 2 };
      left.self = left;
      const right: Record<string, unknown> = { v: 1 };
      right.self = right;
      return { actual: left, expected: right };
    };

    const scenarios: Array<TestScenario<MismatchInput, Mismatch[]>> = [
      {
        id: 'Self-Cycle, Guarded',
        description: 'A value referencing itself does not recurse forever.',
        input: buildSelfCycle,
        expected: []
      },
      {
        id: 'Isomorphic Cycles',
        description: 'Two separate cycles with equal content are equal.',
        input: buildIsomorphicCycles,
        expected: []
      },
      {
        id: 'Diverging Cycles',
        description: 'Differences beside the back-edge are still reported.',
        input: buildDivergingCycles,
        expected: [{ kind: 'changed', path: ['v'] }]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ input, expected }) => {
      expect(runWithCycles(resolveScenarioInput(input))).toStrictEqual(
        expected
      );
    });
  });

  describe('hasMismatch', () => {
    const createTracked = () => {
      const reads: string[] = [];
      const actual = {
        a: 2,
        get b() {
          reads.push('b');
          return 1;
        }
      };
      return { actual, reads };
    };

    test('stops at the first mismatch', () => {
      const { actual, reads } = createTracked();

      expect(hasMismatch(actual, { a: 1, b: 1 })).toBe(true);
      expect(reads).toStrictEqual([]);
    });

    test('findMismatches keeps walking after the first mismatch', () => {
      const { actual, reads } = createTracked();

      expect(findMismatches(actual, { a: 1, b: 1 })).toStrictEqual([
        { kind: 'changed', path: ['a'] }
      ]);
      expect(reads).toStrictEqual(['b']);
    });

    test('reports equal values as having no mismatch', () => {
      expect(hasMismatch(new Map([['k', [1]]]), new Map([['k', [1]]]))).toBe(false);
      expect(hasMismatch({ x: 1 }, {})).toBe(true);
    });
  });
});
