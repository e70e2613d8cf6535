import type { Container, CycleEntry, Mismatch, MismatchOptions } from './types';

import {
  areArraysShallowEqual,
  areLeavesEqual,
  containerKind,
  createMismatch,
  isContainer,
  prependPath,
  readChild,
  toEntrySegment
} from './utils';

export type { Mismatch, MismatchOptions } from './types';

type ArrayEquality = (
  actual: readonly unknown[],
  expected: readonly unknown[]
) => boolean;

/**
 * Settings of one traversal, resolved once from the caller's options.
 */
type Walk = {
  trackCircularReferences: boolean;

  /** Set when arrays are compared as single values. */
  atomicArrays: ArrayEquality | undefined;

  ignoreKeys: ReadonlySet<string>;

  /** Return as soon as one mismatch is known. */
  stopAtFirst: boolean;
};

function createWalk(
  options: Partial<MismatchOptions>,
  stopAtFirst: boolean
): Walk {
  const { arrays = 'elementwise', arrayEquality = 'shallow' } = options;

  if (arrays !== 'elementwise' && arrays !== 'atomic') {
    throw new Error(`[callcheck] Invalid array policy: ${String(arrays)}`);
  }

  return {
    trackCircularReferences: options.trackCircularReferences ?? true,
    atomicArrays:
      arrays === 'elementwise'
        ? undefined
        : arrayEquality === 'reference'
          ? (actual, expected) => actual === expected
          : areArraysShallowEqual,
    ignoreKeys: new Set(options.ignoreKeys),
    stopAtFirst
  };
}

/**
 * Checks whether this exact pair of containers is already being compared
 * further up the current recursion path (a circular back-edge).
 */
function isCycleDetected(
  stack: readonly CycleEntry[],
  actual: Container,
  expected: Container
): boolean {
  return stack.some(
    ([seenActual, seenExpected]) => seenActual === actual && seenExpected === expected
  );
}

/**
 * Compares two values at one position of the traversal.
 *
 * Two containers of the same kind are walked (arrays by index, maps by key,
 * sets by membership, other objects by own key). Value objects and anything
 * of differing kind are compared as leaves.
 *
 * @returns Mismatches with paths relative to this position.
 */
function compareValues(
  actual: unknown,
  expected: unknown,
  walk: Walk,
  cycleStack: readonly CycleEntry[]
): Mismatch[] {
  if (!isContainer(actual) || !isContainer(expected)) {
    return areLeavesEqual(actual, expected) ? [] : [createMismatch('changed')];
  }

  const kind = containerKind(expected);

  if (kind === 'value' || containerKind(actual) !== kind) {
    return areLeavesEqual(actual, expected) ? [] : [createMismatch('changed')];
  }

  if (walk.trackCircularReferences) {
    if (isCycleDetected(cycleStack, actual, expected)) return [];
    cycleStack = [...cycleStack, [actual, expected]];
  }

  if (Array.isArray(actual) && Array.isArray(expected) && walk.atomicArrays) {
    return walk.atomicArrays(actual, expected) ? [] : [createMismatch('changed')];
  }

  if (actual instanceof Map && expected instanceof Map) {
    return compareEntries(actual, expected, walk, cycleStack);
  }

  if (actual instanceof Set && expected instanceof Set) {
    return compareMembers(actual, expected);
  }

  return compareKeys(actual, expected, walk, cycleStack);
}

/**
 * Walks the own enumerable keys of two objects or arrays: expected keys first
 * (`missing` or a recursive comparison), then the extra keys of `actual`
 * (`unexpected`). `ignoreKeys` applies to object keys, never to indices.
 */
function compareKeys(
  actual: Container,
  expected: Container,
  walk: Walk,
  cycleStack: readonly CycleEntry[]
): Mismatch[] {
  const mismatches: Mismatch[] = [];
  const isArray = Array.isArray(expected);
  const isCompared = (key: string) => isArray || !walk.ignoreKeys.has(key);
  const segmentOf = (key: string) => (isArray ? Number(key) : key);

  for (const key of Object.keys(expected)) {
    if (!isCompared(key)) continue;

    if (key in actual) {
      const nested = compareValues(
        readChild(actual, key),
        readChild(expected, key),
        walk,
        cycleStack
      );
      mismatches.push(...prependPath(nested, segmentOf(key)));
    } else {
      mismatches.push(createMismatch('missing', [segmentOf(key)]));
    }

    if (walk.stopAtFirst && mismatches.length > 0) return mismatches;
  }

  for (const key of Object.keys(actual)) {
    if (isCompared(key) && !(key in expected)) {
      mismatches.push(createMismatch('unexpected', [segmentOf(key)]));
      if (walk.stopAtFirst) return mismatches;
    }
  }

  return mismatches;
}

/**
 * Walks two maps by key, in the expected map's insertion order. Keys are
 * looked up the way `Map#has` does; values are compared recursively.
 */
function compareEntries(
  actual: ReadonlyMap<unknown, unknown>,
  expected: ReadonlyMap<unknown, unknown>,
  walk: Walk,
  cycleStack: readonly CycleEntry[]
): Mismatch[] {
  const mismatches: Mismatch[] = [];

  for (const [key, value] of expected) {
    const segment = toEntrySegment(key);

    if (actual.has(key)) {
      const nested = compareValues(actual.get(key), value, walk, cycleStack);
      mismatches.push(...prependPath(nested, segment));
    } else {
      mismatches.push(createMismatch('missing', [segment]));
    }

    if (walk.stopAtFirst && mismatches.length > 0) return mismatches;
  }

  for (const key of actual.keys()) {
    if (!expected.has(key)) {
      mismatches.push(createMismatch('unexpected', [toEntrySegment(key)]));
      if (walk.stopAtFirst) return mismatches;
    }
  }

  return mismatches;
}

/**
 * Two sets are equal when they hold the same members (`Set#has` lookup);
 * otherwise a single `changed` is reported at the set's own path.
 */
function compareMembers(
  actual: ReadonlySet<unknown>,
  expected: ReadonlySet<unknown>
): Mismatch[] {
  const sameMembers =
    actual.size === expected.size &&
    Array.from(expected).every(member => actual.has(member));

  return sameMembers ? [] : [createMismatch('changed')];
}

/**
 * Finds every point at which `actual` departs from `expected`.
 *
 * Accepts any two values: primitives are compared directly, containers are
 * walked depth-first. An empty result means the values are structurally
 * equal under the given options.
 *
 * @param actual - The value the callable produced.
 * @param expected - The anticipated value.
 * @param options - Optional overrides of the comparison policy.
 * @returns The mismatches, each with the key path where it occurs.
 */
export function findMismatches(
  actual: unknown,
  expected: unknown,
  options: Partial<MismatchOptions> = {}
): Mismatch[] {
  return compareValues(actual, expected, createWalk(options, false), []);
}

/**
 * Same comparison as {@link findMismatches}, stopping at the first mismatch.
 */
export function hasMismatch(
  actual: unknown,
  expected: unknown,
  options: Partial<MismatchOptions> = {}
): boolean {
  return compareValues(actual, expected, createWalk(options, true), []).length > 0;
}
