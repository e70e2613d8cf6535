import type { Container, Mismatch } from './types';

/**
 * `Object.prototype.toString` tags of the built-ins whose content, not their
 * keys, decides equality.
 */
const VALUE_TAGS: ReadonlySet<string> = new Set([
  '[object String]',
  '[object Number]',
  '[object Boolean]',
  '[object BigInt]',
  '[object Date]',
  '[object RegExp]'
]);

const REGEXP_TAG = '[object RegExp]';

function typeTag(value: object): string {
  return Object.prototype.toString.call(value);
}

/**
 * How a container is walked.
 *
 * - `array`: by index.
 * - `map`: by entry key.
 * - `set`: by membership.
 * - `value`: not walked; boxed primitives, `Date` and `RegExp`.
 * - `record`: by own enumerable key.
 */
export type ContainerKind = 'array' | 'map' | 'set' | 'value' | 'record';

export function containerKind(value: Container): ContainerKind {
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'map';
  if (value instanceof Set) return 'set';
  return isValueObject(value) ? 'value' : 'record';
}

/**
 * True for boxed primitives, `Date` and `RegExp`.
 */
export function isValueObject(value: object): boolean {
  return VALUE_TAGS.has(typeTag(value));
}

/**
 * Compares two value objects by what they hold: the unboxed primitive (a
 * `Date` unboxes to its timestamp) under `Object.is`, or the pattern text
 * with flags for `RegExp`.
 */
export function areValueObjectsEqual(left: object, right: object): boolean {
  const tag = typeTag(left);
  if (tag !== typeTag(right) || !VALUE_TAGS.has(tag)) return false;
  if (tag === REGEXP_TAG) return String(left) === String(right);
  return Object.is(left.valueOf(), right.valueOf());
}

/**
 * Leaf equality: `Object.is`, then content equality for two value objects.
 */
export function areLeavesEqual(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) return true;
  return isContainer(left) && isContainer(right) && areValueObjectsEqual(left, right);
}

/**
 * Same instance, or same length with every item equal under `Object.is`.
 */
export function areArraysShallowEqual(
  left: readonly unknown[],
  right: readonly unknown[]
): boolean {
  if (left === right) return true;
  if (left.length !== right.length) return false;
  return left.every((item, index) => Object.is(item, right[index]));
}

export function isContainer(value: unknown): value is Container {
  return typeof value === 'object' && value !== null;
}

export function readChild(container: Container, key: string): unknown {
  return Reflect.get(container, key);
}

/**
 * Path segment of a `Map` entry. String and number keys are used as they
 * are; other keys are rendered with `String`.
 */
export function toEntrySegment(key: unknown): string | number {
  return typeof key === 'string' || typeof key === 'number' ? key : String(key);
}

/**
 * Prefixes the path of every mismatch with `segment`, in place. Paths grow
 * while the recursion unwinds.
 */
export function prependPath(
  mismatches: Mismatch[],
  segment: string | number
): Mismatch[] {
  for (const mismatch of mismatches) {
    mismatch.path.unshift(segment);
  }
  return mismatches;
}

export function createMismatch(
  kind: Mismatch['kind'],
  path: (string | number)[] = []
): Mismatch {
  return { kind, path };
}
