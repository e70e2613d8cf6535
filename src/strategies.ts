import type { Comparator, Stringifier } from './types';

import { hasMismatch } from './differ';
import type { MismatchOptions } from './differ';
import { areArraysShallowEqual, isContainer, isValueObject } from './differ/utils';
import { isBigInt, isNumber, isString } from './utils/type-guards';

/**
 * Marker rendered for both values when a harness was built with a comparator
 * but without a stringifier.
 */
export const UNSPECIFIED_STRINGIFIER_MARKER = '<to-string function not specified>';

// ---------------------------------------------------------------------------
// Comparators
// ---------------------------------------------------------------------------

/**
 * Default comparator: strict equality (`===`).
 *
 * Note: `NaN` never equals itself and `+0` equals `-0`, exactly as with `===`.
 */
export function strictEquality<R>(actual: R, expected: R): boolean {
  return actual === expected;
}

/**
 * `Object.is` equality: `NaN` equals `NaN`, `+0` differs from `-0`.
 */
export function sameValueEquality<R>(actual: R, expected: R): boolean {
  return Object.is(actual, expected);
}

/**
 * Arrays are equal iff they have the same length and every item is equal
 * under `Object.is`.
 */
export function shallowArrayEquality<T>(
  actual: readonly T[],
  expected: readonly T[]
): boolean {
  return areArraysShallowEqual(actual, expected);
}

/**
 * Creates a deep structural comparator for complex result types.
 *
 * Two results are equal when `findMismatches` would report nothing; the walk
 * stops at the first difference. Maps compare entry by entry, sets by
 * membership. By default arrays are compared element by element and circular
 * references are guarded; see `MismatchOptions` for the available policies.
 *
 * @example
 * ```ts
 * const tester = new FunctionTest(loadUser, {
 *   comparator: structuralEquality({ ignoreKeys: ['createdAt'] }),
 *   stringifier: valueStringifier
 * });
 * ```
 *
 * @param options - Optional overrides of the comparison policy.
 * @returns A comparator usable with any result type.
 */
export function structuralEquality<R>(
  options: Partial<MismatchOptions> = {}
): Comparator<R> {
  return (actual, expected) =>
    !hasMismatch(actual, expected, options);
}

// ---------------------------------------------------------------------------
// Stringifiers
// ---------------------------------------------------------------------------

/**
 * Default stringifier: the built-in primitive-to-text conversion (`String`).
 */
export function primitiveStringifier<R>(value: R): string {
  return String(value);
}

/**
 * Stringifier substituted when only a comparator was supplied.
 */
export function placeholderStringifier<R>(_value: R): string {
  return UNSPECIFIED_STRINGIFIER_MARKER;
}

/**
 * Creates a stringifier for list results that joins the items' text with
 * `separator` (e.g. `[1, 13, 15]` with `', '` renders `1, 13, 15`).
 *
 * @param separator - Text placed between items.
 * @param item - Renders a single item.
 */
export function listStringifier<T>(
  separator = ', ',
  item: Stringifier<T> = primitiveStringifier
): Stringifier<readonly T[]> {
  return values => values.map(item).join(separator);
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

function renderKey(key: string): string {
  return IDENTIFIER.test(key) ? key : JSON.stringify(key);
}

/**
 * Renders one value; `ancestors` holds the containers currently being
 * rendered so a back-reference prints `[Circular]` instead of recursing.
 */
function renderValue(value: unknown, ancestors: readonly object[]): string {
  if (isString(value)) return JSON.stringify(value);
  if (isBigInt(value)) return `${value}n`;
  if (isNumber(value)) return Object.is(value, -0) ? '-0' : String(value);
  if (typeof value === 'function') {
    return value.name ? `[Function ${value.name}]` : '[Function (anonymous)]';
  }
  if (!isContainer(value)) return String(value);

  if (ancestors.includes(value)) return '[Circular]';
  const nested = [...ancestors, value];

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (value instanceof Map) {
    const entries = Array.from(value, ([k, v]) =>
      `${renderValue(k, nested)} => ${renderValue(v, nested)}`
    );
    return `Map(${value.size}) {${entries.length > 0 ? ` ${entries.join(', ')} ` : ''}}`;
  }
  if (value instanceof Set) {
    const items = Array.from(value, item => renderValue(item, nested));
    return `Set(${value.size}) {${items.length > 0 ? ` ${items.join(', ')} ` : ''}}`;
  }
  if (isValueObject(value)) return String(value);

  if (Array.isArray(value)) {
    const items: string[] = value.map(item => renderValue(item, nested));
    return `[${items.join(', ')}]`;
  }

  const fields = Object.keys(value).map(
    key => `${renderKey(key)}: ${renderValue(Reflect.get(value, key), nested)}`
  );
  return fields.length > 0 ? `{ ${fields.join(', ')} }` : '{}';
}

/**
 * Renders arbitrary values, nested ones included, in a compact literal-like
 * form:
 *
 * | value                     | rendered              |
 * |---------------------------|-----------------------|
 * | `'a'`                     | `"a"`                 |
 * | `10n`                     | `10n`                 |
 * | `[1, 'x']`                | `[1, "x"]`            |
 * | `{ id: 1, 'a-b': null }`  | `{ id: 1, "a-b": null }` |
 * | `new Set([1])`            | `Set(1) { 1 }`        |
 * | `obj.self = obj`          | `{ self: [Circular] }`|
 *
 * Dates render as ISO strings; other boxed values and `RegExp` through `String`.
 */
export function valueStringifier<R>(value: R): string {
  return renderValue(value, []);
}
