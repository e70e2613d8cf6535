export type Guard<T> = (value: unknown) => value is T;

/**
 * Mapping of JavaScript `typeof` results to corresponding TypeScript types.
 * Used by the {@link is} factory.
 */
type PrimitiveTypeMap = {
  boolean: boolean;
  number: number;
  bigint: bigint;
  string: string;
  symbol: symbol;
  undefined: undefined;
};

/**
 * Creates a guard for a built-in primitive `typeof` check.
 *
 * @template T  One of the keys of {@link PrimitiveTypeMap}.
 * @param type  The primitive type keyword to compare against `typeof value`.
 * @returns     A guard that returns `true` iff `typeof value === type`.
 */
export function is<T extends keyof PrimitiveTypeMap>(
  type: T
): Guard<PrimitiveTypeMap[T]> {
  return (value: unknown): value is PrimitiveTypeMap[T] =>
    typeof value === type;
}

/** Guard verifying the value is a string. */
export const isString = is('string');

/** Guard verifying the value is a number (including NaN/Infinity). */
export const isNumber = is('number');

/** Guard verifying the value is a bigint. */
export const isBigInt = is('bigint');

/**
 * Guard verifying the value is a non-null object (arrays and class instances
 * included). Functions are not objects for this purpose.
 */
export function isNonNullObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

/**
 * Creates a guard verifying the value is an object carrying a string-valued
 * property named `key` (own or inherited).
 *
 * Inherited properties count so that `Error#name`, which lives on the
 * prototype, is recognised.
 *
 * @param key
 *   The property that must hold a string.
 * @returns
 *   A guard narrowing to `{ [key]: string }`.
 */
export function hasStringProperty<K extends string>(
  key: K
): Guard<Record<K, string>> {
  return (value: unknown): value is Record<K, string> =>
    isNonNullObject(value) && key in value && isString(Reflect.get(value, key));
}
