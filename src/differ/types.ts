/**
 * A single point at which an actual value departs from the expected one.
 */
export type Mismatch = {
  /**
   * Discriminator describing how the two values differ at `path`.
   *
   * - `missing`: present in the expected value, absent from the actual one.
   * - `unexpected`: present in the actual value, absent from the expected one.
   * - `changed`: present in both, but not equal.
   */
  kind: 'missing' | 'unexpected' | 'changed';

  /**
   * Key path from the root to the mismatch (e.g. `["users", 0, "name"]`).
   * Strings for object keys, numbers for array indices; empty for the root.
   */
  path: (string | number)[];
};

/**
 * A traversable value: any non-null object, arrays included.
 * Everything else is a leaf and compared by value.
 */
export type Container = object;

/**
 * A pair of containers being compared at some depth of the current
 * recursion path. Used to detect circular references.
 */
export type CycleEntry = readonly [actual: Container, expected: Container];

export type MismatchOptions = {
  /**
   * If true, a pair of containers that is already being compared further up
   * the current path is treated as equal instead of being re-entered.
   *
   * **Notes:**
   * - This is path-scoped: sibling branches do not share history.
   * - If `false`, cyclic values cause a stack overflow.
   */
  trackCircularReferences: boolean;

  /**
   * Controls how arrays are compared.
   *
   * - **"elementwise"**:
   *   Traverse arrays by index and report index-level mismatches.
   *
   * - **"atomic"**:
   *   Treat arrays as single values; report at most one `changed` mismatch at
   *   the array's own path, decided by `arrayEquality`.
   */
  arrays: 'elementwise' | 'atomic';

  /**
   * Equality used when `arrays` is `'atomic'`; ignored otherwise.
   *
   * - **"reference"**: equal iff the same array instance.
   * - **"shallow"**: equal iff same instance, or same length and every item
   *   equal under `Object.is`.
   */
  arrayEquality: 'reference' | 'shallow';

  /**
   * Object keys never compared (objects only; array indices are never skipped).
   * Typical use: volatile fields such as timestamps or generated ids.
   */
  ignoreKeys?: readonly string[];
};
