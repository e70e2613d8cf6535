import type { FaultDescription } from './types';

import { hasStringProperty } from './utils/type-guards';

const hasName = hasStringProperty('name');
const hasMessage = hasStringProperty('message');

/**
 * Structural contract of a fault that can be reported with a type name and
 * message. Every `Error` satisfies it, including errors from another realm
 * (`vm` contexts, workers) for which `instanceof Error` is `false`.
 */
export type StructuredFault = { name: string; message: string };

/**
 * Determines whether a thrown value carries a type name and a message.
 *
 * @param thrown - The value caught at the invocation boundary.
 * @returns `true` for `Error` instances and error-shaped objects.
 */
export function isStructuredFault(thrown: unknown): thrown is StructuredFault {
  if (thrown instanceof Error) return true;
  return hasName(thrown) && hasMessage(thrown);
}

/**
 * Resolves the type name reported for a structured fault.
 *
 * Resolution order:
 * 1. Custom `name`:
 *    If `name` was changed from the generic `"Error"` (built-ins such as
 *    `TypeError` or classes that assign `this.name`), it wins.
 * 2. Constructor name:
 *    Subclasses that leave `name` untouched still inherit `"Error"`; the
 *    constructor name (e.g. `DivideByZeroError`) identifies them instead.
 * 3. Fallback:
 *    The plain `name` (`"Error"`, or whatever the object carried).
 *
 * @param fault - A value that passed {@link isStructuredFault}.
 * @returns The type identifier printed in the `EXCEPTION` block.
 */
function resolveTypeName(fault: StructuredFault): string {
  if (fault.name !== 'Error' && fault.name.length > 0) return fault.name;

  // Null-prototype objects have no constructor at all.
  const constructorName: string | undefined = fault.constructor?.name;

  if (constructorName && constructorName !== 'Object') return constructorName;

  return fault.name.length > 0 ? fault.name : 'Error';
}

/**
 * Classifies a value caught around one test invocation.
 *
 * Never throws: reading `name` or `message` through a throwing getter
 * degrades the fault to `opaque`.
 *
 * @param thrown - Whatever the callable, comparator or stringifier threw.
 * @returns A `structured` description with type name and message, or `opaque`.
 */
export function describeFault(thrown: unknown): FaultDescription {
  try {
    if (!isStructuredFault(thrown)) return { kind: 'opaque' };

    return {
      kind: 'structured',
      typeName: resolveTypeName(thrown),
      message: thrown.message
    };
  } catch {
    // A hostile getter on the thrown value; nothing readable remains.
    return { kind: 'opaque' };
  }
}
