import type { ScenarioInput } from './types';

/**
 * Resolves a scenario input that may be a direct value or a builder function.
 *
 * Note: Use builders only when you need fresh references (cycles/aliasing).
 */
export function resolveScenarioInput<T>(input: ScenarioInput<T>): T {
  if (typeof input === 'function') {
    return (input as () => T)();
  }
  return input;
}
