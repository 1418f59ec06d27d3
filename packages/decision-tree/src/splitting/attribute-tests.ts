// ---------------------------------------------------------------------------
// Attribute test generators
// ---------------------------------------------------------------------------

import type { Example, TestGenerator } from '../types.js';
import { UnknownAttributeError } from '../errors.js';

/** Split on the truthiness of the attribute's raw value. */
export function valueTest<A extends PropertyKey>(attribute: A): (example: Example<A>) => boolean {
  return (example) => Boolean(example[attribute]);
}

/**
 * Split numeric attributes at caller-chosen thresholds: the test is true when
 * `example[attribute] <= threshold`. A non-numeric value is never below a
 * threshold and goes down the false branch.
 *
 * Attributes without a threshold use `fallback`, or throw
 * UnknownAttributeError when none is given.
 */
export function thresholdTests<A extends string>(
  thresholds: Readonly<Partial<Record<A, number>>>,
  fallback?: TestGenerator<A, Example<A>>,
): TestGenerator<A, Example<A>> {
  return (attribute) => {
    const threshold = Object.hasOwn(thresholds, attribute) ? thresholds[attribute] : undefined;
    if (threshold === undefined) {
      if (fallback) return fallback(attribute);
      throw new UnknownAttributeError(attribute);
    }
    return (example) => {
      const value = example[attribute];
      return typeof value === 'number' && value <= threshold;
    };
  };
}
