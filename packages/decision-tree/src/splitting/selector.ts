// ---------------------------------------------------------------------------
// Attribute Selector: greedy information-gain choice
// ---------------------------------------------------------------------------

import type { AttributeGain, Sample, TestGenerator } from '../types.js';
import { EmptySampleError, NoAttributesError } from '../errors.js';
import { gain } from '../information/metrics.js';

/**
 * Return the attribute whose test yields the highest information gain.
 *
 * Ties keep the earliest candidate in `attributes`, so the caller's ordering
 * decides between equally good splits and must be stable for reproducible
 * trees.
 *
 * @throws NoAttributesError when `attributes` is empty
 * @throws EmptySampleError when `sample` is empty
 */
export function pickBestAttribute<A, E, L>(
  sample: Sample<E, L>,
  attributes: readonly A[],
  testGenerator: TestGenerator<A, E>,
  truthLabel: L,
): A {
  if (attributes.length === 0) throw new NoAttributesError();
  if (sample.length === 0) throw new EmptySampleError('pickBestAttribute');

  let best: AttributeGain<A> | undefined;
  for (const attribute of attributes) {
    const g = gain(sample, testGenerator(attribute), truthLabel);
    // Strict comparison: an equal gain never displaces an earlier candidate
    if (best === undefined || g > best.gain) {
      best = { attribute, gain: g };
    }
  }
  if (best === undefined) throw new NoAttributesError();
  return best.attribute;
}

/**
 * Gain of every candidate, best first. Equal gains stay in caller order, so
 * the head of the list is always `pickBestAttribute`'s answer.
 *
 * @throws EmptySampleError when `sample` is empty
 */
export function rankAttributes<A, E, L>(
  sample: Sample<E, L>,
  attributes: readonly A[],
  testGenerator: TestGenerator<A, E>,
  truthLabel: L,
): AttributeGain<A>[] {
  if (sample.length === 0) throw new EmptySampleError('rankAttributes');

  const ranked = attributes.map((attribute) => ({
    attribute,
    gain: gain(sample, testGenerator(attribute), truthLabel),
  }));
  // Array.prototype.sort is stable
  return ranked.sort((a, b) => b.gain - a.gain);
}
