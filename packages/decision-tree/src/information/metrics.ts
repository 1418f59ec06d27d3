// ---------------------------------------------------------------------------
// Information Metrics: binary entropy and information gain (bits)
// ---------------------------------------------------------------------------

import type { AttributeTest, Sample } from '../types.js';
import { EmptySampleError } from '../errors.js';
import { partition } from '../splitting/partition.js';
import { countByLabel } from './label-count.js';

/**
 * Shannon entropy of a two-class distribution given raw counts:
 * H = -p·log2(p) - n·log2(n) over the normalised ratios.
 *
 * A distribution with an empty class is pure and returns exactly 0, which
 * also keeps log2(0) out of the sum.
 */
export function info(positive: number, negative: number): number {
  if (positive === 0 || negative === 0) return 0;
  const total = positive + negative;
  const pRatio = positive / total;
  const nRatio = negative / total;
  return -pRatio * Math.log2(pRatio) - nRatio * Math.log2(nRatio);
}

/**
 * Weighted entropy remaining after splitting `sample` with `test`:
 *   (|T| / |S|)·info(T) + (|F| / |S|)·info(F)
 *
 * @throws EmptySampleError when `sample` is empty
 */
export function entropy<E, L>(
  sample: Sample<E, L>,
  test: AttributeTest<E>,
  truthLabel: L,
): number {
  if (sample.length === 0) throw new EmptySampleError('entropy');

  const total = sample.length;
  const { trueSample, falseSample } = partition(sample, test);
  const t = countByLabel(trueSample, truthLabel);
  const f = countByLabel(falseSample, truthLabel);

  return (
    (trueSample.length / total) * info(t.positive, t.negative) +
    (falseSample.length / total) * info(f.positive, f.negative)
  );
}

/**
 * Information gain of splitting `sample` with `test`: the entropy of the
 * whole sample minus the weighted entropy of the two sides. Non-negative up
 * to floating-point rounding; 0 for a split that tells nothing.
 *
 * @throws EmptySampleError when `sample` is empty
 */
export function gain<E, L>(sample: Sample<E, L>, test: AttributeTest<E>, truthLabel: L): number {
  if (sample.length === 0) throw new EmptySampleError('gain');
  const { positive, negative } = countByLabel(sample, truthLabel);
  return info(positive, negative) - entropy(sample, test, truthLabel);
}
