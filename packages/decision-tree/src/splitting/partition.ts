// ---------------------------------------------------------------------------
// Attribute Partitioner
// ---------------------------------------------------------------------------

import type { AttributeTest, LabeledExample, Partition, Sample } from '../types.js';

/**
 * Stable split of `sample` by `test`. Each pair lands in exactly one side and
 * keeps its relative order. The test is evaluated once per example.
 */
export function partition<E, L>(sample: Sample<E, L>, test: AttributeTest<E>): Partition<E, L> {
  const trueSample: LabeledExample<E, L>[] = [];
  const falseSample: LabeledExample<E, L>[] = [];
  for (const pair of sample) {
    if (test(pair[0])) {
      trueSample.push(pair);
    } else {
      falseSample.push(pair);
    }
  }
  return { trueSample, falseSample };
}
