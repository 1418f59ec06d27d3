// ---------------------------------------------------------------------------
// Label Counter
// ---------------------------------------------------------------------------

import type { LabelCount, Sample } from '../types.js';

/**
 * Count examples whose label equals `truthLabel`. Every other label value is
 * folded into `negative`, so a third label is silently treated as negative.
 */
export function countByLabel<E, L>(sample: Sample<E, L>, truthLabel: L): LabelCount {
  let positive = 0;
  for (const [, label] of sample) {
    if (label === truthLabel) positive++;
  }
  return { positive, negative: sample.length - positive };
}

/** True when every example agrees on its relationship to the truth label. */
export function isPure(count: LabelCount): boolean {
  return count.positive === 0 || count.negative === 0;
}
