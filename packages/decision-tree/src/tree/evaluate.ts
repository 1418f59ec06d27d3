// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

import type { Sample, TreeNode } from '../types.js';
import { EmptySampleError } from '../errors.js';
import { predict } from './node.js';

/** Fraction of `sample` where the prediction matches `label === truthLabel`. */
export function accuracy<A, E, L>(tree: TreeNode<A, E>, sample: Sample<E, L>, truthLabel: L): number {
  if (sample.length === 0) throw new EmptySampleError('accuracy');
  let correct = 0;
  for (const [example, label] of sample) {
    if (predict(tree, example) === (label === truthLabel)) correct++;
  }
  return correct / sample.length;
}
