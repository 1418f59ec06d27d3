// ---------------------------------------------------------------------------
// Tree Builder: greedy top-down ID3 induction
// ---------------------------------------------------------------------------

import type {
  AttributePolicy,
  AttributeTest,
  BuildTreeOptions,
  InductionLogger,
  LabelCount,
  Sample,
  TestGenerator,
  TreeChild,
  TreeNode,
} from '../types.js';
import { DEFAULT_ATTRIBUTE_POLICY, DEFAULT_MAX_DEPTH } from '../types.js';
import {
  EmptySampleError,
  InvalidOptionError,
  NoAttributesError,
  TreeDidNotConvergeError,
} from '../errors.js';
import { countByLabel, isPure } from '../information/label-count.js';
import { gain } from '../information/metrics.js';
import { partition } from '../splitting/partition.js';
import { pickBestAttribute } from '../splitting/selector.js';
import { branch, createNode, leaf } from './node.js';

interface InductionContext<A, E, L> {
  testGenerator: TestGenerator<A, E>;
  truthLabel: L;
  maxDepth: number;
  attributePolicy: AttributePolicy;
  logger: InductionLogger<A> | undefined;
}

/**
 * Build a binary decision tree from `sample`.
 *
 * At every node the attribute with the highest information gain is chosen,
 * the sample is split by its test and each side either becomes a leaf (when
 * all of its examples agree on the truth label) or is split again. No
 * pruning and no backtracking.
 *
 * With the default `reuse` policy the full attribute list is offered at every
 * level, so a node may split again on an ancestor's attribute. This matters
 * when tests encode thresholds that differ between levels.
 *
 * Induction fails with TreeDidNotConvergeError rather than recursing forever
 * when an impure partition cannot be split (see `ConvergenceFailure`).
 *
 * @param sample - Non-empty training pairs
 * @param attributes - Candidate attributes; their order breaks gain ties
 * @param testGenerator - Produces the boolean split for an attribute
 * @param truthLabel - Label treated as the positive class
 */
export function buildTree<A, E, L>(
  sample: Sample<E, L>,
  attributes: readonly A[],
  testGenerator: TestGenerator<A, E>,
  truthLabel: L,
  options: BuildTreeOptions<A> = {},
): TreeNode<A, E> {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new InvalidOptionError('maxDepth', maxDepth);
  }
  const attributePolicy = options.attributePolicy ?? DEFAULT_ATTRIBUTE_POLICY;
  if (attributePolicy !== 'reuse' && attributePolicy !== 'exclude-ancestors') {
    throw new InvalidOptionError('attributePolicy', attributePolicy);
  }
  if (sample.length === 0) throw new EmptySampleError('buildTree');
  if (attributes.length === 0) throw new NoAttributesError();

  const ctx: InductionContext<A, E, L> = {
    testGenerator,
    truthLabel,
    maxDepth,
    attributePolicy,
    logger: options.logger,
  };

  // An already-pure sample still gets a root split; a side that split leaves
  // empty inherits the sample's common verdict.
  const count = countByLabel(sample, truthLabel);
  const emptySideVerdict = isPure(count) ? count.positive > 0 : undefined;

  return buildNode(sample, attributes, 1, count, ctx, emptySideVerdict);
}

// ---------------------------------------------------------------------------
// Private: recursive induction
// ---------------------------------------------------------------------------

function buildNode<A, E, L>(
  sample: Sample<E, L>,
  candidates: readonly A[],
  depth: number,
  count: LabelCount,
  ctx: InductionContext<A, E, L>,
  emptySideVerdict?: boolean,
): TreeNode<A, E> {
  if (candidates.length === 0) {
    throw new TreeDidNotConvergeError('attributes-exhausted', depth, count.positive, count.negative);
  }

  // Only tests that send examples both ways can make progress. A pure root
  // sample may have none and still gets a node.
  const dividing = candidates.filter((c) => divides(sample, ctx.testGenerator(c)));
  if (dividing.length === 0 && emptySideVerdict === undefined) {
    throw new TreeDidNotConvergeError('no-progress', depth, count.positive, count.negative);
  }

  const attr = pickBestAttribute(
    sample,
    dividing.length > 0 ? dividing : candidates,
    ctx.testGenerator,
    ctx.truthLabel,
  );
  const test = ctx.testGenerator(attr);
  const { trueSample, falseSample } = partition(sample, test);

  ctx.logger?.({
    type: 'split',
    depth,
    attribute: attr,
    gain: gain(sample, test, ctx.truthLabel),
    trueSize: trueSample.length,
    falseSize: falseSample.length,
  });

  const remaining =
    ctx.attributePolicy === 'reuse' ? candidates : candidates.filter((c) => c !== attr);

  const resolve = (side: Sample<E, L>, name: 'true' | 'false'): TreeChild<A, E> => {
    if (side.length === 0) {
      if (emptySideVerdict === undefined) {
        throw new TreeDidNotConvergeError('no-progress', depth, count.positive, count.negative);
      }
      ctx.logger?.({ type: 'leaf', depth, branch: name, verdict: emptySideVerdict, size: 0 });
      return leaf(emptySideVerdict);
    }

    const sideCount = countByLabel(side, ctx.truthLabel);
    if (isPure(sideCount)) {
      const verdict = sideCount.positive > 0;
      ctx.logger?.({ type: 'leaf', depth, branch: name, verdict, size: side.length });
      return leaf(verdict);
    }

    if (depth >= ctx.maxDepth) {
      throw new TreeDidNotConvergeError(
        'max-depth',
        depth + 1,
        sideCount.positive,
        sideCount.negative,
      );
    }
    return branch(buildNode(side, remaining, depth + 1, sideCount, ctx));
  };

  return createNode(attr, test, resolve(trueSample, 'true'), resolve(falseSample, 'false'));
}

/** True when `test` sends at least one example each way. */
function divides<E, L>(sample: Sample<E, L>, test: AttributeTest<E>): boolean {
  let sawTrue = false;
  let sawFalse = false;
  for (const [example] of sample) {
    if (test(example)) sawTrue = true;
    else sawFalse = true;
    if (sawTrue && sawFalse) return true;
  }
  return false;
}
