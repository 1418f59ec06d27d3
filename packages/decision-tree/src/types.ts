// ---------------------------------------------------------------------------
// Binary ID3: Core Types
// ---------------------------------------------------------------------------

/** Attribute identifier → attribute value. Never mutated by the core. */
export type Example<A extends PropertyKey = string> = Readonly<Record<A, unknown>>;

/** One training pair. */
export type LabeledExample<E, L> = readonly [example: E, label: L];

/** Ordered training set. Order only matters for stable partitions. */
export type Sample<E, L> = ReadonlyArray<LabeledExample<E, L>>;

/** Boolean split over an example. Opaque to the core. */
export type AttributeTest<E> = (example: E) => boolean;

/** Turns an attribute identifier into its split test. */
export type TestGenerator<A, E> = (attribute: A) => AttributeTest<E>;

// ---------------------------------------------------------------------------
// Metrics
// ---------------------------------------------------------------------------

export interface LabelCount {
  positive: number; // label === truthLabel
  negative: number; // everything else
}

export interface Partition<E, L> {
  trueSample: Sample<E, L>;
  falseSample: Sample<E, L>;
}

export interface AttributeGain<A> {
  attribute: A;
  gain: number; // bits
}

// ---------------------------------------------------------------------------
// Tree
// ---------------------------------------------------------------------------

export interface TreeLeaf {
  readonly kind: 'leaf';
  readonly verdict: boolean;
}

export interface TreeBranch<A, E> {
  readonly kind: 'branch';
  readonly node: TreeNode<A, E>;
}

export type TreeChild<A, E> = TreeLeaf | TreeBranch<A, E>;

export interface TreeNode<A, E> {
  /** Attribute this node splits on (introspection only). */
  readonly attr: A;
  readonly test: AttributeTest<E>;
  readonly trueChild: TreeChild<A, E>;
  readonly falseChild: TreeChild<A, E>;
}

// ---------------------------------------------------------------------------
// Induction
// ---------------------------------------------------------------------------

/**
 * `reuse` offers the full attribute list at every level, so a descendant may
 * split again on an ancestor's attribute. `exclude-ancestors` removes each
 * attribute from the candidates below the node that used it.
 */
export type AttributePolicy = 'reuse' | 'exclude-ancestors';

export type InductionEvent<A> =
  | {
      type: 'split';
      depth: number;
      attribute: A;
      gain: number;
      trueSize: number;
      falseSize: number;
    }
  | {
      type: 'leaf';
      depth: number;
      branch: 'true' | 'false';
      verdict: boolean;
      size: number;
    };

export type InductionLogger<A> = (event: InductionEvent<A>) => void;

export interface BuildTreeOptions<A> {
  /** Deepest node level allowed; the root is level 1. */
  maxDepth?: number;
  attributePolicy?: AttributePolicy;
  logger?: InductionLogger<A>;
}

export const DEFAULT_MAX_DEPTH = 64;
export const DEFAULT_ATTRIBUTE_POLICY: AttributePolicy = 'reuse';
