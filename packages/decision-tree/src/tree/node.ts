// ---------------------------------------------------------------------------
// Tree nodes: construction, prediction and introspection
// ---------------------------------------------------------------------------

import type { AttributeTest, TreeBranch, TreeChild, TreeLeaf, TreeNode } from '../types.js';

/** Type guard: is this child a terminal verdict? */
export function isLeaf<A, E>(child: TreeChild<A, E>): child is TreeLeaf {
  return child.kind === 'leaf';
}

export function leaf(verdict: boolean): TreeLeaf {
  return Object.freeze({ kind: 'leaf', verdict });
}

export function branch<A, E>(node: TreeNode<A, E>): TreeBranch<A, E> {
  return Object.freeze({ kind: 'branch', node });
}

export function createNode<A, E>(
  attr: A,
  test: AttributeTest<E>,
  trueChild: TreeChild<A, E>,
  falseChild: TreeChild<A, E>,
): TreeNode<A, E> {
  return Object.freeze({ attr, test, trueChild, falseChild });
}

/**
 * Classify `example` by walking from `root` until a leaf is reached.
 * Iterative, so tree depth never translates into call-stack depth.
 */
export function predict<A, E>(root: TreeNode<A, E>, example: E): boolean {
  let node = root;
  for (;;) {
    const child = node.test(example) ? node.trueChild : node.falseChild;
    if (isLeaf(child)) return child.verdict;
    node = child.node;
  }
}

// ---------------------------------------------------------------------------
// Introspection
// ---------------------------------------------------------------------------

function children<A, E>(node: TreeNode<A, E>): [TreeChild<A, E>, TreeChild<A, E>] {
  return [node.trueChild, node.falseChild];
}

/** Number of node levels; a root with two leaves has depth 1. */
export function treeDepth<A, E>(node: TreeNode<A, E>): number {
  let deepest = 0;
  for (const child of children(node)) {
    if (!isLeaf(child)) deepest = Math.max(deepest, treeDepth(child.node));
  }
  return deepest + 1;
}

export function countNodes<A, E>(node: TreeNode<A, E>): number {
  let total = 1;
  for (const child of children(node)) {
    if (!isLeaf(child)) total += countNodes(child.node);
  }
  return total;
}

export function countLeaves<A, E>(node: TreeNode<A, E>): number {
  let total = 0;
  for (const child of children(node)) {
    total += isLeaf(child) ? 1 : countLeaves(child.node);
  }
  return total;
}

/** Distinct split attributes in pre-order of first appearance. */
export function usedAttributes<A, E>(root: TreeNode<A, E>): A[] {
  const seen = new Set<A>();
  const visit = (node: TreeNode<A, E>): void => {
    seen.add(node.attr);
    for (const child of children(node)) {
      if (!isLeaf(child)) visit(child.node);
    }
  };
  visit(root);
  return [...seen];
}

/**
 * Indented text rendering, one line per node or leaf:
 *
 *   a?
 *     true -> yes
 *     false -> b?
 *       true -> yes
 *       false -> no
 */
export function formatTree<A, E>(
  root: TreeNode<A, E>,
  formatAttribute: (attribute: A) => string = String,
): string {
  const lines = [`${formatAttribute(root.attr)}?`];

  const appendChildren = (node: TreeNode<A, E>, indent: string): void => {
    const sides = [
      ['true', node.trueChild],
      ['false', node.falseChild],
    ] as const;
    for (const [side, child] of sides) {
      if (isLeaf(child)) {
        lines.push(`${indent}${side} -> ${child.verdict ? 'yes' : 'no'}`);
      } else {
        lines.push(`${indent}${side} -> ${formatAttribute(child.node.attr)}?`);
        appendChildren(child.node, `${indent}  `);
      }
    }
  };

  appendChildren(root, '  ');
  return lines.join('\n');
}
