// ---------------------------------------------------------------------------
// Tree construction + prediction: barrel export
// ---------------------------------------------------------------------------

export { buildTree } from './builder.js';
export {
  isLeaf,
  leaf,
  branch,
  createNode,
  predict,
  treeDepth,
  countNodes,
  countLeaves,
  usedAttributes,
  formatTree,
} from './node.js';
export { accuracy } from './evaluate.js';
