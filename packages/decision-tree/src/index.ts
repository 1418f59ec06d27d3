// ---------------------------------------------------------------------------
// @binary-id3/decision-tree: Information-gain decision trees
// ---------------------------------------------------------------------------

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Information Metrics + Label Counter
export * from './information/index.js';

// Partitioning, Attribute Selection, Test Generators
export * from './splitting/index.js';

// Induction, Prediction, Introspection
export * from './tree/index.js';
