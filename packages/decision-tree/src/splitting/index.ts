// ---------------------------------------------------------------------------
// Partitioning + Attribute Selection: barrel export
// ---------------------------------------------------------------------------

export { partition } from './partition.js';
export { pickBestAttribute, rankAttributes } from './selector.js';
export { valueTest, thresholdTests } from './attribute-tests.js';
