// ---------------------------------------------------------------------------
// Information Metrics + Label Counter: barrel export
// ---------------------------------------------------------------------------

export { info, entropy, gain } from './metrics.js';
export { countByLabel, isPure } from './label-count.js';
