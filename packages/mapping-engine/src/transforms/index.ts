export { filterTransforms } from './transform-filter.js';
export type { TransformFilterResult } from './transform-filter.js';
export { contiguousRenames } from './alias-renumbering.js';
