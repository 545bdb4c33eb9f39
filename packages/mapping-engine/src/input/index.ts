export { normalizeConnectorInput } from './normalize-input.js';
export type { NormalizedInput } from './normalize-input.js';
