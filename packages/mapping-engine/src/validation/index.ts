export { validateMapping } from './validator.js';
export type { ValidationOutcome } from './validator.js';
