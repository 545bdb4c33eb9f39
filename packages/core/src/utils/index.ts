export {
  CONNECTOR_CLASS_KEY,
  NAME_KEY,
  TASKS_MAX_KEY,
  TRANSFORMS_KEY,
  PREDICATES_KEY,
  isStructuralKey,
  parseAliasList,
  familyKey,
  collectFamily,
} from './config-keys.js';
export type { KeyFamily } from './config-keys.js';

export { findPlaceholders, resolvePlaceholders } from './placeholders.js';
