export {
  levenshtein,
  diceSorensen,
  tokenJaccard,
  calculateSimilarity,
  compositeSimilarity,
} from './string-similarity.js';

export { splitIdentifier, normalizePropertyText } from './text.js';
