export { LexicalSimilarityProvider, DEFAULT_LEXICAL_WEIGHTS } from './lexical-provider.js';
export { CachedSimilarityProvider } from './cached-provider.js';
export type { CachedSimilarityOptions, CacheStats } from './cached-provider.js';
export { scoreCandidates } from './score-candidates.js';
