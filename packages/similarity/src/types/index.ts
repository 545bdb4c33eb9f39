export type {
  SimilarityResult,
  SimilarityAlgorithm,
  WeightedAlgorithm,
  SimilarityProvider,
} from './similarity.js';
