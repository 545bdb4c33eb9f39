import { compositeSimilarity } from '../similarity/string-similarity.js';
import type { SimilarityProvider, WeightedAlgorithm } from '../types/similarity.js';

export const DEFAULT_LEXICAL_WEIGHTS: WeightedAlgorithm[] = [
  { algorithm: 'dice_sorensen', weight: 0.4 },
  { algorithm: 'token_jaccard', weight: 0.4 },
  { algorithm: 'levenshtein', weight: 0.2 },
];

/**
 * Similarity backend that needs no model: a weighted blend of bigram overlap,
 * token overlap and edit distance over the normalised texts.
 */
export class LexicalSimilarityProvider implements SimilarityProvider {
  readonly name = 'lexical';

  constructor(private readonly weights: WeightedAlgorithm[] = DEFAULT_LEXICAL_WEIGHTS) {}

  async score(left: string, right: string): Promise<number> {
    return compositeSimilarity(left, right, this.weights).score;
  }
}
