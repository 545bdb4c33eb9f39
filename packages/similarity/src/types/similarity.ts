/**
 * Similarity Types
 */

/** Result of a similarity comparison */
export interface SimilarityResult {
  /** Similarity score between 0 (no match) and 1 (exact match) */
  score: number;

  /** Which algorithm produced this result */
  algorithm: SimilarityAlgorithm;

  /** Optional details about the comparison */
  details?: string;
}

/** Available similarity algorithms */
export type SimilarityAlgorithm =
  | 'levenshtein'
  | 'dice_sorensen'
  | 'token_jaccard'
  | 'composite';

export interface WeightedAlgorithm {
  algorithm: Exclude<SimilarityAlgorithm, 'composite'>;
  weight: number;
}

/**
 * Capability used by the semantic tier: (text, text) -> score in [0, 1].
 *
 * Backends may be a local model, a remote inference call or a lexical
 * fallback. Implementations must be deterministic for a fixed model.
 */
export interface SimilarityProvider {
  readonly name: string;
  score(left: string, right: string): Promise<number>;
}
