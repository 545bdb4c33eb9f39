import type { SimilarityProvider } from '../types/similarity.js';

/**
 * Score one text against many candidates; results keep candidate order.
 */
export async function scoreCandidates(
  provider: SimilarityProvider,
  text: string,
  candidates: readonly string[]
): Promise<number[]> {
  return Promise.all(candidates.map((candidate) => provider.score(text, candidate)));
}
