/**
 * String Similarity Functions
 *
 * Lexical measures over normalised property texts.
 * Uses fastest-levenshtein for the edit distance.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';
import type {
  SimilarityAlgorithm,
  SimilarityResult,
  WeightedAlgorithm,
} from '../types/similarity.js';

/**
 * Normalized Levenshtein similarity
 *
 * @returns Similarity score 0-1 (1 = identical)
 */
export function levenshtein(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'levenshtein' };
  }

  if (a.length === 0 || b.length === 0) {
    return { score: 0, algorithm: 'levenshtein' };
  }

  const dist = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);

  return {
    score: 1 - dist / maxLen,
    algorithm: 'levenshtein',
    details: `Distance: ${dist}, Max length: ${maxLen}`,
  };
}

/**
 * Dice-Sørensen coefficient over character n-grams
 *
 * Tolerates abbreviations such as fmt/format better than edit distance.
 */
export function diceSorensen(a: string, b: string, ngramSize = 2): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'dice_sorensen' };
  }

  const aNgrams = getNgrams(a, ngramSize);
  const bNgrams = getNgrams(b, ngramSize);

  if (aNgrams.size === 0 || bNgrams.size === 0) {
    return { score: 0, algorithm: 'dice_sorensen' };
  }

  const intersection = countShared(aNgrams, bNgrams);
  const score = (2 * intersection) / (aNgrams.size + bNgrams.size);

  return {
    score,
    algorithm: 'dice_sorensen',
    details: `Intersection: ${intersection}, A ngrams: ${aNgrams.size}, B ngrams: ${bNgrams.size}`,
  };
}

/**
 * Jaccard coefficient over whitespace-separated tokens
 */
export function tokenJaccard(a: string, b: string): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'token_jaccard' };
  }

  const aTokens = tokenSet(a);
  const bTokens = tokenSet(b);

  if (aTokens.size === 0 || bTokens.size === 0) {
    return { score: 0, algorithm: 'token_jaccard' };
  }

  const intersection = countShared(aTokens, bTokens);
  const union = aTokens.size + bTokens.size - intersection;

  return {
    score: intersection / union,
    algorithm: 'token_jaccard',
    details: `Intersection: ${intersection}, Union: ${union}`,
  };
}

function getNgrams(str: string, n: number): Set<string> {
  const ngrams = new Set<string>();

  if (str.length === 0) {
    return ngrams;
  }

  if (str.length < n) {
    ngrams.add(str);
    return ngrams;
  }

  for (let i = 0; i <= str.length - n; i++) {
    ngrams.add(str.substring(i, i + n));
  }

  return ngrams;
}

function tokenSet(str: string): Set<string> {
  return new Set(str.split(/\s+/).filter((token) => token.length > 0));
}

function countShared(a: Set<string>, b: Set<string>): number {
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) shared++;
  }
  return shared;
}

/**
 * Calculate similarity using a single algorithm
 */
export function calculateSimilarity(
  a: string,
  b: string,
  algorithm: WeightedAlgorithm['algorithm'],
  options?: { ngramSize?: number }
): SimilarityResult {
  switch (algorithm) {
    case 'levenshtein':
      return levenshtein(a, b);
    case 'dice_sorensen':
      return diceSorensen(a, b, options?.ngramSize);
    case 'token_jaccard':
      return tokenJaccard(a, b);
  }
}

/**
 * Weighted combination of several algorithms
 */
export function compositeSimilarity(
  a: string,
  b: string,
  algorithms: WeightedAlgorithm[]
): SimilarityResult {
  if (a === b) {
    return { score: 1, algorithm: 'composite' };
  }

  let totalWeight = 0;
  let weightedSum = 0;
  const details: string[] = [];

  for (const { algorithm, weight } of algorithms) {
    const result = calculateSimilarity(a, b, algorithm);
    weightedSum += result.score * weight;
    totalWeight += weight;
    details.push(`${algorithm}: ${result.score.toFixed(3)}`);
  }

  const score = totalWeight > 0 ? weightedSum / totalWeight : 0;
  const algorithm: SimilarityAlgorithm = 'composite';

  return { score, algorithm, details: details.join(', ') };
}
