/**
 * Semantic fallback tier
 *
 * Greedy, order-stable assignment: unclaimed SM keys are processed in
 * declaration order and each accepted match removes its FM property from
 * the candidate pool.
 */

import {
  isStructuralKey,
  TranslationError,
  type FmTemplate,
  type IssueSeverity,
  type PropertyDefinition,
} from '@connect-migrator/core';
import {
  normalizePropertyText,
  scoreCandidates,
  type SimilarityProvider,
} from '@connect-migrator/similarity';
import { issues } from '../issues/index.js';
import type { MappingContext } from './context.js';
import type { MappingTier } from './tier.js';
import { checkValueShape } from './value-shape.js';

export const DEFAULT_SEMANTIC_THRESHOLD = 0.7;

export interface SemanticMatcherOptions {
  threshold?: number;
  /** Severity of SemanticMatchFailure (default: error) */
  failureSeverity?: IssueSeverity;
}

interface Candidate {
  def: PropertyDefinition;
  text: string;
}

export class SemanticMatcher implements MappingTier {
  readonly name = 'semantic' as const;
  readonly threshold: number;
  private readonly failureSeverity: IssueSeverity;
  // Property texts are computed once per template and reused across connectors
  private readonly textCache = new WeakMap<FmTemplate, Map<string, string>>();

  constructor(
    private readonly provider: SimilarityProvider,
    options: SemanticMatcherOptions = {}
  ) {
    this.threshold = options.threshold ?? DEFAULT_SEMANTIC_THRESHOLD;
    this.failureSeverity = options.failureSeverity ?? 'error';

    if (!Number.isFinite(this.threshold) || this.threshold < 0 || this.threshold > 1) {
      throw new TranslationError({
        code: 'CONFIGURATION_ERROR',
        message: `Semantic threshold must be between 0 and 1 (got ${this.threshold})`,
      });
    }
  }

  async apply(ctx: MappingContext): Promise<void> {
    for (const key of ctx.unclaimedSourceKeys()) {
      const pool = this.candidatePool(ctx);
      if (pool.length === 0) {
        ctx.logger.debug('No semantic candidates left', { key });
        return;
      }

      const sourceText = normalizePropertyText(key, ctx.connector.descriptions?.[key]);
      const scores = await scoreCandidates(
        this.provider,
        sourceText,
        pool.map((candidate) => candidate.text)
      );

      let bestIndex = -1;
      let bestScore = -1;
      scores.forEach((score, index) => {
        this.assertScore(score, key);
        if (score > bestScore) {
          bestScore = score;
          bestIndex = index;
        }
      });

      const best = pool[bestIndex];
      if (!best) continue;

      if (bestScore < this.threshold) {
        this.reject(
          ctx,
          key,
          `best candidate '${best.def.name}' scored ${bestScore.toFixed(2)}, below the threshold ${this.threshold.toFixed(2)}`
        );
        continue;
      }

      const shape = checkValueShape(ctx.sourceValue(key) ?? '', best.def);
      if (!shape.ok) {
        this.reject(
          ctx,
          key,
          `best candidate '${best.def.name}' scored ${bestScore.toFixed(2)} but ${shape.reason}`
        );
        continue;
      }

      ctx.write(best.def.name, shape.value, this.name);
      ctx.claimSource(key);
      ctx.logger.info('Semantic match', {
        key,
        target: best.def.name,
        score: Number(bestScore.toFixed(4)),
        provider: this.provider.name,
      });
    }
  }

  private candidatePool(ctx: MappingContext): Candidate[] {
    const texts = this.textsFor(ctx.template);
    const pool: Candidate[] = [];
    for (const def of ctx.template.configDefs) {
      if (def.internal || isStructuralKey(def.name) || ctx.isTargetTaken(def.name)) continue;
      pool.push({ def, text: texts.get(def.name) ?? def.name });
    }
    return pool;
  }

  private textsFor(template: FmTemplate): Map<string, string> {
    let texts = this.textCache.get(template);
    if (!texts) {
      texts = new Map(
        template.configDefs.map((def) => [
          def.name,
          normalizePropertyText(def.name, def.description, def.section),
        ])
      );
      this.textCache.set(template, texts);
    }
    return texts;
  }

  private assertScore(score: number, key: string): void {
    if (!Number.isFinite(score) || score < 0 || score > 1) {
      throw new TranslationError({
        code: 'SIMILARITY_FAILED',
        message: `Similarity provider '${this.provider.name}' returned ${score} for '${key}'`,
        suggestion: 'Scores must be numbers between 0 and 1.',
      });
    }
  }

  private reject(ctx: MappingContext, key: string, reason: string): void {
    ctx.markSemanticRejected(key);
    ctx.report(issues.semanticMatchFailure(key, reason, this.failureSeverity));
  }
}
