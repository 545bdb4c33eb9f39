import type { ConnectorConfig, MappingRule } from '@connect-migrator/core';
import { issues } from '../issues/index.js';
import type { MappingContext } from './context.js';
import type { MappingTier } from './tier.js';

/**
 * FM targets the template rules own for this connector: value rule
 * targets, and switch rule targets whose source is set or that have a
 * default branch. Copying the SM value there would pre-empt the rule.
 */
export function ruleOwnedTargets(rules: readonly MappingRule[], source: ConnectorConfig): Set<string> {
  const owned = new Set<string>();
  for (const rule of rules) {
    if (rule.type === 'value') {
      owned.add(rule.target);
    } else if (
      rule.type === 'switch' &&
      (Object.prototype.hasOwnProperty.call(source, rule.source) || rule.default !== undefined)
    ) {
      owned.add(rule.target);
    }
  }
  return owned;
}

/**
 * Exact-name copy with recommended-value validation. Case-sensitive.
 */
export class DirectMatcher implements MappingTier {
  readonly name = 'direct' as const;

  apply(ctx: MappingContext): void {
    const owned = ruleOwnedTargets(ctx.applicableRules(), ctx.source);

    for (const key of ctx.unclaimedSourceKeys()) {
      const def = ctx.definition(key);
      if (!def || owned.has(key) || ctx.isTargetTaken(key)) continue;

      const value = ctx.sourceValue(key) ?? '';

      if (def.internal) {
        ctx.claimSource(key);
        ctx.report(issues.internalValueIgnored(key));
        continue;
      }

      if (def.recommendedValues.length > 0 && !def.recommendedValues.includes(value)) {
        ctx.claimSource(key);
        ctx.reserveTarget(key);
        ctx.report(issues.invalidValue(key, value, def.recommendedValues));
        continue;
      }

      ctx.write(key, value, this.name);
      ctx.claimSource(key);
      ctx.logger.debug('Direct match', { key });
    }
  }
}
