import {
  resolvePlaceholders,
  findPlaceholders,
  type SwitchRule,
  type ValueRule,
  type VariableRule,
} from '@connect-migrator/core';
import { issues } from '../issues/index.js';
import type { MappingContext } from './context.js';
import type { MappingTier } from './tier.js';

/**
 * Evaluates the template's switch, value and variable rules in declared
 * order. Never overwrites a target set by a higher-priority tier.
 */
export class TemplateRuleMapper implements MappingTier {
  readonly name = 'template-rule' as const;

  apply(ctx: MappingContext): void {
    for (const rule of ctx.applicableRules()) {
      switch (rule.type) {
        case 'switch':
          this.applySwitch(ctx, rule);
          break;
        case 'value':
          this.applyValue(ctx, rule);
          break;
        case 'variable':
          this.applyVariable(ctx, rule);
          break;
      }
    }
  }

  private applySwitch(ctx: MappingContext, rule: SwitchRule): void {
    const smValue = ctx.sourceValue(rule.source);

    if (smValue === undefined) {
      if (rule.default !== undefined) {
        ctx.write(rule.target, rule.default, this.name);
      }
    } else {
      ctx.claimSource(rule.source);
      const mapped = switchOutcome(ctx, rule, smValue);
      if (mapped === undefined) {
        ctx.report(issues.switchCaseUnmatched(rule.source, smValue, rule.target));
      } else if (ctx.write(rule.target, mapped, this.name)) {
        ctx.logger.debug('Switch rule applied', { source: rule.source, target: rule.target });
      }
    }

    if (rule.target !== rule.source) {
      this.reconcileSwitchTarget(ctx, rule);
    }
  }

  /** An SM key named like the switch target is kept or superseded, never left unmapped */
  private reconcileSwitchTarget(ctx: MappingContext, rule: SwitchRule): void {
    const smValue = ctx.sourceValue(rule.target);
    if (smValue === undefined || ctx.isClaimed(rule.target)) return;

    const written = ctx.valueOf(rule.target);
    if (written === undefined) {
      if (ctx.isTargetTaken(rule.target) || !isSwitchTargetValue(ctx, rule, smValue)) return;
      ctx.claimSource(rule.target);
      ctx.write(rule.target, smValue, this.name);
      return;
    }

    ctx.claimSource(rule.target);
    if (smValue !== written) {
      ctx.report(issues.valueMismatch(rule.target, written, smValue));
    }
  }

  private applyValue(ctx: MappingContext, rule: ValueRule): void {
    ctx.write(rule.target, rule.value, this.name);

    // The constant wins over a user value for the same key
    const smValue = ctx.sourceValue(rule.target);
    if (smValue === undefined || ctx.isClaimed(rule.target)) return;

    ctx.claimSource(rule.target);
    const written = ctx.valueOf(rule.target) ?? rule.value;
    if (smValue !== written) {
      ctx.report(issues.valueMismatch(rule.target, written, smValue));
    }
  }

  private applyVariable(ctx: MappingContext, rule: VariableRule): void {
    const result = resolvePlaceholders(rule.value, (key) => ctx.sourceValue(key));

    if (result.resolved === null) {
      ctx.report(issues.unresolvedVariable(rule.target, result.missing));
      return;
    }

    for (const key of findPlaceholders(rule.value)) {
      ctx.claimSource(key);
    }
    ctx.write(rule.target, result.resolved, this.name);
  }
}

/**
 * Target value for an SM switch value: its case, or the value itself when
 * it already is one the target accepts.
 */
function switchOutcome(ctx: MappingContext, rule: SwitchRule, smValue: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(rule.cases, smValue)) {
    return rule.cases[smValue];
  }
  return isSwitchTargetValue(ctx, rule, smValue) ? smValue : undefined;
}

function isSwitchTargetValue(ctx: MappingContext, rule: SwitchRule, value: string): boolean {
  return (
    Object.values(rule.cases).includes(value) ||
    rule.default === value ||
    (ctx.definition(rule.target)?.recommendedValues.includes(value) ?? false)
  );
}
