import { isStructuralKey, resolvePlaceholders } from '@connect-migrator/core';
import { issues } from '../issues/index.js';
import type { MappingContext } from '../tiers/context.js';

export interface ValidationOutcome {
  unmapped: string[];
}

/**
 * Final checks after all tiers and the transform filter:
 * undeclared output keys are dropped, required properties are defaulted
 * or reported, and unclaimed SM keys are collected as unmapped.
 */
export function validateMapping(ctx: MappingContext): ValidationOutcome {
  filterUndeclared(ctx);
  checkRequired(ctx);
  return { unmapped: collectUnmapped(ctx) };
}

function filterUndeclared(ctx: MappingContext): void {
  for (const key of ctx.outputKeys()) {
    if (isStructuralKey(key) || ctx.definition(key)) continue;
    ctx.remove(key);
    ctx.report(issues.configDefFiltered(key, ctx.template.templateId));
  }
}

function checkRequired(ctx: MappingContext): void {
  for (const def of ctx.template.configDefs) {
    if (!def.required || def.internal) continue;

    const current = ctx.valueOf(def.name);
    if (current !== undefined && current.trim() !== '') continue;

    if (current !== undefined) {
      ctx.remove(def.name);
    }

    const fallback =
      def.defaultValue === undefined
        ? null
        : resolvePlaceholders(def.defaultValue, (key) => ctx.valueOf(key)).resolved;

    if (fallback !== null && fallback.trim() !== '') {
      ctx.write(def.name, fallback, 'default');
      ctx.report(issues.defaultApplied(def.name, fallback));
    } else {
      ctx.report(issues.requiredPropertyMissing(def.name));
    }
  }
}

function collectUnmapped(ctx: MappingContext): string[] {
  const unmapped = ctx.unclaimedSourceKeys();
  for (const key of unmapped) {
    if (!ctx.wasSemanticRejected(key)) {
      ctx.report(issues.unmappedProperty(key));
    }
  }
  return unmapped;
}
