import { TranslationError } from '@connect-migrator/core';

/** Mapping tiers, highest priority first */
export const TIER_NAMES = ['direct', 'template-rule', 'static', 'semantic'] as const;

export type TierName = (typeof TIER_NAMES)[number];

export const DEFAULT_TIER_ORDER: readonly TierName[] = TIER_NAMES;

export function isTierName(value: string): value is TierName {
  return (TIER_NAMES as readonly string[]).includes(value);
}

/**
 * Check a configured tier order. A subset disables the missing tiers.
 *
 * @throws TranslationError with code CONFIGURATION_ERROR
 */
export function validateTierOrder(order: readonly string[]): TierName[] {
  const seen = new Set<TierName>();
  for (const name of order) {
    if (!isTierName(name)) {
      throw new TranslationError({
        code: 'CONFIGURATION_ERROR',
        message: `Unknown mapping tier '${name}'`,
        suggestion: `Use tier names from: ${TIER_NAMES.join(', ')}`,
      });
    }
    if (seen.has(name)) {
      throw new TranslationError({
        code: 'CONFIGURATION_ERROR',
        message: `Mapping tier '${name}' is listed more than once`,
      });
    }
    seen.add(name);
  }
  return [...seen];
}
