/**
 * Helpers for Kafka Connect property keys
 *
 * Transforms and predicates are declared as an alias list plus a dotted
 * key family per alias: transforms=a,b / transforms.a.type=... .
 */

import type { ConnectorConfig } from '../types/index.js';

export const CONNECTOR_CLASS_KEY = 'connector.class';
export const NAME_KEY = 'name';
export const TASKS_MAX_KEY = 'tasks.max';
export const TRANSFORMS_KEY = 'transforms';
export const PREDICATES_KEY = 'predicates';

export type KeyFamily = typeof TRANSFORMS_KEY | typeof PREDICATES_KEY;

const STRUCTURAL_KEYS = new Set([
  CONNECTOR_CLASS_KEY,
  NAME_KEY,
  TASKS_MAX_KEY,
  TRANSFORMS_KEY,
  PREDICATES_KEY,
]);

/**
 * Keys handled outside the mapping tiers: identity keys and the
 * transform/predicate families.
 */
export function isStructuralKey(key: string): boolean {
  return (
    STRUCTURAL_KEYS.has(key) ||
    key.startsWith(`${TRANSFORMS_KEY}.`) ||
    key.startsWith(`${PREDICATES_KEY}.`)
  );
}

/**
 * Split a comma-separated alias list, dropping blanks and repeats
 */
export function parseAliasList(value: string | undefined): string[] {
  if (!value) return [];
  const aliases: string[] = [];
  for (const part of value.split(',')) {
    const alias = part.trim();
    if (alias && !aliases.includes(alias)) {
      aliases.push(alias);
    }
  }
  return aliases;
}

export function familyKey(family: KeyFamily, alias: string, attribute: string): string {
  return `${family}.${alias}.${attribute}`;
}

/**
 * Entries of one alias's dotted family, in config order, with the
 * attribute part split off.
 */
export function collectFamily(
  config: ConnectorConfig,
  family: KeyFamily,
  alias: string
): Array<{ attribute: string; value: string }> {
  const prefix = `${family}.${alias}.`;
  const entries: Array<{ attribute: string; value: string }> = [];
  for (const [key, value] of Object.entries(config)) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      entries.push({ attribute: key.slice(prefix.length), value });
    }
  }
  return entries;
}
