/**
 * ${key} placeholder handling for variable rules, template defaults and
 * config-file environment references. ${key:-fallback} stands for
 * fallback when the key has no value.
 */

const PLACEHOLDER = /\$\{([^}]+)\}/g;
const FALLBACK_SEPARATOR = ':-';

interface Placeholder {
  key: string;
  fallback?: string;
}

function parsePlaceholder(inner: string): Placeholder {
  const separator = inner.indexOf(FALLBACK_SEPARATOR);
  return separator < 0
    ? { key: inner.trim() }
    : { key: inner.slice(0, separator).trim(), fallback: inner.slice(separator + FALLBACK_SEPARATOR.length) };
}

function placeholders(value: string): Placeholder[] {
  const found: Placeholder[] = [];
  for (const match of value.matchAll(PLACEHOLDER)) {
    const placeholder = parsePlaceholder(match[1] ?? '');
    if (placeholder.key) found.push(placeholder);
  }
  return found;
}

/** Referenced keys, in order of first appearance */
export function findPlaceholders(value: string): string[] {
  const keys: string[] = [];
  for (const { key } of placeholders(value)) {
    if (!keys.includes(key)) keys.push(key);
  }
  return keys;
}

/**
 * Substitute every ${key} with lookup(key), or its fallback.
 * Returns the unresolved keys instead when any lookup misses.
 */
export function resolvePlaceholders(
  value: string,
  lookup: (key: string) => string | undefined
): { resolved: string; missing: [] } | { resolved: null; missing: string[] } {
  const missing: string[] = [];
  for (const { key, fallback } of placeholders(value)) {
    if (fallback === undefined && lookup(key) === undefined && !missing.includes(key)) {
      missing.push(key);
    }
  }
  if (missing.length > 0) {
    return { resolved: null, missing };
  }

  const resolved = value.replace(PLACEHOLDER, (match, inner: string) => {
    const { key, fallback } = parsePlaceholder(inner);
    if (!key) return match;
    return lookup(key) ?? fallback ?? '';
  });
  return { resolved, missing: [] };
}
