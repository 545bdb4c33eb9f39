/**
 * Property text normalisation
 *
 * Both sides of a semantic comparison are reduced to lowercase words:
 * dotted, dashed, snake and camel case names split into tokens, and
 * punctuation in descriptions dropped.
 */

export function splitIdentifier(value: string): string[] {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2')
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length > 0);
}

export function normalizePropertyText(
  name: string,
  description?: string,
  section?: string
): string {
  return [name, description ?? '', section ?? '']
    .flatMap((part) => splitIdentifier(part))
    .join(' ');
}
