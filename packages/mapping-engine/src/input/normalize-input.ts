/**
 * Input shape adapter
 *
 * Accepted shapes, all reduced to an ordered list of connectors:
 *   { name, config }                       single connector
 *   [ { name, config }, ... ]              list
 *   { "<name>": { config }, ... }          keyed by connector name
 *   { "<name>": { info: { config } } }     REST export with expand=info
 *   { connectors: <any of the above> }     wrapper
 */

import {
  formatZodIssues,
  smConnectorSchema,
  TranslationError,
  type SmConnector,
} from '@connect-migrator/core';

export interface NormalizedInput {
  connectors: SmConnector[];
  /** Entries that were skipped, with the reason */
  warnings: string[];
}

interface RawEntry {
  label: string;
  /** Name to use when the entry carries none */
  fallbackName?: string;
  value: Record<string, unknown>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function hasConfig(value: Record<string, unknown>): boolean {
  return isPlainObject(value.config);
}

/** The connector object inside a one-level wrapper such as { info: {...} } */
function unwrap(value: Record<string, unknown>): Record<string, unknown> | undefined {
  if (hasConfig(value)) return value;

  const nested = Object.entries(value).filter(
    (entry): entry is [string, Record<string, unknown>] =>
      isPlainObject(entry[1]) && hasConfig(entry[1])
  );
  const preferred = nested.find(([key]) => key.toLowerCase() === 'info') ?? nested[0];
  return preferred?.[1];
}

function collectEntries(raw: unknown, warnings: string[]): RawEntry[] {
  if (Array.isArray(raw)) {
    return raw.flatMap((item, index): RawEntry[] => {
      if (!isPlainObject(item)) {
        warnings.push(`Skipped input entry #${index}: not an object.`);
        return [];
      }
      if (hasConfig(item)) {
        return [{ label: `#${index}`, value: item }];
      }
      return collectKeyed(item, warnings);
    });
  }

  if (!isPlainObject(raw)) {
    throw new TranslationError({
      code: 'INVALID_INPUT',
      message: 'Connector input must be a JSON object or array',
    });
  }

  const wrapped = raw.connectors;
  if (wrapped !== undefined && !hasConfig(raw) && (Array.isArray(wrapped) || isPlainObject(wrapped))) {
    return collectEntries(wrapped, warnings);
  }

  if (hasConfig(raw)) {
    return [{ label: '#0', value: raw }];
  }

  return collectKeyed(raw, warnings);
}

function collectKeyed(raw: Record<string, unknown>, warnings: string[]): RawEntry[] {
  const entries: RawEntry[] = [];
  for (const [name, value] of Object.entries(raw)) {
    const connector = isPlainObject(value) ? unwrap(value) : undefined;
    if (!connector) {
      warnings.push(`Skipped input entry '${name}': no connector config found.`);
      continue;
    }
    entries.push({ label: `'${name}'`, fallbackName: name, value: connector });
  }
  return entries;
}

/**
 * Normalise any accepted input shape
 *
 * @throws TranslationError INVALID_INPUT when the top level is neither object nor array
 */
export function normalizeConnectorInput(raw: unknown): NormalizedInput {
  const warnings: string[] = [];
  const connectors: SmConnector[] = [];
  const seen = new Set<string>();

  for (const entry of collectEntries(raw, warnings)) {
    const candidate =
      entry.value.name === undefined && entry.fallbackName !== undefined
        ? { ...entry.value, name: entry.fallbackName }
        : entry.value;

    const result = smConnectorSchema.safeParse(candidate);
    if (!result.success) {
      warnings.push(formatZodIssues(`Skipped input entry ${entry.label}`, result.error));
      continue;
    }

    const connector = result.data;
    if (seen.has(connector.name)) {
      warnings.push(`Skipped input entry ${entry.label}: duplicate connector name '${connector.name}'.`);
      continue;
    }
    seen.add(connector.name);
    connectors.push(connector);
  }

  return { connectors, warnings };
}
