import type { PropertyDefinition } from '@connect-migrator/core';

export type ShapeCheck = { ok: true; value: string } | { ok: false; reason: string };

const BOOLEAN_VALUES = new Set(['true', 'false']);
const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Advisory type check for a fuzzy match. Values stay text; this only
 * rejects pairs whose shapes clearly disagree.
 */
export function checkValueShape(value: string, def: PropertyDefinition): ShapeCheck {
  const trimmed = value.trim();

  if (def.recommendedValues.length > 0) {
    const canonical = def.recommendedValues.find(
      (allowed) => allowed.toLowerCase() === trimmed.toLowerCase()
    );
    return canonical !== undefined
      ? { ok: true, value: canonical }
      : {
          ok: false,
          reason: `value '${value}' is not one of the allowed values of '${def.name}'`,
        };
  }

  switch (def.type) {
    case 'BOOLEAN':
      return BOOLEAN_VALUES.has(trimmed.toLowerCase())
        ? { ok: true, value: trimmed.toLowerCase() }
        : { ok: false, reason: `value '${value}' is not a boolean but '${def.name}' is` };
    case 'INT':
    case 'LONG':
    case 'SHORT':
      return INTEGER_PATTERN.test(trimmed)
        ? { ok: true, value: trimmed }
        : { ok: false, reason: `value '${value}' is not an integer but '${def.name}' is` };
    case 'DOUBLE':
      return DECIMAL_PATTERN.test(trimmed)
        ? { ok: true, value: trimmed }
        : { ok: false, reason: `value '${value}' is not a number but '${def.name}' is` };
    default:
      return { ok: true, value };
  }
}
