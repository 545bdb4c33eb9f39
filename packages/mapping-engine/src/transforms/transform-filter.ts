/**
 * Transform/Predicate Filter
 *
 * A transform survives iff its type is in the supported registry. A
 * predicate survives iff a surviving transform references it. Surviving
 * chains keep their relative order and are re-indexed without gaps.
 */

import {
  collectFamily,
  familyKey,
  parseAliasList,
  PREDICATES_KEY,
  TRANSFORMS_KEY,
  type ConnectorConfig,
  type Logger,
  type MappingIssue,
} from '@connect-migrator/core';
import { issues } from '../issues/index.js';
import { contiguousRenames } from './alias-renumbering.js';

export interface TransformFilterResult {
  /** Entries to write to the FM config, in output order */
  entries: Array<[key: string, value: string]>;
  issues: MappingIssue[];
  keptTransforms: string[];
  removedTransforms: string[];
  keptPredicates: string[];
  removedPredicates: string[];
}

interface TransformSpec {
  alias: string;
  type: string | undefined;
  predicate: string | undefined;
}

function readTransform(config: ConnectorConfig, alias: string): TransformSpec {
  const attrs = collectFamily(config, TRANSFORMS_KEY, alias);
  const type = attrs.find((attr) => attr.attribute === 'type')?.value.trim();
  const predicate = attrs.find((attr) => attr.attribute === 'predicate')?.value.trim();
  return { alias, type: type || undefined, predicate: predicate || undefined };
}

export function filterTransforms(
  config: ConnectorConfig,
  supportedTypes: ReadonlySet<string>,
  logger?: Logger
): TransformFilterResult {
  const found: MappingIssue[] = [];
  const transformAliases = parseAliasList(config[TRANSFORMS_KEY]);
  const predicateAliases = parseAliasList(config[PREDICATES_KEY]);
  const declaredPredicates = new Set(predicateAliases);

  const kept: TransformSpec[] = [];
  const removed: TransformSpec[] = [];

  for (const alias of transformAliases) {
    const spec = readTransform(config, alias);
    if (spec.type === undefined) {
      found.push(issues.missingTransformType(alias));
      removed.push(spec);
    } else if (!supportedTypes.has(spec.type)) {
      found.push(issues.transformUnsupported(alias, spec.type));
      removed.push(spec);
    } else {
      kept.push(spec);
    }
  }

  // A kept transform may only reference a declared predicate
  const droppedReferences = new Set<string>();
  for (const spec of kept) {
    if (spec.predicate !== undefined && !declaredPredicates.has(spec.predicate)) {
      found.push(issues.predicateUndeclared(spec.alias, spec.predicate));
      droppedReferences.add(spec.alias);
    }
  }

  const keptPredicates: string[] = [];
  const removedPredicates: string[] = [];
  for (const predicate of predicateAliases) {
    const usedByKept = kept.some(
      (spec) => spec.predicate === predicate && !droppedReferences.has(spec.alias)
    );
    if (usedByKept) {
      keptPredicates.push(predicate);
      continue;
    }

    removedPredicates.push(predicate);
    const owners = removed
      .filter((spec) => spec.predicate === predicate)
      .map((spec) => spec.alias);
    found.push(
      owners.length > 0
        ? issues.predicateOrphaned(predicate, owners)
        : issues.predicateUnreferenced(predicate)
    );
  }

  const keptTransforms = kept.map((spec) => spec.alias);
  const transformNames = contiguousRenames(transformAliases, keptTransforms);
  const predicateNames = contiguousRenames(predicateAliases, keptPredicates);

  const entries: Array<[string, string]> = [];
  if (keptTransforms.length > 0) {
    entries.push([
      TRANSFORMS_KEY,
      keptTransforms.map((alias) => transformNames.get(alias) ?? alias).join(','),
    ]);
    for (const alias of keptTransforms) {
      const name = transformNames.get(alias) ?? alias;
      for (const { attribute, value } of collectFamily(config, TRANSFORMS_KEY, alias)) {
        if (droppedReferences.has(alias) && (attribute === 'predicate' || attribute === 'negate')) {
          continue;
        }
        const rendered =
          attribute === 'predicate' ? (predicateNames.get(value.trim()) ?? value) : value;
        entries.push([familyKey(TRANSFORMS_KEY, name, attribute), rendered]);
      }
    }
  }

  if (keptPredicates.length > 0) {
    entries.push([
      PREDICATES_KEY,
      keptPredicates.map((alias) => predicateNames.get(alias) ?? alias).join(','),
    ]);
    for (const alias of keptPredicates) {
      const name = predicateNames.get(alias) ?? alias;
      for (const { attribute, value } of collectFamily(config, PREDICATES_KEY, alias)) {
        entries.push([familyKey(PREDICATES_KEY, name, attribute), value]);
      }
    }
  }

  const removedTransforms = removed.map((spec) => spec.alias);
  if (removedTransforms.length > 0 || removedPredicates.length > 0) {
    logger?.info('Transform chain filtered', {
      removedTransforms,
      removedPredicates,
    });
  }

  return {
    entries,
    issues: found,
    keptTransforms,
    removedTransforms,
    keptPredicates,
    removedPredicates,
  };
}
