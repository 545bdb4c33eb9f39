/**
 * Issue catalogue
 *
 * Message text is part of the output contract: operators aggregate
 * results by the leading [Code] tag and the quoted key names.
 */

import type { IssueSeverity, MappingIssue } from '@connect-migrator/core';

function quoteList(values: readonly string[]): string {
  return values.map((value) => `'${value}'`).join(', ');
}

export function renderIssue(issue: MappingIssue): string {
  return `[${issue.code}] ${issue.message}`;
}

export const issues = {
  templateNotFound(connectorClass: string | undefined): MappingIssue {
    return {
      code: 'TemplateNotFound',
      severity: 'error',
      key: 'connector.class',
      message: connectorClass
        ? `No FM template found for connector class '${connectorClass}'.`
        : `Connector has no 'connector.class' property; no FM template can be selected.`,
    };
  },

  requiredPropertyMissing(key: string): MappingIssue {
    return {
      code: 'RequiredPropertyMissing',
      severity: 'error',
      key,
      message: `Required FM property '${key}' could not be derived from the given configs.`,
    };
  },

  invalidValue(key: string, value: string, allowed: readonly string[]): MappingIssue {
    return {
      code: 'InvalidValue',
      severity: 'error',
      key,
      message: `Value '${value}' of property '${key}' is not one of the allowed values [${allowed.join(', ')}]; the property was not copied.`,
    };
  },

  semanticMatchFailure(
    key: string,
    reason: string,
    severity: IssueSeverity
  ): MappingIssue {
    return {
      code: 'SemanticMatchFailure',
      severity,
      key,
      message: `Property '${key}' could not be matched to an FM property: ${reason}.`,
    };
  },

  transformUnsupported(alias: string, type: string): MappingIssue {
    return {
      code: 'TransformUnsupported',
      severity: 'error',
      key: `transforms.${alias}.type`,
      message: `Transform '${alias}' of type '${type}' is not supported by the fully-managed connector and was removed.`,
    };
  },

  missingTransformType(alias: string): MappingIssue {
    return {
      code: 'MissingTransformType',
      severity: 'error',
      key: `transforms.${alias}.type`,
      message: `Transform '${alias}' has no 'transforms.${alias}.type' property and was removed.`,
    };
  },

  predicateOrphaned(predicate: string, removedTransforms: readonly string[]): MappingIssue {
    const owners =
      removedTransforms.length === 1
        ? `its transform ${quoteList(removedTransforms)} was removed`
        : `its transforms ${quoteList(removedTransforms)} were removed`;
    return {
      code: 'PredicateOrphaned',
      severity: 'error',
      key: `predicates.${predicate}`,
      message: `Predicate '${predicate}' was removed because ${owners}.`,
    };
  },

  predicateUnreferenced(predicate: string): MappingIssue {
    return {
      code: 'PredicateUnreferenced',
      severity: 'warning',
      key: `predicates.${predicate}`,
      message: `Predicate '${predicate}' is not referenced by any transform and was removed.`,
    };
  },

  predicateUndeclared(alias: string, predicate: string): MappingIssue {
    return {
      code: 'PredicateUndeclared',
      severity: 'error',
      key: `transforms.${alias}.predicate`,
      message: `Transform '${alias}' references predicate '${predicate}', which is not listed in 'predicates'; the reference was removed.`,
    };
  },

  configDefFiltered(key: string, templateId: string): MappingIssue {
    return {
      code: 'ConfigDefFiltered',
      severity: 'error',
      key,
      message: `Property '${key}' is not declared by template '${templateId}' and was removed.`,
    };
  },

  unmappedProperty(key: string): MappingIssue {
    return {
      code: 'UnmappedProperty',
      severity: 'warning',
      key,
      message: `Property '${key}' has no FM equivalent and was not mapped.`,
    };
  },

  valueMismatch(key: string, fmValue: string, smValue: string): MappingIssue {
    return {
      code: 'ValueMismatch',
      severity: 'warning',
      key,
      message: `Property '${key}' is fixed to '${fmValue}' by the FM template; the SM value '${smValue}' was ignored.`,
    };
  },

  defaultApplied(key: string, value: string): MappingIssue {
    return {
      code: 'DefaultApplied',
      severity: 'warning',
      key,
      message: `Required FM property '${key}' was set to its default value '${value}'.`,
    };
  },

  switchCaseUnmatched(source: string, value: string, target: string): MappingIssue {
    return {
      code: 'SwitchCaseUnmatched',
      severity: 'warning',
      key: source,
      message: `Value '${value}' of property '${source}' has no case in the mapping rule for '${target}'; '${target}' was not set.`,
    };
  },

  unresolvedVariable(target: string, missing: readonly string[]): MappingIssue {
    return {
      code: 'UnresolvedVariable',
      severity: 'warning',
      key: target,
      message: `Mapping rule for '${target}' was skipped because ${quoteList(missing)} ${
        missing.length === 1 ? 'is' : 'are'
      } not set.`,
    };
  },

  internalValueIgnored(key: string): MappingIssue {
    return {
      code: 'InternalValueIgnored',
      severity: 'warning',
      key,
      message: `Property '${key}' is managed by the platform; the SM value was ignored.`,
    };
  },

  internalError(message: string): MappingIssue {
    return {
      code: 'InternalError',
      severity: 'error',
      message: `Translation failed: ${message}`,
    };
  },
};
