/**
 * Mapping issue and result types
 */

import type { ConnectorConfig } from './connector.js';

export type IssueSeverity = 'error' | 'warning';

/** Issue taxonomy; the code is rendered into every message */
export type MappingIssueCode =
  | 'TemplateNotFound'
  | 'RequiredPropertyMissing'
  | 'InvalidValue'
  | 'SemanticMatchFailure'
  | 'TransformUnsupported'
  | 'MissingTransformType'
  | 'PredicateOrphaned'
  | 'PredicateUnreferenced'
  | 'PredicateUndeclared'
  | 'ConfigDefFiltered'
  | 'UnmappedProperty'
  | 'ValueMismatch'
  | 'DefaultApplied'
  | 'SwitchCaseUnmatched'
  | 'UnresolvedVariable'
  | 'InternalValueIgnored'
  | 'InternalError';

export interface MappingIssue {
  code: MappingIssueCode;
  severity: IssueSeverity;
  /** Human-readable reason, naming the offending key/transform/predicate */
  message: string;
  /** SM or FM key the issue is about */
  key?: string;
}

/** Per-connector output record (wire format) */
export interface MappingResult {
  name: string;
  sm_config: ConnectorConfig;
  config: ConnectorConfig;
  mapping_errors: string[];
  mapping_warnings: string[];
  unmapped_configs: string[];
}
