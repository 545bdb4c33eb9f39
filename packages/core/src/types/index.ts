/**
 * Type exports for core
 */

export type { ConnectorConfig, ConnectorType, SmConnector } from './connector.js';

export type {
  PropertyType,
  PropertyPlacement,
  PropertyDefinition,
  RuleScope,
  SwitchRule,
  ValueRule,
  VariableRule,
  MappingRule,
  FmTemplate,
} from './template.js';

export type {
  IssueSeverity,
  MappingIssueCode,
  MappingIssue,
  MappingResult,
} from './result.js';
