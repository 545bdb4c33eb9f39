/**
 * Fully-managed template types
 *
 * A template describes which properties an FM connector accepts and how
 * SM properties are translated into them.
 */

import type { ConnectorType } from './connector.js';

/** Declared logical type of a property (advisory only) */
export type PropertyType =
  | 'STRING'
  | 'BOOLEAN'
  | 'INT'
  | 'LONG'
  | 'SHORT'
  | 'DOUBLE'
  | 'PASSWORD'
  | 'LIST'
  | 'CLASS';

/** Where the property lives in the FM payload */
export type PropertyPlacement = 'top-level' | 'nested';

/** A single entry of the template's config_defs */
export interface PropertyDefinition {
  name: string;
  required: boolean;
  /** Template default; may reference other FM properties as ${name} */
  defaultValue?: string;
  /** Allowed values; empty means unconstrained */
  recommendedValues: string[];
  description: string;
  placement: PropertyPlacement;
  type?: PropertyType;
  section?: string;
  /** Inferred by the platform; never taken from user input */
  internal: boolean;
}

/** Connector directions a rule applies to */
export type RuleScope = ConnectorType | 'ANY';

/** Maps the value of one SM property onto a target value */
export interface SwitchRule {
  type: 'switch';
  source: string;
  target: string;
  cases: { [smValue: string]: string };
  default?: string;
}

/** Writes a constant to the target */
export interface ValueRule {
  type: 'value';
  target: string;
  value: string;
  appliesTo: RuleScope;
}

/** Writes a value assembled from ${sourceKey} placeholders */
export interface VariableRule {
  type: 'variable';
  target: string;
  value: string;
}

export type MappingRule = SwitchRule | ValueRule | VariableRule;

export interface FmTemplate {
  /** FM connector class written to connector.class */
  templateId: string;
  /** SM connector class this template translates */
  connectorClass: string;
  /** Additional SM classes resolved to this template */
  aliases: string[];
  connectorType: ConnectorType;
  /** Database types (jdbc:<type>://) used to pick between templates of one class */
  databaseTypes: string[];
  configDefs: PropertyDefinition[];
  mappingRules: MappingRule[];
  /** Transform types the FM connector accepts; absent means "use the fallback list" */
  supportedTransforms?: string[];
}
