export { MappingContext } from './context.js';
export type { WriteOrigin } from './context.js';
export type { MappingTier } from './tier.js';
export { DirectMatcher, ruleOwnedTargets } from './direct-matcher.js';
export { TemplateRuleMapper } from './template-rule-mapper.js';
export { StaticMappingTable, DEFAULT_STATIC_MAPPINGS } from './static-mapping-table.js';
export type {
  StaticMapping,
  ValueTranslation,
  PrefixRename,
  KeyRename,
  UrlDerivation,
} from './static-mapping-table.js';
export { SemanticMatcher, DEFAULT_SEMANTIC_THRESHOLD } from './semantic-matcher.js';
export type { SemanticMatcherOptions } from './semantic-matcher.js';
export { checkValueShape } from './value-shape.js';
export type { ShapeCheck } from './value-shape.js';
