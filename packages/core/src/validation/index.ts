export {
  scalarSchema,
  propertyTypeSchema,
  propertyDefinitionSchema,
  mappingRuleSchema,
  templateSchema,
  smConnectorSchema,
  transformsFallbackSchema,
  formatZodIssues,
  parseTemplate,
} from './schemas.js';
export type { TemplateFileInput } from './schemas.js';
