/**
 * Zod schemas for template files and SM connector input
 *
 * Template files use the snake_case layout of the FM template export;
 * the schemas coerce scalars to strings and return the camelCase model.
 */

import { z } from 'zod';
import type {
  FmTemplate,
  MappingRule,
  PropertyDefinition,
  SmConnector,
} from '../types/index.js';
import { TranslationError } from '../errors/index.js';

/** Scalars that Kafka Connect renders as text */
export const scalarSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

/** Boolean flags arrive as true/false or "true"/"false" */
const flagSchema = z
  .union([z.boolean(), z.string()])
  .optional()
  .transform(
    (value) =>
      value === true ||
      (typeof value === 'string' && value.trim().toLowerCase() === 'true')
  );

export const propertyTypeSchema = z.enum([
  'STRING',
  'BOOLEAN',
  'INT',
  'LONG',
  'SHORT',
  'DOUBLE',
  'PASSWORD',
  'LIST',
  'CLASS',
]);

export const propertyDefinitionSchema = z
  .object({
    name: z.string().min(1),
    required: flagSchema,
    default_value: z.union([scalarSchema, z.null()]).optional(),
    recommended_values: z.array(scalarSchema).default([]),
    description: z.string().default(''),
    type: z
      .string()
      .transform((value) => value.toUpperCase())
      .pipe(propertyTypeSchema)
      .optional(),
    section: z.string().optional(),
    internal: flagSchema,
    placement: z.enum(['top-level', 'nested']).default('top-level'),
  })
  .transform(
    (raw): PropertyDefinition => ({
      name: raw.name,
      required: raw.required,
      defaultValue: raw.default_value ?? undefined,
      recommendedValues: raw.recommended_values,
      description: raw.description,
      placement: raw.placement,
      type: raw.type,
      section: raw.section,
      internal: raw.internal,
    })
  );

const PLACEHOLDER_PATTERN = /\$\{[^}]+\}/;

const switchRuleSchema = z.object({
  type: z.literal('switch'),
  source: z.string().min(1),
  target: z.string().min(1),
  cases: z.record(scalarSchema),
  default: scalarSchema.optional(),
});

const valueRuleSchema = z.object({
  type: z.literal('value'),
  target: z.string().min(1),
  value: scalarSchema,
  applies_to: z.enum(['SOURCE', 'SINK', 'ANY']).default('ANY'),
});

const variableRuleSchema = z.object({
  type: z.literal('variable'),
  target: z.string().min(1),
  value: z
    .string()
    .regex(PLACEHOLDER_PATTERN, 'variable rule value must contain a ${key} placeholder'),
});

export const mappingRuleSchema = z
  .discriminatedUnion('type', [switchRuleSchema, valueRuleSchema, variableRuleSchema])
  .transform((raw): MappingRule => {
    switch (raw.type) {
      case 'switch':
        return raw.default === undefined
          ? { type: 'switch', source: raw.source, target: raw.target, cases: raw.cases }
          : {
              type: 'switch',
              source: raw.source,
              target: raw.target,
              cases: raw.cases,
              default: raw.default,
            };
      case 'value':
        return {
          type: 'value',
          target: raw.target,
          value: raw.value,
          appliesTo: raw.applies_to,
        };
      case 'variable':
        return { type: 'variable', target: raw.target, value: raw.value };
    }
  });

export const templateSchema = z
  .object({
    template_id: z.string().min(1),
    'connector.class': z.string().min(1),
    aliases: z.array(z.string().min(1)).default([]),
    connector_type: z.enum(['SOURCE', 'SINK']),
    database_types: z.array(z.string().min(1)).default([]),
    config_defs: z.array(propertyDefinitionSchema),
    mapping_rules: z.array(mappingRuleSchema).default([]),
    supported_transforms: z.array(z.string().min(1)).optional(),
  })
  .superRefine((value, ctx) => {
    const names = new Set<string>();
    value.config_defs.forEach((def, index) => {
      if (names.has(def.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate config_def name: ${def.name}`,
          path: ['config_defs', index, 'name'],
        });
      }
      names.add(def.name);
    });
  })
  .transform(
    (raw): FmTemplate => ({
      templateId: raw.template_id,
      connectorClass: raw['connector.class'],
      aliases: raw.aliases,
      connectorType: raw.connector_type,
      databaseTypes: raw.database_types.map((type) => type.toLowerCase()),
      configDefs: raw.config_defs,
      mappingRules: raw.mapping_rules,
      supportedTransforms: raw.supported_transforms,
    })
  );

/** Raw template file shape, before coercion */
export type TemplateFileInput = z.input<typeof templateSchema>;

export const smConnectorSchema = z
  .object({
    name: z.string().min(1),
    config: z.record(scalarSchema),
    descriptions: z.record(z.string()).optional(),
  })
  .transform(
    (raw): SmConnector =>
      raw.descriptions
        ? { name: raw.name, config: raw.config, descriptions: raw.descriptions }
        : { name: raw.name, config: raw.config }
  );

/** Fallback list of supported transform types, keyed by template_id */
export const transformsFallbackSchema = z.record(z.array(z.string().min(1)));

export function formatZodIssues(label: string, error: z.ZodError): string {
  const issues = error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `${label}:\n${issues}`;
}

/**
 * Validate a raw template object
 *
 * @param source - file name or label used in the error message
 * @throws TranslationError with code INVALID_TEMPLATE
 */
export function parseTemplate(raw: unknown, source = 'template'): FmTemplate {
  const result = templateSchema.safeParse(raw);
  if (!result.success) {
    throw new TranslationError({
      code: 'INVALID_TEMPLATE',
      message: formatZodIssues(`Invalid template ${source}`, result.error),
      suggestion: 'Check the template against the template file format.',
      context: { source },
    });
  }
  return result.data;
}
