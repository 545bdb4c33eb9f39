import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { formatZodIssues, resolvePlaceholders, TranslationError } from '@connect-migrator/core';
import { TIER_NAMES, type DebeziumVersion, type TierName } from '@connect-migrator/mapping-engine';
import { readJsonFile } from './json-file.js';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Replace ${VAR} and ${VAR:-default} in every string of a parsed config.
 * An empty variable counts as unset.
 *
 * @throws TranslationError CONFIGURATION_ERROR naming every unset variable without a default
 */
export function expandEnvPlaceholders(value: unknown, env: Env = process.env): unknown {
  const missing = new Set<string>();

  const expand = (node: unknown): unknown => {
    if (typeof node === 'string') {
      const result = resolvePlaceholders(node, (name) => env[name] || undefined);
      if (result.resolved === null) {
        result.missing.forEach((name) => missing.add(name));
        return node;
      }
      return result.resolved;
    }
    if (Array.isArray(node)) {
      return node.map(expand);
    }
    if (typeof node === 'object' && node !== null) {
      return Object.fromEntries(Object.entries(node).map(([key, item]) => [key, expand(item)]));
    }
    return node;
  };

  const expanded = expand(value);
  if (missing.size > 0) {
    throw new TranslationError({
      code: 'CONFIGURATION_ERROR',
      message: `Config file references unset environment variables: ${[...missing].join(', ')}`,
      suggestion: 'Export the variables or give defaults with ${NAME:-value}.',
    });
  }
  return expanded;
}

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    templatesDir: z.string().min(1),
    transformsFallbackFile: z.string().min(1).optional(),
    semantic: z
      .object({
        enabled: z.boolean().optional(),
        threshold: z.number().min(0).max(1).optional(),
        failureSeverity: z.enum(['error', 'warning']).optional(),
      })
      .strict()
      .optional(),
    tierOrder: z.array(z.enum(TIER_NAMES)).min(1).optional(),
    concurrency: z.number().int().min(1).max(64).optional(),
    debeziumVersion: z.enum(['v1', 'v2']).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.tierOrder?.forEach((tier, index) => {
      if (seen.has(tier)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate mapping tier: ${tier}`,
          path: ['tierOrder', index],
        });
      }
      seen.add(tier);
    });
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Config file with paths made absolute and the semantic switch applied */
export interface CliConfig {
  templatesDir: string;
  transformsFallbackFile?: string;
  tierOrder?: TierName[];
  semanticThreshold?: number;
  semanticFailureSeverity?: 'error' | 'warning';
  concurrency?: number;
  debeziumVersion?: DebeziumVersion;
  logging: NonNullable<ConfigFile['logging']>;
}

export function resolveConfig(file: ConfigFile, baseDir: string): CliConfig {
  const semanticEnabled = file.semantic?.enabled ?? true;
  const tierOrder = semanticEnabled
    ? file.tierOrder
    : (file.tierOrder ?? [...TIER_NAMES]).filter((tier) => tier !== 'semantic');

  return {
    templatesDir: resolve(baseDir, file.templatesDir),
    transformsFallbackFile: file.transformsFallbackFile
      ? resolve(baseDir, file.transformsFallbackFile)
      : undefined,
    tierOrder,
    semanticThreshold: file.semantic?.threshold,
    semanticFailureSeverity: file.semantic?.failureSeverity,
    concurrency: file.concurrency,
    debeziumVersion: file.debeziumVersion,
    logging: file.logging ?? {},
  };
}

/**
 * Load a config file. Relative paths inside it resolve against its directory.
 *
 * @throws TranslationError CONFIGURATION_ERROR for unreadable, malformed or invalid files
 */
export async function loadConfig(configPath: string, env: Env = process.env): Promise<CliConfig> {
  const absolutePath = resolve(process.cwd(), configPath);
  const parsed = await readJsonFile(absolutePath, {
    label: 'config file',
    code: 'CONFIGURATION_ERROR',
    suggestion: 'Pass a readable JSON config file with --config.',
  });

  const result = configFileSchema.safeParse(expandEnvPlaceholders(parsed, env));
  if (!result.success) {
    throw new TranslationError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodIssues('Invalid config file', result.error),
      context: { path: absolutePath },
    });
  }
  return resolveConfig(result.data, dirname(absolutePath));
}
