import { fileURLToPath } from 'node:url';
import { Logger, parseTemplate, type FmTemplate, type TemplateFileInput } from '@connect-migrator/core';
import type { SimilarityProvider } from '@connect-migrator/similarity';
import { MappingContext } from '../src/tiers/context.js';

export const TEMPLATES_DIR = fileURLToPath(new URL('./fixtures/templates', import.meta.url));
export const TRANSFORMS_FALLBACK_FILE = fileURLToPath(
  new URL('./fixtures/transforms-fallback.json', import.meta.url)
);

export const JDBC_SOURCE = 'io.confluent.connect.jdbc.JdbcSourceConnector';
export const EXAMPLE_SINK = 'com.example.connect.ExampleSinkConnector';

/** Logger that records nothing below error and never writes to stderr */
export function silentLogger(): Logger {
  return new Logger({ level: 'error', write: () => undefined });
}

/**
 * Deterministic similarity backend. Each entry scores a source text
 * against every candidate text that equals or starts with the given
 * normalised FM name; anything else scores 0.
 */
export function stubProvider(
  table: ReadonlyArray<readonly [sourceText: string, targetName: string, score: number]>
): SimilarityProvider {
  return {
    name: 'stub',
    score: async (left, right) => {
      const hit = table.find(
        ([source, target]) => left === source && (right === target || right.startsWith(`${target} `))
      );
      return hit?.[2] ?? 0;
    },
  };
}

export function template(raw: TemplateFileInput): FmTemplate {
  return parseTemplate(raw, 'test');
}

export function context(
  fmTemplate: FmTemplate,
  config: Record<string, string>,
  name = 'test-connector'
): MappingContext {
  return new MappingContext(fmTemplate, { name, config }, silentLogger());
}
