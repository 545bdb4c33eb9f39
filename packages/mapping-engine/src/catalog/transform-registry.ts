import { readFile } from 'node:fs/promises';
import {
  formatZodIssues,
  TranslationError,
  transformsFallbackSchema,
  type FmTemplate,
} from '@connect-migrator/core';

/**
 * Transform types each FM connector accepts.
 *
 * The template's own supported_transforms list wins; otherwise the
 * fallback list for its template_id; otherwise nothing is supported.
 */
export class TransformRegistry {
  private readonly fallback: Map<string, ReadonlySet<string>>;

  constructor(fallback: { [templateId: string]: readonly string[] } = {}) {
    this.fallback = new Map(
      Object.entries(fallback).map(([templateId, types]) => [templateId, new Set(types)])
    );
  }

  static fromObject(raw: unknown, source = 'transforms fallback'): TransformRegistry {
    const result = transformsFallbackSchema.safeParse(raw);
    if (!result.success) {
      throw new TranslationError({
        code: 'CONFIGURATION_ERROR',
        message: formatZodIssues(`Invalid ${source}`, result.error),
      });
    }
    return new TransformRegistry(result.data);
  }

  static async fromFile(path: string): Promise<TransformRegistry> {
    let raw: unknown;
    try {
      const text = await readFile(path, 'utf-8');
      raw = JSON.parse(text.charCodeAt(0) === 0xfeff ? text.slice(1) : text);
    } catch (error) {
      throw new TranslationError({
        code: 'CONFIGURATION_ERROR',
        message: `Cannot load transforms fallback file ${path}`,
        cause: error instanceof Error ? error : undefined,
      });
    }
    return TransformRegistry.fromObject(raw, path);
  }

  supportedFor(template: FmTemplate): ReadonlySet<string> {
    if (template.supportedTransforms) {
      return new Set(template.supportedTransforms);
    }
    return this.fallback.get(template.templateId) ?? new Set();
  }
}
