import { readFile } from 'node:fs/promises';
import { TranslationError, type TranslationErrorCode } from '@connect-migrator/core';

export interface JsonFileOptions {
  /** Names the file in error messages, e.g. "config file" */
  label: string;
  code: TranslationErrorCode;
  suggestion?: string;
}

/**
 * Read and parse a JSON file. A leading UTF-8 BOM is ignored.
 *
 * @throws TranslationError with the given code when the file is unreadable or malformed
 */
export async function readJsonFile(path: string, options: JsonFileOptions): Promise<unknown> {
  const fail = (problem: string, cause: unknown): TranslationError =>
    new TranslationError({
      code: options.code,
      message: `${options.label} ${path} ${problem}: ${cause instanceof Error ? cause.message : String(cause)}`,
      suggestion: options.suggestion,
      cause,
      context: { path },
    });

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw fail('cannot be read', error);
  }

  try {
    const parsed: unknown = JSON.parse(content.replace(/^\uFEFF/, ''));
    return parsed;
  } catch (error) {
    throw fail('is not valid JSON', error);
  }
}
