/**
 * One translation run: catalog, transforms registry, orchestrator, input
 */

import { Logger, TranslationError } from '@connect-migrator/core';
import {
  createMappingOrchestrator,
  TemplateCatalog,
  TransformRegistry,
  type BatchTranslation,
} from '@connect-migrator/mapping-engine';
import type { CliConfig } from './config.js';
import { readJsonFile } from './json-file.js';

export interface RunOptions {
  config: CliConfig;
  inputPath: string;
  logger?: Logger;
}

export async function runTranslation(options: RunOptions): Promise<BatchTranslation> {
  const { config } = options;
  const logger = options.logger ?? new Logger(config.logging);

  const catalog = await TemplateCatalog.fromDirectory(config.templatesDir, {
    debeziumVersion: config.debeziumVersion,
    logger,
  });
  if (catalog.size === 0) {
    throw new TranslationError({
      code: 'CONFIGURATION_ERROR',
      message: `No templates found in ${config.templatesDir}`,
      suggestion: 'Point templatesDir at a directory of FM template JSON files.',
    });
  }

  const transforms = config.transformsFallbackFile
    ? await TransformRegistry.fromFile(config.transformsFallbackFile)
    : undefined;

  logger.info('Template catalog ready', {
    templates: catalog.size,
    transformsFallback: config.transformsFallbackFile ?? null,
  });

  const orchestrator = createMappingOrchestrator(catalog, {
    transforms,
    semanticThreshold: config.semanticThreshold,
    semanticFailureSeverity: config.semanticFailureSeverity,
    tierOrder: config.tierOrder,
    concurrency: config.concurrency,
    logger,
  });

  const raw = await readJsonFile(options.inputPath, {
    label: 'input file',
    code: 'INVALID_INPUT',
    suggestion: 'Pass a JSON export of the self-managed connectors with --input.',
  });

  return orchestrator.translateInput(raw);
}
